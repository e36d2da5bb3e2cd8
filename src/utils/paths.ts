import * as path from 'path';
import * as os from 'os';
import { mkdirSync, existsSync } from 'fs';

const DATA_DIR_NAME = '.failover-proxy';

export const CONFIG_ENV_VAR = 'FAILOVER_PROXY_CONFIG';

export function getDataDir(): string {
  return path.join(os.homedir(), DATA_DIR_NAME);
}

export function getConfigPath(customPath?: string): string {
  if (customPath) return path.resolve(customPath);
  const fromEnv = process.env[CONFIG_ENV_VAR];
  if (fromEnv) {
    return path.resolve(fromEnv);
  }
  return path.join(getDataDir(), 'config.json');
}

export function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}
