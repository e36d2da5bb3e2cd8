import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { initIfNeeded } from '../../utils/init';
import { CONFIG_ENV_VAR, getConfigPath, getDataDir } from '../../utils/paths';
import { parseConfig } from '../../config';

describe('getConfigPath', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('defaults to config.json in the data directory', () => {
    vi.stubEnv(CONFIG_ENV_VAR, '');
    expect(getConfigPath()).toBe(path.join(os.homedir(), '.failover-proxy', 'config.json'));
    expect(getDataDir()).toBe(path.join(os.homedir(), '.failover-proxy'));
  });

  it('prefers an explicit path over the environment', () => {
    vi.stubEnv(CONFIG_ENV_VAR, '/etc/proxy/env.json');
    expect(getConfigPath('/tmp/explicit.json')).toBe('/tmp/explicit.json');
    expect(getConfigPath()).toBe('/etc/proxy/env.json');
  });

  it('resolves relative paths', () => {
    vi.stubEnv(CONFIG_ENV_VAR, '');
    expect(getConfigPath('conf/proxy.json')).toBe(path.resolve('conf/proxy.json'));
  });
});

describe('initIfNeeded', () => {
  let dir: string;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    dir = mkdtempSync(path.join(os.tmpdir(), 'failover-proxy-init-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes a valid example config on first run', () => {
    const configPath = path.join(dir, 'nested', 'config.json');

    expect(initIfNeeded(configPath)).toBe(true);

    expect(existsSync(configPath)).toBe(true);
    const config = parseConfig(JSON.parse(readFileSync(configPath, 'utf-8')));
    expect(config.backends[0].name).toBe('primary');
  });

  it('leaves an existing config alone', () => {
    const configPath = path.join(dir, 'config.json');
    initIfNeeded(configPath);
    const before = readFileSync(configPath, 'utf-8');

    expect(initIfNeeded(configPath)).toBe(false);
    expect(readFileSync(configPath, 'utf-8')).toBe(before);
  });
});
