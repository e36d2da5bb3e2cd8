import { existsSync, copyFileSync, writeFileSync } from 'fs';
import * as path from 'path';
import { getConfigPath, ensureDir } from './paths';

const MINIMAL_CONFIG = {
  port: 8080,
  debug: false,
  backends: [
    {
      name: 'primary',
      base_url: 'https://api.example.com',
      token: 'YOUR_TOKEN_HERE',
      enabled: true,
      platform: 'anthropic',
    },
  ],
  retry: { timeout_seconds: 30 },
  failover: {
    circuit_breaker: {
      failure_threshold: 3,
      open_timeout_seconds: 30,
      half_open_requests: 1,
    },
    rate_limit: { cooldown_seconds: 60 },
  },
};

/**
 * First-run initialization.
 * If no config file exists, copies config.example.json next to the resolved
 * config path (or writes a minimal one) and prints next steps.
 *
 * Returns true if this was a first run (config was just created).
 */
export function initIfNeeded(configPath?: string): boolean {
  const resolvedConfig = getConfigPath(configPath);

  if (existsSync(resolvedConfig)) {
    return false;
  }

  ensureDir(path.dirname(resolvedConfig));

  // Find the example file bundled with the package
  const examplePaths = [
    path.join(__dirname, '..', '..', 'config.example.json'),
    path.join(__dirname, '..', 'config.example.json'),
    path.join(process.cwd(), 'config.example.json'),
  ];

  const examplePath = examplePaths.find((p) => existsSync(p));

  if (examplePath) {
    copyFileSync(examplePath, resolvedConfig);
  } else {
    writeFileSync(resolvedConfig, `${JSON.stringify(MINIMAL_CONFIG, null, 2)}\n`, 'utf-8');
  }
  console.log(`Created config at: ${resolvedConfig}`);

  console.log('');
  console.log('Welcome to failover-proxy!');
  console.log('');
  console.log('Next steps:');
  console.log(`  1. Edit your config: ${resolvedConfig}`);
  console.log('  2. Set base_url and token for each backend and enable at least one');
  console.log('  3. Run again: failover-proxy serve');
  console.log('');

  return true;
}
