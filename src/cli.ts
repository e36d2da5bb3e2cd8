#!/usr/bin/env node

import { readFileSync } from 'fs';
import * as path from 'path';
import { Command } from 'commander';
import { serveCommand } from './commands/serve';
import { checkCommand } from './commands/check';

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(path.join(__dirname, '..', 'package.json'), 'utf-8'));
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('failover-proxy')
  .description('Reverse proxy that fails over between API backends and converts between message and chat-completions formats')
  .version(readVersion());

program
  .command('serve', { isDefault: true })
  .description('Start the proxy server in the foreground')
  .option('-p, --port <port>', 'Port to listen on (default: from config, else 8080)')
  .option('-c, --config <path>', 'Path to config.json')
  .action(serveCommand);

program
  .command('check')
  .description('Validate the config file and print a summary')
  .option('-c, --config <path>', 'Path to config.json')
  .action(checkCommand);

program.parseAsync().catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : String(e));
  process.exit(1);
});
