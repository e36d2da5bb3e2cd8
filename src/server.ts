import { serve } from '@hono/node-server';
import { ConfigManager } from './config';
import { createApp } from './index';
import { CircuitBreaker } from './utils/circuit-breaker';
import { createLogger } from './utils/logger';
import { getConfigPath } from './utils/paths';

export interface ServerOptions {
  port?: number;
  configPath?: string;
}

export interface ServerInstance {
  port: number;
  stop: () => void;
}

/**
 * Load the config, build the shared breaker and start the proxy server.
 */
export async function createServer(options: ServerOptions = {}): Promise<ServerInstance> {
  const configPath = getConfigPath(options.configPath);
  const configManager = new ConfigManager(configPath);
  const config = await configManager.load();

  const logger = createLogger(undefined, config.debug);
  const breaker = new CircuitBreaker(config.backends, config.failover, logger);
  const app = createApp({ configManager, breaker, config, logger });

  const port = options.port ?? config.port;
  const server = serve({
    fetch: app.fetch,
    port,
  });

  logger.info('server.start', `Server is running on http://127.0.0.1:${port}`, {
    port,
    config: configPath,
    backends: config.backends.map((b) => `${b.name}${b.enabled ? '' : ' (disabled)'}`),
  });

  const stop = () => {
    server.close();
    logger.info('server.stop', 'Server stopped');
  };

  // Graceful shutdown
  const shutdown = () => {
    stop();
    process.exit(0);
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);

  return { port, stop };
}
