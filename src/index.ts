import { Hono } from "hono";
import { AppConfig, AppEnv } from "./types";
import { ConfigManager } from "./config";
import { CircuitBreaker } from "./utils/circuit-breaker";
import { Logger, createLogger } from "./utils/logger";
import { FailoverProxy } from "./proxy";
import {
  authMiddleware,
  getHealth,
  getBackends,
  getBackendsStatus,
  enableBackend,
  disableBackend,
} from "./admin";

export interface AppDeps {
  configManager: ConfigManager;
  breaker: CircuitBreaker;
  config: AppConfig;
  logger?: Logger;
}

/**
 * Build the HTTP app: management routes first, everything else is proxied.
 */
export function createApp(deps: AppDeps): Hono<AppEnv> {
  const { configManager, breaker, config } = deps;
  const logger = deps.logger ?? createLogger(undefined, config.debug);
  const proxy = new FailoverProxy(breaker, {
    timeoutSeconds: config.retry.timeoutSeconds,
    logger,
  });

  const app = new Hono<AppEnv>();

  app.use("*", async (c, next) => {
    c.set("configManager", configManager);
    c.set("breaker", breaker);
    c.set("adminToken", config.adminToken);
    await next();
  });

  // Management routes
  app.get("/health", authMiddleware, getHealth);
  app.get("/backends", authMiddleware, getBackends);
  app.get("/backends/status", authMiddleware, getBackendsStatus);
  app.on(["GET", "POST"], "/backend/:name/enable", authMiddleware, enableBackend);
  app.on(["GET", "POST"], "/backend/:name/disable", authMiddleware, disableBackend);

  // Everything else goes upstream
  app.all("*", (c) => proxy.handle(c));

  return app;
}

export { FailoverProxy } from "./proxy";
export { CircuitBreaker } from "./utils/circuit-breaker";
export { ConfigManager, loadConfig, parseConfig } from "./config";
export type { AppConfig, Backend, BackendState } from "./types";
