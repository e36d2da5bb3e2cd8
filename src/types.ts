import type { ConfigManager } from "./config";
import type { CircuitBreaker } from "./utils/circuit-breaker";

/**
 * Wire dialect a backend speaks.
 * "anthropic" is the native message API, "openai" the chat-completions API.
 */
export type Platform = "anthropic" | "openai";

/**
 * Upstream backend configuration
 */
export interface Backend {
  name: string;
  baseUrl: string;
  token: string;
  enabled: boolean;
  model?: string; // Overrides the request's model field when set
  platform: Platform;
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  openTimeoutSeconds: number;
  halfOpenRequests: number;
}

export interface RateLimitConfig {
  cooldownSeconds: number;
}

export interface FailoverConfig {
  circuitBreaker: CircuitBreakerConfig;
  rateLimit: RateLimitConfig;
}

/**
 * Application configuration
 */
export interface AppConfig {
  port: number;
  debug: boolean;
  adminToken?: string;
  backends: Backend[];
  retry: {
    timeoutSeconds: number;
  };
  failover: FailoverConfig;
}

/**
 * Runtime circuit breaker state, one per configured backend.
 * Timestamps are epoch milliseconds, null when unset.
 */
export interface BackendState {
  backend: Backend;
  consecutiveFailures: number;
  lastFailureTime: number | null;
  lastError: string | null;
  circuitOpen: boolean;
  openedAt: number | null;
  last429Time: number | null;
  retryAfterUntil: number | null;
  halfOpenTries: number;
  lastTrialTime: number | null;
}

export type CircuitState = "closed" | "open" | "half-open" | "unknown";

export type SkipDecision =
  | { skip: false }
  | { skip: true; reason: string; remainingSeconds: number };

/**
 * Request as received from the client, body buffered once.
 */
export interface InboundRequest {
  method: string;
  path: string;
  search: string; // Includes the leading "?" or is empty
  headers: Record<string, string>;
  body: Uint8Array;
}

/**
 * Hono context variables shared by the management routes.
 */
export type AppEnv = {
  Variables: {
    configManager: ConfigManager;
    breaker: CircuitBreaker;
    adminToken: string | undefined;
  };
};
