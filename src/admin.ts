import { Context, Next } from 'hono';
import { AppEnv } from './types';
import { errorMessage } from './errors';

/**
 * Management API: backend listing, circuit status and enable/disable toggles.
 * Handlers read the ConfigManager and CircuitBreaker from context variables.
 */

export interface ErrorResponse {
  error: string;
  message?: string;
}

function errorResponse(error: string, message: string): ErrorResponse {
  return { error, message };
}

/**
 * Mask a credential for display: first 4 + "..." + last 4.
 */
export function maskToken(token: string): string {
  if (token.length <= 8) return '****';
  return `${token.slice(0, 4)}...${token.slice(-4)}`;
}

function isoOrNull(epochMs: number | null): string | null {
  return epochMs === null ? null : new Date(epochMs).toISOString();
}

/**
 * Authentication middleware - validates token from query or header.
 * Open when no admin token is configured.
 */
export async function authMiddleware(c: Context<AppEnv>, next: Next) {
  const expected = c.get('adminToken');
  if (!expected) {
    await next();
    return;
  }

  const token =
    c.req.query('token') ||
    c.req.header('Authorization')?.replace('Bearer ', '');

  if (token !== expected) {
    return c.json(errorResponse('Unauthorized', 'Invalid or missing admin token'), 401);
  }

  await next();
}

/**
 * GET /health
 */
export async function getHealth(c: Context<AppEnv>) {
  const config = c.get('configManager').getConfig();
  return c.json({
    status: 'healthy',
    total_backends: config.backends.length,
    enabled_backends: config.backends.filter((b) => b.enabled).length,
    timestamp: new Date().toISOString(),
  });
}

/**
 * GET /backends - configured backends with masked tokens
 */
export async function getBackends(c: Context<AppEnv>) {
  const config = c.get('configManager').getConfig();
  const backends = config.backends.map((b) => ({
    name: b.name,
    base_url: b.baseUrl,
    enabled: b.enabled,
    ...(b.model ? { model: b.model } : {}),
    platform: b.platform,
    token_masked: maskToken(b.token),
  }));
  return c.json({ backends, count: backends.length });
}

/**
 * GET /backends/status - circuit breaker and rate limit state per backend
 */
export async function getBackendsStatus(c: Context<AppEnv>) {
  const config = c.get('configManager').getConfig();
  const breaker = c.get('breaker');

  const backends = config.backends.map((b) => {
    const circuit = breaker.getBackendState(b.name);
    const rateLimit = breaker.getRateLimitState(b.name);
    return {
      name: b.name,
      enabled: b.enabled,
      circuit_breaker: {
        state: circuit.state,
        consecutive_failures: circuit.consecutiveFailures,
        last_failure_time: isoOrNull(circuit.lastFailureTime),
      },
      rate_limit: {
        cooldown_until: isoOrNull(rateLimit.cooldownUntil),
        retry_after_seconds: rateLimit.retryAfterSeconds,
      },
      ...(circuit.lastError ? { last_error: circuit.lastError } : {}),
    };
  });

  return c.json({ backends, count: backends.length });
}

async function toggleBackend(c: Context<AppEnv>, enable: boolean) {
  const name = c.req.param('name');
  if (!name) {
    return c.json(errorResponse('Missing backend name', 'Backend name is required'), 400);
  }

  const manager = c.get('configManager');
  const breaker = c.get('breaker');
  const action = enable ? 'enable' : 'disable';

  try {
    if (enable) {
      await manager.enableBackend(name);
      breaker.onBackendEnabled(name);
    } else {
      await manager.disableBackend(name);
      breaker.onBackendDisabled(name);
    }
  } catch (e) {
    return c.json(errorResponse(`Failed to ${action} backend`, errorMessage(e)), 400);
  }

  return c.json({ success: true, message: `Backend '${name}' has been ${action}d` });
}

/**
 * GET|POST /backend/:name/enable
 */
export async function enableBackend(c: Context<AppEnv>) {
  return toggleBackend(c, true);
}

/**
 * GET|POST /backend/:name/disable
 */
export async function disableBackend(c: Context<AppEnv>) {
  return toggleBackend(c, false);
}
