import {
  AppConfig,
  BackendState,
  CircuitState,
  FailoverConfig,
  SkipDecision,
} from "../types";
import { Logger, createLogger } from "./logger";

/**
 * Per-backend circuit breaker with rate-limit demotion.
 *
 * States are derived from the record:
 * - closed:    circuitOpen === false
 * - open:      circuitOpen and the open timeout has not elapsed since openedAt
 * - half-open: circuitOpen and the open timeout has elapsed; up to
 *              halfOpenRequests trial attempts are let through per probe round
 *
 * A 429 never counts as a failure. It only moves the backend behind the
 * non-rate-limited ones in sortBackendsByPriority() for cooldownSeconds.
 *
 * All methods are synchronous, so each read or write of a BackendState
 * completes before any other request handler runs. Callers must not keep a
 * decision across an await and act on it later without asking again.
 */

export interface CircuitBreakerInfo {
  state: CircuitState;
  consecutiveFailures: number;
  lastFailureTime: number | null;
  lastError: string | null;
}

export interface RateLimitInfo {
  cooldownUntil: number | null;
  retryAfterSeconds: number;
}

function createState(backend: AppConfig["backends"][number]): BackendState {
  return {
    backend: { ...backend },
    consecutiveFailures: 0,
    lastFailureTime: null,
    lastError: null,
    circuitOpen: false,
    openedAt: null,
    last429Time: null,
    retryAfterUntil: null,
    halfOpenTries: 0,
    lastTrialTime: null,
  };
}

function remainingSeconds(sinceMs: number, windowMs: number): number {
  return Math.max(0, Math.ceil((windowMs - sinceMs) / 1000));
}

export class CircuitBreaker {
  private readonly states: BackendState[];
  private readonly logger: Logger;

  constructor(
    backends: AppConfig["backends"],
    private readonly config: FailoverConfig,
    logger?: Logger,
  ) {
    this.states = backends.map(createState);
    this.logger = logger ?? createLogger();
  }

  private get openTimeoutMs(): number {
    return this.config.circuitBreaker.openTimeoutSeconds * 1000;
  }

  private get cooldownMs(): number {
    return this.config.rateLimit.cooldownSeconds * 1000;
  }

  getStates(): readonly BackendState[] {
    return this.states;
  }

  findState(name: string): BackendState | undefined {
    return this.states.find((s) => s.backend.name === name);
  }

  /**
   * Enabled backends in configured order, with the ones inside their 429
   * cooldown moved after all the others.
   */
  sortBackendsByPriority(): BackendState[] {
    const now = Date.now();
    const normal: BackendState[] = [];
    const rateLimited: BackendState[] = [];

    for (const state of this.states) {
      if (!state.backend.enabled) continue;

      if (state.last429Time !== null && now - state.last429Time < this.cooldownMs) {
        rateLimited.push(state);
      } else {
        normal.push(state);
      }
    }

    return [...normal, ...rateLimited];
  }

  shouldSkipBackend(state: BackendState): SkipDecision {
    if (!state.backend.enabled) {
      return { skip: true, reason: "disabled", remainingSeconds: 0 };
    }

    if (!state.circuitOpen || state.openedAt === null) {
      return { skip: false };
    }

    const now = Date.now();
    const sinceOpen = now - state.openedAt;
    if (sinceOpen < this.openTimeoutMs) {
      const remaining = remainingSeconds(sinceOpen, this.openTimeoutMs);
      return {
        skip: true,
        reason: `circuit open (${remaining}s remaining)`,
        remainingSeconds: remaining,
      };
    }

    const budget = this.config.circuitBreaker.halfOpenRequests;
    if (state.halfOpenTries >= budget && state.lastTrialTime !== null) {
      const sinceTrial = now - state.lastTrialTime;
      if (sinceTrial < this.openTimeoutMs) {
        const remaining = remainingSeconds(sinceTrial, this.openTimeoutMs);
        return {
          skip: true,
          reason: `half-open trials exhausted (${state.halfOpenTries}/${budget}, ${remaining}s remaining)`,
          remainingSeconds: remaining,
        };
      }
    }

    return { skip: false };
  }

  isHalfOpen(state: BackendState): boolean {
    if (!state.circuitOpen || state.openedAt === null) return false;
    return Date.now() - state.openedAt >= this.openTimeoutMs;
  }

  /**
   * Register an attempt that passed shouldSkipBackend(). Returns true when the
   * attempt is a half-open trial. An exhausted round whose wait has elapsed
   * starts a new round here.
   */
  beginAttempt(state: BackendState): boolean {
    if (!this.isHalfOpen(state)) return false;

    const now = Date.now();
    const budget = this.config.circuitBreaker.halfOpenRequests;
    if (
      state.halfOpenTries >= budget &&
      state.lastTrialTime !== null &&
      now - state.lastTrialTime >= this.openTimeoutMs
    ) {
      state.halfOpenTries = 0;
    }

    state.halfOpenTries++;
    state.lastTrialTime = now;
    return true;
  }

  recordSuccess(state: BackendState): void {
    if (state.circuitOpen) {
      this.logger.info("circuit_breaker.reset", `${state.backend.name} recovered, circuit closed`, {
        backend: state.backend.name,
      });
    }

    state.consecutiveFailures = 0;
    state.circuitOpen = false;
    state.openedAt = null;
    state.halfOpenTries = 0;
    state.lastTrialTime = null;
    state.lastFailureTime = null;
  }

  /**
   * Record a 5xx or local/transport failure. statusCode is 0 for the latter.
   */
  recordFailure(state: BackendState, statusCode: number, detail?: string): void {
    const now = Date.now();
    state.consecutiveFailures++;
    state.lastFailureTime = now;
    state.lastError = detail ?? `HTTP ${statusCode}`;

    if (state.circuitOpen) {
      this.logger.warn("circuit_breaker.trial_failed", `${state.backend.name} still failing while open`, {
        backend: state.backend.name,
        status: statusCode,
        halfOpenTries: state.halfOpenTries,
        halfOpenRequests: this.config.circuitBreaker.halfOpenRequests,
      });
      return;
    }

    const threshold = this.config.circuitBreaker.failureThreshold;
    if (state.consecutiveFailures >= threshold) {
      state.circuitOpen = true;
      state.openedAt = now;
      state.halfOpenTries = 0;
      state.lastTrialTime = null;
      this.logger.warn(
        "circuit_breaker.open",
        `${state.backend.name} opened after ${state.consecutiveFailures} consecutive failures`,
        {
          backend: state.backend.name,
          status: statusCode,
          consecutiveFailures: state.consecutiveFailures,
          openTimeoutSeconds: this.config.circuitBreaker.openTimeoutSeconds,
        },
      );
    }
  }

  record429(state: BackendState, retryAfter?: string | null): void {
    const now = Date.now();
    state.last429Time = now;

    const seconds = retryAfter ? parseRetryAfterSeconds(retryAfter) : null;
    state.retryAfterUntil = seconds !== null ? now + seconds * 1000 : null;

    this.logger.warn("rate_limit.record", `${state.backend.name} rate limited`, {
      backend: state.backend.name,
      retryAfterSeconds: seconds,
      cooldownSeconds: this.config.rateLimit.cooldownSeconds,
    });
  }

  getBackendState(name: string): CircuitBreakerInfo {
    const state = this.findState(name);
    if (!state) {
      return {
        state: "unknown",
        consecutiveFailures: 0,
        lastFailureTime: null,
        lastError: null,
      };
    }

    let circuit: CircuitState = "closed";
    if (state.circuitOpen) {
      circuit = this.isHalfOpen(state) ? "half-open" : "open";
    }

    return {
      state: circuit,
      consecutiveFailures: state.consecutiveFailures,
      lastFailureTime: state.lastFailureTime,
      lastError: state.lastError,
    };
  }

  getRateLimitState(name: string): RateLimitInfo {
    const state = this.findState(name);
    if (!state || state.last429Time === null) {
      return { cooldownUntil: null, retryAfterSeconds: 0 };
    }

    const until = state.last429Time + this.cooldownMs;
    const now = Date.now();
    if (now >= until) {
      return { cooldownUntil: null, retryAfterSeconds: 0 };
    }

    return {
      cooldownUntil: until,
      retryAfterSeconds: Math.floor((until - now) / 1000),
    };
  }

  /**
   * Called after the management API enabled a backend. Resets its circuit.
   */
  onBackendEnabled(name: string): void {
    const state = this.findState(name);
    if (!state) return;

    state.backend.enabled = true;
    state.consecutiveFailures = 0;
    state.circuitOpen = false;
    state.openedAt = null;
    state.halfOpenTries = 0;
    state.lastTrialTime = null;
    this.logger.info("backend.enabled", `${name} enabled, circuit state reset`, { backend: name });
  }

  onBackendDisabled(name: string): void {
    const state = this.findState(name);
    if (!state) return;

    state.backend.enabled = false;
    this.logger.info("backend.disabled", `${name} disabled`, { backend: name });
  }
}

/**
 * Parse an integer-seconds Retry-After value. HTTP-date values return null.
 */
export function parseRetryAfterSeconds(value: string): number | null {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  return parseInt(trimmed, 10);
}
