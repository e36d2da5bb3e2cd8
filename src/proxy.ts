import type { Context } from "hono";
import { stream } from "hono/streaming";
import { BackendState, InboundRequest } from "./types";
import { ConversionError, errorBody, errorMessage } from "./errors";
import { CircuitBreaker } from "./utils/circuit-breaker";
import { readBody, toArrayBuffer } from "./utils/compression";
import { buildCurlCommand } from "./utils/curl";
import { OpenAIStreamConverter, convertResponseBody } from "./utils/format-converter";
import { cleanHeaders } from "./utils/headers";
import { Logger, createLogger, generateRequestId, preview } from "./utils/logger";
import { AttemptPlan, classifyStatus, prepareAttempt } from "./utils/provider";
import { StreamRelay } from "./utils/stream-relay";

/**
 * Result of one attempt against one backend. Only `respond` ends the loop.
 */
export type AttemptOutcome =
  | { kind: "retry"; error: string }
  | { kind: "respond"; response: Response };

export interface FailoverProxyOptions {
  timeoutSeconds: number;
  logger?: Logger;
}

interface AttemptContext {
  c: Context;
  state: BackendState;
  request: InboundRequest;
  requestId: string;
  logger: Logger;
}

function isEventStream(response: Response): boolean {
  const type = response.headers.get("content-type") ?? "";
  return type.toLowerCase().includes("text/event-stream");
}

/**
 * Walks the backends in priority order until one gives an answer worth
 * returning to the client, feeding every outcome into the circuit breaker.
 */
export class FailoverProxy {
  private readonly logger: Logger;
  private readonly decoder = new TextDecoder();

  constructor(
    private readonly breaker: CircuitBreaker,
    private readonly options: FailoverProxyOptions,
  ) {
    this.logger = options.logger ?? createLogger();
  }

  async handle(c: Context): Promise<Response> {
    const startTime = Date.now();
    const headers = c.req.header();
    const requestId = headers["x-request-id"] || generateRequestId();
    const logger = this.logger.child(requestId);
    const url = new URL(c.req.url);

    let body: Uint8Array;
    try {
      body = new Uint8Array(await c.req.arrayBuffer());
    } catch (e) {
      logger.warn("request.error", "Failed to read request body", { error: errorMessage(e) });
      return c.json(
        errorBody("invalid_request_error", `failed to read request body: ${errorMessage(e)}`),
        400,
        { "x-request-id": requestId },
      );
    }

    const request: InboundRequest = {
      method: c.req.method,
      path: url.pathname,
      search: url.search,
      headers,
      body,
    };

    logger.info("request.start", "Incoming proxy request", {
      method: request.method,
      path: request.path,
      bytes: body.length,
    });

    const candidates = this.breaker.sortBackendsByPriority();
    let lastError = "no enabled backends";
    let attempts = 0;

    for (const state of candidates) {
      const decision = this.breaker.shouldSkipBackend(state);
      if (decision.skip) {
        logger.info("circuit_breaker.skip", `Skipping ${state.backend.name}: ${decision.reason}`, {
          backend: state.backend.name,
          reason: decision.reason,
          remainingSeconds: decision.remainingSeconds,
        });
        lastError = `${state.backend.name}: ${decision.reason}`;
        continue;
      }

      attempts++;
      const outcome = await this.attempt({ c, state, request, requestId, logger });

      if (outcome.kind === "respond") {
        logger.info("request.complete", "Request completed", {
          backend: state.backend.name,
          status: outcome.response.status,
          attempts,
          latency: Date.now() - startTime,
        });
        return outcome.response;
      }

      lastError = `${state.backend.name}: ${outcome.error}`;
      if (c.req.raw.signal.aborted) {
        logger.info("request.error", "Client disconnected, stopping failover", { attempts });
        break;
      }
    }

    logger.error("request.error", "All backends unavailable", {
      attempts,
      candidates: candidates.length,
      error: lastError,
      latency: Date.now() - startTime,
    });

    if (logger.isDebug) {
      const curl = buildCurlCommand(
        request.method,
        c.req.url,
        headers,
        body.length > 0 ? this.decoder.decode(body) : undefined,
      );
      logger.debug("request.debug_curl", "Reproducible curl command for failed request", { curl });
    }

    return c.json(
      errorBody("fallback_exhausted", `All backends unavailable: ${lastError}`),
      502,
      { "x-request-id": requestId },
    );
  }

  private async attempt(ctx: AttemptContext): Promise<AttemptOutcome> {
    const { state, request, logger } = ctx;
    const backend = state.backend;

    let plan: AttemptPlan;
    try {
      plan = prepareAttempt(backend, request, this.options.timeoutSeconds, logger);
    } catch (e) {
      const detail = errorMessage(e);
      logger.warn("conversion.error", `Cannot prepare request for ${backend.name}`, {
        backend: backend.name,
        error: detail,
      });
      this.breaker.recordFailure(state, 0, detail);
      return { kind: "retry", error: detail };
    }

    const trial = this.breaker.beginAttempt(state);
    logger.info("backend.attempt", `Forwarding request to ${backend.name}`, {
      backend: backend.name,
      model: plan.model,
      streaming: plan.streaming,
      converted: plan.converted,
      halfOpenTrial: trial,
    });

    const clientSignal = ctx.c.req.raw.signal;
    const controller = new AbortController();
    const onClientAbort = () => controller.abort();
    clientSignal.addEventListener("abort", onClientAbort, { once: true });

    let timedOut = false;
    const timeoutId =
      plan.timeoutMs === null
        ? null
        : setTimeout(() => {
            timedOut = true;
            controller.abort();
          }, plan.timeoutMs);

    const attemptStart = Date.now();
    // Local failure: transport error, timeout or an unreadable body
    const fail = (statusCode: number, detail: string): AttemptOutcome => {
      if (clientSignal.aborted && !timedOut) {
        return { kind: "retry", error: "client disconnected" };
      }
      const event = timedOut ? "backend.timeout" : "backend.failure";
      logger.warn(event, `${backend.name} failed: ${detail}`, {
        backend: backend.name,
        status: statusCode,
        error: detail,
        latency: Date.now() - attemptStart,
      });
      this.breaker.recordFailure(state, statusCode, detail);
      return { kind: "retry", error: detail };
    };

    try {
      let response: Response;
      try {
        response = await fetch(plan.url, {
          method: plan.method,
          headers: plan.headers,
          body: plan.body instanceof Uint8Array ? toArrayBuffer(plan.body) : plan.body,
          signal: controller.signal,
        });
      } catch (e) {
        return fail(0, timedOut ? `timeout after ${this.options.timeoutSeconds}s` : errorMessage(e));
      }

      const status = response.status;
      const statusClass = classifyStatus(status);

      if (statusClass === "success") {
        // The upstream's content type decides, whatever the request asked for
        if (isEventStream(response) && response.body) {
          // The deadline covers the call, never a live stream
          if (timeoutId !== null) clearTimeout(timeoutId);
          this.breaker.recordSuccess(state);
          logger.info("backend.success", `${backend.name} streaming`, {
            backend: backend.name,
            status,
            latency: Date.now() - attemptStart,
          });
          return { kind: "respond", response: this.relay(ctx, plan, response, response.body) };
        }

        const bytes = await this.readUpstream(response, logger);
        if (bytes === null || timedOut || clientSignal.aborted) {
          return fail(0, timedOut ? `timeout after ${this.options.timeoutSeconds}s` : "failed to read response body");
        }

        this.breaker.recordSuccess(state);
        logger.info("backend.success", `${backend.name} succeeded`, {
          backend: backend.name,
          status,
          bytes: bytes.length,
          latency: Date.now() - attemptStart,
        });
        return { kind: "respond", response: this.buffered(ctx, plan, response, bytes) };
      }

      const bytes = await this.readUpstream(response, logger);
      if (bytes === null) {
        return fail(status, `HTTP ${status} (unreadable body)`);
      }
      const text = this.decoder.decode(bytes);

      switch (statusClass) {
        case "rate_limited": {
          logger.warn("backend.failure", `${backend.name} rate limited`, {
            backend: backend.name,
            status,
            body: preview(text),
          });
          this.breaker.record429(state, response.headers.get("retry-after"));
          return { kind: "retry", error: `HTTP ${status}` };
        }
        case "server_error": {
          logger.warn("backend.failure", `${backend.name} returned ${status}`, {
            backend: backend.name,
            status,
            body: preview(text),
          });
          this.breaker.recordFailure(state, status, `HTTP ${status}: ${preview(text, 200)}`);
          return { kind: "retry", error: `HTTP ${status}` };
        }
        case "auth_error":
          logger.warn("backend.failure", `${backend.name} rejected credentials`, {
            backend: backend.name,
            status,
            body: preview(text),
          });
          return { kind: "respond", response: this.passthrough(ctx, response, bytes) };
        default:
          logger.info("backend.failure", `${backend.name} returned ${status}, not eligible for failover`, {
            backend: backend.name,
            status,
          });
          return { kind: "respond", response: this.passthrough(ctx, response, bytes) };
      }
    } finally {
      if (timeoutId !== null) clearTimeout(timeoutId);
      clientSignal.removeEventListener("abort", onClientAbort);
    }
  }

  private async readUpstream(response: Response, logger: Logger): Promise<Uint8Array | null> {
    try {
      return await readBody(response, logger);
    } catch (e) {
      logger.warn("backend.failure", "Failed to read upstream body", { error: errorMessage(e) });
      return null;
    }
  }

  private responseHeaders(response: Response, requestId: string): Headers {
    const headers = new Headers(cleanHeaders(response.headers));
    headers.set("x-request-id", requestId);
    return headers;
  }

  private passthrough(ctx: AttemptContext, response: Response, bytes: Uint8Array): Response {
    return new Response(toArrayBuffer(bytes), {
      status: response.status,
      headers: this.responseHeaders(response, ctx.requestId),
    });
  }

  private buffered(
    ctx: AttemptContext,
    plan: AttemptPlan,
    response: Response,
    bytes: Uint8Array,
  ): Response {
    const headers = this.responseHeaders(response, ctx.requestId);
    if (!plan.converted) {
      return new Response(toArrayBuffer(bytes), { status: response.status, headers });
    }

    try {
      const converted = convertResponseBody(this.decoder.decode(bytes));
      ctx.logger.debug("conversion.response", "Converted chat-completions response", {
        backend: ctx.state.backend.name,
        bytes: converted.length,
      });
      headers.set("content-type", "application/json");
      return new Response(converted, { status: response.status, headers });
    } catch (e) {
      if (!(e instanceof ConversionError)) throw e;
      ctx.logger.error("conversion.error", "Failed to convert response", {
        backend: ctx.state.backend.name,
        error: e.message,
        body: preview(this.decoder.decode(bytes)),
      });
      return ctx.c.json(errorBody("api_error", e.message), 500, { "x-request-id": ctx.requestId });
    }
  }

  private relay(
    ctx: AttemptContext,
    plan: AttemptPlan,
    response: Response,
    body: ReadableStream<Uint8Array>,
  ): Response {
    const { c, state, logger, requestId } = ctx;
    const headers = this.responseHeaders(response, requestId);
    headers.set("content-type", "text/event-stream");
    headers.set("cache-control", "no-cache");

    const converter = plan.converted ? new OpenAIStreamConverter(plan.model ?? "") : undefined;

    const streamed = stream(c, async (s) => {
      const relay = new StreamRelay(s, {
        converter,
        backend: state.backend.name,
        logger,
      });
      s.onAbort(() => relay.abort());
      await relay.relay(body);
    });
    return new Response(streamed.body, { status: response.status, headers });
  }
}
