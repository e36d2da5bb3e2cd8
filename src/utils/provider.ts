import { Backend, InboundRequest } from '../types';
import { ConversionError } from '../errors';
import { cleanRequestHeaders } from './headers';
import { convertAnthropicToOpenAI } from './format-converter';
import { Logger } from './logger';

const MESSAGES_PATH = '/v1/messages';
const CHAT_COMPLETIONS_PATH = '/v1/chat/completions';

/**
 * Everything needed to send one attempt to one backend.
 */
export interface AttemptPlan {
  method: string;
  url: string;
  headers: Record<string, string>;
  body: Uint8Array | string | undefined;
  /** Client asked for `stream: true` */
  streaming: boolean;
  /** Deadline for call plus body read; null means none */
  timeoutMs: number | null;
  /** Request was converted to chat-completions, so the response must be converted back */
  converted: boolean;
  /** Model sent upstream, when the body carries one */
  model?: string;
}

export type StatusClass =
  | 'success'
  | 'rate_limited'
  | 'server_error'
  | 'auth_error'
  | 'client_error';

export function classifyStatus(status: number): StatusClass {
  if (status >= 200 && status < 300) return 'success';
  if (status === 429) return 'rate_limited';
  if (status >= 500) return 'server_error';
  if (status === 401 || status === 403) return 'auth_error';
  return 'client_error';
}

export function isMessagesPath(path: string): boolean {
  return path.endsWith(MESSAGES_PATH);
}

/**
 * Path the client asked for, rewritten for chat-completions backends.
 */
export function upstreamPath(backend: Backend, path: string): string {
  if (backend.platform === 'openai' && isMessagesPath(path)) {
    return path.slice(0, -MESSAGES_PATH.length) + CHAT_COMPLETIONS_PATH;
  }
  return path;
}

/**
 * Base URL (path prefix kept, trailing slash dropped) + client path + query.
 */
export function buildTargetUrl(baseUrl: string, path: string, search: string): string {
  const base = new URL(baseUrl);
  const prefix = base.pathname.replace(/\/+$/, '');
  return `${base.origin}${prefix}${path}${search}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a body as a JSON object; null when it is anything else.
 */
export function parseJsonObject(body: Uint8Array): Record<string, unknown> | null {
  if (body.length === 0) return null;
  try {
    const value: unknown = JSON.parse(new TextDecoder().decode(body));
    return isRecord(value) ? value : null;
  } catch {
    return null;
  }
}

/**
 * Build the upstream request for one backend. The inbound body is never
 * modified; rewritten bodies are fresh strings.
 * Throws ConversionError when a chat-completions backend cannot take the body.
 */
export function prepareAttempt(
  backend: Backend,
  request: InboundRequest,
  timeoutSeconds: number,
  logger?: Logger,
): AttemptPlan {
  const path = upstreamPath(backend, request.path);
  if (path !== request.path) {
    logger?.debug('backend.path_rewrite', `Rewrote ${request.path} to ${path}`, {
      backend: backend.name,
      from: request.path,
      to: path,
    });
  }

  const hasBody =
    request.method !== 'GET' && request.method !== 'HEAD' && request.body.length > 0;
  const json = hasBody ? parseJsonObject(request.body) : null;
  const streaming = json?.stream === true;
  const convert = backend.platform === 'openai' && isMessagesPath(request.path);

  let body: Uint8Array | string | undefined = hasBody ? request.body : undefined;
  let model = typeof json?.model === 'string' ? json.model : undefined;
  let rewritten = false;

  if (json && backend.model) {
    logger?.debug('backend.model_override', `Model ${model ?? '(none)'} -> ${backend.model}`, {
      backend: backend.name,
      from: model,
      model: backend.model,
    });
    model = backend.model;
    rewritten = true;
  }

  if (convert) {
    if (!json) {
      throw new ConversionError('cannot convert request: body is not a JSON object');
    }
    const foreign = convertAnthropicToOpenAI({ ...json, ...(model !== undefined ? { model } : {}) });
    body = JSON.stringify(foreign);
    model = foreign.model;
    logger?.debug('conversion.request', 'Converted request to chat-completions', {
      backend: backend.name,
      model,
      messages: foreign.messages.length,
    });
  } else if (rewritten && json) {
    body = JSON.stringify({ ...json, model });
  }

  const headers = cleanRequestHeaders(request.headers);
  if ((convert || rewritten) && !Object.keys(headers).some((k) => k.toLowerCase() === 'content-type')) {
    headers['content-type'] = 'application/json';
  }
  headers['Authorization'] = `Bearer ${backend.token}`;

  return {
    method: request.method,
    url: buildTargetUrl(backend.baseUrl, path, request.search),
    headers,
    body,
    streaming,
    timeoutMs: streaming ? null : timeoutSeconds * 1000,
    converted: convert,
    ...(model !== undefined ? { model } : {}),
  };
}
