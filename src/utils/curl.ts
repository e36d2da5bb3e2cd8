/**
 * Build a copy-paste ready curl command from request components.
 * Used for debug logging when all backends fail.
 */
import { redactHeaders } from './headers';

const EXCLUDED_HEADERS = new Set([
  'host',
  'connection',
  'keep-alive',
  'content-length',
  'transfer-encoding',
  'te',
  'trailer',
  'upgrade',
]);

function escapeShellSingleQuote(str: string): string {
  // Replace ' with '\'' (end quote, escaped quote, start quote)
  return str.replace(/'/g, "'\\''");
}

export function buildCurlCommand(
  method: string,
  url: string,
  headers: Record<string, string>,
  body?: string,
): string {
  const parts: string[] = [`curl -X ${method.toUpperCase()} '${escapeShellSingleQuote(url)}'`];

  for (const [key, value] of Object.entries(redactHeaders(headers))) {
    if (EXCLUDED_HEADERS.has(key.toLowerCase())) continue;
    parts.push(`-H '${escapeShellSingleQuote(key)}: ${escapeShellSingleQuote(value)}'`);
  }

  if (body !== undefined && body !== '') {
    parts.push(`-d '${escapeShellSingleQuote(body)}'`);
  }

  return parts.join(' ');
}
