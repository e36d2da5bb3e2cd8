/**
 * Headers that only describe a single connection (RFC 7230 section 6.1).
 */
export const HOP_BY_HOP_HEADERS = [
  "connection",
  "keep-alive",
  "proxy-authenticate",
  "proxy-authorization",
  "te",
  "trailer",
  "transfer-encoding",
  "upgrade",
];

/**
 * Filter out specific headers by key names (case-insensitive).
 */
export function filterHeaders(
  headers: Record<string, string>,
  keys: string[],
): Record<string, string> {
  const excluded = new Set(keys.map((k) => k.toLowerCase()));
  return Object.fromEntries(
    Object.entries(headers).filter(([key]) => !excluded.has(key.toLowerCase())),
  );
}

/**
 * Client headers safe to forward upstream. The client's own credentials are
 * dropped; the backend token is set separately.
 */
export function cleanRequestHeaders(
  headers: Record<string, string>,
): Record<string, string> {
  return filterHeaders(headers, [
    ...HOP_BY_HOP_HEADERS,
    "host",
    "content-length",
    "accept-encoding",
    "authorization",
    "x-api-key",
  ]);
}

/**
 * Clean hop-by-hop headers for response forwarding.
 * Length and encoding are dropped because the body may be decoded or rewritten.
 */
export function cleanHeaders(headers: Headers): Record<string, string> {
  const result: Record<string, string> = {};
  const unsafeHeaders = new Set([
    ...HOP_BY_HOP_HEADERS,
    "content-length",
    "content-encoding",
    "host",
  ]);

  headers.forEach((value, key) => {
    if (!unsafeHeaders.has(key.toLowerCase())) {
      result[key] = value;
    }
  });

  return result;
}

/**
 * Header map suitable for logs and curl output, with credentials masked.
 */
export function redactHeaders(
  headers: Record<string, string>,
): Record<string, string> {
  const sensitive = new Set(["authorization", "x-api-key", "proxy-authorization"]);
  return Object.fromEntries(
    Object.entries(headers).map(([key, value]) => [
      key,
      sensitive.has(key.toLowerCase()) ? "[REDACTED]" : value,
    ]),
  );
}
