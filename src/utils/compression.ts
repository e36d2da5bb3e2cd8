import { constants, gunzipSync } from 'zlib';
import { decompress as zstdDecompress } from 'fzstd';
import { errorMessage } from '../errors';
import { Logger } from './logger';

/**
 * Best-effort decoding of upstream bodies.
 * Honors the declared Content-Encoding and, when none is declared, sniffs
 * gzip or zstd magic bytes. Anything that cannot be decoded is returned raw.
 */

type Encoding = 'gzip' | 'zstd';

const GZIP_MAGIC = [0x1f, 0x8b];
const ZSTD_MAGIC = [0x28, 0xb5, 0x2f, 0xfd];

function startsWith(bytes: Uint8Array, magic: number[]): boolean {
  if (bytes.length < magic.length) return false;
  return magic.every((b, i) => bytes[i] === b);
}

export function sniffEncoding(bytes: Uint8Array): Encoding | null {
  if (startsWith(bytes, GZIP_MAGIC)) return 'gzip';
  if (startsWith(bytes, ZSTD_MAGIC)) return 'zstd';
  return null;
}

/**
 * Map a Content-Encoding header to a supported encoding.
 * Returns undefined when nothing is declared and null for encodings we leave alone.
 */
export function declaredEncoding(header: string | null): Encoding | null | undefined {
  if (!header) return undefined;
  const value = header.trim().toLowerCase();
  if (value === '' || value === 'identity') return undefined;
  if (value === 'gzip' || value === 'x-gzip') return 'gzip';
  if (value === 'zstd') return 'zstd';
  return null;
}

/**
 * Decode bytes with the given encoding. Throws on corrupt input.
 */
export function decode(bytes: Uint8Array, encoding: Encoding): Uint8Array {
  if (encoding === 'gzip') {
    // Sync flush lets a truncated stream yield what it has
    const out = gunzipSync(bytes, { finishFlush: constants.Z_SYNC_FLUSH });
    return new Uint8Array(out.buffer, out.byteOffset, out.byteLength);
  }
  return zstdDecompress(bytes);
}

/**
 * Decode when declared or sniffed; on failure return the input unchanged.
 */
export function decodeBody(
  bytes: Uint8Array,
  contentEncoding: string | null,
  logger?: Logger,
): Uint8Array {
  const declared = declaredEncoding(contentEncoding);
  if (declared === null) return bytes;

  // fetch may already have decoded a declared encoding, so the magic bytes decide
  const sniffed = sniffEncoding(bytes);
  if (sniffed === null) return bytes;
  const encoding = declared ?? sniffed;

  try {
    const decoded = decode(bytes, encoding);
    logger?.debug('compression.decode', `Decoded ${encoding} body`, {
      encoding,
      declared: declared !== undefined,
      compressedBytes: bytes.length,
      decodedBytes: decoded.length,
    });
    return decoded;
  } catch (e) {
    logger?.warn('compression.decode', `Failed to decode ${encoding} body, using raw bytes`, {
      encoding,
      error: errorMessage(e),
    });
    return bytes;
  }
}

/**
 * Standalone copy of the bytes, usable as a fetch or Response body.
 */
export function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const copy = new Uint8Array(bytes.byteLength);
  copy.set(bytes);
  return copy.buffer;
}

function concat(chunks: Uint8Array[], total: number): Uint8Array {
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

/**
 * Read a whole response body and make it readable.
 * A read that fails part way returns what arrived; throws only when nothing did.
 */
export async function readBody(response: Response, logger?: Logger): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  let total = 0;

  if (response.body) {
    const reader = response.body.getReader();
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        chunks.push(value);
        total += value.length;
      }
    } catch (e) {
      if (total === 0) throw e;
      logger?.warn('compression.decode', 'Body read failed part way, using partial body', {
        bytesRead: total,
        error: errorMessage(e),
      });
    }
  }

  return decodeBody(concat(chunks, total), response.headers.get('content-encoding'), logger);
}

/**
 * readBody decoded as UTF-8 text.
 */
export async function readBodyText(response: Response, logger?: Logger): Promise<string> {
  return new TextDecoder().decode(await readBody(response, logger));
}
