import { errorMessage } from '../errors';
import { OpenAIStreamConverter, streamErrorEvent } from './format-converter';
import { Logger, createLogger, preview } from './logger';

/**
 * Sink for relayed SSE text. Every write must reach the client as its own
 * chunk, so a caller that buffers here breaks incremental delivery.
 */
export interface ChunkWriter {
  write(chunk: string): Promise<unknown>;
}

export interface StreamRelayOptions {
  /** Convert chat-completions chunks; relay verbatim when absent */
  converter?: OpenAIStreamConverter;
  backend?: string;
  logger?: Logger;
}

export interface RelayResult {
  completed: boolean;
  bytesRead: number;
  chunksWritten: number;
  text: string;
  error?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Watches native SSE lines that pass through untouched, collecting the
 * streamed text for the completion log and spotting the end of the stream.
 */
class VerbatimTap {
  text = '';
  done = false;

  observe(rawLine: string): void {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (!line.startsWith('data:')) return;

    const data = line.slice(5).trimStart();
    if (data === '[DONE]') {
      this.done = true;
      return;
    }

    let event: unknown;
    try {
      event = JSON.parse(data);
    } catch {
      return;
    }
    if (!isRecord(event)) return;

    if (event.type === 'message_stop') {
      this.done = true;
    } else if (event.type === 'content_block_delta' && isRecord(event.delta)) {
      const text = event.delta.text;
      if (typeof text === 'string') this.text += text;
    }
  }
}

/**
 * Incremental SSE relay from an upstream body to a client writer.
 * Writes at most one chunk per upstream read and never holds the whole stream.
 */
export class StreamRelay {
  private reader: ReadableStreamDefaultReader<Uint8Array> | null = null;
  private aborted = false;
  private readonly converter?: OpenAIStreamConverter;
  private readonly backend?: string;
  private readonly logger: Logger;

  constructor(
    private readonly writer: ChunkWriter,
    options: StreamRelayOptions = {},
  ) {
    this.converter = options.converter;
    this.backend = options.backend;
    this.logger = options.logger ?? createLogger();
  }

  get isAborted(): boolean {
    return this.aborted;
  }

  /**
   * Stop relaying and cancel the upstream read, typically on client disconnect.
   */
  abort(): void {
    if (this.aborted) return;
    this.aborted = true;

    const reader = this.reader;
    if (!reader) return;
    reader.cancel().catch((e: unknown) => {
      this.logger.debug('stream.error', 'Upstream cancel failed', {
        backend: this.backend,
        error: errorMessage(e),
      });
    });
  }

  async relay(body: ReadableStream<Uint8Array>): Promise<RelayResult> {
    const reader = body.getReader();
    this.reader = reader;

    const decoder = new TextDecoder();
    const tap = new VerbatimTap();
    const converter = this.converter;
    let buffer = '';
    let bytesRead = 0;
    let chunksWritten = 0;
    let finished = false;
    let failure: string | undefined;

    const emit = async (out: string): Promise<void> => {
      if (out === '' || this.aborted) return;
      await this.writer.write(out);
      chunksWritten++;
    };

    // Split decoded text into complete lines, keeping the partial tail in buffer
    const takeLines = (text: string): string[] => {
      buffer += text;
      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';
      return lines;
    };

    try {
      while (!this.aborted) {
        const { done, value } = await reader.read();
        if (done) break;
        bytesRead += value.length;

        const text = decoder.decode(value, { stream: true });
        const lines = takeLines(text);

        if (converter) {
          await emit(lines.map((line) => converter.processLine(line)).join(''));
          finished = converter.isDone;
        } else {
          await emit(text);
          lines.forEach((line) => tap.observe(line));
          finished = tap.done;
        }

        if (finished) {
          await reader.cancel();
          break;
        }
      }

      if (!finished && !this.aborted) {
        // Verbatim mode already wrote the buffered text; only the decoder tail is new
        const tail = decoder.decode();
        const rest = buffer + tail;
        buffer = '';
        if (converter) {
          const out = rest === '' ? '' : converter.processLine(rest);
          await emit(out + converter.finish());
        } else {
          await emit(tail);
          if (rest !== '') tap.observe(rest);
        }
        finished = true;
      }
    } catch (e) {
      failure = errorMessage(e);
      if (!this.aborted) {
        this.logger.error('stream.error', 'Stream relay failed', {
          backend: this.backend,
          bytesRead,
          error: failure,
        });
        await this.writeError(`upstream stream error: ${failure}`);
      }
    } finally {
      reader.releaseLock();
      this.reader = null;
    }

    const assembled = converter ? converter.assembledText : tap.text;
    const result: RelayResult = {
      completed: finished && failure === undefined && !this.aborted,
      bytesRead,
      chunksWritten,
      text: assembled,
      ...(failure !== undefined ? { error: failure } : {}),
    };

    this.logger.info('stream.complete', this.aborted ? 'Stream aborted by client' : 'Stream relayed', {
      backend: this.backend,
      converted: converter !== undefined,
      completed: result.completed,
      bytesRead,
      chunksWritten,
      textLength: assembled.length,
      preview: preview(assembled, 200),
    });

    return result;
  }

  private async writeError(message: string): Promise<void> {
    const event = this.converter ? this.converter.fail(message) : streamErrorEvent(message);
    if (event === '') return;
    try {
      await this.writer.write(event);
    } catch (e) {
      this.logger.debug('stream.error', 'Could not deliver error event', {
        backend: this.backend,
        error: errorMessage(e),
      });
    }
  }
}
