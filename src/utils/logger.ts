/**
 * Structured logging utility.
 * Outputs one JSON object per line on stdout/stderr.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogEvent =
  | 'request.start'
  | 'request.complete'
  | 'request.error'
  | 'request.debug_curl'
  | 'backend.attempt'
  | 'backend.success'
  | 'backend.failure'
  | 'backend.timeout'
  | 'backend.model_override'
  | 'backend.path_rewrite'
  | 'backend.enabled'
  | 'backend.disabled'
  | 'circuit_breaker.skip'
  | 'circuit_breaker.open'
  | 'circuit_breaker.trial_failed'
  | 'circuit_breaker.reset'
  | 'rate_limit.record'
  | 'conversion.request'
  | 'conversion.response'
  | 'conversion.error'
  | 'compression.decode'
  | 'stream.complete'
  | 'stream.error'
  | 'config.load'
  | 'config.persist'
  | 'server.start'
  | 'server.stop';

export interface LogData {
  requestId?: string;
  backend?: string;
  model?: string;
  status?: number;
  latency?: number;
  error?: string;
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: LogEvent;
  message: string;
  requestId?: string;
  data?: LogData;
}

export class Logger {
  private requestId?: string;
  private debugMode: boolean;

  constructor(requestId?: string, debugMode: boolean = false) {
    this.requestId = requestId;
    this.debugMode = debugMode;
  }

  /**
   * Create a child logger with the same debug setting bound to another request
   */
  child(requestId: string): Logger {
    return new Logger(requestId, this.debugMode);
  }

  get isDebug(): boolean {
    return this.debugMode;
  }

  private log(level: LogLevel, event: LogEvent, message: string, data?: LogData): void {
    // Skip debug logs unless debug mode is enabled
    if (level === 'debug' && !this.debugMode) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      message,
      ...(this.requestId && { requestId: this.requestId }),
      ...(data && { data }),
    };

    switch (level) {
      case 'error':
        console.error(JSON.stringify(entry));
        break;
      case 'warn':
        console.warn(JSON.stringify(entry));
        break;
      default:
        console.log(JSON.stringify(entry));
    }
  }

  info(event: LogEvent, message: string, data?: LogData): void {
    this.log('info', event, message, data);
  }

  warn(event: LogEvent, message: string, data?: LogData): void {
    this.log('warn', event, message, data);
  }

  error(event: LogEvent, message: string, data?: LogData): void {
    this.log('error', event, message, data);
  }

  debug(event: LogEvent, message: string, data?: LogData): void {
    this.log('debug', event, message, data);
  }
}

/**
 * Generate a unique request ID for tracing
 */
export function generateRequestId(): string {
  return `req_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
}

/**
 * Create a logger instance with optional request ID
 */
export function createLogger(requestId?: string, debug: boolean = false): Logger {
  return new Logger(requestId, debug);
}

/**
 * Truncate a body for log output.
 */
export function preview(text: string, max: number = 500): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
