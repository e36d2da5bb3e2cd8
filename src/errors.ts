// Error types shared by the config layer, converter and proxy

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class ConversionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConversionError";
  }
}

export class BackendNotFoundError extends Error {
  constructor(name: string) {
    super(`backend '${name}' not found`);
    this.name = "BackendNotFoundError";
  }
}

export class BackendStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BackendStateError";
  }
}

export type ErrorType =
  | "invalid_request_error"
  | "api_error"
  | "fallback_exhausted";

export interface ErrorBody {
  type: "error";
  error: {
    type: ErrorType;
    message: string;
  };
}

/**
 * Client-facing error body in the native message API shape.
 */
export function errorBody(type: ErrorType, message: string): ErrorBody {
  return { type: "error", error: { type, message } };
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
