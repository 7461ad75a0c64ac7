export type ErrorKind =
  | "config"
  | "validation"
  | "transport"
  | "decode"
  | "io"
  | "unknown";

export class AppError extends Error {
  readonly kind: ErrorKind;
  override readonly cause?: unknown;

  constructor(kind: ErrorKind, message: string, cause?: unknown) {
    super(message);
    this.kind = kind;
    this.cause = cause;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, cause?: unknown) {
    super("config", message, cause);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super("validation", message, cause);
  }
}

/**
 * The page could not be retrieved: network failure, timeout, cancellation,
 * a non-2xx status or an oversized body.
 */
export class TransportError extends AppError {
  readonly statusCode?: number;
  readonly retryable: boolean;

  constructor(params: {
    message: string;
    statusCode?: number;
    retryable: boolean;
    cause?: unknown;
  }) {
    super("transport", params.message, params.cause);
    this.statusCode = params.statusCode;
    this.retryable = params.retryable;
  }
}

export const DECODE_FAILURE_MESSAGE = "Failed to load content";

/** The page was retrieved but its bytes are not valid UTF-8 text. */
export class DecodeError extends AppError {
  constructor(cause?: unknown) {
    super("decode", DECODE_FAILURE_MESSAGE, cause);
  }
}

export class IOError extends AppError {
  readonly path?: string;

  constructor(message: string, cause?: unknown, path?: string) {
    super("io", message, cause);
    this.path = path;
  }
}

export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error;
  if (error instanceof Error)
    return new AppError("unknown", error.message, error);
  return new AppError("unknown", String(error));
}
