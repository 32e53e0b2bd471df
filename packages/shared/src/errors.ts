/**
 * Error Kinds
 *
 * Every failure the core can surface carries a stable `code`. The request
 * layer maps codes to responses; everything unrecognised is an internal error.
 *
 * CACHE_DEGRADED never reaches a caller: it only travels inside degraded
 * outcomes on the acceleration path.
 */

export const ErrorCode = {
  VALIDATION_FAILED: "VALIDATION_FAILED",
  NOT_FOUND: "NOT_FOUND",
  EXPIRED: "EXPIRED",
  STORE_FAILURE: "STORE_FAILURE",
  CACHE_DEGRADED: "CACHE_DEGRADED",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export class ShortkitError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Bad input, e.g. a non-http(s) destination or a malformed duration.
 */
export class ValidationError extends ShortkitError {
  /** Field-level messages, when the failure came from schema validation */
  readonly details?: Record<string, string[]>;

  constructor(message: string, details?: Record<string, string[]>) {
    super(ErrorCode.VALIDATION_FAILED, message);
    this.details = details;
  }
}

export class NotFoundError extends ShortkitError {
  constructor(message = "Short URL not found") {
    super(ErrorCode.NOT_FOUND, message);
  }
}

/**
 * The record exists but is inactive or past its expiry.
 */
export class ExpiredError extends ShortkitError {
  constructor(message = "This short URL has expired") {
    super(ErrorCode.EXPIRED, message);
  }
}

/**
 * Durable store I/O failure. Always surfaced, never retried inline.
 */
export class StoreError extends ShortkitError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.STORE_FAILURE, message, { cause });
  }
}

/**
 * Fast store failure or timeout.
 */
export class CacheDegradedError extends ShortkitError {
  readonly operation: string;

  constructor(operation: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : "unavailable";
    super(ErrorCode.CACHE_DEGRADED, `Fast store ${operation} failed: ${reason}`, { cause });
    this.operation = operation;
  }
}

export function isShortkitError(err: unknown): err is ShortkitError {
  return err instanceof ShortkitError;
}
