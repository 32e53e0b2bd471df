/**
 * Degraded Outcomes
 *
 * The fast store is an accelerator: its failures must never fail a request.
 * Acceleration-path calls return an Outcome instead of throwing, and the
 * caller branches on `degraded`.
 */

import { CacheDegradedError } from "@shortkit/shared";

export type Outcome<T> =
  | { degraded: false; value: T }
  | { degraded: true; error: CacheDegradedError };

export function ok<T>(value: T): Outcome<T> {
  return { degraded: false, value };
}

export function degraded<T>(operation: string, cause?: unknown): Outcome<T> {
  return { degraded: true, error: new CacheDegradedError(operation, cause) };
}

/**
 * Run a fast store call, converting rejection or timeout into a degraded
 * outcome. Never rejects.
 */
export async function attempt<T>(
  operation: string,
  fn: () => Promise<T>,
  timeoutMs?: number
): Promise<Outcome<T>> {
  try {
    const value = timeoutMs === undefined ? await fn() : await withTimeout(fn(), timeoutMs, operation);
    return ok(value);
  } catch (err) {
    return degraded(operation, err);
  }
}

// =============================================================================
// Utilities
// =============================================================================

export class TimeoutError extends Error {
  constructor(operation: string, ms: number) {
    super(`${operation} timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Wrap a promise with a deadline. Rejects with TimeoutError when it passes;
 * the underlying call keeps running and its result is dropped.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  operation = "operation"
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new TimeoutError(operation, ms)), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}
