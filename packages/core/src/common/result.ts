/**
 * Result type for fallible operations.
 * Expected failures (missing rows, bad input, store outages) travel as values;
 * exceptions are reserved for programmer errors.
 */

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value
  throw result.error instanceof Error
    ? result.error
    : new Error(String(result.error))
}

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok
}

export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return !result.ok
}

/**
 * Runs a synchronous store operation, converting a throw into `Err`.
 * Used by repositories around better-sqlite3 calls.
 */
export function attempt<T, E>(fn: () => T, onError: (err: unknown) => E): Result<T, E> {
  try {
    return Ok(fn())
  } catch (err) {
    return Err(onError(err))
  }
}
