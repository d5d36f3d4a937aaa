/**
 * Result Type
 *
 * Explicit success/failure values for parsing boundaries. Orchestration code
 * throws; parsers return a Result so callers decide how to report the failure.
 */

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E }

export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}
