import type { TrackerError } from './errors.js'

/**
 * Outcome of a pipeline step that can fail on what it was handed: document
 * text, run options, a rule file, an export. Failures carry a TrackerError.
 */
export type Result<T, E = TrackerError> =
  | { ok: true; value: T }
  | { ok: false; error: E }

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value })

export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error })

/** The Ok value. An Err throws its error unchanged, code and context included. */
export function unwrap<T>(result: Result<T, Error>): T {
  if (!result.ok) throw result.error
  return result.value
}

/** Transform the success value, passing an Err through untouched. */
export function mapResult<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? Ok(fn(result.value)) : result
}
