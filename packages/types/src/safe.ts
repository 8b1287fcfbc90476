/**
 * Tuple-based results for operations that can fail
 *
 * An operation returns `[error, undefined]` or `[undefined, value]` instead of
 * throwing, so callers destructure and branch on the first slot.
 */

export type Safe<T, E extends Error | string = Error> =
  | SafeError<E>
  | SafeResult<T>

export type SafeResult<T> = [undefined, T]
export type SafeError<E extends Error | string> = [E, undefined]

export function safeResult<T>(res: T): SafeResult<T> {
  return [undefined, res]
}

export function safeError<E extends Error>(err: E): SafeError<E> {
  return [err, undefined]
}
