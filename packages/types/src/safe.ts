/**
 * Set of helpers to return errors as values instead of throwing them
 * A `Safe` is a tuple whose first slot is the error, second slot the result
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
