/**
 * Set of functions to wrap fallible operations into error/result tuples
 * Also works to wrap around try catch statements
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

/**
 * Run a synchronous function and capture a thrown value as a SafeError
 */
export function safeCall<T>(fn: () => T): Safe<T> {
  try {
    return safeResult(fn())
  } catch (error) {
    return safeError(error instanceof Error ? error : new Error(String(error)))
  }
}
