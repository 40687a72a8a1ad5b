import * as _ from 'radash'

/**
 * Set of functions to wrap around promises to make them safe
 * Also works to wrap around try catch statements
 */

export type SafePromise<T, E extends Error = Error> = Promise<
  SafeError<E> | SafeResult<T>
>

export type Safe<T, E extends Error = Error> = SafeError<E> | SafeResult<T>

export type SafeResult<T> = [undefined, T]
export type SafeError<E extends Error> = [E, undefined]

export function safeResult<T>(res: T): SafeResult<T> {
  return [undefined, res]
}

export function safeError<E extends Error>(err: E): SafeError<E> {
  return [err, undefined]
}

export async function safeTry<T>(promise: Promise<T>): SafePromise<T> {
  const [error, result] = await _.try(() => promise)()
  if (error) return safeError(error)
  return safeResult(result)
}

/**
 * Runs a synchronous function that may throw and captures the outcome
 */
export function safeCall<T>(fn: () => T): Safe<T> {
  try {
    return safeResult(fn())
  } catch (error) {
    return safeError(error instanceof Error ? error : new Error(String(error)))
  }
}
