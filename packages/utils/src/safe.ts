export type SafePromise<T, E extends Error = Error> = Promise<Safe<T, E>>

export type Safe<T, E extends Error = Error> = SafeError<E> | SafeResult<T>

export type SafeResult<T> = [undefined, T]
export type SafeError<E extends Error> = [E, undefined]

export function safeResult<T>(res: T): SafeResult<T> {
  return [undefined, res]
}

export function safeError<E extends Error>(err: E): SafeError<E> {
  return [err, undefined]
}

/**
 * Normalises anything thrown into an `Error`, keeping the original as `cause`
 * when it was not one already.
 */
export function toError(err: unknown): Error {
  if (err instanceof Error) return err
  return new Error(typeof err === 'string' ? err : String(err), { cause: err })
}

export async function safeTry<T>(promise: () => Promise<T>): SafePromise<T> {
  try {
    return safeResult(await promise())
  } catch (err) {
    return safeError(toError(err))
  }
}

export function safeSyncTry<T>(callBack: () => T): Safe<T> {
  try {
    return safeResult(callBack())
  } catch (err) {
    return safeError(toError(err))
  }
}
