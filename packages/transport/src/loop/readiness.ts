import type { EventEmitter } from 'node:events'
import { pEvent } from 'p-event'

function isTimeoutError(err: unknown): boolean {
  return err instanceof Error && err.name === 'TimeoutError'
}

/**
 * Resolves `true` as soon as `isReady()` holds, re-checking every time
 * `emitter` fires `event`, or with the current `isReady()` once `timeoutMs`
 * elapses or `signal` aborts.
 */
export async function waitUntil(
  emitter: EventEmitter,
  event: string,
  isReady: () => boolean,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<boolean> {
  if (isReady()) return true
  if (timeoutMs <= 0 || signal?.aborted === true) return false

  try {
    await pEvent(emitter, event, {
      timeout: timeoutMs,
      filter: () => isReady(),
      signal,
    })
    return true
  } catch (err) {
    if (isTimeoutError(err) || signal?.aborted) return isReady()
    throw err
  }
}
