import { EventEmitter } from 'node:events'
import { waitUntil } from '../loop/readiness.js'

const PUSH_EVENT = 'push'

/**
 * Unbounded FIFO between a single producer (a receive or accept loop) and a
 * single consumer (the application). Draining never blocks.
 */
export class InboundQueue<T> extends EventEmitter {
  private items: T[] = []

  get size(): number {
    return this.items.length
  }

  isEmpty(): boolean {
    return this.items.length === 0
  }

  push(item: T): void {
    this.items.push(item)
    this.emit(PUSH_EVENT)
  }

  shift(): T | undefined {
    return this.items.shift()
  }

  /** Removes and returns everything queued, oldest first. */
  drain(): T[] {
    const drained = this.items
    this.items = []
    return drained
  }

  /**
   * Resolves once at least one item is queued (`true`), or with `false`
   * when `timeoutMs` elapses or `signal` aborts first. Leaves the items in
   * place.
   */
  waitForItems(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    return waitUntil(
      this,
      PUSH_EVENT,
      () => this.items.length > 0,
      timeoutMs,
      signal,
    )
  }

  /**
   * Waits up to `timeoutMs` for something to arrive, then drains.
   */
  async drainWhenReady(timeoutMs: number): Promise<T[]> {
    await this.waitForItems(timeoutMs)
    return this.drain()
  }
}
