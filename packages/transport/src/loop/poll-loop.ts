import { toError } from '@framelink/utils'
import debug from 'debug'

const log = debug('framelink:loop')

export type LoopStatus =
  | { code: 'IDLE' }
  | {
      code: 'RUNNING'
      controller: AbortController
      done: Promise<void>
    }

export interface PollLoopOptions {
  /** Shown in logs. */
  name: string
  pollTimeoutMs: number
  /**
   * Waits at most `timeoutMs` for work, or until `signal` aborts. Resolves
   * `true` when there is something for `step` to do.
   */
  poll: (timeoutMs: number, signal: AbortSignal) => Promise<boolean>
  /**
   * Handles one unit of ready work without waiting on the network.
   * Resolving `false` ends the loop.
   */
  step: () => Promise<boolean>
  /** Receives whatever `poll` or `step` threw; the loop ends right after. */
  onError?: (err: Error) => void
}

/**
 * A long-running task that waits on a readiness poll with a bounded timeout
 * and checks its stop flag once per cycle. `stop()` resolves only after the
 * task has returned.
 */
export class PollLoop {
  private status: LoopStatus = { code: 'IDLE' }
  /** A start arrived while a stop was still draining the task. */
  private restartPending = false
  private readonly options: PollLoopOptions

  constructor(options: PollLoopOptions) {
    this.options = options
  }

  get running(): boolean {
    return this.status.code === 'RUNNING'
  }

  /** True between a stop request and the task actually returning. */
  get stopping(): boolean {
    return (
      this.status.code === 'RUNNING' && this.status.controller.signal.aborted
    )
  }

  /**
   * Starts the task unless it is already running. Returns whether a new
   * task was started or, while a stop is in progress, scheduled to start
   * as soon as the stopping task has returned.
   */
  start(): boolean {
    if (this.status.code === 'RUNNING') {
      if (!this.status.controller.signal.aborted || this.restartPending) {
        return false
      }
      this.restartPending = true
      log('%s: restart scheduled', this.options.name)
      return true
    }

    const controller = new AbortController()
    const done = Promise.resolve().then(() => this.run(controller))
    this.status = { code: 'RUNNING', controller, done }
    log('%s: started', this.options.name)
    return true
  }

  /**
   * Resolves once the task has returned, unless a `start` issued while
   * stopping has already brought up its replacement.
   */
  async stop(): Promise<void> {
    this.restartPending = false
    if (this.status.code === 'IDLE') return

    const { controller, done } = this.status
    controller.abort()
    await done
  }

  private async run(controller: AbortController): Promise<void> {
    const { signal } = controller
    const { name, poll, step, pollTimeoutMs } = this.options

    try {
      while (!signal.aborted) {
        const ready = await poll(pollTimeoutMs, signal)
        if (!ready || signal.aborted) continue

        const keepGoing = await step()
        if (!keepGoing) {
          log('%s: finished', name)
          break
        }
      }
    } catch (err) {
      const error = toError(err)
      log('%s: failed: %s', name, error.message)
      this.restartPending = false
      this.reportError(error)
    } finally {
      if (
        this.status.code === 'RUNNING' &&
        this.status.controller === controller
      ) {
        this.status = { code: 'IDLE' }
      }
      log('%s: stopped', name)
      if (this.restartPending) {
        this.restartPending = false
        this.start()
      }
    }
  }

  private reportError(error: Error): void {
    try {
      this.options.onError?.(error)
    } catch (handlerErr) {
      log(
        '%s: error handler threw: %s',
        this.options.name,
        toError(handlerErr).message,
      )
    }
  }
}
