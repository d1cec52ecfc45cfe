import {
  ConnectionClosedError,
  PreconditionError,
  SendError,
  toError,
} from '@framelink/utils'
import { encodeFrame } from '@framelink/wire'
import debug from 'debug'
import { EventEmitter } from 'eventemitter3'
import type { Socket } from 'node:net'
import {
  type ConnectionConfig,
  type ConnectionOptions,
  connectionConfigSchema,
  parseConfig,
} from '../config/index.js'
import { PollLoop } from '../loop/poll-loop.js'
import { type PeerAddress, peerFromSocket, peerKey } from '../peer.js'
import { InboundQueue } from '../queue/inbound-queue.js'
import { SocketReader } from './socket-reader.js'
import {
  ConnectionState,
  type PeerConnectionEvents,
} from './types.js'

const log = debug('framelink:connection')

/**
 * One live stream socket with its own receive loop and inbound queue.
 *
 * The receive loop is the only producer into the queue; `getMessages` is
 * the only consumer. Sends go straight to the socket.
 */
export class PeerConnection extends EventEmitter<PeerConnectionEvents> {
  public readonly socket: Socket
  public readonly peer: PeerAddress
  public readonly config: ConnectionConfig

  private readonly reader: SocketReader
  private readonly inbound = new InboundQueue<string>()
  private readonly loop: PollLoop
  private readonly key: string

  private _state: ConnectionState = ConnectionState.Active
  private _closeReason: Error | undefined
  private closing: Promise<void> | null = null

  constructor(socket: Socket, options: ConnectionOptions = {}) {
    super()
    this.config = parseConfig(connectionConfigSchema, options)
    this.socket = socket
    this.peer = peerFromSocket(socket)
    this.key = peerKey(this.peer)
    this.reader = new SocketReader(socket, {
      headerWidth: this.config.headerWidth,
      maxFrameSize: this.config.maxFrameSize,
    })

    this.loop = new PollLoop({
      name: `receive ${this.key}`,
      pollTimeoutMs: this.config.pollTimeoutMs,
      poll: (timeoutMs, signal) => this.reader.waitReady(timeoutMs, signal),
      step: () => this.receiveOne(),
      onError: (err) =>
        this.markClosed(
          this._state === ConnectionState.Closing ? undefined : err,
        ),
    })

    socket.once('close', () => {
      // Released while no loop was reading it.
      if (this._state === ConnectionState.Active && !this.loop.running) {
        this.markClosed(this.queueBufferedFrames())
      }
    })
  }

  get state(): ConnectionState {
    return this._state
  }

  /** Why the connection closed, when it was not closed locally. */
  get closeReason(): Error | undefined {
    return this._closeReason
  }

  get receiving(): boolean {
    return this.loop.running
  }

  get queuedMessages(): number {
    return this.inbound.size
  }

  /** Starts the receive loop; does nothing if it is already running. */
  startReceiving(): void {
    if (this._state !== ConnectionState.Active) {
      throw new PreconditionError(
        `cannot receive on ${this._state} connection to ${this.key}`,
      )
    }
    if (this.loop.start()) {
      this.reader.resume()
    }
  }

  /**
   * Stops the receive loop and resolves once it has exited, within one poll
   * interval. Bytes arriving meanwhile, including the rest of a frame that
   * was cut short, stay buffered until receiving starts again.
   */
  async stopReceiving(): Promise<void> {
    if (!this.loop.running) return

    await this.loop.stop()
    // A startReceiving() issued while stopping has already restarted the loop.
    if (!this.loop.running) this.reader.pause()
  }

  /**
   * Writes one frame. Resolves once the whole frame has been handed to the
   * kernel.
   */
  async send(message: string): Promise<void> {
    if (this._state !== ConnectionState.Active || !this.socket.writable) {
      throw new SendError(this.key, {
        cause: new PreconditionError(`connection is ${this._state}`),
      })
    }

    const frame = encodeFrame(message, this.config.headerWidth)
    await new Promise<void>((resolve, reject) => {
      this.socket.write(frame, (err) => {
        if (err) {
          log('send to %s failed: %s', this.key, err.message)
          reject(new SendError(this.key, { cause: err }))
        } else {
          resolve()
        }
      })
    })
  }

  /** Drains every queued message in arrival order. */
  getMessages(): string[] {
    return this.inbound.drain()
  }

  /**
   * Like `getMessages`, but first waits up to `timeoutMs` for at least one
   * message to be queued.
   */
  waitForMessages(timeoutMs: number): Promise<string[]> {
    return this.inbound.drainWhenReady(timeoutMs)
  }

  /**
   * Stops receiving and releases the socket. Queued messages stay readable.
   */
  async close(): Promise<void> {
    if (this._state === ConnectionState.Closed) return
    if (this.closing !== null) return this.closing

    this._state = ConnectionState.Closing
    this.closing = (async () => {
      await this.loop.stop()
      this.markClosed()
    })()
    return this.closing
  }

  /**
   * Releases the socket at once without waiting for the receive loop; the
   * loop observes the closed socket on its next cycle.
   */
  destroy(reason?: Error): void {
    this.markClosed(reason)
  }

  private async receiveOne(): Promise<boolean> {
    const message = this.reader.takeFrame()
    if (message === undefined) throw this.reader.endOfStream()

    this.inbound.push(message)
    return true
  }

  /**
   * Moves every complete frame still buffered into the queue and returns
   * why the stream cannot go on.
   */
  private queueBufferedFrames(): Error {
    try {
      for (;;) {
        const message = this.reader.takeFrame()
        if (message === undefined) return this.reader.endOfStream()
        this.inbound.push(message)
      }
    } catch (err) {
      return toError(err)
    }
  }

  private markClosed(reason?: Error): void {
    if (this._state === ConnectionState.Closed) return

    this._state = ConnectionState.Closed
    this._closeReason = reason
    if (reason instanceof ConnectionClosedError) {
      log('%s disconnected', this.key)
    } else if (reason !== undefined) {
      log('dropping %s: %s', this.key, reason.message)
    } else {
      log('closed %s', this.key)
    }

    if (!this.socket.destroyed) {
      if (reason === undefined) {
        this.socket.destroySoon()
      } else {
        this.socket.destroy()
      }
    }
    this.emit('close', reason)
  }
}
