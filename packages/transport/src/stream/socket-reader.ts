import { ConnectionClosedError } from '@framelink/utils'
import {
  DEFAULT_HEADER_WIDTH,
  type FrameOptions,
  frameAvailable,
  missingFrameBytes,
  takeFrame,
} from '@framelink/wire'
import { EventEmitter } from 'node:events'
import type { Socket } from 'node:net'
import { Uint8ArrayList } from 'uint8arraylist'
import { waitUntil } from '../loop/readiness.js'

const READABLE_EVENT = 'readable'

/**
 * Buffers what a socket delivers until whole frames can be taken off the
 * front. A partial frame stays buffered across stops and restarts of the
 * receive loop, so nothing is lost when receiving pauses mid-frame.
 */
export class SocketReader extends EventEmitter {
  private readonly socket: Socket
  private readonly options: FrameOptions
  private readonly buffer = new Uint8ArrayList()
  private ended = false
  private failure: Error | null = null

  constructor(socket: Socket, options: FrameOptions = {}) {
    super()
    this.socket = socket
    this.options = options

    socket.on('data', this.onData)
    socket.once('end', this.onEnd)
    socket.once('close', this.onEnd)
    socket.on('error', this.onError)
    // Nothing is read off the wire until a receive loop asks for it.
    socket.pause()
  }

  /** A frame, the end of the stream or an error is waiting to be observed. */
  get ready(): boolean {
    return (
      this.ended ||
      this.failure !== null ||
      frameAvailable(this.buffer, this.options)
    )
  }

  get bufferedBytes(): number {
    return this.buffer.byteLength
  }

  get error(): Error | null {
    return this.failure
  }

  resume(): void {
    if (!this.socket.destroyed) this.socket.resume()
  }

  pause(): void {
    if (!this.socket.destroyed) this.socket.pause()
  }

  waitReady(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    return waitUntil(this, READABLE_EVENT, () => this.ready, timeoutMs, signal)
  }

  /** Next complete frame's payload, or `undefined` when none is buffered. */
  takeFrame(): string | undefined {
    return takeFrame(this.buffer, this.options)
  }

  /**
   * Why no further frame will come: the socket's error, or the stream's end
   * with however many bytes of a started frame never arrived.
   */
  endOfStream(): Error {
    if (this.failure !== null) return this.failure
    return new ConnectionClosedError(
      missingFrameBytes(
        this.buffer,
        this.options.headerWidth ?? DEFAULT_HEADER_WIDTH,
      ),
    )
  }

  private onData = (chunk: Buffer): void => {
    this.buffer.append(chunk)
    this.emit(READABLE_EVENT)
  }

  private onEnd = (): void => {
    this.ended = true
    this.emit(READABLE_EVENT)
  }

  private onError = (err: Error): void => {
    this.failure = err
    this.emit(READABLE_EVENT)
  }
}
