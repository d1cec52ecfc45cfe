import {
  BindError,
  MessageTooLargeError,
  PreconditionError,
  SendError,
  isFramelinkError,
  resolveLocalAddress,
  toError,
} from '@framelink/utils'
import { decodePayload, encodePayload } from '@framelink/wire'
import debug from 'debug'
import { EventEmitter } from 'eventemitter3'
import { type RemoteInfo, type Socket, createSocket } from 'node:dgram'
import { isIPv6 } from 'node:net'
import {
  type DatagramConfig,
  type DatagramEndpointOptions,
  datagramConfigSchema,
  parseConfig,
} from '../config/index.js'
import { PollLoop } from '../loop/poll-loop.js'
import { type PeerAddress, normalizeHost, peerKey } from '../peer.js'
import { InboundQueue } from '../queue/inbound-queue.js'
import type {
  DatagramEndpointEvents,
  DatagramMessage,
  RawDatagram,
} from './types.js'

const log = debug('framelink:datagram')

/**
 * Bound datagram socket with an optional receive loop. Each datagram is one
 * message; there is no framing.
 *
 * Datagrams arriving while the loop is stopped wait in a receive buffer of
 * `maxPendingDatagrams` entries. Beyond that they are dropped.
 */
export class DatagramEndpoint extends EventEmitter<DatagramEndpointEvents> {
  public readonly config: DatagramConfig

  private readonly socket: Socket
  private readonly received = new InboundQueue<RawDatagram>()
  private readonly inbound = new InboundQueue<DatagramMessage>()
  private readonly loop: PollLoop
  private closed = false

  static async create(
    options: DatagramEndpointOptions = {},
  ): Promise<DatagramEndpoint> {
    const host = options.host ?? (await resolveLocalAddress())
    const config = parseConfig(datagramConfigSchema, { ...options, host })
    const endpoint = new DatagramEndpoint(config)
    await endpoint.bind()
    return endpoint
  }

  private constructor(config: DatagramConfig) {
    super()
    this.config = config
    this.socket = createSocket(isIPv6(config.host) ? 'udp6' : 'udp4')
    this.loop = new PollLoop({
      name: 'datagram receive',
      pollTimeoutMs: config.pollTimeoutMs,
      poll: (timeoutMs, signal) =>
        this.received.waitForItems(timeoutMs, signal),
      step: async () => {
        this.receiveOne()
        return true
      },
    })
  }

  get address(): PeerAddress {
    const { address, port } = this.socket.address()
    return { host: address, port }
  }

  get listening(): boolean {
    return this.loop.running
  }

  listenForMessages(): void {
    if (this.closed) throw new PreconditionError('endpoint is closed')
    this.loop.start()
  }

  stopListeningForMessages(): Promise<void> {
    return this.loop.stop()
  }

  /** Drains every decoded datagram in arrival order. */
  getMessages(): DatagramMessage[] {
    return this.inbound.drain()
  }

  waitForMessages(timeoutMs: number): Promise<DatagramMessage[]> {
    return this.inbound.drainWhenReady(timeoutMs)
  }

  /** Sends `message` as a single datagram. */
  async send(message: string, host: string, port: number): Promise<void> {
    const target = peerKey({ host, port })
    if (this.closed) {
      throw new SendError(target, {
        cause: new PreconditionError('endpoint is closed'),
      })
    }

    const payload = encodePayload(message)
    if (payload.byteLength > this.config.maxDatagramSize) {
      throw new MessageTooLargeError(
        payload.byteLength,
        this.config.maxDatagramSize,
      )
    }

    await new Promise<void>((resolve, reject) => {
      const onSent = (err: Error | null): void => {
        if (err) {
          log('send to %s failed: %s', target, err.message)
          reject(new SendError(target, { cause: err }))
        } else {
          resolve()
        }
      }
      try {
        this.socket.send(payload, port, host, onSent)
      } catch (err) {
        reject(new SendError(target, { cause: toError(err) }))
      }
    })
  }

  /**
   * Releases the socket. The receive loop must have been stopped first.
   */
  async close(): Promise<void> {
    if (this.loop.running) {
      throw new PreconditionError('listener must be stopped first')
    }
    if (this.closed) return

    this.closed = true
    this.received.drain()
    await new Promise<void>((resolve) => this.socket.close(() => resolve()))
    log('closed %s', peerKey(this.config))
    this.emit('close')
  }

  private async bind(): Promise<void> {
    const { host, port } = this.config
    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error): void => {
        this.socket.close()
        reject(new BindError(host, port, { cause: err }))
      }
      this.socket.once('error', onError)
      this.socket.bind({ address: host, port }, () => {
        this.socket.off('error', onError)
        resolve()
      })
    })

    this.socket.on('error', (err) => log('socket error: %s', err.message))
    this.socket.on('message', this.onMessage)
    log('bound %s', peerKey(this.address))
  }

  private onMessage = (data: Buffer, rinfo: RemoteInfo): void => {
    const sender = { host: normalizeHost(rinfo.address), port: rinfo.port }
    if (this.received.size >= this.config.maxPendingDatagrams) {
      this.drop(
        sender,
        new PreconditionError(
          `receive buffer full (${this.config.maxPendingDatagrams} datagrams)`,
        ),
      )
      return
    }
    this.received.push({ data, sender })
  }

  private receiveOne(): void {
    const datagram = this.received.shift()
    if (datagram === undefined) return

    const { data, sender } = datagram
    if (data.byteLength > this.config.maxDatagramSize) {
      this.drop(
        sender,
        new MessageTooLargeError(data.byteLength, this.config.maxDatagramSize),
      )
      return
    }

    try {
      this.inbound.push({ message: decodePayload(data), sender })
    } catch (err) {
      if (!isFramelinkError(err)) throw err
      this.drop(sender, err)
    }
  }

  private drop(sender: PeerAddress, reason: Error): void {
    log('dropping datagram from %s: %s', peerKey(sender), reason.message)
    this.emit('dropped', sender, reason)
  }
}
