import {
  ConnectError,
  type SafePromise,
  PreconditionError,
  resolveLocalAddress,
  safeError,
  safeResult,
} from '@framelink/utils'
import debug from 'debug'
import { EventEmitter } from 'eventemitter3'
import { type Socket, createConnection } from 'node:net'
import {
  type StreamClientConfig,
  type StreamClientOptions,
  parseConfig,
  streamClientConfigSchema,
} from '../config/index.js'
import { type PeerAddress, normalizeHost } from '../peer.js'
import { PeerConnection } from './peer-connection.js'
import { ConnectionState, type StreamClientEvents } from './types.js'

const log = debug('framelink:client')

/**
 * Outbound stream connection. Constructing one does not touch the network;
 * `connect()` does.
 */
export class StreamClient extends EventEmitter<StreamClientEvents> {
  public readonly config: StreamClientConfig
  private connection: PeerConnection | null = null
  private connecting = false

  constructor(options: StreamClientOptions = {}) {
    super()
    this.config = parseConfig(streamClientConfigSchema, options)
  }

  get state(): ConnectionState {
    if (this.connection !== null) return this.connection.state
    return ConnectionState.Idle
  }

  get peer(): PeerAddress | undefined {
    return this.connection?.peer
  }

  /** This end of the connection, once connected. */
  get localAddress(): PeerAddress | undefined {
    if (this.connection === null) return undefined

    const { localAddress, localPort } = this.connection.socket
    if (localAddress === undefined || localPort === undefined) return undefined
    return { host: normalizeHost(localAddress), port: localPort }
  }

  get receiving(): boolean {
    return this.connection?.receiving ?? false
  }

  get closeReason(): Error | undefined {
    return this.connection?.closeReason
  }

  /**
   * Opens the connection. Without a configured host, connects to this
   * host's own address.
   */
  async connect(): Promise<void> {
    if (this.connection !== null || this.connecting) {
      throw new PreconditionError('client is already connected')
    }

    this.connecting = true
    try {
      const host = this.config.host ?? (await resolveLocalAddress())
      const [error, socket] = await this.dial(host, this.config.port)
      if (error !== undefined) {
        log('connect to %s:%d failed: %s', host, this.config.port, error.message)
        throw new ConnectError(host, this.config.port, { cause: error })
      }

      const connection = new PeerConnection(socket, {
        headerWidth: this.config.headerWidth,
        pollTimeoutMs: this.config.pollTimeoutMs,
        maxFrameSize: this.config.maxFrameSize,
      })
      connection.on('close', (reason) => this.emit('close', reason))
      this.connection = connection
      log('connected to %s:%d', host, this.config.port)
      this.emit('connect', connection.peer)
    } finally {
      this.connecting = false
    }
  }

  startReceiving(): void {
    this.requireConnection('receive').startReceiving()
  }

  async stopReceiving(): Promise<void> {
    await this.connection?.stopReceiving()
  }

  async send(message: string): Promise<void> {
    await this.requireConnection('send').send(message)
  }

  getMessages(): string[] {
    return this.connection?.getMessages() ?? []
  }

  async waitForMessages(timeoutMs: number): Promise<string[]> {
    if (this.connection === null) return []
    return this.connection.waitForMessages(timeoutMs)
  }

  async close(): Promise<void> {
    await this.connection?.close()
  }

  private requireConnection(action: string): PeerConnection {
    if (this.connection === null) {
      throw new PreconditionError(`cannot ${action} before connect()`)
    }
    return this.connection
  }

  private dial(host: string, port: number): SafePromise<Socket> {
    const timeoutMs = this.config.connectTimeoutMs
    const socket = createConnection({ host, port })

    return new Promise((resolve) => {
      const cleanup = (): void => {
        clearTimeout(timer)
        socket.off('connect', onConnect)
        socket.off('error', onError)
      }

      const onConnect = (): void => {
        cleanup()
        resolve(safeResult(socket))
      }

      const onError = (err: Error): void => {
        cleanup()
        socket.destroy()
        resolve(safeError(err))
      }

      const onTimeout = (): void => {
        cleanup()
        socket.destroy()
        resolve(safeError(new Error(`connection timeout after ${timeoutMs}ms`)))
      }

      const timer = setTimeout(onTimeout, timeoutMs)
      socket.once('connect', onConnect)
      socket.once('error', onError)
    })
  }
}
