import {
  BindError,
  PreconditionError,
  UnknownPeerError,
  resolveLocalAddress,
  safeSyncTry,
  safeTry,
} from '@framelink/utils'
import debug from 'debug'
import { EventEmitter } from 'eventemitter3'
import { type Server, type Socket, createServer } from 'node:net'
import {
  type StreamServerConfig,
  type StreamServerOptions,
  parseConfig,
  streamServerConfigSchema,
} from '../config/index.js'
import { PollLoop } from '../loop/poll-loop.js'
import { type PeerAddress, type PeerRef, peerKey } from '../peer.js'
import { InboundQueue } from '../queue/inbound-queue.js'
import { PeerConnection } from './peer-connection.js'
import {
  ConnectionState,
  type PendingConnection,
  type SendToAllResult,
  type StreamServerEvents,
} from './types.js'

const log = debug('framelink:server')

/**
 * Listening stream socket that accepts peers on an accept loop and keeps a
 * registry of their connections.
 *
 * Accepted connections wait in a pending queue until
 * `drainNewConnections` admits them, so the registry only changes when the
 * application asks for it.
 */
export class StreamServer extends EventEmitter<StreamServerEvents> {
  public readonly config: StreamServerConfig

  private readonly server: Server
  /** Sockets the kernel accepted that the accept loop has not taken yet. */
  private readonly backlog = new InboundQueue<Socket>()
  private readonly pending = new InboundQueue<PendingConnection>()
  private readonly registry = new Map<string, PeerConnection>()
  private readonly acceptLoop: PollLoop
  private closed = false
  private closing: Promise<void> | null = null

  /**
   * Validates `options`, binds and starts listening. The accept loop is not
   * started.
   */
  static async create(options: StreamServerOptions = {}): Promise<StreamServer> {
    const host = options.host ?? (await resolveLocalAddress())
    const config = parseConfig(streamServerConfigSchema, { ...options, host })
    const server = new StreamServer(config)
    await server.listen()
    return server
  }

  private constructor(config: StreamServerConfig) {
    super()
    this.config = config
    this.server = createServer({ pauseOnConnect: true }, this.onSocket)
    this.acceptLoop = new PollLoop({
      name: 'accept',
      pollTimeoutMs: config.pollTimeoutMs,
      poll: (timeoutMs, signal) =>
        this.backlog.waitForItems(timeoutMs, signal),
      step: async () => {
        this.acceptOne()
        return true
      },
    })
  }

  /** The bound address; reports the real port when bound to port 0. */
  get address(): PeerAddress {
    const address = this.server.address()
    if (address === null || typeof address === 'string') {
      return { host: this.config.host, port: this.config.port }
    }
    return { host: address.address, port: address.port }
  }

  get listening(): boolean {
    return this.acceptLoop.running
  }

  /** Registered peers, in admission order. */
  get peers(): PeerAddress[] {
    return Array.from(this.registry.values(), (conn) => conn.peer)
  }

  get pendingConnections(): number {
    return this.pending.size
  }

  listenForConnections(): void {
    this.assertOpen()
    this.acceptLoop.start()
  }

  /** Stops the accept loop. Already accepted peers are untouched. */
  stopListeningForConnections(): Promise<void> {
    return this.acceptLoop.stop()
  }

  /**
   * Moves every pending connection into the registry and returns the newly
   * admitted peers, oldest first.
   */
  drainNewConnections(): PeerAddress[] {
    const admitted: PeerAddress[] = []
    for (const { connection, peer } of this.pending.drain()) {
      const key = peerKey(peer)
      const previous = this.registry.get(key)
      if (previous !== undefined && previous !== connection) {
        log('replacing stale connection for %s', key)
        previous.destroy()
      }
      this.registry.set(key, connection)
      connection.on('close', (reason) => {
        if (this.registry.get(key) === connection) {
          this.emit('peer:closed', peer, reason)
        }
      })
      admitted.push(peer)
    }
    if (admitted.length > 0) {
      log('admitted %d peer(s)', admitted.length)
    }
    return admitted
  }

  /**
   * Starts a receive loop for every registered peer that is active and not
   * already receiving.
   */
  listenForMessages(): void {
    this.assertOpen()
    for (const connection of this.registry.values()) {
      if (connection.state === ConnectionState.Active && !connection.receiving) {
        connection.startReceiving()
      }
    }
  }

  async stopListeningForMessages(): Promise<void> {
    await Promise.all(
      Array.from(this.registry.values(), (conn) => conn.stopReceiving()),
    )
  }

  getConnection(peer: PeerRef): PeerConnection {
    const key = peerKey(peer)
    const connection = this.registry.get(key)
    if (connection === undefined) throw new UnknownPeerError(key)
    return connection
  }

  getMessagesFrom(peer: PeerRef): string[] {
    return this.getConnection(peer).getMessages()
  }

  /** Drains every registered peer, including those with nothing queued. */
  getAllMessages(): Map<string, string[]> {
    const messages = new Map<string, string[]>()
    for (const [key, connection] of this.registry) {
      messages.set(key, connection.getMessages())
    }
    return messages
  }

  async sendTo(peer: PeerRef, message: string): Promise<void> {
    await this.getConnection(peer).send(message)
  }

  /** Sends to every registered peer in turn; one failure never stops the rest. */
  async sendToAll(message: string): Promise<SendToAllResult> {
    const result: SendToAllResult = { delivered: [], failed: [] }
    for (const connection of this.registry.values()) {
      const [error] = await safeTry(() => connection.send(message))
      if (error === undefined) {
        result.delivered.push(connection.peer)
      } else {
        log('broadcast to %s failed: %s', peerKey(connection.peer), error.message)
        result.failed.push({ peer: connection.peer, error })
      }
    }
    return result
  }

  /** Stops the peer's loop, closes its socket and forgets it. */
  async dropPeer(peer: PeerRef): Promise<void> {
    const connection = this.getConnection(peer)
    this.registry.delete(peerKey(peer))
    await connection.close()
  }

  /**
   * Forgets peers whose connection has closed and whose queue is empty.
   * Returns the removed peers.
   */
  pruneClosedPeers(): PeerAddress[] {
    const pruned: PeerAddress[] = []
    for (const [key, connection] of this.registry) {
      if (
        connection.state === ConnectionState.Closed &&
        connection.queuedMessages === 0
      ) {
        this.registry.delete(key)
        pruned.push(connection.peer)
      }
    }
    return pruned
  }

  /**
   * Stops every loop, closes every connection and the listener. Messages
   * still queued are discarded.
   */
  async close(): Promise<void> {
    if (this.closing !== null) return this.closing

    this.closed = true
    this.closing = (async () => {
      await this.acceptLoop.stop()

      const connections = [
        ...this.registry.values(),
        ...this.pending.drain().map(({ connection }) => connection),
      ]
      this.registry.clear()
      await Promise.all(connections.map((conn) => conn.close()))

      for (const socket of this.backlog.drain()) socket.destroy()

      await new Promise<void>((resolve) => {
        this.server.close((err) => {
          if (err) log('listener close: %s', err.message)
          resolve()
        })
      })
      log('closed')
      this.emit('close')
    })()
    return this.closing
  }

  private async listen(): Promise<void> {
    const { host, port, backlog } = this.config
    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error): void => {
        reject(new BindError(host, port, { cause: err }))
      }
      this.server.once('error', onError)
      this.server.listen({ host, port, backlog }, () => {
        this.server.off('error', onError)
        resolve()
      })
    })
    this.server.on('error', (err) => log('listener error: %s', err.message))
    log('listening on %s', peerKey(this.address))
  }

  private onSocket = (socket: Socket): void => {
    if (this.closed || this.backlog.size >= this.config.backlog) {
      log('backlog full, refusing %s:%s', socket.remoteAddress, socket.remotePort)
      socket.destroy()
      return
    }
    socket.on('error', this.onBacklogError)
    this.backlog.push(socket)
  }

  private onBacklogError = (err: Error): void => {
    log('queued connection failed: %s', err.message)
  }

  private acceptOne(): void {
    const socket = this.backlog.shift()
    if (socket === undefined) return

    socket.off('error', this.onBacklogError)
    if (socket.destroyed) {
      log('queued connection went away before it was accepted')
      return
    }

    const [error, connection] = safeSyncTry(
      () =>
        new PeerConnection(socket, {
          headerWidth: this.config.headerWidth,
          pollTimeoutMs: this.config.pollTimeoutMs,
          maxFrameSize: this.config.maxFrameSize,
        }),
    )
    if (error !== undefined) {
      log('cannot accept connection: %s', error.message)
      socket.destroy()
      return
    }
    this.pending.push({ connection, peer: connection.peer })
    log('accepted %s', peerKey(connection.peer))
    this.emit('connection', connection.peer)
  }

  private assertOpen(): void {
    if (this.closed) throw new PreconditionError('server is closed')
  }
}
