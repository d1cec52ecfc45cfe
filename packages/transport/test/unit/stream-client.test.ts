import {
  ConfigurationError,
  ConnectError,
  PreconditionError,
} from '@framelink/utils'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { StreamClient } from '../../src/stream/stream-client.js'
import { StreamServer } from '../../src/stream/stream-server.js'
import { ConnectionState } from '../../src/stream/types.js'
import { FAST_POLL_MS, LOOPBACK, collect, unusedPort } from '../utils.js'

describe('StreamClient', () => {
  const cleanups: Array<() => Promise<void>> = []

  afterEach(async () => {
    for (const cleanup of cleanups.splice(0).reverse()) {
      await cleanup()
    }
  })

  it('should start idle without touching the network', () => {
    const client = new StreamClient({ host: LOOPBACK, port: 9 })

    expect(client.state).toBe(ConnectionState.Idle)
    expect(client.peer).toBeUndefined()
    expect(client.localAddress).toBeUndefined()
    expect(client.getMessages()).toEqual([])
  })

  it('should refuse to send or receive before connecting', async () => {
    const client = new StreamClient({ host: LOOPBACK, port: 9 })

    expect(() => client.startReceiving()).toThrow(PreconditionError)
    await expect(client.send('hi')).rejects.toBeInstanceOf(PreconditionError)
    await expect(client.waitForMessages(10)).resolves.toEqual([])
    await expect(client.stopReceiving()).resolves.toBeUndefined()
    await expect(client.close()).resolves.toBeUndefined()
  })

  it('should reject invalid options', () => {
    expect(() => new StreamClient({ port: 0 })).toThrow(ConfigurationError)
    expect(() => new StreamClient({ host: 'bad host' })).toThrow(
      ConfigurationError,
    )
  })

  it('should fail to connect when nothing listens', async () => {
    const port = await unusedPort()
    const client = new StreamClient({ host: LOOPBACK, port })

    const connecting = client.connect()
    await expect(connecting).rejects.toBeInstanceOf(ConnectError)
    await expect(connecting).rejects.toThrow(`cannot connect to ${LOOPBACK}:${port}`)
    expect(client.state).toBe(ConnectionState.Idle)
  })

  it('should connect, talk and disconnect', async () => {
    const server = await StreamServer.create({
      host: LOOPBACK,
      port: 0,
      pollTimeoutMs: FAST_POLL_MS,
    })
    cleanups.push(() => server.close())
    const client = new StreamClient({
      host: LOOPBACK,
      port: server.address.port,
      pollTimeoutMs: FAST_POLL_MS,
    })
    cleanups.push(() => client.close())
    const onConnect = vi.fn()
    client.on('connect', onConnect)

    await client.connect()
    expect(client.state).toBe(ConnectionState.Active)
    expect(client.peer).toEqual(server.address)
    expect(onConnect).toHaveBeenCalledWith(server.address)
    await expect(client.connect()).rejects.toBeInstanceOf(PreconditionError)

    server.listenForConnections()
    await vi.waitFor(() => expect(server.pendingConnections).toBe(1))
    const [peer] = server.drainNewConnections()
    expect(peer).toEqual(client.localAddress)
    server.listenForMessages()

    await client.send('ping')
    const messages: string[] = []
    await vi.waitFor(() => {
      messages.push(...server.getMessagesFrom(client.localAddress ?? 'unknown'))
      expect(messages).toEqual(['ping'])
    })

    client.startReceiving()
    expect(client.receiving).toBe(true)
    await server.sendToAll('pong')
    expect(await collect((ms) => client.waitForMessages(ms), 1)).toEqual([
      'pong',
    ])

    const onClose = vi.fn()
    client.on('close', onClose)
    await client.close()
    expect(client.state).toBe(ConnectionState.Closed)
    expect(onClose).toHaveBeenCalledWith(undefined)
  })
})
