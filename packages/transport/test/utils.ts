import { type Server, type Socket, createConnection, createServer } from 'node:net'

export const LOOPBACK = '127.0.0.1'

/** Short enough that stop() never holds a test up for long. */
export const FAST_POLL_MS = 20

/**
 * Two ends of one loopback TCP connection: `[accepted, dialled]`.
 * Call `close()` when done.
 */
export async function socketPair(): Promise<{
  accepted: Socket
  dialled: Socket
  close: () => Promise<void>
}> {
  const server: Server = createServer({ pauseOnConnect: true })
  await new Promise<void>((resolve) => server.listen(0, LOOPBACK, resolve))
  const address = server.address()
  if (address === null || typeof address === 'string') {
    throw new Error('listener has no port')
  }

  const acceptedPromise = new Promise<Socket>((resolve) =>
    server.once('connection', resolve),
  )
  const dialled = createConnection({ host: LOOPBACK, port: address.port })
  await new Promise<void>((resolve, reject) => {
    dialled.once('connect', resolve)
    dialled.once('error', reject)
  })
  const accepted = await acceptedPromise

  return {
    accepted,
    dialled,
    close: async () => {
      accepted.destroy()
      dialled.destroy()
      await new Promise<void>((resolve) => server.close(() => resolve()))
    },
  }
}

/** A port nothing listens on, for connection refusal tests. */
export async function unusedPort(): Promise<number> {
  const server = createServer()
  await new Promise<void>((resolve) => server.listen(0, LOOPBACK, resolve))
  const address = server.address()
  if (address === null || typeof address === 'string') {
    throw new Error('listener has no port')
  }
  await new Promise<void>((resolve) => server.close(() => resolve()))
  return address.port
}

/**
 * Keeps calling `drain` until `count` items have been collected or
 * `timeoutMs` runs out.
 */
export async function collect<T>(
  drain: (timeoutMs: number) => Promise<T[]>,
  count: number,
  timeoutMs = 2000,
): Promise<T[]> {
  const deadline = Date.now() + timeoutMs
  const items: T[] = []
  while (items.length < count && Date.now() < deadline) {
    items.push(...(await drain(50)))
  }
  return items
}
