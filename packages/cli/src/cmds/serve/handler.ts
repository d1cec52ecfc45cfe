import { StreamServer, peerKey } from '@framelink/transport'
import type { GlobalArgs } from '../../options/globalOptions.js'
import { serverActions } from '../../session/actions.js'
import type { LineIO } from '../../session/io.js'
import { runMenu } from '../../session/menu.js'
import type { ServeArgs } from './options.js'

export type ServeHandlerArgs = ServeArgs & GlobalArgs

export async function serveHandler(
  args: ServeHandlerArgs,
  io: LineIO,
): Promise<void> {
  const server = await StreamServer.create({
    host: args.host,
    port: args.port,
    backlog: args.backlog,
    headerWidth: args.headerWidth,
    pollTimeoutMs: args.pollTimeout,
  })
  try {
    server.listenForConnections()
    io.print(`Listening on ${peerKey(server.address)}`)
    await runMenu(io, serverActions(server))
  } finally {
    await server.close()
  }
}
