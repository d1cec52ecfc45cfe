import { StreamClient, peerKey } from '@framelink/transport'
import type { GlobalArgs } from '../../options/globalOptions.js'
import { clientActions } from '../../session/actions.js'
import type { LineIO } from '../../session/io.js'
import { runMenu } from '../../session/menu.js'
import type { ConnectArgs } from './options.js'

export type ConnectHandlerArgs = ConnectArgs & GlobalArgs

export async function connectHandler(
  args: ConnectHandlerArgs,
  io: LineIO,
): Promise<void> {
  const client = new StreamClient({
    host: args.host,
    port: args.port,
    connectTimeoutMs: args.connectTimeout,
    headerWidth: args.headerWidth,
    pollTimeoutMs: args.pollTimeout,
  })
  await client.connect()
  try {
    client.startReceiving()
    if (client.peer !== undefined) {
      io.print(`Connected to ${peerKey(client.peer)}`)
    }
    await runMenu(io, clientActions(client))
  } finally {
    await client.close()
  }
}
