import { DatagramEndpoint, peerKey } from '@framelink/transport'
import type { GlobalArgs } from '../../options/globalOptions.js'
import { datagramActions } from '../../session/actions.js'
import { type LineIO, promptPort, promptText } from '../../session/io.js'
import { runMenu } from '../../session/menu.js'
import type { UdpArgs } from './options.js'

export type UdpHandlerArgs = UdpArgs & GlobalArgs

export async function udpHandler(args: UdpHandlerArgs, io: LineIO): Promise<void> {
  let port = args.port
  if (port === undefined) {
    io.print('Please specify a port to send on')
    const answer = await promptPort(io, 'Port: ', { allowZero: true })
    if (answer === null) return
    port = answer
  }

  const endpoint = await DatagramEndpoint.create({
    host: args.host,
    port,
    pollTimeoutMs: args.pollTimeout,
  })
  try {
    endpoint.listenForMessages()
    io.print(`Your address: ${peerKey(endpoint.address)}`)

    let toHost = args.toHost
    let toPort = args.toPort
    if (toHost === undefined || toPort === undefined) {
      io.print('Please specify an ip and port to send to')
    }
    if (toHost === undefined) {
      const answer = await promptText(io, 'Ip: ')
      if (answer === null) return
      toHost = answer
    }
    if (toPort === undefined) {
      const answer = await promptPort(io)
      if (answer === null) return
      toPort = answer
    }

    await runMenu(io, datagramActions(endpoint, { host: toHost, port: toPort }))
  } finally {
    await endpoint.stopListeningForMessages()
    await endpoint.close()
  }
}
