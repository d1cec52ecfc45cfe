import type { CommandModule } from 'yargs'
import type { GlobalArgs } from '../../options/globalOptions.js'
import { createConsoleIO } from '../../session/io.js'
import { type UdpHandlerArgs, udpHandler } from './handler.js'
import { udpOptions } from './options.js'

export const udpCommand: CommandModule<GlobalArgs, UdpHandlerArgs> = {
  command: 'udp',
  describe: 'Exchange datagrams with another endpoint',
  builder: (yargs) => yargs.options(udpOptions),
  handler: async (args) => {
    const io = createConsoleIO()
    try {
      await udpHandler(args, io)
    } finally {
      io.close()
    }
  },
}
