import type { CommandModule } from 'yargs'
import type { GlobalArgs } from '../../options/globalOptions.js'
import { createConsoleIO } from '../../session/io.js'
import { type ConnectHandlerArgs, connectHandler } from './handler.js'
import { connectOptions } from './options.js'

export const connectCommand: CommandModule<GlobalArgs, ConnectHandlerArgs> = {
  command: 'connect',
  describe: 'Connect to a framelink server and exchange messages',
  builder: (yargs) => yargs.options(connectOptions),
  handler: async (args) => {
    const io = createConsoleIO()
    try {
      await connectHandler(args, io)
    } finally {
      io.close()
    }
  },
}
