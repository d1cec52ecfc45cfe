import type { CommandModule } from 'yargs'
import type { GlobalArgs } from '../../options/globalOptions.js'
import { createConsoleIO } from '../../session/io.js'
import { type ServeHandlerArgs, serveHandler } from './handler.js'
import { serveOptions } from './options.js'

export const serveCommand: CommandModule<GlobalArgs, ServeHandlerArgs> = {
  command: 'serve',
  describe: 'Accept stream connections and exchange messages with them',
  builder: (yargs) => yargs.options(serveOptions),
  handler: async (args) => {
    const io = createConsoleIO()
    try {
      await serveHandler(args, io)
    } finally {
      io.close()
    }
  },
}
