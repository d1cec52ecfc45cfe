import yargs, { type Argv } from 'yargs'
import { hideBin } from 'yargs/helpers'
import { connectCommand, serveCommand, udpCommand } from './cmds/index.js'
import { configureLogging } from './logging.js'
import { type GlobalArgs, globalOptions } from './options/globalOptions.js'

const VERSION = '0.1.0'
const topBanner = `framelink: length-prefixed messaging over TCP and UDP
  * Version: ${VERSION}`

const bottomBanner = `Set DEBUG=framelink:* or --logLevel debug for transport logs.`

export function getCli(argv: string[] = hideBin(process.argv)): Argv<GlobalArgs> {
  return yargs(argv)
    .env('FRAMELINK')
    .parserConfiguration({
      'dot-notation': false,
    })
    .options(globalOptions)
    .middleware((args) => configureLogging(args.logLevel))
    .scriptName('framelink')
    .command(udpCommand)
    .command(serveCommand)
    .command(connectCommand)
    .demandCommand(1)
    .showHelpOnFail(false)
    .usage(topBanner)
    .epilogue(bottomBanner)
    .version(topBanner)
    .alias('h', 'help')
    .alias('v', 'version')
    .recommendCommands()
    .strict()
}
