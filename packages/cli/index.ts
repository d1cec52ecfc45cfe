export { getCli } from './src/cli.js'
export { type ConnectHandlerArgs, connectHandler } from './src/cmds/connect/handler.js'
export { type ConnectArgs, connectOptions } from './src/cmds/connect/options.js'
export { type ServeHandlerArgs, serveHandler } from './src/cmds/serve/handler.js'
export { type ServeArgs, serveOptions } from './src/cmds/serve/options.js'
export { type UdpHandlerArgs, udpHandler } from './src/cmds/udp/handler.js'
export { type UdpArgs, udpOptions } from './src/cmds/udp/options.js'
export { configureLogging } from './src/logging.js'
export { type GlobalArgs, globalOptions } from './src/options/globalOptions.js'
export { type LineIO, createConsoleIO } from './src/session/io.js'
export { type MenuActions, runMenu } from './src/session/menu.js'
