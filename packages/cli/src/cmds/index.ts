export { connectCommand } from './connect/index.js'
export { serveCommand } from './serve/index.js'
export { udpCommand } from './udp/index.js'
