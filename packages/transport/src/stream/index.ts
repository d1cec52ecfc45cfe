export { PeerConnection } from './peer-connection.js'
export { SocketReader } from './socket-reader.js'
export { StreamClient } from './stream-client.js'
export { StreamServer } from './stream-server.js'
export { ConnectionState } from './types.js'
export type {
  FailedSend,
  PeerConnectionEvents,
  PendingConnection,
  SendToAllResult,
  StreamClientEvents,
  StreamServerEvents,
} from './types.js'
