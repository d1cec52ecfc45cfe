export { DatagramEndpoint } from './datagram-endpoint.js'
export type * from './types.js'
