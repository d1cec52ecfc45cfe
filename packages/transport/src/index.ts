export * from './config/index.js'
export * from './datagram/index.js'
export { PollLoop } from './loop/poll-loop.js'
export type { LoopStatus, PollLoopOptions } from './loop/poll-loop.js'
export { waitUntil } from './loop/readiness.js'
export * from './peer.js'
export { InboundQueue } from './queue/inbound-queue.js'
export * from './stream/index.js'
