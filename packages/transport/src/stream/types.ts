import type { PeerAddress } from '../peer.js'
import type { PeerConnection } from './peer-connection.js'

export const ConnectionState = {
  /** Constructed, not connected yet. */
  Idle: 'idle',
  /** Socket usable; the receive loop may run. */
  Active: 'active',
  /** Close requested; the receive loop is being stopped. */
  Closing: 'closing',
  /** Socket released. */
  Closed: 'closed',
} as const

export type ConnectionState =
  (typeof ConnectionState)[keyof typeof ConnectionState]

export interface PeerConnectionEvents {
  /** The connection reached `Closed`; `reason` is set unless closed locally. */
  close: (reason?: Error) => void
}

/** A connection handed from the accept loop to the registry. */
export interface PendingConnection {
  connection: PeerConnection
  peer: PeerAddress
}

export interface FailedSend {
  peer: PeerAddress
  error: Error
}

export interface SendToAllResult {
  delivered: PeerAddress[]
  failed: FailedSend[]
}

export interface StreamServerEvents {
  /** A connection was accepted and is waiting in the pending queue. */
  connection: (peer: PeerAddress) => void
  /** A registered peer's connection closed. */
  'peer:closed': (peer: PeerAddress, reason?: Error) => void
  close: () => void
}

export interface StreamClientEvents {
  connect: (peer: PeerAddress) => void
  close: (reason?: Error) => void
}
