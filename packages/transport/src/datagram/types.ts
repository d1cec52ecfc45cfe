import type { PeerAddress } from '../peer.js'

/** One received datagram, decoded. */
export interface DatagramMessage {
  message: string
  sender: PeerAddress
}

/** A datagram as the socket delivered it, before decoding. */
export interface RawDatagram {
  data: Uint8Array
  sender: PeerAddress
}

export interface DatagramEndpointEvents {
  /** A datagram was dropped: too large, not UTF-8 or the receive buffer was full. */
  dropped: (sender: PeerAddress, reason: Error) => void
  close: () => void
}
