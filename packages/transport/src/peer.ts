import { PreconditionError } from '@framelink/utils'
import { isIPv6, type Socket } from 'node:net'

/**
 * Network address of a remote endpoint. Peers are told apart by host and
 * port, so several connections from one host are distinct peers.
 */
export interface PeerAddress {
  host: string
  port: number
}

/** Accepts either an address or its `peerKey` form. */
export type PeerRef = PeerAddress | string

const IPV4_MAPPED_PREFIX = '::ffff:'

/**
 * Strips the IPv4-mapped IPv6 prefix dual-stack listeners report.
 */
export function normalizeHost(host: string): string {
  const lower = host.toLowerCase()
  if (lower.startsWith(IPV4_MAPPED_PREFIX) && lower.includes('.')) {
    return host.slice(IPV4_MAPPED_PREFIX.length)
  }
  return host
}

export function peerKey(peer: PeerRef): string {
  if (typeof peer === 'string') return peer

  const host = normalizeHost(peer.host)
  return isIPv6(host) ? `[${host}]:${peer.port}` : `${host}:${peer.port}`
}

export function samePeer(a: PeerRef, b: PeerRef): boolean {
  return peerKey(a) === peerKey(b)
}

export function peerFromSocket(socket: Socket): PeerAddress {
  const { remoteAddress, remotePort } = socket
  if (remoteAddress === undefined || remotePort === undefined) {
    throw new PreconditionError('socket has no remote address')
  }
  return { host: normalizeHost(remoteAddress), port: remotePort }
}
