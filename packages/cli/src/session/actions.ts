import {
  type DatagramEndpoint,
  type PeerAddress,
  type StreamClient,
  type StreamServer,
  peerKey,
} from '@framelink/transport'
import type { MenuActions } from './menu.js'

export function datagramActions(
  endpoint: DatagramEndpoint,
  target: PeerAddress,
): MenuActions {
  return {
    sendLabel: 'send message',
    async send(message) {
      await endpoint.send(message, target.host, target.port)
      return []
    },
    async receive() {
      return endpoint
        .getMessages()
        .map(({ message, sender }) => `Received from ${peerKey(sender)}: ${message}`)
    },
  }
}

/**
 * New peers are admitted and start receiving each time messages are read,
 * and peers that have gone away are reported once and forgotten.
 */
export function serverActions(server: StreamServer): MenuActions {
  return {
    sendLabel: 'broadcast message',
    async send(message) {
      const { delivered, failed } = await server.sendToAll(message)
      return [
        `Sent to ${delivered.length} peer(s)`,
        ...failed.map(
          ({ peer, error }) => `Failed to send to ${peerKey(peer)}: ${error.message}`,
        ),
      ]
    },
    async receive() {
      const lines = server
        .drainNewConnections()
        .map((peer) => `New peer ${peerKey(peer)}`)
      server.listenForMessages()

      for (const [key, messages] of server.getAllMessages()) {
        for (const message of messages) {
          lines.push(`Received from ${key}: ${message}`)
        }
      }
      for (const peer of server.pruneClosedPeers()) {
        lines.push(`Peer ${peerKey(peer)} disconnected`)
      }
      return lines
    },
  }
}

export function clientActions(client: StreamClient): MenuActions {
  return {
    sendLabel: 'send message',
    async send(message) {
      await client.send(message)
      return []
    },
    async receive() {
      return client.getMessages().map((message) => `Received: ${message}`)
    },
  }
}
