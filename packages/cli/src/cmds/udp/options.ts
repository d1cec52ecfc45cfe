import type { InferredOptionTypes, Options } from 'yargs'

export const udpOptions = {
  host: {
    description: 'Address to bind (defaults to this host\'s address)',
    type: 'string',
  },
  port: {
    description: 'Port to bind; asked for when missing',
    type: 'number',
  },
  toHost: {
    description: 'Address to send messages to; asked for when missing',
    type: 'string',
  },
  toPort: {
    description: 'Port to send messages to; asked for when missing',
    type: 'number',
  },
} as const satisfies Record<string, Options>

export type UdpArgs = InferredOptionTypes<typeof udpOptions>
