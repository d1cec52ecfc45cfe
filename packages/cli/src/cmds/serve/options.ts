import type { InferredOptionTypes, Options } from 'yargs'

export const serveOptions = {
  host: {
    description: 'Address to listen on (defaults to this host\'s address)',
    type: 'string',
  },
  port: {
    description: 'Port to listen on',
    type: 'number',
    default: 1024,
  },
  backlog: {
    description: 'Connections held while none are being accepted',
    type: 'number',
    default: 128,
  },
} as const satisfies Record<string, Options>

export type ServeArgs = InferredOptionTypes<typeof serveOptions>
