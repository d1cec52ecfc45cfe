import type { InferredOptionTypes, Options } from 'yargs'

export const connectOptions = {
  host: {
    description: 'Server to connect to (defaults to this host\'s address)',
    type: 'string',
  },
  port: {
    description: 'Server port',
    type: 'number',
    default: 1024,
  },
  connectTimeout: {
    description: 'Give up connecting after this long (ms)',
    type: 'number',
    default: 10_000,
  },
} as const satisfies Record<string, Options>

export type ConnectArgs = InferredOptionTypes<typeof connectOptions>
