import type { InferredOptionTypes, Options } from 'yargs'

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const

export const globalOptions = {
  logLevel: {
    description: 'Logging verbosity level',
    type: 'string',
    choices: LOG_LEVELS,
    default: 'info',
  },
  headerWidth: {
    description: 'Bytes in the length prefix of each stream frame (1-6)',
    type: 'number',
    default: 4,
  },
  pollTimeout: {
    description: 'How long receive loops wait for data per cycle (ms)',
    type: 'number',
    default: 100,
  },
} as const satisfies Record<string, Options>

export type GlobalArgs = InferredOptionTypes<typeof globalOptions>
