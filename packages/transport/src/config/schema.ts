import { ConfigurationError, isIpAddress } from '@framelink/utils'
import {
  DEFAULT_HEADER_WIDTH,
  DEFAULT_MAX_FRAME_SIZE,
  MAX_HEADER_WIDTH,
  MIN_HEADER_WIDTH,
} from '@framelink/wire'
import { z } from 'zod'
import {
  DEFAULT_BACKLOG,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_MAX_PENDING_DATAGRAMS,
  DEFAULT_POLL_TIMEOUT_MS,
  DEFAULT_PORT,
  MAX_PORT,
  MAX_UDP_PAYLOAD,
  MIN_PORT,
} from './constants.js'

const HOSTNAME_PATTERN =
  /^(?=.{1,253}$)[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?(?:\.[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?)*$/i

export const bindHostSchema = z
  .string()
  .min(1)
  .refine((host) => isIpAddress(host) || host === 'localhost', {
    message: 'must be an IP address or localhost',
  })

export const connectHostSchema = z
  .string()
  .min(1)
  .refine((host) => isIpAddress(host) || HOSTNAME_PATTERN.test(host), {
    message: 'must be an IP address or a host name',
  })

export const bindPortSchema = z.number().int().min(MIN_PORT).max(MAX_PORT)
export const connectPortSchema = z.number().int().min(1).max(MAX_PORT)

const pollTimeoutSchema = z
  .number()
  .positive()
  .finite()
  .default(DEFAULT_POLL_TIMEOUT_MS)

export const connectionConfigSchema = z.object({
  headerWidth: z
    .number()
    .int()
    .min(MIN_HEADER_WIDTH)
    .max(MAX_HEADER_WIDTH)
    .default(DEFAULT_HEADER_WIDTH),
  pollTimeoutMs: pollTimeoutSchema,
  maxFrameSize: z.number().int().positive().default(DEFAULT_MAX_FRAME_SIZE),
})

export const streamServerConfigSchema = connectionConfigSchema.extend({
  host: bindHostSchema,
  port: bindPortSchema.default(DEFAULT_PORT),
  backlog: z.number().int().positive().default(DEFAULT_BACKLOG),
})

export const streamClientConfigSchema = connectionConfigSchema.extend({
  host: connectHostSchema.optional(),
  port: connectPortSchema.default(DEFAULT_PORT),
  connectTimeoutMs: z
    .number()
    .positive()
    .finite()
    .default(DEFAULT_CONNECT_TIMEOUT_MS),
})

export const datagramConfigSchema = z.object({
  host: bindHostSchema,
  port: bindPortSchema.default(DEFAULT_PORT),
  pollTimeoutMs: pollTimeoutSchema,
  maxDatagramSize: z
    .number()
    .int()
    .positive()
    .max(MAX_UDP_PAYLOAD)
    .default(MAX_UDP_PAYLOAD),
  maxPendingDatagrams: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_MAX_PENDING_DATAGRAMS),
})

export type ConnectionConfig = z.output<typeof connectionConfigSchema>
export type ConnectionOptions = z.input<typeof connectionConfigSchema>

export type StreamServerConfig = z.output<typeof streamServerConfigSchema>
export type StreamServerOptions = Partial<
  z.input<typeof streamServerConfigSchema>
>

export type StreamClientConfig = z.output<typeof streamClientConfigSchema>
export type StreamClientOptions = z.input<typeof streamClientConfigSchema>

export type DatagramConfig = z.output<typeof datagramConfigSchema>
export type DatagramEndpointOptions = Partial<
  z.input<typeof datagramConfigSchema>
>

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : 'options'
  return `${path}: ${issue.message}`
}

/**
 * Validates `input` against `schema`, filling in defaults.
 * Throws `ConfigurationError` naming every invalid field.
 */
export function parseConfig<Output, Input>(
  schema: z.ZodType<Output, z.ZodTypeDef, Input>,
  input: unknown,
): Output {
  const result = schema.safeParse(input)
  if (!result.success) {
    throw new ConfigurationError(result.error.issues.map(formatIssue))
  }
  return result.data
}
