/**
 * Error codes for every failure the transports surface
 */
export const ErrorCode = {
  // Construction
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  BIND_ERROR: 'BIND_ERROR',
  CONNECT_ERROR: 'CONNECT_ERROR',

  // Framing
  ENCODING_ERROR: 'ENCODING_ERROR',
  CONNECTION_CLOSED: 'CONNECTION_CLOSED',
  FRAME_TOO_LARGE: 'FRAME_TOO_LARGE',
  MESSAGE_TOO_LARGE: 'MESSAGE_TOO_LARGE',

  // Caller-facing operations
  SEND_ERROR: 'SEND_ERROR',
  UNKNOWN_PEER: 'UNKNOWN_PEER',
  PRECONDITION_ERROR: 'PRECONDITION_ERROR',
} as const

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode]

/**
 * Extra details attached to an error for logging
 */
export interface ErrorContext {
  component?: string
  operation?: string
  peer?: string
  [key: string]: unknown
}
