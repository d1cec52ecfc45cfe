import { ErrorCode, type ErrorContext } from './types.js'

interface FramelinkErrorOptions {
  context?: ErrorContext
  cause?: unknown
}

/**
 * Base class for every error raised by the framelink packages
 */
export class FramelinkError extends Error {
  public readonly code: ErrorCode
  public readonly context?: ErrorContext

  constructor(
    code: ErrorCode,
    message: string,
    options: FramelinkErrorOptions = {},
  ) {
    super(message, { cause: options.cause })
    this.name = this.constructor.name
    this.code = code
    this.context = options.context

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    }
  }
}

/** Invalid construction parameters. */
export class ConfigurationError extends FramelinkError {
  public readonly issues: string[]

  constructor(issues: string[], options?: FramelinkErrorOptions) {
    super(
      ErrorCode.CONFIGURATION_ERROR,
      `invalid configuration: ${issues.join('; ')}`,
      options,
    )
    this.issues = issues
  }
}

/** The address/port could not be bound. */
export class BindError extends FramelinkError {
  constructor(host: string, port: number, options?: FramelinkErrorOptions) {
    super(ErrorCode.BIND_ERROR, `cannot bind ${host}:${port}`, options)
  }
}

/** An outbound stream connection could not be established. */
export class ConnectError extends FramelinkError {
  constructor(host: string, port: number, options?: FramelinkErrorOptions) {
    super(ErrorCode.CONNECT_ERROR, `cannot connect to ${host}:${port}`, options)
  }
}

export class EncodingError extends FramelinkError {
  constructor(message: string, options?: FramelinkErrorOptions) {
    super(ErrorCode.ENCODING_ERROR, message, options)
  }
}

/** The stream ended before a full frame could be read. */
export class ConnectionClosedError extends FramelinkError {
  public readonly missing: number

  constructor(missing: number, options?: FramelinkErrorOptions) {
    super(
      ErrorCode.CONNECTION_CLOSED,
      missing > 0
        ? `connection closed with ${missing} bytes of the frame outstanding`
        : 'connection closed',
      options,
    )
    this.missing = missing
  }
}

export class FrameTooLargeError extends FramelinkError {
  public readonly length: number
  public readonly limit: number

  constructor(length: number, limit: number, options?: FramelinkErrorOptions) {
    super(
      ErrorCode.FRAME_TOO_LARGE,
      `frame length ${length} exceeds limit of ${limit} bytes`,
      options,
    )
    this.length = length
    this.limit = limit
  }
}

export class MessageTooLargeError extends FramelinkError {
  public readonly length: number
  public readonly limit: number

  constructor(length: number, limit: number, options?: FramelinkErrorOptions) {
    super(
      ErrorCode.MESSAGE_TOO_LARGE,
      `message of ${length} bytes exceeds the ${limit} byte datagram limit`,
      options,
    )
    this.length = length
    this.limit = limit
  }
}

export class SendError extends FramelinkError {
  constructor(peer: string, options?: FramelinkErrorOptions) {
    const reason =
      options?.cause instanceof Error ? `: ${options.cause.message}` : ''
    super(ErrorCode.SEND_ERROR, `send to ${peer} failed${reason}`, {
      ...options,
      context: { peer, ...options?.context },
    })
  }
}

export class UnknownPeerError extends FramelinkError {
  constructor(peer: string, options?: FramelinkErrorOptions) {
    super(ErrorCode.UNKNOWN_PEER, `peer ${peer} is not registered`, {
      ...options,
      context: { peer, ...options?.context },
    })
  }
}

/** A resource was used or released out of order. */
export class PreconditionError extends FramelinkError {
  constructor(message: string, options?: FramelinkErrorOptions) {
    super(ErrorCode.PRECONDITION_ERROR, message, options)
  }
}

export function isFramelinkError(
  err: unknown,
  code?: ErrorCode,
): err is FramelinkError {
  if (!(err instanceof FramelinkError)) return false
  return code === undefined || err.code === code
}
