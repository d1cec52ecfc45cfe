import { EncodingError } from '@framelink/utils'
import {
  DEFAULT_HEADER_WIDTH,
  MAX_HEADER_WIDTH,
  MIN_HEADER_WIDTH,
} from './constants.js'

const textEncoder = new TextEncoder()

export function assertHeaderWidth(headerWidth: number): void {
  if (
    !Number.isInteger(headerWidth) ||
    headerWidth < MIN_HEADER_WIDTH ||
    headerWidth > MAX_HEADER_WIDTH
  ) {
    throw new EncodingError(
      `header width must be an integer between ${MIN_HEADER_WIDTH} and ${MAX_HEADER_WIDTH}, got ${headerWidth}`,
    )
  }
}

/**
 * Largest payload length a header of `headerWidth` bytes can describe.
 */
export function maxPayloadLength(headerWidth: number): number {
  assertHeaderWidth(headerWidth)
  return 2 ** (8 * headerWidth) - 1
}

export function encodePayload(message: string): Uint8Array {
  return textEncoder.encode(message)
}

export function encodeLength(length: number, headerWidth: number): Uint8Array {
  const limit = maxPayloadLength(headerWidth)
  if (!Number.isSafeInteger(length) || length < 0 || length > limit) {
    throw new EncodingError(
      `payload length ${length} does not fit in a ${headerWidth} byte header (max ${limit})`,
    )
  }

  const header = Buffer.alloc(headerWidth)
  header.writeUIntBE(length, 0, headerWidth)
  return header
}

/**
 * UTF-8 encodes `message` and prefixes it with its byte length as a
 * `headerWidth`-byte big-endian unsigned integer.
 */
export function encodeFrame(
  message: string,
  headerWidth: number = DEFAULT_HEADER_WIDTH,
): Uint8Array {
  const payload = encodePayload(message)
  const header = encodeLength(payload.byteLength, headerWidth)

  const frame = new Uint8Array(headerWidth + payload.byteLength)
  frame.set(header, 0)
  frame.set(payload, headerWidth)
  return frame
}
