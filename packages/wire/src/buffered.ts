import { FrameTooLargeError } from '@framelink/utils'
import type { Uint8ArrayList } from 'uint8arraylist'
import { DEFAULT_HEADER_WIDTH } from './constants.js'
import { decodePayload, effectiveFrameLimit, readFrameLength } from './decode.js'
import type { FrameOptions } from './types.js'

/** Declared payload length of the frame at the front of `buffer`, once its header is complete. */
export function peekFrameLength(
  buffer: Uint8ArrayList,
  headerWidth: number = DEFAULT_HEADER_WIDTH,
): number | undefined {
  if (buffer.byteLength < headerWidth) return undefined
  return readFrameLength(buffer.subarray(0, headerWidth), headerWidth)
}

/**
 * Bytes still missing from the frame at the front of `buffer`: the rest of
 * the header while it is incomplete, otherwise the rest of the payload.
 * Zero for an empty buffer.
 */
export function missingFrameBytes(
  buffer: Uint8ArrayList,
  headerWidth: number = DEFAULT_HEADER_WIDTH,
): number {
  if (buffer.byteLength === 0) return 0

  const length = peekFrameLength(buffer, headerWidth)
  if (length === undefined) return headerWidth - buffer.byteLength
  return Math.max(0, headerWidth + length - buffer.byteLength)
}

/**
 * Whether `takeFrame` would make progress: a whole frame is buffered, or the
 * header alone already declares a frame over the limit.
 */
export function frameAvailable(
  buffer: Uint8ArrayList,
  options: FrameOptions = {},
): boolean {
  const headerWidth = options.headerWidth ?? DEFAULT_HEADER_WIDTH
  const length = peekFrameLength(buffer, headerWidth)
  if (length === undefined) return false
  if (length > effectiveFrameLimit(headerWidth, options.maxFrameSize)) return true
  return buffer.byteLength >= headerWidth + length
}

/**
 * Removes the frame at the front of `buffer` and returns its payload.
 * Consumes nothing and returns `undefined` while the frame is incomplete,
 * so bytes that arrive later continue the same frame.
 *
 * An oversized frame is reported from its header alone, before any payload
 * is buffered, and is left in place.
 */
export function takeFrame(
  buffer: Uint8ArrayList,
  options: FrameOptions = {},
): string | undefined {
  const headerWidth = options.headerWidth ?? DEFAULT_HEADER_WIDTH
  const length = peekFrameLength(buffer, headerWidth)
  if (length === undefined) return undefined

  const limit = effectiveFrameLimit(headerWidth, options.maxFrameSize)
  if (length > limit) {
    throw new FrameTooLargeError(length, limit)
  }

  const frameSize = headerWidth + length
  if (buffer.byteLength < frameSize) return undefined

  const payload = buffer.subarray(headerWidth, frameSize)
  buffer.consume(frameSize)
  return decodePayload(payload)
}
