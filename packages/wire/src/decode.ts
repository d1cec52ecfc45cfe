import {
  ConnectionClosedError,
  EncodingError,
  FrameTooLargeError,
} from '@framelink/utils'
import { Uint8ArrayList } from 'uint8arraylist'
import { DEFAULT_HEADER_WIDTH, DEFAULT_MAX_FRAME_SIZE } from './constants.js'
import { assertHeaderWidth, maxPayloadLength } from './encode.js'
import type { ChunkReader, FrameOptions, ReadExactlyOptions } from './types.js'

const textDecoder = new TextDecoder('utf-8', { fatal: true })

/**
 * Reads exactly `length` bytes, concatenating as many partial reads as it
 * takes. Throws `ConnectionClosedError` when the stream ends first.
 */
export async function readExactly(
  read: ChunkReader,
  length: number,
  options: ReadExactlyOptions = {},
): Promise<Uint8Array> {
  const received = new Uint8ArrayList()

  while (received.byteLength < length) {
    const remaining = length - received.byteLength
    const chunk = await read(remaining)

    if (chunk.byteLength === 0) {
      const started = options.frameStarted === true || received.byteLength > 0
      throw new ConnectionClosedError(started ? remaining : 0)
    }
    if (chunk.byteLength > remaining) {
      throw new RangeError(
        `reader returned ${chunk.byteLength} bytes when at most ${remaining} were requested`,
      )
    }
    received.append(chunk)
  }

  return received.subarray()
}

export function readFrameLength(
  header: Uint8Array,
  headerWidth: number = DEFAULT_HEADER_WIDTH,
): number {
  assertHeaderWidth(headerWidth)
  if (header.byteLength < headerWidth) {
    throw new EncodingError(
      `length header needs ${headerWidth} bytes, got ${header.byteLength}`,
    )
  }

  return Buffer.from(
    header.buffer,
    header.byteOffset,
    header.byteLength,
  ).readUIntBE(0, headerWidth)
}

export function decodePayload(payload: Uint8Array): string {
  try {
    return textDecoder.decode(payload)
  } catch (err) {
    throw new EncodingError('payload is not valid UTF-8', { cause: err })
  }
}

/**
 * Frame ceiling actually enforced: the configured limit, capped by what the
 * header can express.
 */
export function effectiveFrameLimit(
  headerWidth: number = DEFAULT_HEADER_WIDTH,
  maxFrameSize: number = DEFAULT_MAX_FRAME_SIZE,
): number {
  return Math.min(maxFrameSize, maxPayloadLength(headerWidth))
}

/**
 * Reads one length-prefixed frame and returns its UTF-8 payload.
 *
 * The declared length is checked against the frame ceiling before any
 * payload byte is consumed.
 */
export async function decodeFrame(
  read: ChunkReader,
  options: FrameOptions = {},
): Promise<string> {
  const headerWidth = options.headerWidth ?? DEFAULT_HEADER_WIDTH
  const limit = effectiveFrameLimit(headerWidth, options.maxFrameSize)

  const header = await readExactly(read, headerWidth)
  const length = readFrameLength(header, headerWidth)
  if (length > limit) {
    throw new FrameTooLargeError(length, limit)
  }

  const payload = await readExactly(read, length, { frameStarted: true })
  return decodePayload(payload)
}
