import {
  ConnectionClosedError,
  EncodingError,
  FrameTooLargeError,
} from '@framelink/utils'
import { describe, expect, it } from 'vitest'
import {
  type ChunkReader,
  DEFAULT_MAX_FRAME_SIZE,
  decodeFrame,
  effectiveFrameLimit,
  encodeFrame,
  maxPayloadLength,
  readExactly,
  readFrameLength,
} from '../../src/index.js'

/** Serves `bytes` at most `chunkSize` bytes per read. */
function chunkedReader(bytes: Uint8Array, chunkSize = bytes.byteLength) {
  let offset = 0
  const read: ChunkReader = async (maxBytes) => {
    const n = Math.min(maxBytes, chunkSize, bytes.byteLength - offset)
    const chunk = bytes.subarray(offset, offset + n)
    offset += n
    return chunk
  }
  return { read, consumed: () => offset }
}

describe('encodeFrame', () => {
  it('should prefix the payload with a big-endian length', () => {
    expect(Array.from(encodeFrame('hello', 4))).toEqual([
      0, 0, 0, 5, 104, 101, 108, 108, 111,
    ])
  })

  it('should count UTF-8 bytes, not characters', () => {
    const frame = encodeFrame('héllo', 2)
    expect(Array.from(frame.subarray(0, 2))).toEqual([0, 6])
    expect(frame.byteLength).toBe(8)
  })

  it('should encode an empty message as a bare header', () => {
    expect(Array.from(encodeFrame('', 3))).toEqual([0, 0, 0])
  })

  it('should default to a four byte header', () => {
    expect(Array.from(encodeFrame('a'))).toEqual([0, 0, 0, 1, 97])
  })

  it('should accept the longest payload the header can describe', () => {
    const frame = encodeFrame('a'.repeat(255), 1)
    expect(frame[0]).toBe(255)
    expect(frame.byteLength).toBe(256)
  })

  it('should fail when the payload does not fit the header', () => {
    expect(() => encodeFrame('a'.repeat(256), 1)).toThrow(EncodingError)
  })

  it('should reject unsupported header widths', () => {
    expect(() => encodeFrame('x', 0)).toThrow(EncodingError)
    expect(() => encodeFrame('x', 7)).toThrow(EncodingError)
    expect(() => encodeFrame('x', 2.5)).toThrow(EncodingError)
  })
})

describe('decodeFrame', () => {
  const messages = ['', 'ping', 'héllo wörld', '数据帧', 'emoji 🚀 ok']

  for (const headerWidth of [1, 2, 4, 6]) {
    it(`should round-trip messages with a ${headerWidth} byte header`, async () => {
      for (const message of messages) {
        const { read } = chunkedReader(encodeFrame(message, headerWidth))
        await expect(decodeFrame(read, { headerWidth })).resolves.toBe(message)
      }
    })
  }

  for (const chunkSize of [1, 2, 3, 7]) {
    it(`should reassemble frames delivered in ${chunkSize} byte chunks`, async () => {
      const message = 'partial delivery ✓'
      const { read } = chunkedReader(encodeFrame(message, 4), chunkSize)
      await expect(decodeFrame(read)).resolves.toBe(message)
    })
  }

  it('should decode consecutive frames in order', async () => {
    const frames = ['m1', 'm2', 'm3'].map((m) => encodeFrame(m, 2))
    const stream = new Uint8Array(frames.reduce((n, f) => n + f.byteLength, 0))
    let offset = 0
    for (const frame of frames) {
      stream.set(frame, offset)
      offset += frame.byteLength
    }

    const { read } = chunkedReader(stream, 3)
    const decoded = [
      await decodeFrame(read, { headerWidth: 2 }),
      await decodeFrame(read, { headerWidth: 2 }),
      await decodeFrame(read, { headerWidth: 2 }),
    ]
    expect(decoded).toEqual(['m1', 'm2', 'm3'])
  })

  it('should report a clean close between frames', async () => {
    const { read } = chunkedReader(new Uint8Array(0))
    const err = await decodeFrame(read).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ConnectionClosedError)
    expect(err).toMatchObject({ missing: 0 })
  })

  it('should report a close in the middle of the header', async () => {
    const { read } = chunkedReader(new Uint8Array([0, 0]))
    const err = await decodeFrame(read).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ConnectionClosedError)
    expect(err).toMatchObject({ missing: 2 })
  })

  it('should report a close in the middle of the payload', async () => {
    const truncated = encodeFrame('hello', 4).subarray(0, 6)
    const { read } = chunkedReader(truncated, 1)
    const err = await decodeFrame(read).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ConnectionClosedError)
    expect(err).toMatchObject({ missing: 3 })
  })

  it('should reject an oversized frame before reading its payload', async () => {
    const frame = new Uint8Array(4 + 1000)
    frame.set([0, 0, 0x03, 0xe8], 0)
    const { read, consumed } = chunkedReader(frame)

    const err = await decodeFrame(read, { maxFrameSize: 100 }).catch(
      (e: unknown) => e,
    )

    expect(err).toBeInstanceOf(FrameTooLargeError)
    expect(err).toMatchObject({ length: 1000, limit: 100 })
    expect(consumed()).toBe(4)
  })

  it('should reject payloads that are not valid UTF-8', async () => {
    const { read } = chunkedReader(new Uint8Array([0, 0, 0, 2, 0xc3, 0x28]))
    await expect(decodeFrame(read)).rejects.toThrow(EncodingError)
  })
})

describe('readExactly', () => {
  it('should return an empty array without reading for zero bytes', async () => {
    const read: ChunkReader = async () => {
      throw new Error('should not read')
    }
    const bytes = await readExactly(read, 0)
    expect(bytes.byteLength).toBe(0)
  })

  it('should refuse readers that return more than requested', async () => {
    const read: ChunkReader = async () => new Uint8Array(8)
    await expect(readExactly(read, 4)).rejects.toThrow(RangeError)
  })
})

describe('frame length helpers', () => {
  it('should read big-endian lengths from a view with an offset', () => {
    const view = new Uint8Array([9, 9, 1, 0]).subarray(2)
    expect(readFrameLength(view, 2)).toBe(256)
  })

  it('should compute the largest describable payload', () => {
    expect(maxPayloadLength(1)).toBe(255)
    expect(maxPayloadLength(4)).toBe(4_294_967_295)
    expect(maxPayloadLength(6)).toBe(281_474_976_710_655)
  })

  it('should cap the configured ceiling by the header width', () => {
    expect(effectiveFrameLimit(1, 1000)).toBe(255)
    expect(effectiveFrameLimit(4)).toBe(DEFAULT_MAX_FRAME_SIZE)
  })
})
