import { EncodingError, FrameTooLargeError } from '@framelink/utils'
import { Uint8ArrayList } from 'uint8arraylist'
import { describe, expect, it } from 'vitest'
import {
  encodeFrame,
  frameAvailable,
  missingFrameBytes,
  peekFrameLength,
  takeFrame,
} from '../../src/index.js'

function bufferOf(...chunks: Uint8Array[]): Uint8ArrayList {
  return new Uint8ArrayList(...chunks)
}

describe('takeFrame', () => {
  it('should take whole frames off the front in order', () => {
    const buffer = bufferOf(encodeFrame('one'), encodeFrame('two'))

    expect(takeFrame(buffer)).toBe('one')
    expect(takeFrame(buffer)).toBe('two')
    expect(takeFrame(buffer)).toBeUndefined()
    expect(buffer.byteLength).toBe(0)
  })

  it('should leave a partial header untouched', () => {
    const buffer = bufferOf(encodeFrame('hello').subarray(0, 2))

    expect(takeFrame(buffer)).toBeUndefined()
    expect(buffer.byteLength).toBe(2)
  })

  it('should continue a frame once the rest arrives', () => {
    const frame = encodeFrame('grüße')
    const buffer = bufferOf(frame.subarray(0, 2))
    expect(takeFrame(buffer)).toBeUndefined()

    buffer.append(frame.subarray(2, 6))
    expect(takeFrame(buffer)).toBeUndefined()
    expect(buffer.byteLength).toBe(6)

    buffer.append(frame.subarray(6))
    expect(takeFrame(buffer)).toBe('grüße')
  })

  it('should honour the header width', () => {
    const buffer = bufferOf(encodeFrame('abc', 2))

    expect(takeFrame(buffer, { headerWidth: 2 })).toBe('abc')
  })

  it('should reject an oversized frame from its header alone', () => {
    const buffer = bufferOf(encodeFrame('hello').subarray(0, 4))

    expect(() => takeFrame(buffer, { maxFrameSize: 4 })).toThrow(
      FrameTooLargeError,
    )
    expect(buffer.byteLength).toBe(4)
  })

  it('should consume a frame whose payload is not UTF-8', () => {
    const buffer = bufferOf(
      Uint8Array.from([0, 0, 0, 1, 0xff]),
      encodeFrame('next'),
    )

    expect(() => takeFrame(buffer)).toThrow(EncodingError)
    expect(takeFrame(buffer)).toBe('next')
  })
})

describe('frameAvailable', () => {
  it('should wait for the whole frame', () => {
    const frame = encodeFrame('hello')

    expect(frameAvailable(bufferOf())).toBe(false)
    expect(frameAvailable(bufferOf(frame.subarray(0, 3)))).toBe(false)
    expect(frameAvailable(bufferOf(frame.subarray(0, 8)))).toBe(false)
    expect(frameAvailable(bufferOf(frame))).toBe(true)
  })

  it('should report an oversized header straight away', () => {
    const header = encodeFrame('hello').subarray(0, 4)

    expect(frameAvailable(bufferOf(header), { maxFrameSize: 4 })).toBe(true)
  })
})

describe('missingFrameBytes', () => {
  const frame = encodeFrame('truncated')

  it('should be zero for an empty buffer', () => {
    expect(missingFrameBytes(bufferOf())).toBe(0)
  })

  it('should count the rest of an incomplete header', () => {
    expect(missingFrameBytes(bufferOf(frame.subarray(0, 1)))).toBe(3)
  })

  it('should count the rest of an incomplete payload', () => {
    expect(missingFrameBytes(bufferOf(frame.subarray(0, 6)))).toBe(7)
  })

  it('should be zero once the frame is complete', () => {
    expect(missingFrameBytes(bufferOf(frame))).toBe(0)
  })
})

describe('peekFrameLength', () => {
  it('should read the length without consuming it', () => {
    const buffer = bufferOf(encodeFrame('abcd', 3))

    expect(peekFrameLength(buffer, 3)).toBe(4)
    expect(buffer.byteLength).toBe(7)
  })
})
