/**
 * Reads up to `maxBytes` bytes from a stream. Resolves with fewer bytes when
 * that is all that is available, and with an empty array once the stream
 * has ended.
 */
export type ChunkReader = (maxBytes: number) => Promise<Uint8Array>

export interface FrameOptions {
  /** Width in bytes of the big-endian length header. */
  headerWidth?: number
  /** Largest payload length accepted when decoding. */
  maxFrameSize?: number
}

export interface ReadExactlyOptions {
  /**
   * Whether earlier bytes of the same frame were already consumed. A stream
   * ending before the first byte of a frame reports nothing outstanding.
   */
  frameStarted?: boolean
}
