/** Header width used when none is configured: lengths up to 2^32 - 1. */
export const DEFAULT_HEADER_WIDTH = 4

export const MIN_HEADER_WIDTH = 1

/** Widest length header whose value a JavaScript number holds exactly. */
export const MAX_HEADER_WIDTH = 6

/** Safety ceiling on a single frame's declared payload length. */
export const DEFAULT_MAX_FRAME_SIZE = 16 * 1024 * 1024
