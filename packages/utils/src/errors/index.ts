/**
 * Structured errors shared by the codec and the transports
 */

export * from './base.js'
export * from './types.js'
