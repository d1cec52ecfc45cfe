export * from './buffered.js'
export * from './constants.js'
export * from './decode.js'
export * from './encode.js'
export type * from './types.js'
