export * from './errors/index.js'
export * from './net.js'
export * from './safe.js'
