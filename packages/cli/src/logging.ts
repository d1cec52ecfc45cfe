import debug from 'debug'
import type { GlobalArgs } from './options/globalOptions.js'

const NAMESPACES = 'framelink:*'

/**
 * `debug` turns on every framelink namespace; the quieter levels leave
 * whatever `DEBUG` selected alone.
 */
export function configureLogging(level: GlobalArgs['logLevel']): void {
  if (level === 'debug' && !debug.enabled(NAMESPACES)) {
    const current = process.env.DEBUG
    debug.enable(current ? `${current},${NAMESPACES}` : NAMESPACES)
  }
}
