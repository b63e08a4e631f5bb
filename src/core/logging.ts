/**
 * Logging Configuration - LogTape setup for structured logging
 *
 * Usage:
 *   import { getLogger } from '@logtape/logtape'
 *
 *   const logger = getLogger(['dashboard', 'data'])
 *   logger.info('Loaded {count} records', { count })
 *
 * Categories: ['dashboard', 'data'] for CSV loading, ['dashboard', 'view']
 * for chart rendering, ['dashboard', 'ui'] for the shell and error boundary.
 */

import { configure, getConsoleSink, type LogLevel } from '@logtape/logtape'

export async function initLogging(level: LogLevel): Promise<void> {
  await configure({
    sinks: {
      console: getConsoleSink()
    },
    loggers: [
      {
        category: ['dashboard'],
        lowestLevel: level,
        sinks: ['console'],
        parentSinks: 'override'
      },
      {
        category: ['logtape', 'meta'],
        lowestLevel: 'warning',
        sinks: ['console'],
        parentSinks: 'override'
      },
      // Catch-all for errors from anything else
      {
        category: [],
        lowestLevel: 'error',
        sinks: ['console']
      }
    ]
  })
}
