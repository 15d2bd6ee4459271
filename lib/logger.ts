/**
 * Logging setup
 *
 * Category loggers built on LogTape. Loggers stay silent until
 * initializeLogging() runs, so library callers and tests get no output.
 * Output goes to stderr: stdout carries the rendered text.
 *
 * @module lib/logger
 */

import { Console } from 'node:console'
import {
  configure,
  getConsoleSink,
  getLogger,
  type Logger,
} from '@logtape/logtape'

const ROOT_CATEGORY = 'blockfit'

/** Options for logging initialization */
export interface LoggingOptions {
  debug?: boolean
}

/**
 * Configures the console sink. Call once, before the first log line matters.
 */
export async function initializeLogging({
  debug = false,
}: LoggingOptions = {}): Promise<void> {
  const stderrConsole = new Console({
    stdout: process.stderr,
    stderr: process.stderr,
  })

  await configure({
    reset: true,
    sinks: { console: getConsoleSink({ console: stderrConsole }) },
    loggers: [
      {
        category: [ROOT_CATEGORY],
        lowestLevel: debug ? 'debug' : 'info',
        sinks: ['console'],
      },
      // LogTape's own diagnostics
      { category: ['logtape', 'meta'], lowestLevel: 'warning', sinks: ['console'] },
    ],
  })
}

export const appLogger = (): Logger => getLogger([ROOT_CATEGORY, 'app'])
export const configLogger = (): Logger => getLogger([ROOT_CATEGORY, 'config'])
export const imageLogger = (): Logger => getLogger([ROOT_CATEGORY, 'image'])
export const renderLogger = (): Logger => getLogger([ROOT_CATEGORY, 'render'])
