import pino, { type DestinationStream, type Logger } from 'pino'
import type { LogLevel } from '../config/settings.js'

/**
 * The slice of a pino logger the engine writes diagnostic traces to.
 * Passed explicitly to every component that logs.
 */
export type DiagnosticLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>

export interface LoggerOptions {
  level?: LogLevel | 'silent'
  destination?: DestinationStream
}

/**
 * Create the diagnostic logger.
 * Writes JSON lines to stderr unless a destination is given.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: 'strata',
      level: options.level ?? 'warn',
      base: undefined,
    },
    options.destination ?? pino.destination(2)
  )
}

/**
 * Logger that drops everything.
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}
