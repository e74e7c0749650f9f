/**
 * Logger factory.
 * @packageDocumentation
 */

import { pino, type DestinationStream, type LevelWithSilent, type Logger } from 'pino'

export const LOGGER_NAME = 'aho-automaton'

/**
 * @public
 */
export interface LoggerOptions {
  /** @defaultValue 'silent' */
  level?: LevelWithSilent

  /** Where records are written; stdout when omitted */
  destination?: DestinationStream
}

/**
 * Create the library's pino logger.
 *
 * Silent unless a level is given: a library should not write to stdout
 * without being asked.
 *
 * @public
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const settings = { name: LOGGER_NAME, level: options.level ?? 'silent' }
  return options.destination ? pino(settings, options.destination) : pino(settings)
}
