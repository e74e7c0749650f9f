/**
 * Automaton creation options.
 * @packageDocumentation
 */

import { z } from 'zod'
import type { LevelWithSilent, Logger } from 'pino'
import { parseOptions } from '../compile'

const automatonOptionsSchema = z
  .object({
    logger: z.custom<Logger>(
      (value) => typeof value === 'object' && value !== null && 'debug' in value && 'warn' in value,
      'Expected a pino logger',
    ),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
  })
  .partial()
  .strict()

/**
 * Options for {@link createAutomaton}.
 *
 * @public
 */
export interface AutomatonOptions {
  /** Logger to report compilation and lifecycle violations to */
  logger?: Logger

  /**
   * Level of the logger created when none is given.
   * @defaultValue 'silent'
   */
  logLevel?: LevelWithSilent
}

/**
 * @throws InvalidOptionsError when an option has the wrong type
 */
export function validateAutomatonOptions(options: AutomatonOptions): AutomatonOptions {
  return parseOptions(automatonOptionsSchema, options)
}
