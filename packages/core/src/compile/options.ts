/**
 * Compile options and their validation.
 * @packageDocumentation
 */

import { z, type ZodTypeAny } from 'zod'
import { InvalidOptionsError } from '../types'

/**
 * Default budget of the deterministic closure: unlimited, so `compile(true)`
 * never fails on size unless the caller asks for a cap.
 *
 * @public
 */
export const DEFAULT_MAX_TRANSITIONS = Infinity

export const compileOptionsSchema = z
  .object({
    deterministic: z.boolean().default(false),
    maxTransitions: z.union([z.number().int().positive(), z.literal(Infinity)]).default(DEFAULT_MAX_TRANSITIONS),
  })
  .strict()

/**
 * Options for automaton compilation.
 *
 * @public
 */
export interface CompileOptions {
  /**
   * Close the transition table so matching never follows failure links.
   *
   * Costs up to one transition per (state, alphabet symbol) pair instead of
   * one per trie edge; worthwhile for small alphabets and long texts.
   *
   * @defaultValue false
   */
  deterministic?: boolean

  /**
   * Maximum size of the closed transition table, for callers that need to
   * bound memory. Only used when `deterministic` is set.
   * @defaultValue Infinity
   */
  maxTransitions?: number
}

/**
 * Compile options with every default applied.
 */
export type ResolvedCompileOptions = Required<CompileOptions>

/**
 * Validate an options object against a schema.
 *
 * @throws InvalidOptionsError listing every problem found
 */
export function parseOptions<T extends ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input)
  if (!result.success) {
    throw new InvalidOptionsError(
      result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    )
  }
  return result.data
}

/**
 * Normalize the argument of `compile`: either the bare deterministic flag or
 * a full options object.
 */
export function resolveCompileOptions(options: boolean | CompileOptions = {}): ResolvedCompileOptions {
  return parseOptions(compileOptionsSchema, typeof options === 'boolean' ? { deterministic: options } : options)
}
