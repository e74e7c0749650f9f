/**
 * Aho-Corasick Automaton Library
 *
 * Multi-pattern exact matching: insert any number of patterns, compile them
 * into an automaton once, then scan texts in a single left-to-right pass that
 * reports every occurrence of every pattern, overlapping ones included.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.0.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // Automaton types
  Match,
  AutomatonStats,
  // Error types
  AutomatonErrorCode,
  OptionIssue,
} from './types'
export {
  AutomatonError,
  AlreadyBuiltError,
  NotBuiltError,
  EmptyPatternError,
  AutomatonLimitError,
  InvalidOptionsError,
} from './types'

// =============================================================================
// Automaton
// =============================================================================

export { AhoCorasick, createAutomaton, buildAutomaton, type AutomatonOptions } from './automaton'

// =============================================================================
// Options and matching
// =============================================================================

export { DEFAULT_MAX_TRANSITIONS, type CompileOptions } from './compile'
export type { Scanner } from './match'

// =============================================================================
// Logging
// =============================================================================

export { createLogger, type LoggerOptions } from './logging'
