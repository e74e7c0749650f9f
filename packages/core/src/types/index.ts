/**
 * Type definitions shared by the builder, compiler and matcher.
 * @packageDocumentation
 */

export type {
  State,
  PatternEntry,
  CompiledAutomatonBase,
  NondeterministicAutomaton,
  DeterministicAutomaton,
  CompiledAutomaton,
  Match,
  AutomatonStats,
} from './automaton'
export { ROOT_STATE } from './automaton'

export type { AutomatonErrorCode, OptionIssue } from './errors'
export {
  AutomatonError,
  AlreadyBuiltError,
  NotBuiltError,
  EmptyPatternError,
  AutomatonLimitError,
  InvalidOptionsError,
} from './errors'
