// =============================================================================
// STATES AND TABLES
// =============================================================================

/**
 * A state is nothing more than an integer index into the automaton tables.
 * @public
 */
export type State = number

/**
 * The initial state. Always exists and never carries output.
 * @public
 */
export const ROOT_STATE: State = 0

/**
 * An inserted pattern together with its length in symbols.
 *
 * Output tables refer to entries by index so that a pattern shared by many
 * states through failure chains is stored once.
 *
 * @public
 */
export interface PatternEntry<P> {
  /** The pattern exactly as it was inserted */
  readonly pattern: P

  /** Number of symbols the pattern's iterator produced */
  readonly length: number
}

/**
 * Tables shared by both compiled modes. Every table is indexed by state id.
 * @public
 */
export interface CompiledAutomatonBase<S, P> {
  /**
   * Outgoing transitions of each state. The array is frozen; the rows are
   * read-only by type only, which is why compiled tables stay internal to
   * the package.
   */
  readonly transitions: readonly ReadonlyMap<S, State>[]

  /**
   * Pattern ids recognized in each state, own pattern first and then those
   * inherited along the failure chain (longest first).
   */
  readonly outputs: readonly (readonly number[])[]

  /** Interned pattern table */
  readonly patterns: readonly PatternEntry<P>[]
}

/**
 * Automaton that follows failure links while matching.
 * @public
 */
export interface NondeterministicAutomaton<S, P> extends CompiledAutomatonBase<S, P> {
  readonly deterministic: false

  /** Failure link of each state (entry 0 is unused) */
  readonly failure: readonly State[]
}

/**
 * Automaton whose transition table was closed over the whole alphabet.
 *
 * Every state has a direct transition for every symbol seen during
 * insertion, so no failure table is kept.
 *
 * @public
 */
export interface DeterministicAutomaton<S, P> extends CompiledAutomatonBase<S, P> {
  readonly deterministic: true
}

/**
 * A compiled, immutable Aho-Corasick automaton.
 * @public
 */
export type CompiledAutomaton<S, P> = NondeterministicAutomaton<S, P> | DeterministicAutomaton<S, P>

// =============================================================================
// MATCHES
// =============================================================================

/**
 * One occurrence of a pattern in the scanned text.
 *
 * The pattern occupies symbol positions `[start, end)`.
 *
 * @public
 */
export interface Match<P> {
  readonly pattern: P
  readonly start: number
  readonly end: number
}

/**
 * Size figures of an automaton.
 * @public
 */
export interface AutomatonStats {
  /** Number of states, root included */
  readonly states: number

  /** Number of entries in the transition table */
  readonly transitions: number

  /** Number of distinct patterns */
  readonly patterns: number

  readonly deterministic: boolean
  readonly built: boolean
}
