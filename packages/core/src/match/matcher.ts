/**
 * Text matching - scans symbols against a compiled automaton.
 * @packageDocumentation
 */

import type { State, CompiledAutomaton, Match } from '../types'
import { ROOT_STATE } from '../types'

/**
 * Advance the automaton by one symbol.
 * @public
 */
export type Step<S> = (state: State, symbol: S) => State

/**
 * Mutable traversal state of one scan. Owned by a single search or scanner,
 * never by the automaton.
 */
export interface Cursor {
  state: State
  /** Number of symbols consumed so far */
  position: number
}

/**
 * Select the transition function for the automaton's compiled mode.
 *
 * @public
 */
export function createStep<S, P>(automaton: CompiledAutomaton<S, P>): Step<S> {
  const { transitions } = automaton

  if (automaton.deterministic) {
    // Absent only for symbols never inserted
    return (state, symbol) => transitions[state].get(symbol) ?? ROOT_STATE
  }

  const { failure } = automaton
  return (state, symbol) => {
    let current = state
    while (current !== ROOT_STATE && !transitions[current].has(symbol)) {
      current = failure[current]
    }
    return transitions[current].get(symbol) ?? ROOT_STATE
  }
}

/**
 * Lazily scan symbols, yielding each match as soon as the symbol that
 * completes it is consumed.
 *
 * The cursor is advanced in place, one symbol at a time, so a consumer that
 * stops early leaves it just past the last symbol read.
 */
export function* scanSymbols<S, P>(
  automaton: CompiledAutomaton<S, P>,
  step: Step<S>,
  symbols: Iterable<S>,
  cursor: Cursor,
): Generator<Match<P>, void, undefined> {
  const { outputs, patterns } = automaton

  for (const symbol of symbols) {
    cursor.state = step(cursor.state, symbol)
    cursor.position++

    const end = cursor.position
    for (const id of outputs[cursor.state]) {
      const entry = patterns[id]
      yield { pattern: entry.pattern, start: end - entry.length, end }
    }
  }
}

/**
 * Find every occurrence of every pattern in a text.
 *
 * Overlapping occurrences are all reported. Matches ending at the same
 * position come longest first.
 *
 * @param automaton - Compiled automaton
 * @param text - Any finite or infinite sequence of symbols
 * @returns Lazy iterator of matches, in order of end position
 *
 * @public
 */
export function searchText<S, P>(
  automaton: CompiledAutomaton<S, P>,
  text: Iterable<S>,
  step: Step<S> = createStep(automaton),
): Generator<Match<P>, void, undefined> {
  return scanSymbols(automaton, step, text, { state: ROOT_STATE, position: 0 })
}

/**
 * Test whether any pattern occurs in a text.
 *
 * Stops reading at the first match.
 *
 * @public
 */
export function containsMatch<S, P>(
  automaton: CompiledAutomaton<S, P>,
  text: Iterable<S>,
  step: Step<S> = createStep(automaton),
): boolean {
  const { outputs } = automaton
  let state = ROOT_STATE

  for (const symbol of text) {
    state = step(state, symbol)
    if (outputs[state].length > 0) {
      return true
    }
  }

  return false
}
