/**
 * Trie builder - accumulates patterns into a prefix tree.
 * @packageDocumentation
 */

import type { State, PatternEntry } from '../types'
import { ROOT_STATE, EmptyPatternError } from '../types'
import { createTransitionTable, getOrCreateTransition, type TransitionTable } from './transition-table'

/**
 * Mutable state of the insertion phase.
 *
 * The keys of each row of `table` are that state's alphabet: the symbols
 * with an outgoing trie edge. The compiler reads the trie once, after the
 * last insertion, and the trie is dropped afterwards.
 */
export interface Trie<S, P> {
  readonly table: TransitionTable<S>

  /** Id of the pattern whose last symbol lands exactly on each state */
  readonly terminals: (number | undefined)[]

  /** Interned patterns, in insertion order */
  readonly patterns: PatternEntry<P>[]
}

/**
 * Create an empty trie containing only the root state.
 */
export function createTrie<S, P>(): Trie<S, P> {
  return {
    table: createTransitionTable<S>(),
    terminals: [undefined],
    patterns: [],
  }
}

/**
 * Number of states allocated so far, root included.
 */
export function trieSize<S, P>(trie: Trie<S, P>): number {
  return trie.table.rows.length
}

/**
 * Insert a pattern, creating whatever states its path needs.
 *
 * Inserting a symbol sequence that is already present keeps the pattern
 * inserted first.
 *
 * @returns The state on which the pattern ends
 * @throws EmptyPatternError if the pattern has no symbols
 */
export function insertPattern<S, P extends Iterable<S>>(trie: Trie<S, P>, pattern: P): State {
  let state = ROOT_STATE
  let length = 0

  for (const symbol of pattern) {
    state = getOrCreateTransition(trie.table, state, symbol)
    length++
  }

  if (state === ROOT_STATE) {
    throw new EmptyPatternError()
  }

  while (trie.terminals.length < trie.table.rows.length) {
    trie.terminals.push(undefined)
  }

  if (trie.terminals[state] === undefined) {
    trie.terminals[state] = trie.patterns.length
    trie.patterns.push({ pattern, length })
  }

  return state
}
