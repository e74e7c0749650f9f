/**
 * Sparse transition table keyed by (state, symbol).
 * @packageDocumentation
 */

import type { State } from '../types'

/**
 * Mutable transition table used while the trie grows.
 *
 * Rows are indexed by state id; a new row is appended whenever a state is
 * allocated, so `rows.length` is also the next free state id.
 */
export interface TransitionTable<S> {
  readonly rows: Map<S, State>[]
}

/**
 * Create a table holding only the root state.
 */
export function createTransitionTable<S>(): TransitionTable<S> {
  return { rows: [new Map()] }
}

/**
 * Look up a transition, returning `undefined` when there is none.
 */
export function getTransition<S>(table: TransitionTable<S>, from: State, symbol: S): State | undefined {
  return table.rows[from].get(symbol)
}

/**
 * Get the destination of (from, symbol), allocating a fresh state on a miss.
 *
 * State ids increase monotonically starting at 1.
 */
export function getOrCreateTransition<S>(table: TransitionTable<S>, from: State, symbol: S): State {
  const row = table.rows[from]
  let target = row.get(symbol)

  if (target === undefined) {
    target = table.rows.length
    table.rows.push(new Map())
    row.set(symbol, target)
  }

  return target
}

/**
 * Total number of (state, symbol) entries.
 */
export function countTransitions<S>(rows: readonly ReadonlyMap<S, State>[]): number {
  let total = 0
  for (const row of rows) {
    total += row.size
  }
  return total
}
