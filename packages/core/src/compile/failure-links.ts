/**
 * Breadth-first failure link construction and output merging.
 * @packageDocumentation
 */

import type { State } from '../types'
import { ROOT_STATE } from '../types'
import type { Trie } from '../trie'

/**
 * Tables produced while walking the trie.
 */
export interface FailureTables<S> {
  /** Transition rows, copied from the trie so they may be closed afterwards */
  readonly rows: Map<S, State>[]
  readonly failure: State[]
  readonly outputs: number[][]
}

/**
 * Called for each non-root state once its children have been linked.
 * Shallower states are always visited first.
 */
export type StateVisitor<S> = (state: State, tables: FailureTables<S>) => void

/**
 * Compute failure links and merged output sets for every state of the trie.
 *
 * States are processed in increasing depth: a state's failure target is
 * always shallower, so its link and output set are final by the time they
 * are read.
 *
 * @param trie - Trie holding every inserted pattern
 * @param visit - Optional hook run after each dequeued state
 */
export function propagateFailureLinks<S, P>(trie: Trie<S, P>, visit?: StateVisitor<S>): FailureTables<S> {
  const alphabets = trie.table.rows
  const tables: FailureTables<S> = {
    rows: alphabets.map((row) => new Map(row)),
    failure: alphabets.map(() => ROOT_STATE),
    // States of an insertion that failed part-way have no terminal entry
    outputs: alphabets.map((_, state) => {
      const id = trie.terminals[state]
      return id === undefined ? [] : [id]
    }),
  }
  const { rows, failure, outputs } = tables

  // Depth-1 states fail to the root
  const queue: State[] = [...alphabets[ROOT_STATE].values()]

  for (let head = 0; head < queue.length; head++) {
    const r = queue[head]

    for (const [symbol, s] of alphabets[r]) {
      queue.push(s)

      let f = failure[r]
      while (f !== ROOT_STATE && !rows[f].has(symbol)) {
        f = failure[f]
      }
      failure[s] = rows[f].get(symbol) ?? ROOT_STATE

      // Exactly once, after failure[s] is fixed
      outputs[s] = [...outputs[s], ...outputs[failure[s]]]
    }

    visit?.(r, tables)
  }

  return tables
}
