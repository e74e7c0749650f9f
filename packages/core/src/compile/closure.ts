/**
 * Deterministic closure of the transition table.
 * @packageDocumentation
 */

import type { State } from '../types'
import { ROOT_STATE } from '../types'
import type { FailureTables } from './failure-links'

/**
 * Give `state` a direct transition for every symbol found along its failure
 * chain.
 *
 * The chain is walked nearest first down to and including the root, and an
 * existing transition is never overwritten, so each symbol takes the target
 * of the longest suffix that can extend with it.
 *
 * @param alphabets - Original trie rows (their keys are each state's alphabet)
 * @returns Number of transitions added
 */
export function closeState<S>(state: State, alphabets: readonly ReadonlyMap<S, State>[], tables: FailureTables<S>): number {
  const row = tables.rows[state]
  let added = 0

  for (let f = tables.failure[state]; ; f = tables.failure[f]) {
    for (const [symbol, target] of alphabets[f]) {
      if (!row.has(symbol)) {
        row.set(symbol, target)
        added++
      }
    }
    if (f === ROOT_STATE) break
  }

  return added
}
