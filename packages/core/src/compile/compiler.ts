/**
 * Automaton compiler - turns a finished trie into a matching automaton.
 * @packageDocumentation
 */

import type { Logger } from 'pino'
import type { CompiledAutomaton } from '../types'
import { AutomatonLimitError } from '../types'
import { countTransitions, trieSize, type Trie } from '../trie'
import { propagateFailureLinks } from './failure-links'
import { closeState } from './closure'
import type { ResolvedCompileOptions } from './options'

/**
 * Compile a trie into an immutable automaton.
 *
 * The trie itself is left untouched, so a failed compilation can be retried
 * with other options.
 *
 * @param trie - Trie holding every inserted pattern
 * @param options - Resolved compile options
 * @param logger - Receives one debug record describing the result
 * @returns Automaton ready for matching; its tables are frozen arrays of
 *   `ReadonlyMap` rows
 * @throws AutomatonLimitError if the deterministic closure exceeds `maxTransitions`
 */
export function compileTrie<S, P>(
  trie: Trie<S, P>,
  options: ResolvedCompileOptions,
  logger?: Logger,
): CompiledAutomaton<S, P> {
  const alphabets = trie.table.rows
  const { deterministic, maxTransitions } = options
  let transitionCount = countTransitions(alphabets)

  const tables = propagateFailureLinks(
    trie,
    deterministic
      ? (state, current) => {
          transitionCount += closeState(state, alphabets, current)
          if (transitionCount > maxTransitions) {
            throw new AutomatonLimitError(
              `Deterministic closure exceeded limit of ${maxTransitions} transitions. ` +
                `Compile without determinism or raise maxTransitions.`,
              maxTransitions,
              transitionCount,
            )
          }
        }
      : undefined,
  )

  const transitions = Object.freeze(tables.rows)
  const outputs = Object.freeze(tables.outputs.map((ids) => Object.freeze(ids)))
  const patterns = Object.freeze([...trie.patterns])

  logger?.debug(
    { states: trieSize(trie), transitions: transitionCount, patterns: patterns.length, deterministic },
    'automaton compiled',
  )

  const automaton: CompiledAutomaton<S, P> = deterministic
    ? { deterministic: true, transitions, outputs, patterns }
    : { deterministic: false, transitions, failure: Object.freeze(tables.failure), outputs, patterns }

  return Object.freeze(automaton)
}
