/**
 * Convenience constructors.
 * @packageDocumentation
 */

import type { CompileOptions } from '../compile'
import { AhoCorasick } from './aho-corasick'
import type { AutomatonOptions } from './options'

/**
 * Create an empty automaton.
 *
 * Without type arguments patterns and texts are strings, scanned by code
 * point. Pass a symbol type to match over other sequences:
 *
 * ```ts
 * const ac = createAutomaton<number>()
 * ac.insert([1, 2, 3])
 * ```
 *
 * @public
 */
export function createAutomaton(options?: AutomatonOptions): AhoCorasick<string, string>
export function createAutomaton<S, P extends Iterable<S> = readonly S[]>(options?: AutomatonOptions): AhoCorasick<S, P>
export function createAutomaton<S, P extends Iterable<S>>(options: AutomatonOptions = {}): AhoCorasick<S, P> {
  return new AhoCorasick<S, P>(options)
}

/**
 * Create an automaton, insert every pattern and compile it.
 *
 * @public
 */
export function buildAutomaton(
  patterns: Iterable<string>,
  compileOptions?: boolean | CompileOptions,
  options?: AutomatonOptions,
): AhoCorasick<string, string>
export function buildAutomaton<S, P extends Iterable<S>>(
  patterns: Iterable<P>,
  compileOptions?: boolean | CompileOptions,
  options?: AutomatonOptions,
): AhoCorasick<S, P>
export function buildAutomaton<S, P extends Iterable<S>>(
  patterns: Iterable<P>,
  compileOptions: boolean | CompileOptions = false,
  options: AutomatonOptions = {},
): AhoCorasick<S, P> {
  const automaton = new AhoCorasick<S, P>(options)
  automaton.insertAll(patterns)
  automaton.compile(compileOptions)
  return automaton
}
