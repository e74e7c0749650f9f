/**
 * Aho-Corasick multi-pattern matcher with an insert, compile, search lifecycle.
 * @packageDocumentation
 */

import type { Logger } from 'pino'
import type { AutomatonStats, CompiledAutomaton, Match } from '../types'
import { AlreadyBuiltError, NotBuiltError, type AutomatonError } from '../types'
import { createTrie, insertPattern, trieSize, countTransitions, type Trie } from '../trie'
import { compileTrie, resolveCompileOptions, type CompileOptions } from '../compile'
import { createStep, searchText, containsMatch, Scanner, searchChunks, type Step } from '../match'
import { createLogger } from '../logging'
import { validateAutomatonOptions, type AutomatonOptions } from './options'

type Phase<S, P> =
  | { readonly status: 'building'; readonly trie: Trie<S, P> }
  | { readonly status: 'built'; readonly automaton: CompiledAutomaton<S, P>; readonly step: Step<S> }

/**
 * A multi-pattern exact matching automaton.
 *
 * Usage follows a strict lifecycle:
 * 1. `insert` any number of patterns
 * 2. `compile` exactly once
 * 3. `search` any number of texts
 *
 * Once compiled the automaton is immutable and may be shared by any number
 * of concurrent searches and scanners.
 *
 * Symbols may be of any type compared with SameValueZero (`Map` keys):
 * characters, numbers, interned strings, object references.
 *
 * @typeParam S - Symbol type
 * @typeParam P - Pattern type, a sequence of `S`
 *
 * @public
 */
export class AhoCorasick<S, P extends Iterable<S>> {
  private phase: Phase<S, P> = { status: 'building', trie: createTrie<S, P>() }
  private readonly logger: Logger

  constructor(options: AutomatonOptions = {}) {
    const { logger, logLevel } = validateAutomatonOptions(options)
    this.logger = logger ?? createLogger({ level: logLevel })
  }

  /** Whether `compile` has completed */
  get isBuilt(): boolean {
    return this.phase.status === 'built'
  }

  /** Whether the automaton was compiled with a closed transition table */
  get isDeterministic(): boolean {
    return this.phase.status === 'built' && this.phase.automaton.deterministic
  }

  /**
   * Add a pattern.
   *
   * @throws AlreadyBuiltError after compilation
   * @throws EmptyPatternError if the pattern has no symbols
   */
  insert(pattern: P): void {
    if (this.phase.status === 'built') {
      throw this.violation(new AlreadyBuiltError('insert'))
    }
    insertPattern(this.phase.trie, pattern)
  }

  /**
   * Add several patterns, in order.
   *
   * Stops at the first pattern that fails; earlier ones stay inserted.
   */
  insertAll(patterns: Iterable<P>): void {
    for (const pattern of patterns) {
      this.insert(pattern)
    }
  }

  /**
   * Compute failure links and merged outputs, freezing the automaton.
   *
   * Passing `true` (or `{ deterministic: true }`) also closes the transition
   * table: matching then takes exactly one lookup per symbol, at the cost of
   * up to one transition per (state, alphabet symbol) pair. Keep it for small
   * alphabets; set `maxTransitions` to bound the table size (unbounded by default).
   *
   * @throws AlreadyBuiltError if already compiled
   * @throws AutomatonLimitError if a `maxTransitions` budget was set and the closed table would exceed it;
   *   the automaton stays unbuilt and may be compiled again
   * @throws InvalidOptionsError on malformed options
   */
  compile(options: boolean | CompileOptions = false): void {
    if (this.phase.status === 'built') {
      throw this.violation(new AlreadyBuiltError('compile'))
    }
    const automaton = compileTrie(this.phase.trie, resolveCompileOptions(options), this.logger)
    this.phase = { status: 'built', automaton, step: createStep(automaton) }
  }

  /**
   * Find every occurrence of every pattern in `text`.
   *
   * Matches are produced lazily, interleaved with reading `text`, so the
   * text may be arbitrarily long and the caller may stop at any time.
   * Positions count the symbols produced by the text's iterator (code
   * points for strings).
   *
   * @throws NotBuiltError before compilation (immediately, not on first pull)
   */
  search(text: Iterable<S>): Generator<Match<P>, void, undefined> {
    const { automaton, step } = this.built('search')
    return searchText(automaton, text, step)
  }

  /**
   * Whether any pattern occurs in `text`. Stops at the first match.
   *
   * @throws NotBuiltError before compilation
   */
  test(text: Iterable<S>): boolean {
    const { automaton, step } = this.built('test')
    return containsMatch(automaton, text, step)
  }

  /**
   * Create a scanner for input that arrives in chunks.
   *
   * @throws NotBuiltError before compilation
   */
  createScanner(): Scanner<S, P> {
    const { automaton, step } = this.built('createScanner')
    return new Scanner(automaton, step)
  }

  /**
   * Search an asynchronous source of chunks.
   *
   * @throws NotBuiltError before compilation
   */
  searchAsync(source: AsyncIterable<Iterable<S>>): AsyncGenerator<Match<P>, void, undefined> {
    const { automaton, step } = this.built('searchAsync')
    return searchChunks(automaton, source, step)
  }

  stats(): AutomatonStats {
    if (this.phase.status === 'building') {
      const { trie } = this.phase
      return {
        states: trieSize(trie),
        transitions: countTransitions(trie.table.rows),
        patterns: trie.patterns.length,
        deterministic: false,
        built: false,
      }
    }

    const { automaton } = this.phase
    return {
      states: automaton.transitions.length,
      transitions: countTransitions(automaton.transitions),
      patterns: automaton.patterns.length,
      deterministic: automaton.deterministic,
      built: true,
    }
  }

  private built(operation: string): { automaton: CompiledAutomaton<S, P>; step: Step<S> } {
    if (this.phase.status === 'building') {
      throw this.violation(new NotBuiltError(operation))
    }
    return this.phase
  }

  private violation<E extends AutomatonError>(error: E): E {
    this.logger.warn({ code: error.code }, error.message)
    return error
  }
}
