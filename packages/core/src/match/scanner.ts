/**
 * Incremental scanning over chunked input.
 * @packageDocumentation
 */

import type { CompiledAutomaton, Match } from '../types'
import { ROOT_STATE } from '../types'
import { createStep, scanSymbols, type Cursor, type Step } from './matcher'

/**
 * Push-based matcher for input that arrives in pieces.
 *
 * Traversal state carries over from one chunk to the next, so occurrences
 * spanning a chunk boundary are found, and match positions count from the
 * start of the whole stream. Each scanner owns its own state; any number of
 * scanners may share one automaton.
 *
 * @public
 */
export class Scanner<S, P> {
  private readonly cursor: Cursor = { state: ROOT_STATE, position: 0 }

  /** Iterator of the latest chunk, until all of its symbols are consumed */
  private pending: Iterator<S> | undefined

  constructor(
    private readonly automaton: CompiledAutomaton<S, P>,
    private readonly step: Step<S> = createStep(automaton),
  ) {}

  /** Number of symbols consumed since creation or the last reset */
  get position(): number {
    return this.cursor.position
  }

  /**
   * Feed the next chunk of input.
   *
   * Symbols are read as matches are pulled. Closing the iterator early
   * (`break`, `return()`) consumes the rest of the chunk without reporting
   * its matches; a chunk whose iterator is never started is consumed the
   * same way when the next chunk is fed. Either way later positions stay
   * relative to the whole stream.
   */
  scan(chunk: Iterable<S>): Generator<Match<P>, void, undefined> {
    this.settle()
    const symbols = chunk[Symbol.iterator]()
    this.pending = symbols
    return this.consume(symbols)
  }

  /** Forget all consumed input, including any unread rest of the last chunk. */
  reset(): void {
    this.pending = undefined
    this.cursor.state = ROOT_STATE
    this.cursor.position = 0
  }

  private *consume(symbols: Iterator<S>): Generator<Match<P>, void, undefined> {
    // Not closed by for-of, so an abandoned chunk can still be drained
    const unclosable: Iterable<S> = { [Symbol.iterator]: () => ({ next: () => symbols.next() }) }

    try {
      yield* scanSymbols(this.automaton, this.step, unclosable, this.cursor)
    } finally {
      if (this.pending === symbols) {
        this.settle()
      }
    }
  }

  /** Advance over the unread symbols of the pending chunk without reporting. */
  private settle(): void {
    const symbols = this.pending
    if (symbols === undefined) return
    this.pending = undefined

    for (let result = symbols.next(); !result.done; result = symbols.next()) {
      this.cursor.state = this.step(this.cursor.state, result.value)
      this.cursor.position++
    }
  }
}

/**
 * Find every occurrence in an asynchronous source of chunks, such as a
 * readable stream of strings.
 *
 * @public
 */
export async function* searchChunks<S, P>(
  automaton: CompiledAutomaton<S, P>,
  source: AsyncIterable<Iterable<S>>,
  step: Step<S> = createStep(automaton),
): AsyncGenerator<Match<P>, void, undefined> {
  const scanner = new Scanner(automaton, step)

  for await (const chunk of source) {
    yield* scanner.scan(chunk)
  }
}
