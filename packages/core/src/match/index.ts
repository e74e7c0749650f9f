/**
 * Matching against compiled automata.
 * @packageDocumentation
 */

export { createStep, scanSymbols, searchText, containsMatch, type Step, type Cursor } from './matcher'
export { Scanner, searchChunks } from './scanner'
