/**
 * Automaton lifecycle facade.
 * @packageDocumentation
 */

export { AhoCorasick } from './aho-corasick'
export { createAutomaton, buildAutomaton } from './factory'
export { validateAutomatonOptions, type AutomatonOptions } from './options'
