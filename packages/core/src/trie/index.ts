/**
 * Trie construction (insertion phase).
 * @packageDocumentation
 */

export { createTrie, insertPattern, trieSize, type Trie } from './trie-builder'
export {
  createTransitionTable,
  getTransition,
  getOrCreateTransition,
  countTransitions,
  type TransitionTable,
} from './transition-table'
