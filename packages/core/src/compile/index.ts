/**
 * Automaton compilation utilities.
 * @packageDocumentation
 */

export { compileTrie } from './compiler'
export { propagateFailureLinks, type FailureTables, type StateVisitor } from './failure-links'
export { closeState } from './closure'
export {
  DEFAULT_MAX_TRANSITIONS,
  compileOptionsSchema,
  parseOptions,
  resolveCompileOptions,
  type CompileOptions,
  type ResolvedCompileOptions,
} from './options'
