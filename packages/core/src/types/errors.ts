/**
 * Error codes for automaton contract violations.
 * @public
 */
export type AutomatonErrorCode =
  | 'ALREADY_BUILT' // insert or compile after compilation
  | 'NOT_BUILT' // search before compilation
  | 'EMPTY_PATTERN' // zero-length pattern
  | 'TRANSITION_LIMIT' // deterministic closure exceeded its budget
  | 'INVALID_OPTIONS' // options failed validation

/**
 * Base class of every error thrown by the automaton.
 *
 * All of them are programming errors: the caller broke the
 * insert, compile, search lifecycle or passed bad options.
 *
 * @public
 */
export class AutomatonError extends Error {
  /** Error classification code */
  readonly code: AutomatonErrorCode

  constructor(code: AutomatonErrorCode, message: string) {
    super(message)
    this.name = 'AutomatonError'
    this.code = code
  }
}

/**
 * Thrown by `insert` or `compile` once the automaton is compiled.
 * @public
 */
export class AlreadyBuiltError extends AutomatonError {
  constructor(operation: string) {
    super('ALREADY_BUILT', `Cannot ${operation}: automaton already built`)
    this.name = 'AlreadyBuiltError'
  }
}

/**
 * Thrown by matching operations before `compile`.
 * @public
 */
export class NotBuiltError extends AutomatonError {
  constructor(operation: string) {
    super('NOT_BUILT', `Cannot ${operation}: automaton not built, call compile() first`)
    this.name = 'NotBuiltError'
  }
}

/**
 * Thrown when inserting a pattern with no symbols.
 * @public
 */
export class EmptyPatternError extends AutomatonError {
  constructor() {
    super('EMPTY_PATTERN', 'Empty pattern not allowed')
    this.name = 'EmptyPatternError'
  }
}

/**
 * Error thrown when the deterministic closure exceeds its transition budget.
 *
 * Closing the table costs up to one transition per state and alphabet symbol,
 * which grows quickly for large alphabets.
 *
 * @public
 */
export class AutomatonLimitError extends AutomatonError {
  /** The limit that was exceeded */
  readonly limit: number

  /** The actual value that exceeded the limit */
  readonly actual: number

  constructor(message: string, limit: number, actual: number) {
    super('TRANSITION_LIMIT', message)
    this.name = 'AutomatonLimitError'
    this.limit = limit
    this.actual = actual
  }
}

/**
 * A single validation problem found in an options object.
 * @public
 */
export interface OptionIssue {
  /** Dotted path of the offending option */
  readonly path: string
  readonly message: string
}

/**
 * Thrown when automaton or compile options fail validation.
 * @public
 */
export class InvalidOptionsError extends AutomatonError {
  readonly issues: readonly OptionIssue[]

  constructor(issues: readonly OptionIssue[]) {
    super('INVALID_OPTIONS', `Invalid options: ${issues.map((i) => `${i.path || '(root)'}: ${i.message}`).join('; ')}`)
    this.name = 'InvalidOptionsError'
    this.issues = issues
  }
}
