/**
 * Error codes for machine construction and evaluation failures.
 * @public
 */
export type DfsmErrorCode =
  | 'MALFORMED_ENCODING' // wrong field count, bad integer, bad transition tuple
  | 'MALFORMED_ALPHABET' // symbol that is not a single usable character
  | 'UNKNOWN_STATE_ID' // id referenced but not declared in the states field
  | 'DANGLING_STATE_REFERENCE' // state outside the machine's state set
  | 'UNKNOWN_SYMBOL' // transition symbol outside the alphabet
  | 'EPSILON_NOT_ALLOWED' // epsilon transition in a deterministic machine
  | 'INCOMPLETE_TRANSITION_FUNCTION' // missing or conflicting (state, symbol) entry
  | 'MISSING_TRANSITION' // lookup of an unmapped (state, symbol) pair
  | 'INVALID_INPUT_SYMBOL' // evaluated input contains a symbol outside the alphabet
  | 'INVALID_DESCRIPTOR' // structural descriptor failed schema validation
  | 'ALPHABET_MISMATCH' // binary operation on machines with different alphabets
  | 'STATE_LIMIT' // construction exceeded the configured state limit

/**
 * Names of the five fields of the machine encoding.
 * @public
 */
export type EncodingField = 'states' | 'alphabet' | 'transitions' | 'initial' | 'accepting'

/**
 * Error thrown when a machine cannot be built or evaluated.
 *
 * Construction never yields a partially valid machine: every failure surfaces
 * as one of these, classified by {@link DfsmErrorCode}.
 *
 * @public
 */
export class DfsmError extends Error {
  /** Error classification code */
  readonly code: DfsmErrorCode

  /** Encoding field the problem was found in, for parse failures */
  readonly field?: EncodingField

  constructor(code: DfsmErrorCode, message: string, field?: EncodingField) {
    super(message)
    this.name = 'DfsmError'
    this.code = code
    this.field = field
  }
}

/**
 * Error thrown when an operation would exceed the configured state limit.
 *
 * Guards parsing and component construction against oversized inputs, and
 * product construction against quadratic growth.
 *
 * @public
 */
export class AutomatonLimitError extends DfsmError {
  /** The limit that was exceeded */
  readonly limit: number

  /** The actual value that exceeded the limit */
  readonly actual: number

  constructor(message: string, limit: number, actual: number) {
    super('STATE_LIMIT', message)
    this.name = 'AutomatonLimitError'
    this.limit = limit
    this.actual = actual
  }
}

/**
 * A non-throwing report of why an encoding is invalid.
 * @public
 */
export interface DfsmIssue {
  readonly code: DfsmErrorCode
  readonly message: string
  readonly field?: EncodingField
}
