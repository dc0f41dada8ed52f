import type { Alphabet } from '../machine/alphabet'
import type { StateSet } from '../machine/state'
import type { TransitionFunction } from '../machine/transition-function'

// =============================================================================
// SYMBOLS
// =============================================================================

/**
 * Sentinel marking a transition taken without consuming input.
 *
 * Never a member of any alphabet; deterministic machines reject it.
 *
 * @public
 */
export const EPSILON: unique symbol = Symbol('ε')

/**
 * Type of the {@link EPSILON} sentinel.
 * @public
 */
export type Epsilon = typeof EPSILON

/**
 * A single input character (one Unicode code point).
 * @public
 */
export type InputSymbol = string

/**
 * The label of a transition: an input symbol, or epsilon.
 * @public
 */
export type TransitionSymbol = InputSymbol | Epsilon

// =============================================================================
// STATES AND TRANSITIONS
// =============================================================================

/**
 * A machine state, identified by an integer.
 *
 * Two states are the same state iff their ids are equal; ordering is numeric.
 *
 * @public
 */
export interface State {
  readonly id: number
}

/**
 * A labelled edge of the transition graph.
 * @public
 */
export interface Transition {
  readonly from: State
  readonly symbol: TransitionSymbol
  readonly to: State
}

// =============================================================================
// MACHINE
// =============================================================================

/**
 * The five components of a deterministic finite-state machine.
 *
 * Algorithms read and produce this shape; only {@link Dfsm} guarantees that a
 * value of it satisfies the machine invariants.
 *
 * @public
 */
export interface MachineComponents {
  /** All states of the machine */
  readonly states: StateSet

  /** Input alphabet, in its stable iteration order */
  readonly alphabet: Alphabet

  /** Total, deterministic, epsilon-free transition function */
  readonly transitions: TransitionFunction

  /** Start state (member of `states`) */
  readonly initialState: State

  /** Accepting states (subset of `states`) */
  readonly acceptingStates: StateSet
}

/**
 * Default maximum number of states a machine may have.
 *
 * @public
 */
export const DEFAULT_MAX_STATES = 10_000

/**
 * Options for building machines.
 *
 * @public
 */
export interface MachineOptions {
  /**
   * Maximum number of states to accept or create before throwing.
   * @defaultValue 10000
   */
  maxStates?: number
}

/**
 * The state limit in effect for `options`.
 *
 * @throws RangeError if `maxStates` is given and is not a positive integer
 */
export function resolveMaxStates(options: MachineOptions = {}): number {
  const maxStates = options.maxStates ?? DEFAULT_MAX_STATES
  if (!Number.isSafeInteger(maxStates) || maxStates < 1) {
    throw new RangeError(`State limit ${maxStates} must be a positive integer`)
  }
  return maxStates
}
