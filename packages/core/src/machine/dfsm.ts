/**
 * Deterministic finite-state machines.
 * @packageDocumentation
 */

import type {
  ContainmentResult,
  InputSymbol,
  MachineComponents,
  MachineOptions,
  State,
  Transition,
} from '../types'
import { DfsmError } from '../types'
import { toCanonicForm } from '../automaton/canonical'
import { complement } from '../automaton/complement'
import { accepts, trace } from '../automaton/compute'
import { countAccepted, findWitness, isEmpty } from '../automaton/emptiness'
import { minimize } from '../automaton/minimize'
import { difference, intersect, symmetricDifference, union } from '../automaton/product'
import { findReachableStates, removeUnreachableStates } from '../automaton/reachability'
import { areEquivalent, checkContainment, findDistinguishingString, isSubsetOf } from '../containment/containment'
import { componentsToDescriptor, descriptorToComponents, type NormalizedMachineDescriptor } from '../parse/descriptor'
import { encodeMachine, prettyPrintMachine } from '../parse/encoder'
import { parseEncoding } from '../parse/parser'
import { verifyMachine } from '../parse/validator'
import type { Alphabet } from './alphabet'
import { StateSet, createState } from './state'
import { TransitionFunction } from './transition-function'

/**
 * A deterministic finite-state machine.
 *
 * Instances are validated when built and immutable afterwards. Operations
 * that transform a machine (minimize, prune, relabel, combine) return new
 * instances and never touch the receiver, so a machine can be shared freely.
 *
 * @example
 * ```ts
 * const machine = Dfsm.parse('0 1/a b/0,a,0;0,b,1;1,a,0;1,b,1/0/1')
 * machine.compute('aab') // true
 * machine.minimize().toCanonicForm().encode()
 * ```
 *
 * @public
 */
export class Dfsm implements MachineComponents {
  readonly states: StateSet
  readonly alphabet: Alphabet
  readonly transitions: TransitionFunction
  readonly initialState: State
  readonly acceptingStates: StateSet

  /**
   * Wraps components without checking them. Callers either verify the
   * components first or derive them from an already valid machine by an
   * algorithm that keeps the invariants.
   */
  private constructor(components: MachineComponents) {
    this.states = components.states
    this.alphabet = components.alphabet
    this.transitions = components.transitions
    this.initialState = components.initialState
    this.acceptingStates = components.acceptingStates
  }

  // ===========================================================================
  // CONSTRUCTION
  // ===========================================================================

  /**
   * Build a machine from its encoding.
   *
   * @param encoding - e.g. `0 1/a b/0,a,0;0,b,1;1,a,0;1,b,1/0/1`
   * @param options - Optional limits
   * @throws DfsmError if the encoding is malformed or does not describe a deterministic machine
   */
  static parse(encoding: string, options?: MachineOptions): Dfsm {
    return Dfsm.verified(parseEncoding(encoding), options)
  }

  /**
   * Build a machine from its components.
   *
   * The machine keeps frozen copies of the given states, so later changes to
   * the caller's objects do not affect it.
   *
   * @param states - The states of the machine
   * @param alphabet - The input alphabet
   * @param transitions - A transition function, or the transitions to build one from
   * @param initialState - The start state (must be one of `states`)
   * @param acceptingStates - The accepting states (must be among `states`)
   * @param options - Optional limits
   * @throws DfsmError if the components do not describe a deterministic machine
   */
  static fromComponents(
    states: Iterable<State>,
    alphabet: Alphabet,
    transitions: TransitionFunction | Iterable<Transition>,
    initialState: State,
    acceptingStates: Iterable<State>,
    options?: MachineOptions,
  ): Dfsm {
    const own = (state: State): State => createState(state.id)

    return Dfsm.verified(
      {
        states: StateSet.of([...states].map(own)),
        alphabet,
        transitions: transitions instanceof TransitionFunction ? transitions : new TransitionFunction(transitions),
        initialState: own(initialState),
        acceptingStates: StateSet.of([...acceptingStates].map(own)),
      },
      options,
    )
  }

  /**
   * Build a machine from a structural descriptor such as
   * `{ states: [0], alphabet: ['a'], transitions: [[0, 'a', 0]], initial: 0, accepting: [] }`.
   *
   * @param input - Untrusted value, validated against {@link MachineDescriptorSchema}
   * @param options - Optional limits
   * @throws DfsmError if the value is not a descriptor of a deterministic machine
   */
  static fromDescriptor(input: unknown, options?: MachineOptions): Dfsm {
    return Dfsm.verified(descriptorToComponents(input), options)
  }

  private static verified(components: MachineComponents, options?: MachineOptions): Dfsm {
    verifyMachine(components, options)
    return new Dfsm(components)
  }

  // ===========================================================================
  // RENDERING
  // ===========================================================================

  /** The single-line encoding of this machine. */
  encode(): string {
    return encodeMachine(this)
  }

  /** Set-notation description (`K =`, `Σ =`, `δ =`, `s =`, `A =`), for diagnostics. */
  prettyPrint(): string {
    return prettyPrintMachine(this)
  }

  /** Plain-data view of this machine, accepted back by {@link Dfsm.fromDescriptor}. */
  toDescriptor(): NormalizedMachineDescriptor {
    return componentsToDescriptor(this)
  }

  toString(): string {
    return this.encode()
  }

  // ===========================================================================
  // EVALUATION
  // ===========================================================================

  /**
   * Returns true iff `input` belongs to this machine's language.
   *
   * @param input - A string (read code point by code point) or a sequence of symbols
   * @throws DfsmError with code `INVALID_INPUT_SYMBOL` if the input holds a symbol outside the alphabet
   */
  compute(input: Iterable<InputSymbol>): boolean {
    return accepts(this, input)
  }

  /** The states visited while reading `input`, starting with the initial state. */
  trace(input: Iterable<InputSymbol>): State[] {
    return trace(this, input)
  }

  // ===========================================================================
  // TRANSFORMATIONS
  // ===========================================================================

  /** The states reachable from the initial state. */
  reachableStates(): StateSet {
    return findReachableStates(this)
  }

  /** An equivalent machine with the unreachable states removed. */
  removeUnreachableStates(): Dfsm {
    return new Dfsm(removeUnreachableStates(this))
  }

  /** An equivalent machine with the fewest possible states. */
  minimize(): Dfsm {
    return new Dfsm(minimize(this))
  }

  /**
   * This machine with its reachable states relabeled 0, 1, 2, ... in traversal order.
   *
   * Two minimal machines over the same alphabet recognize the same language
   * iff their canonical forms have the same encoding.
   */
  toCanonicForm(): Dfsm {
    return new Dfsm(toCanonicForm(this))
  }

  /** A machine accepting exactly the strings this one rejects. */
  complement(): Dfsm {
    return new Dfsm(complement(this))
  }

  // ===========================================================================
  // SET OPERATIONS
  // ===========================================================================

  /** @throws DfsmError with code `ALPHABET_MISMATCH` if the alphabets hold different symbols */
  intersect(other: Dfsm, options?: MachineOptions): Dfsm {
    return new Dfsm(intersect(this, other, options))
  }

  /** @throws DfsmError with code `ALPHABET_MISMATCH` if the alphabets hold different symbols */
  union(other: Dfsm, options?: MachineOptions): Dfsm {
    return new Dfsm(union(this, other, options))
  }

  /** @throws DfsmError with code `ALPHABET_MISMATCH` if the alphabets hold different symbols */
  difference(other: Dfsm, options?: MachineOptions): Dfsm {
    return new Dfsm(difference(this, other, options))
  }

  /** @throws DfsmError with code `ALPHABET_MISMATCH` if the alphabets hold different symbols */
  symmetricDifference(other: Dfsm, options?: MachineOptions): Dfsm {
    return new Dfsm(symmetricDifference(this, other, options))
  }

  // ===========================================================================
  // LANGUAGE QUERIES
  // ===========================================================================

  isEmpty(): boolean {
    return isEmpty(this)
  }

  /** A shortest accepted string, or undefined if the language is empty. */
  findWitness(): string | undefined {
    return findWitness(this)
  }

  /**
   * Number of accepted strings of each length from 0 to `maxLength`.
   *
   * @throws RangeError if `maxLength` is not a non-negative integer
   */
  countAccepted(maxLength: number): Map<number, bigint> {
    return countAccepted(this, maxLength)
  }

  isSubsetOf(other: Dfsm, options?: MachineOptions): boolean {
    return isSubsetOf(this, other, options)
  }

  isEquivalentTo(other: Dfsm): boolean {
    return areEquivalent(this, other)
  }

  checkContainment(other: Dfsm, options?: MachineOptions): ContainmentResult {
    return checkContainment(this, other, options)
  }

  findDistinguishingString(other: Dfsm, options?: MachineOptions): string | undefined {
    return findDistinguishingString(this, other, options)
  }
}

/**
 * Result of {@link safeParseDfsm}.
 * @public
 */
export type SafeParseResult =
  | { readonly success: true; readonly machine: Dfsm }
  | { readonly success: false; readonly error: DfsmError }

/**
 * Build a machine from its encoding, returning failures instead of throwing.
 *
 * @public
 */
export function safeParseDfsm(encoding: string, options?: MachineOptions): SafeParseResult {
  try {
    return { success: true, machine: Dfsm.parse(encoding, options) }
  } catch (error) {
    if (error instanceof DfsmError) {
      return { success: false, error }
    }
    throw error
  }
}
