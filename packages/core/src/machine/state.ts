/**
 * States and immutable state sets.
 * @packageDocumentation
 */

import type { State } from '../types'
import { DfsmError } from '../types'

const INTEGER_TOKEN = /^[+-]?\d+$/

/**
 * Create a state with the given id.
 *
 * @param id - Safe integer identifier
 * @throws DfsmError if `id` is not a safe integer
 *
 * @public
 */
export function createState(id: number): State {
  if (!Number.isSafeInteger(id)) {
    throw new DfsmError('MALFORMED_ENCODING', `State id ${id} is not a safe integer`, 'states')
  }
  return Object.freeze({ id })
}

/**
 * Render a state as its decimal id.
 * @public
 */
export function encodeState(state: State): string {
  return String(state.id)
}

/**
 * Numeric ordering of states by id.
 * @public
 */
export function compareStates(a: State, b: State): number {
  return a.id - b.id
}

/**
 * Check whether two state values denote the same state.
 * @public
 */
export function sameState(a: State, b: State): boolean {
  return a.id === b.id
}

/**
 * Parse a whitespace-separated list of integer ids.
 *
 * @param text - e.g. `"0 1 2"`; empty or blank text yields no ids
 * @returns The ids in source order (duplicates preserved)
 * @throws DfsmError with code `MALFORMED_ENCODING` on a token that is not an integer
 *
 * @public
 */
export function parseStateIdList(text: string): number[] {
  const trimmed = text.trim()
  if (trimmed === '') return []

  return trimmed.split(/\s+/).map((token) => parseStateId(token))
}

/**
 * Parse a single integer id token.
 */
export function parseStateId(token: string): number {
  if (!INTEGER_TOKEN.test(token)) {
    throw new DfsmError('MALFORMED_ENCODING', `Expected an integer state id, found "${token}"`)
  }
  const id = Number(token)
  if (!Number.isSafeInteger(id)) {
    throw new DfsmError('MALFORMED_ENCODING', `State id ${token} is out of range`)
  }
  return id
}

/**
 * Render states as their sorted ids joined by single spaces.
 * @public
 */
export function encodeStateSet(states: Iterable<State>): string {
  return StateSet.of(states).encode()
}

/**
 * An immutable set of states, keyed by id and iterated in ascending id order.
 *
 * @public
 */
export class StateSet implements Iterable<State> {
  private readonly byId: ReadonlyMap<number, State>

  private constructor(byId: Map<number, State>) {
    this.byId = byId
  }

  /** Build a set from any states; duplicate ids collapse to the first value seen. */
  static of(states: Iterable<State>): StateSet {
    const collected: State[] = []
    const seen = new Set<number>()
    for (const state of states) {
      if (!seen.has(state.id)) {
        seen.add(state.id)
        collected.push(state)
      }
    }
    collected.sort(compareStates)
    return new StateSet(new Map(collected.map((s) => [s.id, s])))
  }

  /** The empty set. */
  static empty(): StateSet {
    return new StateSet(new Map())
  }

  get size(): number {
    return this.byId.size
  }

  has(state: State): boolean {
    return this.byId.has(state.id)
  }

  hasId(id: number): boolean {
    return this.byId.has(id)
  }

  /** The member with the given id, if any. */
  get(id: number): State | undefined {
    return this.byId.get(id)
  }

  [Symbol.iterator](): Iterator<State> {
    return this.byId.values()
  }

  toArray(): State[] {
    return [...this.byId.values()]
  }

  /** Members of this set that satisfy `predicate`. */
  filter(predicate: (state: State) => boolean): StateSet {
    return StateSet.of(this.toArray().filter(predicate))
  }

  encode(): string {
    return this.toArray().map(encodeState).join(' ')
  }

  prettyPrint(): string {
    return `{${this.toArray().map(encodeState).join(', ')}}`
  }
}
