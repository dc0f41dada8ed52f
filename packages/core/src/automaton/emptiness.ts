/**
 * Machine emptiness checking, witness finding and counting.
 * @packageDocumentation
 */

import type { InputSymbol, MachineComponents, State } from '../types'
import { findReachableStates } from './reachability'

/**
 * Check if a machine's language is empty.
 *
 * Uses reachability analysis from the initial state to any accepting state.
 *
 * @param machine - The machine to check
 * @returns true if the machine accepts no strings
 *
 * @public
 */
export function isEmpty(machine: MachineComponents): boolean {
  const reachable = findReachableStates(machine)

  for (const state of machine.acceptingStates) {
    if (reachable.has(state)) {
      return false
    }
  }

  return true
}

/**
 * Find a shortest string the machine accepts.
 *
 * Breadth-first search from the initial state, trying symbols in alphabet
 * order, so among the shortest accepted strings the first in that order is
 * returned.
 *
 * @param machine - The machine to find a witness for
 * @returns An accepted string (possibly empty), or undefined if the language is empty
 *
 * @public
 */
export function findWitness(machine: MachineComponents): string | undefined {
  interface SearchState {
    state: State
    path: InputSymbol[]
  }

  const visited = new Set<number>([machine.initialState.id])
  const queue: SearchState[] = [{ state: machine.initialState, path: [] }]

  for (let head = 0; head < queue.length; head++) {
    const { state, path } = queue[head]

    if (machine.acceptingStates.has(state)) {
      return path.join('')
    }

    for (const symbol of machine.alphabet) {
      const target = machine.transitions.applyTo(state, symbol)
      if (!visited.has(target.id)) {
        visited.add(target.id)
        queue.push({ state: target, path: [...path, symbol] })
      }
    }
  }

  return undefined
}

/**
 * Count the accepted strings of each length up to `maxLength`.
 *
 * Useful for understanding the "size" of a machine's language. Counts grow
 * exponentially with length, so they are returned as bigints.
 *
 * @param machine - The machine
 * @param maxLength - Longest string length to consider
 * @returns length -> number of accepted strings of that length, for 0..maxLength
 * @throws RangeError if `maxLength` is not a non-negative integer
 *
 * @public
 */
export function countAccepted(machine: MachineComponents, maxLength: number): Map<number, bigint> {
  if (!Number.isSafeInteger(maxLength) || maxLength < 0) {
    throw new RangeError(`Length bound ${maxLength} must be a non-negative integer`)
  }

  const counts = new Map<number, bigint>()

  // Number of strings of the current length that end in each state.
  let paths = new Map<number, bigint>([[machine.initialState.id, 1n]])

  for (let length = 0; length <= maxLength; length++) {
    let accepted = 0n
    for (const [id, count] of paths) {
      if (machine.acceptingStates.hasId(id)) {
        accepted += count
      }
    }
    counts.set(length, accepted)

    if (length === maxLength) break

    const next = new Map<number, bigint>()
    for (const [id, count] of paths) {
      const state = machine.states.get(id)
      if (state === undefined) continue
      for (const symbol of machine.alphabet) {
        const target = machine.transitions.applyTo(state, symbol)
        next.set(target.id, (next.get(target.id) ?? 0n) + count)
      }
    }
    paths = next
  }

  return counts
}
