/**
 * DFA complement operation.
 * @packageDocumentation
 */

import type { MachineComponents } from '../types'

/**
 * Complement a machine by swapping accepting and non-accepting states.
 *
 * The complemented machine accepts exactly the strings over its alphabet
 * that the original rejects, and vice versa. This relies on the transition
 * function being total, which every valid machine guarantees.
 *
 * @param machine - The machine to complement
 * @returns Complemented components; the input is not modified
 *
 * @public
 */
export function complement(machine: MachineComponents): MachineComponents {
  return {
    states: machine.states,
    alphabet: machine.alphabet,
    transitions: machine.transitions,
    initialState: machine.initialState,
    acceptingStates: machine.states.filter((s) => !machine.acceptingStates.has(s)),
  }
}
