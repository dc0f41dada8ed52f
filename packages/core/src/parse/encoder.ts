/**
 * Machine encoders - the text form and the set-notation description.
 * @packageDocumentation
 */

import type { MachineComponents } from '../types'
import { encodeState } from '../machine/state'

/**
 * Encode machine components as a single line.
 *
 * The inverse of {@link parseEncoding}: states and accepting states are
 * rendered as sorted ids, the alphabet in its stable order, and the
 * transitions sorted by source, symbol and target.
 *
 * @public
 */
export function encodeMachine(machine: MachineComponents): string {
  return [
    machine.states.encode(),
    machine.alphabet.encode(),
    machine.transitions.encode(),
    encodeState(machine.initialState),
    machine.acceptingStates.encode(),
  ].join('/')
}

/**
 * Describe machine components in set notation, one component per line:
 *
 * ```
 * K = {0, 1}
 * Σ = {a, b}
 * δ = {(0, a, 0), (0, b, 1), (1, a, 0), (1, b, 1)}
 * s = 0
 * A = {1}
 * ```
 *
 * Meant for diagnostics; it is not parsed back.
 *
 * @public
 */
export function prettyPrintMachine(machine: MachineComponents): string {
  return [
    `K = ${machine.states.prettyPrint()}`,
    `Σ = ${machine.alphabet.prettyPrint()}`,
    `δ = ${machine.transitions.prettyPrint()}`,
    `s = ${encodeState(machine.initialState)}`,
    `A = ${machine.acceptingStates.prettyPrint()}`,
  ].join('\n')
}
