/**
 * Machine validation - checks the invariants every machine must satisfy.
 * @packageDocumentation
 */

import type { DfsmIssue, MachineComponents, MachineOptions } from '../types'
import { AutomatonLimitError, DfsmError, resolveMaxStates } from '../types'
import { parseEncoding } from './parser'

/**
 * Verify that components form a deterministic finite-state machine.
 *
 * Checks, in order:
 * - the state count is within `maxStates`
 * - the initial state and every accepting state belong to the state set
 * - every transition joins declared states on alphabet symbols
 * - every (state, symbol) pair has exactly one transition
 * - there are no epsilon transitions
 *
 * @param machine - Components to verify
 * @param options - Optional limits
 * @throws DfsmError describing the first violation found
 * @throws RangeError if `options.maxStates` is not a positive integer
 *
 * @public
 */
export function verifyMachine(machine: MachineComponents, options: MachineOptions = {}): void {
  const maxStates = resolveMaxStates(options)

  if (machine.states.size > maxStates) {
    throw new AutomatonLimitError(
      `Machine has ${machine.states.size} states, more than the limit of ${maxStates}`,
      maxStates,
      machine.states.size,
    )
  }

  if (!machine.states.has(machine.initialState)) {
    throw new DfsmError(
      'DANGLING_STATE_REFERENCE',
      `Initial state ${machine.initialState.id} is not part of the machine`,
      'initial',
    )
  }

  for (const state of machine.acceptingStates) {
    if (!machine.states.has(state)) {
      throw new DfsmError(
        'DANGLING_STATE_REFERENCE',
        `Accepting state ${state.id} is not part of the machine`,
        'accepting',
      )
    }
  }

  machine.transitions.verifyTransitionMapping(machine.states, machine.alphabet)
  machine.transitions.verifyTotal(machine.states, machine.alphabet)
  machine.transitions.verifyNoEpsilonTransitions()
}

/**
 * Validate a machine encoding without throwing.
 *
 * Construction stops at the first problem, so at most one issue is reported.
 *
 * @param encoding - The machine encoding
 * @param options - Optional limits
 * @returns Array of issues (empty if the encoding describes a valid machine)
 *
 * @public
 */
export function validateEncoding(encoding: string, options?: MachineOptions): readonly DfsmIssue[] {
  try {
    verifyMachine(parseEncoding(encoding), options)
    return []
  } catch (error) {
    if (error instanceof DfsmError) {
      return [{ code: error.code, message: error.message, field: error.field }]
    }
    throw error
  }
}

/**
 * Check if an encoding describes a valid machine.
 *
 * @public
 */
export function isValidEncoding(encoding: string, options?: MachineOptions): boolean {
  return validateEncoding(encoding, options).length === 0
}
