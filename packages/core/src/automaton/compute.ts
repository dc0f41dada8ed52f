/**
 * Input evaluation.
 * @packageDocumentation
 */

import type { InputSymbol, MachineComponents, State } from '../types'
import { DfsmError } from '../types'

/**
 * Run a machine over an input and return every state it passes through.
 *
 * @param machine - The machine to run
 * @param input - A string (read code point by code point) or a sequence of symbols
 * @returns The visited states, starting with the initial state
 * @throws DfsmError with code `INVALID_INPUT_SYMBOL` if the input holds a symbol outside the alphabet
 *
 * @public
 */
export function trace(machine: MachineComponents, input: Iterable<InputSymbol>): State[] {
  let current = machine.initialState
  const visited: State[] = [current]
  let position = 0

  for (const symbol of input) {
    current = step(machine, current, symbol, position++)
    visited.push(current)
  }

  return visited
}

/**
 * Run a machine over an input and return the state it ends in.
 *
 * @throws DfsmError with code `INVALID_INPUT_SYMBOL` if the input holds a symbol outside the alphabet
 *
 * @public
 */
export function run(machine: MachineComponents, input: Iterable<InputSymbol>): State {
  let current = machine.initialState
  let position = 0

  for (const symbol of input) {
    current = step(machine, current, symbol, position++)
  }

  return current
}

/**
 * Check whether a machine accepts an input.
 *
 * @param machine - The machine to run
 * @param input - A string (read code point by code point) or a sequence of symbols
 * @returns true iff the machine ends in an accepting state
 *
 * @public
 */
export function accepts(machine: MachineComponents, input: Iterable<InputSymbol>): boolean {
  return machine.acceptingStates.has(run(machine, input))
}

function step(machine: MachineComponents, state: State, symbol: InputSymbol, position: number): State {
  if (!machine.alphabet.contains(symbol)) {
    throw new DfsmError(
      'INVALID_INPUT_SYMBOL',
      `Input symbol "${symbol}" at position ${position} is not in the alphabet ${machine.alphabet.prettyPrint()}`,
    )
  }
  return machine.transitions.applyTo(state, symbol)
}
