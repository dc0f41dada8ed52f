/**
 * Reachability analysis and unreachable-state pruning.
 * @packageDocumentation
 */

import type { MachineComponents, State } from '../types'
import { StateSet } from '../machine/state'
import { TransitionFunction } from '../machine/transition-function'

/**
 * Find all states reachable from the initial state.
 *
 * Expands a frontier one step at a time until no new state is added.
 *
 * @param machine - A machine with a total transition function
 * @returns The reachable states, including the initial state
 *
 * @public
 */
export function findReachableStates(machine: MachineComponents): StateSet {
  const reachable = new Map<number, State>()
  let frontier: State[] = [machine.initialState]

  while (frontier.length > 0) {
    for (const state of frontier) {
      reachable.set(state.id, state)
    }

    const next = new Map<number, State>()
    for (const state of frontier) {
      for (const symbol of machine.alphabet) {
        const target = machine.transitions.applyTo(state, symbol)
        if (!reachable.has(target.id)) {
          next.set(target.id, target)
        }
      }
    }

    frontier = [...next.values()]
  }

  return StateSet.of(reachable.values())
}

/**
 * Restrict a machine to the states reachable from its initial state.
 *
 * The alphabet and initial state are unchanged; transitions and accepting
 * states are filtered to the reachable subgraph. The input is not modified.
 *
 * @param machine - The machine to prune
 * @returns Components recognizing the same language with no unreachable states
 *
 * @public
 */
export function removeUnreachableStates(machine: MachineComponents): MachineComponents {
  const reachable = findReachableStates(machine)

  const transitions = machine.transitions
    .transitions()
    .filter((t) => reachable.has(t.from) && reachable.has(t.to))

  return {
    states: reachable,
    alphabet: machine.alphabet,
    transitions: new TransitionFunction(transitions),
    initialState: machine.initialState,
    acceptingStates: machine.acceptingStates.filter((s) => reachable.has(s)),
  }
}
