/**
 * Canonical relabeling of machines.
 * @packageDocumentation
 */

import type { MachineComponents, State, Transition } from '../types'
import { StateSet, createState } from '../machine/state'
import { createTransition } from '../machine/transition'
import { TransitionFunction } from '../machine/transition-function'

/**
 * Relabel a machine's states by traversal order.
 *
 * Walks the transition graph depth first from the initial state, taking
 * successors in alphabet order, and numbers states 0, 1, 2, ... as they are
 * first discovered. The numbering depends only on the initial state, the
 * alphabet order and the transition function, so isomorphic machines get
 * identical encodings. In particular, two minimal machines over the same
 * alphabet recognize the same language iff their canonical encodings are equal.
 *
 * States unreachable from the initial state are dropped.
 *
 * @param machine - The machine to relabel
 * @returns New relabeled components; the input is not modified
 *
 * @public
 */
export function toCanonicForm(machine: MachineComponents): MachineComponents {
  const relabeled = new Map<number, State>()
  const transitions: Transition[] = []
  const todo: State[] = [machine.initialState]

  const label = (state: State): State => {
    let canonic = relabeled.get(state.id)
    if (canonic === undefined) {
      canonic = createState(relabeled.size)
      relabeled.set(state.id, canonic)
    }
    return canonic
  }

  label(machine.initialState)

  for (let top = todo.pop(); top !== undefined; top = todo.pop()) {
    const from = label(top)

    for (const symbol of machine.alphabet) {
      const next = machine.transitions.applyTo(top, symbol)
      if (!relabeled.has(next.id)) {
        todo.push(next)
      }
      transitions.push(createTransition(from, symbol, label(next)))
    }
  }

  const accepting = machine.acceptingStates.toArray().flatMap((s) => {
    const canonic = relabeled.get(s.id)
    return canonic === undefined ? [] : [canonic]
  })

  return {
    states: StateSet.of(relabeled.values()),
    alphabet: machine.alphabet,
    transitions: new TransitionFunction(transitions),
    initialState: label(machine.initialState),
    acceptingStates: StateSet.of(accepting),
  }
}
