/**
 * State minimization by Moore partition refinement.
 * @packageDocumentation
 */

import type { MachineComponents, State } from '../types'
import { StateSet } from '../machine/state'
import { createTransition } from '../machine/transition'
import { TransitionFunction } from '../machine/transition-function'
import { removeUnreachableStates } from './reachability'

/**
 * Assignment of each state (by id) to a numbered block.
 */
type Partition = ReadonlyMap<number, number>

/**
 * Minimize a machine.
 *
 * Removes unreachable states, then merges states that no input can tell
 * apart. The result recognizes the same language with the fewest states;
 * each merged state keeps the smallest id of its class.
 *
 * @param machine - The machine to minimize
 * @returns New minimal components; the input is not modified
 *
 * @public
 */
export function minimize(machine: MachineComponents): MachineComponents {
  return mergeEquivalentStates(removeUnreachableStates(machine))
}

/**
 * Map every state to the representative of its equivalence class.
 *
 * Moore's algorithm. The first partition separates accepting from
 * non-accepting states. Each round then rebuilds the partition: a state
 * joins the first new block whose representative was in its block last
 * round and whose successors, on every symbol, were in the same blocks as
 * its own; otherwise it founds a block. Blocks are compared by partition
 * id, never by state value.
 *
 * A round can only split blocks, so the partition is stable as soon as the
 * block count stops growing, which takes at most one round per state.
 *
 * @param machine - A machine with a total transition function
 * @returns state id -> representative state (the smallest id in its class)
 *
 * @public
 */
export function findEquivalentStates(machine: MachineComponents): ReadonlyMap<number, State> {
  const states = machine.states.toArray()
  const symbols = machine.alphabet.toArray()

  // Successors in alphabet order, looked up once.
  const successors = new Map<number, number[]>(
    states.map((s) => [s.id, symbols.map((symbol) => machine.transitions.applyTo(s, symbol).id)]),
  )

  let partition = initialPartition(machine)
  let blockCount = new Set(partition.values()).size

  for (;;) {
    const representatives: State[] = []
    const next = new Map<number, number>()

    for (const state of states) {
      let block = representatives.findIndex((rep) => equivalentIn(partition, successors, state, rep))
      if (block === -1) {
        block = representatives.length
        representatives.push(state)
      }
      next.set(state.id, block)
    }

    const stable = representatives.length === blockCount
    partition = next
    blockCount = representatives.length

    if (stable) {
      return new Map(states.map((s) => [s.id, representatives[blockOf(partition, s.id)]]))
    }
  }
}

/**
 * Block 0 holds the accepting states and the next block the rest; either may be empty.
 */
function initialPartition(machine: MachineComponents): Partition {
  const partition = new Map<number, number>()
  const acceptingBlock = 0
  const rejectingBlock = machine.acceptingStates.size > 0 ? 1 : 0

  for (const state of machine.states) {
    partition.set(state.id, machine.acceptingStates.has(state) ? acceptingBlock : rejectingBlock)
  }

  return partition
}

/**
 * True iff `s` and `t` share a block in `partition` and so do their successors on every symbol.
 */
function equivalentIn(
  partition: Partition,
  successors: ReadonlyMap<number, readonly number[]>,
  s: State,
  t: State,
): boolean {
  if (blockOf(partition, s.id) !== blockOf(partition, t.id)) return false

  const fromS = successors.get(s.id) ?? []
  const fromT = successors.get(t.id) ?? []

  return fromS.every((target, i) => blockOf(partition, target) === blockOf(partition, fromT[i]))
}

function blockOf(partition: Partition, id: number): number {
  return partition.get(id) ?? -1
}

/**
 * Collapse each equivalence class of a machine to its representative.
 *
 * Transitions are rewritten through the representative map; the many
 * transitions a class had on one symbol all become the same transition.
 *
 * @public
 */
export function mergeEquivalentStates(machine: MachineComponents): MachineComponents {
  const equivalent = findEquivalentStates(machine)
  const representativeOf = (state: State): State => equivalent.get(state.id) ?? state

  const transitions = machine.transitions
    .transitions()
    .map((t) => createTransition(representativeOf(t.from), t.symbol, representativeOf(t.to)))

  return {
    states: StateSet.of(equivalent.values()),
    alphabet: machine.alphabet,
    transitions: new TransitionFunction(transitions),
    initialState: representativeOf(machine.initialState),
    acceptingStates: StateSet.of(machine.acceptingStates.toArray().map(representativeOf)),
  }
}
