/**
 * Structural descriptors - a plain-data view of a machine, validated with zod.
 * @packageDocumentation
 */

import { z } from 'zod'
import type { MachineComponents, State, TransitionSymbol } from '../types'
import { DfsmError, EPSILON } from '../types'
import { Alphabet } from '../machine/alphabet'
import { StateSet, createState } from '../machine/state'
import { createTransition } from '../machine/transition'
import { TransitionFunction } from '../machine/transition-function'

const StateIdSchema = z.number().int().safe()

/**
 * Schema of a structural machine descriptor.
 *
 * A transition is a `[from, symbol, to]` tuple; a `null` symbol stands for epsilon.
 *
 * @public
 */
export const MachineDescriptorSchema = z.object({
  states: z.array(StateIdSchema),
  alphabet: z.array(z.string()),
  transitions: z.array(z.tuple([StateIdSchema, z.string().nullable(), StateIdSchema])),
  initial: StateIdSchema,
  accepting: z.array(StateIdSchema).default([]),
})

/**
 * A machine descriptor as accepted by {@link descriptorToComponents}.
 * @public
 */
export type MachineDescriptor = z.input<typeof MachineDescriptorSchema>

/**
 * A machine descriptor as produced by {@link componentsToDescriptor}.
 * @public
 */
export type NormalizedMachineDescriptor = z.infer<typeof MachineDescriptorSchema>

/**
 * Build machine components from an untrusted descriptor.
 *
 * @param input - Value expected to match {@link MachineDescriptorSchema}
 * @throws DfsmError with code `INVALID_DESCRIPTOR` if the value does not match the schema,
 *   `MALFORMED_ALPHABET` for an unusable symbol, or `UNKNOWN_STATE_ID` for an undeclared id
 *
 * @public
 */
export function descriptorToComponents(input: unknown): MachineComponents {
  const result = MachineDescriptorSchema.safeParse(input)

  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.join('.')
      return path === '' ? issue.message : `${path}: ${issue.message}`
    })
    throw new DfsmError('INVALID_DESCRIPTOR', `Invalid machine descriptor: ${issues.join('; ')}`)
  }

  const descriptor = result.data
  const declared = new Map<number, State>(descriptor.states.map((id) => [id, createState(id)]))

  const resolve = (id: number, where: string): State => {
    const state = declared.get(id)
    if (state === undefined) {
      throw new DfsmError('UNKNOWN_STATE_ID', `State ${id} is used in ${where} but not declared in states`)
    }
    return state
  }

  const symbolOf = (symbol: string | null, index: number): TransitionSymbol => {
    if (symbol === null) return EPSILON
    if ([...symbol].length !== 1) {
      throw new DfsmError('INVALID_DESCRIPTOR', `transitions.${index}.1: symbol "${symbol}" must be a single character`)
    }
    return symbol
  }

  return {
    states: StateSet.of(declared.values()),
    alphabet: new Alphabet(descriptor.alphabet),
    transitions: new TransitionFunction(
      descriptor.transitions.map(([from, symbol, to], index) =>
        createTransition(resolve(from, 'transitions'), symbolOf(symbol, index), resolve(to, 'transitions')),
      ),
    ),
    initialState: resolve(descriptor.initial, 'initial'),
    acceptingStates: StateSet.of(descriptor.accepting.map((id) => resolve(id, 'accepting'))),
  }
}

/**
 * Describe machine components as plain data.
 *
 * States are listed in ascending id order and transitions in the encoding's order.
 *
 * @public
 */
export function componentsToDescriptor(machine: MachineComponents): NormalizedMachineDescriptor {
  return {
    states: machine.states.toArray().map((s) => s.id),
    alphabet: machine.alphabet.toArray(),
    transitions: machine.transitions
      .transitions()
      .map((t): [number, string | null, number] => [t.from.id, t.symbol === EPSILON ? null : t.symbol, t.to.id]),
    initial: machine.initialState.id,
    accepting: machine.acceptingStates.toArray().map((s) => s.id),
  }
}
