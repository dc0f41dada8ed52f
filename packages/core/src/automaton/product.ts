/**
 * Boolean combinations of machines by product construction.
 * @packageDocumentation
 */

import type { MachineComponents, MachineOptions, State, Transition } from '../types'
import { AutomatonLimitError, DfsmError, resolveMaxStates } from '../types'
import { StateSet, createState } from '../machine/state'
import { createTransition } from '../machine/transition'
import { TransitionFunction } from '../machine/transition-function'

/**
 * How a product state's acceptance follows from its two component states.
 * @public
 */
export type ProductMode = 'intersection' | 'union' | 'difference' | 'symmetric-difference'

const ACCEPTANCE: Record<ProductMode, (acceptA: boolean, acceptB: boolean) => boolean> = {
  intersection: (a, b) => a && b,
  union: (a, b) => a || b,
  difference: (a, b) => a && !b,
  'symmetric-difference': (a, b) => a !== b,
}

/**
 * Compute the intersection of two machines.
 *
 * L(A ∩ B) = L(A) ∩ L(B)
 *
 * @public
 */
export function intersect(a: MachineComponents, b: MachineComponents, options?: MachineOptions): MachineComponents {
  return productConstruction(a, b, 'intersection', options)
}

/**
 * Compute the union of two machines.
 *
 * L(A ∪ B) = L(A) ∪ L(B)
 *
 * @public
 */
export function union(a: MachineComponents, b: MachineComponents, options?: MachineOptions): MachineComponents {
  return productConstruction(a, b, 'union', options)
}

/**
 * Compute the strings accepted by `a` but not by `b`.
 *
 * L(A \ B) = L(A) ∩ L(B̄)
 *
 * @public
 */
export function difference(a: MachineComponents, b: MachineComponents, options?: MachineOptions): MachineComponents {
  return productConstruction(a, b, 'difference', options)
}

/**
 * Compute the strings accepted by exactly one of the machines.
 *
 * Empty iff the two machines recognize the same language.
 *
 * @public
 */
export function symmetricDifference(
  a: MachineComponents,
  b: MachineComponents,
  options?: MachineOptions,
): MachineComponents {
  return productConstruction(a, b, 'symmetric-difference', options)
}

/**
 * Product construction over the pairs of states reachable from the pair of initial states.
 *
 * Product states are numbered 0, 1, 2, ... in discovery order, and the result
 * uses `a`'s alphabet order.
 *
 * @throws DfsmError with code `ALPHABET_MISMATCH` if the alphabets hold different symbols
 * @throws AutomatonLimitError if the product exceeds `maxStates`
 * @throws RangeError if `options.maxStates` is not a positive integer
 *
 * @public
 */
export function productConstruction(
  a: MachineComponents,
  b: MachineComponents,
  mode: ProductMode,
  options: MachineOptions = {},
): MachineComponents {
  const maxStates = resolveMaxStates(options)

  if (!a.alphabet.hasSameSymbols(b.alphabet)) {
    throw new DfsmError(
      'ALPHABET_MISMATCH',
      `Cannot combine machines over different alphabets ${a.alphabet.prettyPrint()} and ${b.alphabet.prettyPrint()}`,
    )
  }

  const isAccepting = ACCEPTANCE[mode]

  // Map from (stateA, stateB) pair to product state
  const pairToState = new Map<string, State>()
  const accepting: State[] = []
  const transitions: Transition[] = []
  const worklist: { product: State; sa: State; sb: State }[] = []

  const getPairKey = (sa: State, sb: State): string => `${sa.id},${sb.id}`

  const getOrCreateState = (sa: State, sb: State): State => {
    const key = getPairKey(sa, sb)
    let product = pairToState.get(key)

    if (product === undefined) {
      if (pairToState.size >= maxStates) {
        throw new AutomatonLimitError(
          `Product construction exceeded limit of ${maxStates} states`,
          maxStates,
          pairToState.size + 1,
        )
      }

      product = createState(pairToState.size)
      pairToState.set(key, product)
      worklist.push({ product, sa, sb })

      if (isAccepting(a.acceptingStates.has(sa), b.acceptingStates.has(sb))) {
        accepting.push(product)
      }
    }

    return product
  }

  const initialState = getOrCreateState(a.initialState, b.initialState)

  for (let head = 0; head < worklist.length; head++) {
    const item = worklist[head]
    for (const symbol of a.alphabet) {
      const target = getOrCreateState(a.transitions.applyTo(item.sa, symbol), b.transitions.applyTo(item.sb, symbol))
      transitions.push(createTransition(item.product, symbol, target))
    }
  }

  return {
    states: StateSet.of(pairToState.values()),
    alphabet: a.alphabet,
    transitions: new TransitionFunction(transitions),
    initialState,
    acceptingStates: StateSet.of(accepting),
  }
}
