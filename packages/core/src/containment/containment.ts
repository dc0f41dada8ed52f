/**
 * Language containment and equivalence checking.
 * @packageDocumentation
 */

import type { ContainmentResult, LanguageRelationship, MachineComponents, MachineOptions } from '../types'
import { toCanonicForm } from '../automaton/canonical'
import { findWitness } from '../automaton/emptiness'
import { minimize } from '../automaton/minimize'
import { difference, intersect, symmetricDifference } from '../automaton/product'
import { encodeMachine } from '../parse/encoder'

/**
 * Compare the languages of two machines over the same alphabet.
 *
 * Each property is decided exactly: A ⊆ B iff A \ B is empty, and so on,
 * with a shortest witness string reported for every property that fails.
 *
 * @param a - First machine
 * @param b - Second machine
 * @returns Containment result with witness strings
 * @throws DfsmError with code `ALPHABET_MISMATCH` if the alphabets hold different symbols
 *
 * @public
 */
export function checkContainment(
  a: MachineComponents,
  b: MachineComponents,
  options?: MachineOptions,
): ContainmentResult {
  const counterexample = findWitness(difference(a, b, options))
  const reverseCounterexample = findWitness(difference(b, a, options))
  const sharedExample = findWitness(intersect(a, b, options))

  const isSubset = counterexample === undefined
  const isSuperset = reverseCounterexample === undefined
  const isEqual = isSubset && isSuperset
  const hasOverlap = sharedExample !== undefined

  let relationship: LanguageRelationship
  if (isEqual) {
    relationship = 'equal'
  } else if (isSubset) {
    relationship = 'subset'
  } else if (isSuperset) {
    relationship = 'superset'
  } else if (!hasOverlap) {
    relationship = 'disjoint'
  } else {
    relationship = 'overlapping'
  }

  return {
    isSubset,
    isSuperset,
    isEqual,
    hasOverlap,
    relationship,
    counterexample,
    reverseCounterexample,
    sharedExample,
  }
}

/**
 * Check whether every string accepted by `a` is accepted by `b`.
 *
 * @throws DfsmError with code `ALPHABET_MISMATCH` if the alphabets hold different symbols
 *
 * @public
 */
export function isSubsetOf(a: MachineComponents, b: MachineComponents, options?: MachineOptions): boolean {
  return findWitness(difference(a, b, options)) === undefined
}

/**
 * Check whether two machines recognize the same language.
 *
 * Both machines are minimized and put in canonical form, then their
 * encodings are compared. `b` is first read with `a`'s alphabet order, since
 * the canonical numbering follows that order. Machines whose alphabets hold
 * different symbols are never equivalent.
 *
 * @public
 */
export function areEquivalent(a: MachineComponents, b: MachineComponents): boolean {
  if (!a.alphabet.hasSameSymbols(b.alphabet)) {
    return false
  }

  const alignedB: MachineComponents = {
    states: b.states,
    alphabet: a.alphabet,
    transitions: b.transitions,
    initialState: b.initialState,
    acceptingStates: b.acceptingStates,
  }

  return canonicalEncoding(a) === canonicalEncoding(alignedB)
}

/**
 * Find a shortest string accepted by exactly one of the machines.
 *
 * @returns The string, or undefined if the machines are equivalent
 * @throws DfsmError with code `ALPHABET_MISMATCH` if the alphabets hold different symbols
 *
 * @public
 */
export function findDistinguishingString(
  a: MachineComponents,
  b: MachineComponents,
  options?: MachineOptions,
): string | undefined {
  return findWitness(symmetricDifference(a, b, options))
}

/**
 * Encoding of the minimal canonical machine recognizing the same language.
 *
 * @public
 */
export function canonicalEncoding(machine: MachineComponents): string {
  return encodeMachine(toCanonicForm(minimize(machine)))
}
