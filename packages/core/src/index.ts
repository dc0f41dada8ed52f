/**
 * Deterministic Finite-State Machine Library
 *
 * A library for parsing, validating, evaluating, minimizing and comparing
 * deterministic finite-state machines given in a compact single-line encoding.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.0.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // Machine types
  Epsilon,
  InputSymbol,
  TransitionSymbol,
  State,
  Transition,
  MachineComponents,
  MachineOptions,
  // Containment types
  LanguageRelationship,
  ContainmentResult,
  // Error types
  DfsmErrorCode,
  EncodingField,
  DfsmIssue,
} from './types'
export { EPSILON, DEFAULT_MAX_STATES, DfsmError, AutomatonLimitError } from './types'

// =============================================================================
// Machines
// =============================================================================

export { Dfsm, safeParseDfsm, type SafeParseResult } from './machine'
export { Alphabet, StateSet, TransitionFunction } from './machine'
export {
  createState,
  encodeState,
  compareStates,
  sameState,
  parseStateIdList,
  encodeStateSet,
  createTransition,
  compareSymbols,
  compareTransitions,
  encodeTransition,
  formatTransition,
} from './machine'

// =============================================================================
// Encoding and Validation
// =============================================================================

export { parseEncoding, encodeMachine, prettyPrintMachine } from './parse'
export { verifyMachine, validateEncoding, isValidEncoding } from './parse'
export {
  MachineDescriptorSchema,
  descriptorToComponents,
  componentsToDescriptor,
  type MachineDescriptor,
  type NormalizedMachineDescriptor,
} from './parse'

// =============================================================================
// Machine Algorithms
// =============================================================================

export { trace, run, accepts } from './automaton'
export { findReachableStates, removeUnreachableStates } from './automaton'
export { minimize, findEquivalentStates, mergeEquivalentStates } from './automaton'
export { toCanonicForm } from './automaton'
export { complement } from './automaton'
export { intersect, union, difference, symmetricDifference, productConstruction, type ProductMode } from './automaton'
export { isEmpty, findWitness, countAccepted } from './automaton'

// =============================================================================
// Containment Checking
// =============================================================================

export { checkContainment, isSubsetOf, areEquivalent, findDistinguishingString, canonicalEncoding } from './containment'
