/**
 * Type definitions for deterministic finite-state machines.
 * @packageDocumentation
 */

// Machine types
export type {
  Epsilon,
  InputSymbol,
  TransitionSymbol,
  State,
  Transition,
  MachineComponents,
  MachineOptions,
} from './machine'
export { EPSILON, DEFAULT_MAX_STATES, resolveMaxStates } from './machine'

// Error types
export type { DfsmErrorCode, EncodingField, DfsmIssue } from './errors'
export { DfsmError, AutomatonLimitError } from './errors'

// Containment types
export type { LanguageRelationship, ContainmentResult } from './containment'
