// =============================================================================
// LANGUAGE CONTAINMENT
// =============================================================================

/**
 * Describes the relationship between the languages of two machines.
 * @public
 */
export type LanguageRelationship =
  | 'subset' // L(A) ⊂ L(B) (proper subset)
  | 'equal' // L(A) = L(B)
  | 'superset' // L(A) ⊃ L(B)
  | 'overlapping' // L(A) ∩ L(B) ≠ ∅, but neither contains the other
  | 'disjoint' // L(A) ∩ L(B) = ∅

/**
 * Result of comparing the languages of two machines.
 * @public
 */
export interface ContainmentResult {
  /** L(A) ⊆ L(B) */
  readonly isSubset: boolean

  /** L(A) ⊇ L(B) */
  readonly isSuperset: boolean

  /** L(A) = L(B) */
  readonly isEqual: boolean

  /** L(A) ∩ L(B) ≠ ∅ */
  readonly hasOverlap: boolean

  readonly relationship: LanguageRelationship

  /** A shortest string accepted by A but not by B (present iff not a subset) */
  readonly counterexample?: string

  /** A shortest string accepted by B but not by A (present iff not a superset) */
  readonly reverseCounterexample?: string

  /** A shortest string accepted by both (present iff they overlap) */
  readonly sharedExample?: string
}
