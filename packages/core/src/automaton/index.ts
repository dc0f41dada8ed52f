/**
 * Machine algorithms: evaluation, pruning, minimization, canonical form and set operations.
 * @packageDocumentation
 */

export { trace, run, accepts } from './compute'
export { findReachableStates, removeUnreachableStates } from './reachability'
export { minimize, findEquivalentStates, mergeEquivalentStates } from './minimize'
export { toCanonicForm } from './canonical'
export { complement } from './complement'
export {
  intersect,
  union,
  difference,
  symmetricDifference,
  productConstruction,
  type ProductMode,
} from './product'
export { isEmpty, findWitness, countAccepted } from './emptiness'
