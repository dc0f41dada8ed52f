/**
 * Language containment and equivalence.
 * @packageDocumentation
 */

export {
  checkContainment,
  isSubsetOf,
  areEquivalent,
  findDistinguishingString,
  canonicalEncoding,
} from './containment'
