/**
 * Machine building blocks and the machine itself.
 * @packageDocumentation
 */

export {
  createState,
  encodeState,
  compareStates,
  sameState,
  parseStateIdList,
  encodeStateSet,
  StateSet,
} from './state'
export { Alphabet } from './alphabet'
export { createTransition, compareSymbols, compareTransitions, encodeTransition, formatTransition } from './transition'
export { TransitionFunction } from './transition-function'
export { Dfsm, safeParseDfsm, type SafeParseResult } from './dfsm'
