/**
 * Transition triples and their total order.
 * @packageDocumentation
 */

import type { State, Transition, TransitionSymbol } from '../types'
import { EPSILON } from '../types'
import { compareStates, encodeState } from './state'

/**
 * Create a transition triple.
 * @public
 */
export function createTransition(from: State, symbol: TransitionSymbol, to: State): Transition {
  return Object.freeze({ from, symbol, to })
}

/**
 * Order symbols with epsilon first, then by UTF-16 code unit.
 * @public
 */
export function compareSymbols(a: TransitionSymbol, b: TransitionSymbol): number {
  if (a === EPSILON) return b === EPSILON ? 0 : -1
  if (b === EPSILON) return 1
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

/**
 * Total order on transitions: source id, then symbol, then target id.
 *
 * The encoding sorts by this order, which is what makes canonical encodings
 * comparable as text.
 *
 * @public
 */
export function compareTransitions(a: Transition, b: Transition): number {
  return compareStates(a.from, b.from) || compareSymbols(a.symbol, b.symbol) || compareStates(a.to, b.to)
}

/**
 * Render a transition as `from,symbol,to` (empty symbol for epsilon).
 * @public
 */
export function encodeTransition(transition: Transition): string {
  const symbol = transition.symbol === EPSILON ? '' : transition.symbol
  return `${encodeState(transition.from)},${symbol},${encodeState(transition.to)}`
}

/**
 * Render a transition in set notation, e.g. `(0, a, 1)` or `(0, ε, 1)`.
 * @public
 */
export function formatTransition(transition: Transition): string {
  const symbol = transition.symbol === EPSILON ? 'ε' : transition.symbol
  return `(${encodeState(transition.from)}, ${symbol}, ${encodeState(transition.to)})`
}
