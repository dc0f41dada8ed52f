/**
 * Shared helpers for the test suites.
 * @packageDocumentation
 */

import { DfsmError } from './types'

/**
 * Run `fn` and return the DfsmError it throws.
 *
 * Fails if `fn` returns normally or throws anything else.
 */
export function catchDfsmError(fn: () => unknown): DfsmError {
  try {
    fn()
  } catch (error) {
    if (error instanceof DfsmError) {
      return error
    }
    throw error
  }
  throw new Error('Expected a DfsmError to be thrown')
}

/**
 * Every string over `symbols` of length 0 through `maxLength`, shortest first.
 */
export function allStrings(symbols: Iterable<string>, maxLength: number): string[] {
  const alphabet = [...symbols]
  const result: string[] = ['']
  let layer: string[] = ['']

  for (let length = 1; length <= maxLength; length++) {
    layer = layer.flatMap((prefix) => alphabet.map((symbol) => prefix + symbol))
    result.push(...layer)
  }

  return result
}
