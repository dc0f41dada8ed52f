/**
 * Machine alphabets.
 * @packageDocumentation
 */

import type { InputSymbol, TransitionSymbol } from '../types'
import { DfsmError } from '../types'

/** Characters that delimit the encoding and so cannot be symbols. */
const RESERVED_SYMBOLS = new Set(['/', ',', ';'])

/**
 * An ordered set of input symbols.
 *
 * Iteration order is insertion order and never changes for an instance;
 * minimization and canonicalization walk the alphabet repeatedly and depend
 * on that.
 *
 * @public
 */
export class Alphabet implements Iterable<InputSymbol> {
  private readonly symbols: readonly InputSymbol[]
  private readonly members: ReadonlySet<InputSymbol>

  /**
   * @param symbols - Single-character symbols; repeats collapse to the first occurrence
   * @throws DfsmError with code `MALFORMED_ALPHABET` for an unusable symbol
   */
  constructor(symbols: Iterable<InputSymbol>) {
    const ordered: InputSymbol[] = []
    const members = new Set<InputSymbol>()

    for (const symbol of symbols) {
      assertUsableSymbol(symbol)
      if (!members.has(symbol)) {
        members.add(symbol)
        ordered.push(symbol)
      }
    }

    this.symbols = ordered
    this.members = members
  }

  /**
   * Parse a whitespace-separated list of symbols, e.g. `"a b c"`.
   *
   * Blank text yields the empty alphabet.
   */
  static parse(text: string): Alphabet {
    const trimmed = text.trim()
    return new Alphabet(trimmed === '' ? [] : trimmed.split(/\s+/))
  }

  get size(): number {
    return this.symbols.length
  }

  contains(symbol: TransitionSymbol): boolean {
    return typeof symbol === 'string' && this.members.has(symbol)
  }

  [Symbol.iterator](): Iterator<InputSymbol> {
    return this.symbols[Symbol.iterator]()
  }

  toArray(): InputSymbol[] {
    return [...this.symbols]
  }

  /** True if both alphabets hold the same symbols, in any order. */
  hasSameSymbols(other: Alphabet): boolean {
    return this.size === other.size && this.symbols.every((symbol) => other.contains(symbol))
  }

  encode(): string {
    return this.symbols.join(' ')
  }

  prettyPrint(): string {
    return `{${this.symbols.join(', ')}}`
  }
}

function assertUsableSymbol(symbol: InputSymbol): void {
  if ([...symbol].length !== 1) {
    throw new DfsmError('MALFORMED_ALPHABET', `Alphabet symbol "${symbol}" must be exactly one character`, 'alphabet')
  }
  if (/\s/.test(symbol) || RESERVED_SYMBOLS.has(symbol)) {
    throw new DfsmError('MALFORMED_ALPHABET', `"${symbol}" cannot be used as an alphabet symbol`, 'alphabet')
  }
}
