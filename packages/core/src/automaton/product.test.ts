import { describe, it, expect } from 'vitest'

import { difference, intersect, productConstruction, symmetricDifference, union } from './product'
import { accepts } from './compute'
import { parseEncoding } from '../parse/parser'
import { encodeMachine } from '../parse/encoder'
import { AutomatonLimitError } from '../types'
import { allStrings, catchDfsmError } from '../test-helpers'

const ENDS_IN_B = parseEncoding('0 1/a b/0,a,0;0,b,1;1,a,0;1,b,1/0/1')
const EVEN_AS = parseEncoding('0 1/a b/0,a,1;0,b,0;1,a,0;1,b,1/0/0')

describe('productConstruction', () => {
  it('numbers reachable pairs in breadth-first order', () => {
    expect(encodeMachine(intersect(ENDS_IN_B, EVEN_AS))).toBe(
      '0 1 2 3/a b/0,a,1;0,b,2;1,a,0;1,b,3;2,a,1;2,b,2;3,a,0;3,b,3/0/2',
    )
  })

  it('chooses accepting pairs by mode', () => {
    expect(union(ENDS_IN_B, EVEN_AS).acceptingStates.encode()).toBe('0 2 3')
    expect(difference(ENDS_IN_B, EVEN_AS).acceptingStates.encode()).toBe('3')
    expect(symmetricDifference(ENDS_IN_B, EVEN_AS).acceptingStates.encode()).toBe('0 3')
    expect(productConstruction(ENDS_IN_B, EVEN_AS, 'intersection').acceptingStates.encode()).toBe('2')
  })

  it('recognizes the combined languages', () => {
    const intersection = intersect(ENDS_IN_B, EVEN_AS)
    const both = union(ENDS_IN_B, EVEN_AS)
    const onlyFirst = difference(ENDS_IN_B, EVEN_AS)
    const exactlyOne = symmetricDifference(ENDS_IN_B, EVEN_AS)

    for (const input of allStrings(['a', 'b'], 5)) {
      const a = accepts(ENDS_IN_B, input)
      const b = accepts(EVEN_AS, input)

      expect(accepts(intersection, input), input).toBe(a && b)
      expect(accepts(both, input), input).toBe(a || b)
      expect(accepts(onlyFirst, input), input).toBe(a && !b)
      expect(accepts(exactlyOne, input), input).toBe(a !== b)
    }
  })

  it("uses the first machine's alphabet order", () => {
    const reordered = parseEncoding('0 1/b a/0,a,1;0,b,0;1,a,0;1,b,1/0/0')

    expect(intersect(reordered, ENDS_IN_B).alphabet.toArray()).toEqual(['b', 'a'])
    expect(intersect(ENDS_IN_B, reordered).alphabet.toArray()).toEqual(['a', 'b'])
  })

  it('rejects machines over different alphabets', () => {
    const error = catchDfsmError(() => union(ENDS_IN_B, parseEncoding('0/a/0,a,0/0/')))

    expect(error.code).toBe('ALPHABET_MISMATCH')
    expect(error.message).toBe('Cannot combine machines over different alphabets {a, b} and {a}')
  })

  it('stops at the state limit', () => {
    const error = catchDfsmError(() => intersect(ENDS_IN_B, EVEN_AS, { maxStates: 2 }))

    expect(error).toBeInstanceOf(AutomatonLimitError)
    expect(error.code).toBe('STATE_LIMIT')
    if (error instanceof AutomatonLimitError) {
      expect(error.limit).toBe(2)
      expect(error.actual).toBe(3)
    }
  })

  it('rejects a state limit that is not a positive integer', () => {
    expect(() => intersect(ENDS_IN_B, EVEN_AS, { maxStates: Number.NaN })).toThrow(
      new RangeError('State limit NaN must be a positive integer'),
    )
    expect(() => intersect(ENDS_IN_B, EVEN_AS, { maxStates: 0 })).toThrow(RangeError)
  })

  it('explores every reachable pair of a large product', () => {
    const cycle = (length: number) =>
      parseEncoding(
        [
          Array.from({ length }, (_, i) => i).join(' '),
          'a',
          Array.from({ length }, (_, i) => `${i},a,${(i + 1) % length}`).join(';'),
          '0',
          '0',
        ].join('/'),
      )

    const product = intersect(cycle(50), cycle(51))

    expect(product.states.size).toBe(2550)
    expect(accepts(product, 'a'.repeat(2550))).toBe(true)
    expect(accepts(product, 'a'.repeat(50))).toBe(false)
  })

  it('fits within a limit equal to the product size', () => {
    expect(intersect(ENDS_IN_B, EVEN_AS, { maxStates: 4 }).states.size).toBe(4)
  })
})
