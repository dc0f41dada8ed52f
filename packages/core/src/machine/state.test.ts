import { describe, it, expect } from 'vitest'

import { StateSet, compareStates, createState, encodeStateSet, parseStateIdList, sameState } from './state'
import { catchDfsmError } from '../test-helpers'

describe('createState', () => {
  it('wraps an integer id', () => {
    expect(createState(7)).toEqual({ id: 7 })
  })

  it('cannot be changed after creation', () => {
    expect(Object.isFrozen(createState(7))).toBe(true)
  })

  it('rejects a non-integer id', () => {
    const error = catchDfsmError(() => createState(1.5))

    expect(error.code).toBe('MALFORMED_ENCODING')
  })

  it('compares states by id only', () => {
    expect(sameState(createState(3), createState(3))).toBe(true)
    expect(sameState(createState(3), createState(4))).toBe(false)
    expect(compareStates(createState(2), createState(10))).toBeLessThan(0)
    expect(compareStates(createState(10), createState(2))).toBeGreaterThan(0)
  })
})

describe('parseStateIdList', () => {
  it('parses whitespace-separated ids in source order', () => {
    expect(parseStateIdList(' 3  1\t2 ')).toEqual([3, 1, 2])
  })

  it('accepts signed ids', () => {
    expect(parseStateIdList('-1 +2')).toEqual([-1, 2])
  })

  it('returns no ids for blank text', () => {
    expect(parseStateIdList('')).toEqual([])
    expect(parseStateIdList('   ')).toEqual([])
  })

  it('rejects tokens that are not integers', () => {
    expect(catchDfsmError(() => parseStateIdList('1 1.5')).code).toBe('MALFORMED_ENCODING')
    expect(catchDfsmError(() => parseStateIdList('x')).message).toBe('Expected an integer state id, found "x"')
  })
})

describe('StateSet', () => {
  it('orders members by id and drops repeated ids', () => {
    const set = StateSet.of([createState(3), createState(1), createState(3)])

    expect(set.size).toBe(2)
    expect(set.toArray().map((s) => s.id)).toEqual([1, 3])
  })

  it('tests membership by id', () => {
    const set = StateSet.of([createState(1)])

    expect(set.has(createState(1))).toBe(true)
    expect(set.has(createState(2))).toBe(false)
    expect(set.hasId(1)).toBe(true)
    expect(set.get(1)).toEqual({ id: 1 })
    expect(set.get(2)).toBeUndefined()
  })

  it('encodes as sorted ids', () => {
    expect(encodeStateSet([createState(3), createState(1), createState(3)])).toBe('1 3')
    expect(StateSet.empty().encode()).toBe('')
  })

  it('pretty prints in set notation', () => {
    expect(StateSet.of([createState(2), createState(0)]).prettyPrint()).toBe('{0, 2}')
    expect(StateSet.empty().prettyPrint()).toBe('{}')
  })

  it('filters into a new set', () => {
    const set = StateSet.of([0, 1, 2, 3].map(createState))
    const even = set.filter((s) => s.id % 2 === 0)

    expect(even.encode()).toBe('0 2')
    expect(set.encode()).toBe('0 1 2 3')
  })
})
