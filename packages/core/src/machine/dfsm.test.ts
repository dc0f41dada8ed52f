import { describe, it, expect } from 'vitest'

import { Dfsm, safeParseDfsm } from './dfsm'
import { Alphabet } from './alphabet'
import { createState } from './state'
import { createTransition } from './transition'
import { TransitionFunction } from './transition-function'
import { AutomatonLimitError, DfsmError } from '../types'
import { allStrings, catchDfsmError } from '../test-helpers'

/** Accepts strings over {a, b} that end in b. */
const ENDS_IN_B = '0 1/a b/0,a,0;0,b,1;1,a,0;1,b,1/0/1'

/** Same language as ENDS_IN_B, with a redundant state and an unreachable one. */
const ENDS_IN_B_REDUNDANT = '0 1 2 3/a b/0,a,1;0,b,2;1,a,1;1,b,2;2,a,1;2,b,2;3,a,3;3,b,0/0/2 3'

describe('Dfsm', () => {
  describe('parse and encode', () => {
    it('round-trips an encoding in canonical order', () => {
      expect(Dfsm.parse(ENDS_IN_B).encode()).toBe(ENDS_IN_B)
    })

    it('round-trips a machine with no accepting states', () => {
      const encoding = '0/a b/0,a,0;0,b,0/0/'

      expect(Dfsm.parse(encoding).encode()).toBe(encoding)
    })

    it('ignores whitespace around fields and tokens', () => {
      const machine = Dfsm.parse('0 1/a b/0 , a , 0; 0,b, 1 ;1, a, 0 ; 1, b, 1/0/ 1')

      expect(machine.encode()).toBe(ENDS_IN_B)
    })

    it('renders as its encoding', () => {
      expect(String(Dfsm.parse(ENDS_IN_B))).toBe(ENDS_IN_B)
    })

    it('pretty prints in set notation', () => {
      expect(Dfsm.parse(ENDS_IN_B).prettyPrint()).toBe(
        [
          'K = {0, 1}',
          'Σ = {a, b}',
          'δ = {(0, a, 0), (0, b, 1), (1, a, 0), (1, b, 1)}',
          's = 0',
          'A = {1}',
        ].join('\n'),
      )
    })
  })

  describe('validation', () => {
    it('rejects a transition function that is not total', () => {
      const error = catchDfsmError(() => Dfsm.parse('0 1/a b/0,a,0;0,b,1;1,a,0/0/1'))

      expect(error.code).toBe('INCOMPLETE_TRANSITION_FUNCTION')
    })

    it('rejects a transition on an undeclared symbol', () => {
      const error = catchDfsmError(() => Dfsm.parse('0/a/0,a,0;0,c,0/0/'))

      expect(error.code).toBe('UNKNOWN_SYMBOL')
    })

    it('rejects an epsilon transition', () => {
      const error = catchDfsmError(() => Dfsm.parse('0 1/a/0,a,0;1,a,1;0,,1/0/'))

      expect(error.code).toBe('EPSILON_NOT_ALLOWED')
    })

    it('throws DfsmError instances', () => {
      expect(() => Dfsm.parse('0/a/0,a,0')).toThrow(DfsmError)
    })
  })

  describe('fromComponents', () => {
    const s0 = createState(0)
    const s1 = createState(1)
    const transitions = [
      createTransition(s0, 'a', s0),
      createTransition(s0, 'b', s1),
      createTransition(s1, 'a', s0),
      createTransition(s1, 'b', s1),
    ]

    it('builds a machine from explicit components', () => {
      const machine = Dfsm.fromComponents([s1, s0], Alphabet.parse('a b'), transitions, s0, [s1])

      expect(machine.encode()).toBe(ENDS_IN_B)
    })

    it('accepts a prebuilt transition function', () => {
      const machine = Dfsm.fromComponents([s0, s1], Alphabet.parse('a b'), new TransitionFunction(transitions), s0, [s1])

      expect(machine.compute('ab')).toBe(true)
    })

    it('matches states by id', () => {
      const machine = Dfsm.fromComponents([createState(0), createState(1)], Alphabet.parse('a b'), transitions, s0, [
        createState(1),
      ])

      expect(machine.compute('b')).toBe(true)
    })

    it('is not affected by later changes to the given states', () => {
      const initial = { id: 0 }
      const machine = Dfsm.fromComponents(
        [initial, s1],
        Alphabet.parse('a b'),
        [
          createTransition(initial, 'a', initial),
          createTransition(initial, 'b', s1),
          createTransition(s1, 'a', initial),
          createTransition(s1, 'b', s1),
        ],
        initial,
        [s1],
      )

      initial.id = 7

      expect(machine.encode()).toBe(ENDS_IN_B)
      expect(machine.initialState).toEqual({ id: 0 })
      expect(machine.compute('b')).toBe(true)
      expect(machine.compute('ba')).toBe(false)
    })

    it('rejects a transition to a state outside the machine', () => {
      const error = catchDfsmError(() =>
        Dfsm.fromComponents([s0], Alphabet.parse('a'), [createTransition(s0, 'a', createState(5))], s0, []),
      )

      expect(error.code).toBe('DANGLING_STATE_REFERENCE')
    })

    it('rejects an initial state outside the machine', () => {
      const error = catchDfsmError(() =>
        Dfsm.fromComponents([s0], Alphabet.parse('a'), [createTransition(s0, 'a', s0)], s1, []),
      )

      expect(error.code).toBe('DANGLING_STATE_REFERENCE')
      expect(error.field).toBe('initial')
      expect(error.message).toBe('Initial state 1 is not part of the machine')
    })

    it('rejects an accepting state outside the machine', () => {
      const error = catchDfsmError(() =>
        Dfsm.fromComponents([s0], Alphabet.parse('a'), [createTransition(s0, 'a', s0)], s0, [s1]),
      )

      expect(error.code).toBe('DANGLING_STATE_REFERENCE')
      expect(error.field).toBe('accepting')
    })
  })

  describe('fromDescriptor', () => {
    it('builds the same machine as the encoding', () => {
      const machine = Dfsm.fromDescriptor({
        states: [0, 1],
        alphabet: ['a', 'b'],
        transitions: [
          [0, 'a', 0],
          [0, 'b', 1],
          [1, 'a', 0],
          [1, 'b', 1],
        ],
        initial: 0,
        accepting: [1],
      })

      expect(machine.encode()).toBe(ENDS_IN_B)
    })

    it('round-trips through toDescriptor', () => {
      const machine = Dfsm.parse(ENDS_IN_B)

      expect(Dfsm.fromDescriptor(machine.toDescriptor()).encode()).toBe(ENDS_IN_B)
    })
  })

  describe('limits', () => {
    it('rejects machines with more states than allowed', () => {
      const error = catchDfsmError(() => Dfsm.parse(ENDS_IN_B, { maxStates: 1 }))

      expect(error).toBeInstanceOf(AutomatonLimitError)
      expect(error.code).toBe('STATE_LIMIT')
      if (error instanceof AutomatonLimitError) {
        expect(error.limit).toBe(1)
        expect(error.actual).toBe(2)
      }
    })

    it('rejects a state limit that is not a positive integer', () => {
      expect(() => Dfsm.parse(ENDS_IN_B, { maxStates: Number.NaN })).toThrow(
        new RangeError('State limit NaN must be a positive integer'),
      )
      expect(() => Dfsm.parse(ENDS_IN_B, { maxStates: 0 })).toThrow(RangeError)
      expect(() => Dfsm.parse(ENDS_IN_B).union(Dfsm.parse(ENDS_IN_B), { maxStates: 2.5 })).toThrow(RangeError)
    })
  })

  describe('compute', () => {
    const machine = Dfsm.parse(ENDS_IN_B)

    it('accepts and rejects the documented inputs', () => {
      expect(machine.compute('aab')).toBe(true)
      expect(machine.compute('bba')).toBe(false)
    })

    it('rejects the empty input when the initial state is not accepting', () => {
      expect(machine.compute('')).toBe(false)
    })

    it('accepts a sequence of symbols', () => {
      expect(machine.compute(['a', 'b'])).toBe(true)
    })

    it('throws on a symbol outside the alphabet', () => {
      const error = catchDfsmError(() => machine.compute('abc'))

      expect(error.code).toBe('INVALID_INPUT_SYMBOL')
      expect(error.message).toBe('Input symbol "c" at position 2 is not in the alphabet {a, b}')
    })

    it('traces the visited states', () => {
      expect(machine.trace('abb').map((s) => s.id)).toEqual([0, 0, 1, 1])
    })
  })

  describe('transformations', () => {
    it('never modifies the receiver', () => {
      const machine = Dfsm.parse(ENDS_IN_B_REDUNDANT)

      machine.minimize()
      machine.removeUnreachableStates()
      machine.toCanonicForm()
      machine.complement()

      expect(machine.encode()).toBe(ENDS_IN_B_REDUNDANT)
    })

    it('relabels a single-state machine to id 0', () => {
      expect(Dfsm.parse('5/a b/5,b,5;5,a,5/5/').toCanonicForm().encode()).toBe('0/a b/0,a,0;0,b,0/0/')
    })

    it('minimizes to the canonical form of the smallest equivalent machine', () => {
      expect(Dfsm.parse(ENDS_IN_B_REDUNDANT).minimize().toCanonicForm().encode()).toBe(ENDS_IN_B)
    })

    it('is idempotent under minimization', () => {
      const once = Dfsm.parse(ENDS_IN_B_REDUNDANT).minimize()

      expect(once.minimize().toCanonicForm().encode()).toBe(once.toCanonicForm().encode())
    })

    it('preserves the language under pruning and minimization', () => {
      const machine = Dfsm.parse(ENDS_IN_B_REDUNDANT)
      const pruned = machine.removeUnreachableStates()
      const minimal = machine.minimize()

      for (const input of allStrings(machine.alphabet, 6)) {
        expect(pruned.compute(input), input).toBe(machine.compute(input))
        expect(minimal.compute(input), input).toBe(machine.compute(input))
      }
    })

    it('lists the reachable states', () => {
      expect(Dfsm.parse(ENDS_IN_B_REDUNDANT).reachableStates().encode()).toBe('0 1 2')
    })
  })

  describe('language operations', () => {
    const endsInB = Dfsm.parse(ENDS_IN_B)
    const endsInA = Dfsm.parse('0 1/a b/0,a,1;0,b,0;1,a,1;1,b,0/0/1')

    it('answers equivalence through canonical form', () => {
      expect(endsInB.isEquivalentTo(Dfsm.parse(ENDS_IN_B_REDUNDANT))).toBe(true)
      expect(endsInB.isEquivalentTo(endsInA)).toBe(false)
    })

    it('combines machines', () => {
      const either = endsInB.union(endsInA)

      expect(either.compute('')).toBe(false)
      expect(either.compute('a')).toBe(true)
      expect(either.compute('b')).toBe(true)
      expect(endsInB.intersect(endsInA).isEmpty()).toBe(true)
      expect(endsInB.difference(endsInA).isEquivalentTo(endsInB)).toBe(true)
      expect(endsInB.symmetricDifference(endsInB).isEmpty()).toBe(true)
    })

    it('finds witnesses and counts', () => {
      expect(endsInB.findWitness()).toBe('b')
      expect(endsInB.findDistinguishingString(endsInA)).toBe('a')
      expect(endsInB.countAccepted(3)).toEqual(
        new Map([
          [0, 0n],
          [1, 1n],
          [2, 2n],
          [3, 4n],
        ]),
      )
    })

    it('rejects a negative length bound', () => {
      expect(() => endsInB.countAccepted(-1)).toThrow(RangeError)
    })

    it('checks containment', () => {
      expect(endsInB.isSubsetOf(endsInB.union(endsInA))).toBe(true)
      expect(endsInB.checkContainment(endsInA).relationship).toBe('disjoint')
    })
  })
})

describe('safeParseDfsm', () => {
  it('returns the machine on success', () => {
    const result = safeParseDfsm(ENDS_IN_B)

    expect(result.success).toBe(true)
    if (result.success) {
      expect(result.machine.encode()).toBe(ENDS_IN_B)
    }
  })

  it('returns the error on failure', () => {
    const result = safeParseDfsm('0/a/0,a,1/0/')

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.code).toBe('UNKNOWN_STATE_ID')
      expect(result.error.field).toBe('transitions')
    }
  })
})
