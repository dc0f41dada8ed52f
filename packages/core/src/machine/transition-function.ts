/**
 * Deterministic transition functions and their validators.
 * @packageDocumentation
 */

import type { State, Transition, TransitionSymbol } from '../types'
import { DfsmError, EPSILON } from '../types'
import type { Alphabet } from './alphabet'
import { createState, type StateSet } from './state'
import { compareTransitions, createTransition, encodeTransition, formatTransition } from './transition'

/**
 * Two transitions that share a source and symbol but disagree on the target.
 */
interface Conflict {
  readonly kept: Transition
  readonly rejected: Transition
}

/**
 * A mapping from (state, symbol) to a single successor state.
 *
 * Construction only indexes the transitions. Whether they form a valid
 * deterministic machine over a given state set and alphabet is decided by
 * the three `verify*` methods, which the owning machine runs.
 *
 * @public
 */
export class TransitionFunction {
  /** source id -> symbol -> target */
  private readonly delta: ReadonlyMap<number, ReadonlyMap<TransitionSymbol, State>>

  /** source id -> source state */
  private readonly sources: ReadonlyMap<number, State>

  private readonly conflicts: readonly Conflict[]

  constructor(transitions: Iterable<Transition>) {
    const delta = new Map<number, Map<TransitionSymbol, State>>()
    const sources = new Map<number, State>()
    const conflicts: Conflict[] = []

    // The index holds its own frozen state per id, never the caller's objects.
    const interned = new Map<number, State>()
    const intern = (state: State): State => {
      let own = interned.get(state.id)
      if (own === undefined) {
        own = createState(state.id)
        interned.set(state.id, own)
      }
      return own
    }

    for (const { from: rawFrom, symbol, to: rawTo } of transitions) {
      const from = intern(rawFrom)
      const to = intern(rawTo)

      let row = delta.get(from.id)
      if (row === undefined) {
        row = new Map()
        delta.set(from.id, row)
        sources.set(from.id, from)
      }

      const existing = row.get(symbol)
      if (existing === undefined) {
        row.set(symbol, to)
      } else if (existing.id !== to.id) {
        conflicts.push({ kept: createTransition(from, symbol, existing), rejected: createTransition(from, symbol, to) })
      }
    }

    this.delta = delta
    this.sources = sources
    this.conflicts = conflicts
  }

  /**
   * Returns the state reached from `from` on `symbol`.
   *
   * @throws DfsmError with code `MISSING_TRANSITION` if no mapping exists
   */
  applyTo(from: State, symbol: TransitionSymbol): State {
    const to = this.delta.get(from.id)?.get(symbol)
    if (to === undefined) {
      throw new DfsmError(
        'MISSING_TRANSITION',
        `No transition from state ${from.id} on symbol ${describeSymbol(symbol)}`,
      )
    }
    return to
  }

  /** True iff there is a transition from `from` on `symbol`. */
  maps(from: State, symbol: TransitionSymbol): boolean {
    return this.delta.get(from.id)?.has(symbol) ?? false
  }

  /** The transitions of this function, sorted by the transition order. */
  transitions(): Transition[] {
    const result: Transition[] = []

    for (const [fromId, row] of this.delta) {
      const from = this.sources.get(fromId)
      if (from === undefined) continue
      for (const [symbol, to] of row) {
        result.push(createTransition(from, symbol, to))
      }
    }

    return result.sort(compareTransitions)
  }

  /**
   * Checks that every transition joins members of `states` on a symbol of `alphabet`.
   *
   * Epsilon is exempt from the alphabet check; {@link verifyNoEpsilonTransitions} covers it.
   *
   * @throws DfsmError with code `DANGLING_STATE_REFERENCE` or `UNKNOWN_SYMBOL`
   */
  verifyTransitionMapping(states: StateSet, alphabet: Alphabet): void {
    for (const t of this.transitions()) {
      if (!states.has(t.from)) {
        throw new DfsmError(
          'DANGLING_STATE_REFERENCE',
          `Transition ${encodeTransition(t)} leaves state ${t.from.id}, which is not part of the machine`,
          'transitions',
        )
      }
      if (t.symbol !== EPSILON && !alphabet.contains(t.symbol)) {
        throw new DfsmError(
          'UNKNOWN_SYMBOL',
          `Transition ${encodeTransition(t)} uses symbol "${t.symbol}", which is not in the alphabet`,
          'transitions',
        )
      }
      if (!states.has(t.to)) {
        throw new DfsmError(
          'DANGLING_STATE_REFERENCE',
          `Transition ${encodeTransition(t)} enters state ${t.to.id}, which is not part of the machine`,
          'transitions',
        )
      }
    }
  }

  /**
   * Checks that every state has exactly one transition on every symbol.
   *
   * @throws DfsmError with code `INCOMPLETE_TRANSITION_FUNCTION`
   */
  verifyTotal(states: StateSet, alphabet: Alphabet): void {
    const conflict = this.conflicts[0]
    if (conflict !== undefined) {
      throw new DfsmError(
        'INCOMPLETE_TRANSITION_FUNCTION',
        `State ${conflict.kept.from.id} has more than one transition on symbol ` +
          `${describeSymbol(conflict.kept.symbol)} (to ${conflict.kept.to.id} and ${conflict.rejected.to.id})`,
        'transitions',
      )
    }

    for (const symbol of alphabet) {
      for (const state of states) {
        if (!this.maps(state, symbol)) {
          throw new DfsmError(
            'INCOMPLETE_TRANSITION_FUNCTION',
            `The transition function is missing a transition from state ${state.id} on symbol "${symbol}"`,
            'transitions',
          )
        }
      }
    }
  }

  /**
   * Checks that no transition is labelled with epsilon.
   *
   * @throws DfsmError with code `EPSILON_NOT_ALLOWED`
   */
  verifyNoEpsilonTransitions(): void {
    for (const [fromId, row] of this.delta) {
      if (row.has(EPSILON)) {
        throw new DfsmError(
          'EPSILON_NOT_ALLOWED',
          `The transition function has an epsilon transition from state ${fromId}`,
          'transitions',
        )
      }
    }
  }

  /** Sorted transitions as `from,symbol,to` joined by `;`. */
  encode(): string {
    return this.transitions().map(encodeTransition).join(';')
  }

  /** Set notation, e.g. `{(0, a, 0), (0, b, 1)}`. */
  prettyPrint(): string {
    return `{${this.transitions().map(formatTransition).join(', ')}}`
  }
}

function describeSymbol(symbol: TransitionSymbol): string {
  return symbol === EPSILON ? 'ε' : `"${symbol}"`
}
