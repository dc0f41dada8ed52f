/**
 * Encoding parser - converts the `/`-delimited text form to machine components.
 * @packageDocumentation
 */

import type { EncodingField, MachineComponents, State, Transition, TransitionSymbol } from '../types'
import { DfsmError, EPSILON } from '../types'
import { Alphabet } from '../machine/alphabet'
import { StateSet, createState, parseStateId, parseStateIdList } from '../machine/state'
import { createTransition } from '../machine/transition'
import { TransitionFunction } from '../machine/transition-function'

/**
 * A transition as written in the encoding, before its ids are resolved.
 */
interface TransitionTuple {
  readonly fromId: number
  readonly symbol: TransitionSymbol
  readonly toId: number
}

/**
 * Parse a machine encoding into its components.
 *
 * The encoding has five `/`-separated fields:
 *
 * ```
 * <states> / <alphabet> / <transitions> / <initial> / <accepting>
 * ```
 *
 * for example `0 1/a b/0,a,0;0,b,1;1,a,0;1,b,1/0/1`. Whitespace around fields
 * and tokens is ignored, and the accepting field may be empty or absent.
 *
 * Only the syntax and the state ids are checked here; the transition
 * validators are run by the caller.
 *
 * @param encoding - The machine encoding
 * @returns Components whose every state is declared in the states field
 * @throws DfsmError with code `MALFORMED_ENCODING`, `MALFORMED_ALPHABET` or `UNKNOWN_STATE_ID`
 *
 * @public
 */
export function parseEncoding(encoding: string): MachineComponents {
  const fields = encoding.split('/')

  if (fields.length < 4 || fields.length > 5) {
    throw new DfsmError(
      'MALFORMED_ENCODING',
      `Expected 5 "/"-separated fields (states/alphabet/transitions/initial/accepting), found ${fields.length}`,
    )
  }

  const [statesField, alphabetField, transitionsField, initialField, acceptingField = ''] = fields

  const declared = new Map<number, State>()
  for (const id of inField('states', () => parseStateIdList(statesField))) {
    if (!declared.has(id)) {
      declared.set(id, createState(id))
    }
  }

  const resolve = (id: number, field: EncodingField): State => {
    const state = declared.get(id)
    if (state === undefined) {
      throw new DfsmError('UNKNOWN_STATE_ID', `State ${id} is used in ${field} but not declared in states`, field)
    }
    return state
  }

  const alphabet = inField('alphabet', () => Alphabet.parse(alphabetField))

  const transitions: Transition[] = inField('transitions', () => parseTupleList(transitionsField)).map((t) =>
    createTransition(resolve(t.fromId, 'transitions'), t.symbol, resolve(t.toId, 'transitions')),
  )

  const initialState = resolve(
    inField('initial', () => parseInitialId(initialField)),
    'initial',
  )

  const acceptingStates = inField('accepting', () => parseStateIdList(acceptingField)).map((id) =>
    resolve(id, 'accepting'),
  )

  return {
    states: StateSet.of(declared.values()),
    alphabet,
    transitions: new TransitionFunction(transitions),
    initialState,
    acceptingStates: StateSet.of(acceptingStates),
  }
}

/**
 * Parse a `;`-separated list of `from,symbol,to` tuples.
 */
function parseTupleList(text: string): TransitionTuple[] {
  const trimmed = text.trim()
  if (trimmed === '') return []

  return trimmed.split(';').map((tuple) => parseTuple(tuple))
}

/**
 * Parse one `from,symbol,to` tuple. An empty symbol denotes epsilon.
 */
function parseTuple(text: string): TransitionTuple {
  const parts = text.split(',')
  if (parts.length !== 3) {
    throw new DfsmError('MALFORMED_ENCODING', `Expected a transition "from,symbol,to", found "${text.trim()}"`)
  }

  const [from, symbol, to] = parts.map((part) => part.trim())

  if ([...symbol].length > 1) {
    throw new DfsmError('MALFORMED_ENCODING', `Transition symbol "${symbol}" must be a single character`)
  }

  return {
    fromId: parseStateId(from),
    symbol: symbol === '' ? EPSILON : symbol,
    toId: parseStateId(to),
  }
}

function parseInitialId(text: string): number {
  const ids = parseStateIdList(text)
  if (ids.length !== 1) {
    throw new DfsmError('MALFORMED_ENCODING', `Expected exactly one initial state id, found ${ids.length}`)
  }
  return ids[0]
}

/**
 * Run a field parser, tagging its encoding errors with the field name.
 */
function inField<T>(field: EncodingField, parse: () => T): T {
  try {
    return parse()
  } catch (error) {
    if (error instanceof DfsmError && error.field === undefined) {
      throw new DfsmError(error.code, `Invalid ${field} field: ${error.message}`, field)
    }
    throw error
  }
}
