/**
 * Keypad State Machine
 *
 * One pending binary operation, no precedence: an operator stores the entry as
 * the left-hand operand, and equals applies it to the next entry. Keys that
 * need a number while the entry doesn't parse are no-ops.
 */

import { formatFixed } from '@/lib/currency'
import { isDigitKey, isOperator } from './keypad'
import type { KeyToken, KeypadState, Operator } from './types'

export const INITIAL_KEYPAD_STATE: KeypadState = {
  entry: '',
  pendingOperator: null,
  pendingOperand: null,
}

const DECIMAL_ENTRY = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i

// Results of dividing by zero, as written by toFixed
const NON_FINITE_ENTRIES: Record<string, number> = {
  'Infinity': Infinity,
  '-Infinity': -Infinity,
  'NaN': NaN,
}

/**
 * Parse the entry as a number, or null if it isn't one
 *
 * @example
 * parseEntry('12.5')     // => 12.5
 * parseEntry('5.')       // => 5
 * parseEntry('')         // => null
 * parseEntry('Infinity') // => Infinity
 */
export function parseEntry(entry: string): number | null {
  if (Object.hasOwn(NON_FINITE_ENTRIES, entry)) {
    return NON_FINITE_ENTRIES[entry]
  }
  return DECIMAL_ENTRY.test(entry) ? Number(entry) : null
}

export function calculate(left: number, operator: Operator, right: number): number {
  switch (operator) {
    case '÷':
      return left / right
    case '×':
      return left * right
    case '-':
      return left - right
    case '+':
      return left + right
  }
}

/**
 * Apply one key press. Returns the same state object when the key is a no-op.
 */
export function applyKey(state: KeypadState, key: KeyToken): KeypadState {
  if (key === 'C') {
    return INITIAL_KEYPAD_STATE
  }

  if (isDigitKey(key)) {
    return { ...state, entry: state.entry + key }
  }

  if (key === '.') {
    return state.entry.includes('.') ? state : { ...state, entry: state.entry + key }
  }

  if (key === '🖩') {
    return state
  }

  const value = parseEntry(state.entry)
  if (value === null) {
    return state
  }

  if (key === '±') {
    return { ...state, entry: String(-value) }
  }

  if (key === '%') {
    return { ...state, entry: String(value / 100) }
  }

  if (isOperator(key)) {
    return { entry: '', pendingOperator: key, pendingOperand: value }
  }

  // '='
  if (state.pendingOperator === null || state.pendingOperand === null) {
    return state
  }
  const result = calculate(state.pendingOperand, state.pendingOperator, value)
  return { entry: formatFixed(result, 2), pendingOperator: null, pendingOperand: null }
}

/**
 * Apply a sequence of keys in order
 */
export function applyKeys(state: KeypadState, keys: Iterable<KeyToken>): KeypadState {
  let next = state
  for (const key of keys) {
    next = applyKey(next, key)
  }
  return next
}

/**
 * Text for the input row: the entry, or "0" while nothing is typed
 */
export function getDisplayEntry(state: KeypadState): string {
  return state.entry === '' ? '0' : state.entry
}
