/**
 * Keypad layout and key label handling
 */

import { DIGIT_KEYS, OPERATOR_KEYS } from './types'
import type { DigitKey, KeyToken, Operator } from './types'

/**
 * Rows as rendered, top to bottom. Clear appears twice on purpose.
 */
export const KEYPAD_ROWS: readonly (readonly KeyToken[])[] = [
  ['C', '±', '%', '÷'],
  ['7', '8', '9', '×'],
  ['4', '5', '6', '-'],
  ['1', '2', '3', '+'],
  ['C', '0', '.', '='],
]

const KEY_ALIASES: Record<string, KeyToken> = {
  '−': '-', // − minus sign
  '*': '×',
  '/': '÷',
}

const ALL_KEYS = new Set<string>([...DIGIT_KEYS, ...OPERATOR_KEYS, '.', 'C', '±', '%', '=', '🖩'])

function isKeyToken(value: string): value is KeyToken {
  return ALL_KEYS.has(value)
}

export function isDigitKey(key: KeyToken): key is DigitKey {
  return (DIGIT_KEYS as readonly string[]).includes(key)
}

export function isOperator(key: KeyToken): key is Operator {
  return (OPERATOR_KEYS as readonly string[]).includes(key)
}

/**
 * Keys drawn in the accent color
 */
export function isOperatorKey(key: KeyToken): boolean {
  return 'C±%÷×-+='.includes(key)
}

/**
 * Map a raw label to a key token, or null if it isn't a keypad key
 *
 * @example
 * toKeyToken('7') // => '7'
 * toKeyToken('*') // => '×'
 * toKeyToken('x') // => null
 */
export function toKeyToken(label: string): KeyToken | null {
  if (Object.hasOwn(KEY_ALIASES, label)) return KEY_ALIASES[label]
  return isKeyToken(label) ? label : null
}
