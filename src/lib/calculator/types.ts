/**
 * Calculator Types
 */

export const DIGIT_KEYS = ['0', '1', '2', '3', '4', '5', '6', '7', '8', '9'] as const
export const OPERATOR_KEYS = ['÷', '×', '-', '+'] as const

export type DigitKey = (typeof DIGIT_KEYS)[number]
export type Operator = (typeof OPERATOR_KEYS)[number]

export type KeyToken =
  | DigitKey
  | Operator
  | '.'
  | 'C' // clear
  | '±' // sign toggle
  | '%'
  | '='
  | '🖩' // decorative, always ignored

export interface KeypadState {
  /** Raw text being typed: digits, at most one point, or a formatted result */
  entry: string
  pendingOperator: Operator | null
  /** Left-hand value stored when the operator was pressed */
  pendingOperand: number | null
}
