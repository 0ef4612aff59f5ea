export type { DigitKey, KeyToken, KeypadState, Operator } from './types'
export { DIGIT_KEYS, OPERATOR_KEYS } from './types'

export { KEYPAD_ROWS, isDigitKey, isOperator, isOperatorKey, toKeyToken } from './keypad'

export {
  INITIAL_KEYPAD_STATE,
  applyKey,
  applyKeys,
  calculate,
  getDisplayEntry,
  parseEntry,
} from './engine'
