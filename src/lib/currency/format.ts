/**
 * Amount Formatting
 */

/**
 * Format a number with a fixed count of fraction digits.
 * Non-finite values keep their JavaScript spelling ("Infinity", "-Infinity", "NaN").
 *
 * @example
 * formatFixed(8)          // => "8.00"
 * formatFixed(0.125, 1)   // => "0.1"
 * formatFixed(5 / 0)      // => "Infinity"
 */
export function formatFixed(value: number, digits: number = 2): string {
  return value.toFixed(digits);
}

/**
 * Format a converted amount for the second display row
 */
export function formatConvertedAmount(value: number): string {
  return formatFixed(value, 2);
}
