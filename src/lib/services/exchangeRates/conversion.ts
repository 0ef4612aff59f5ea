import { lookupRate } from './rateTable'
import type { RateTable } from './types'

/**
 * Convert an amount between two currencies of the table.
 *
 * Both rates are relative to the same base, so `toRate / fromRate` is the
 * cross rate. Unknown codes and a source rate of 0 (not fetched yet) yield 0.
 *
 * @example
 * // TWD = 1, JPY = 4.3
 * convert(table, 100, 'TWD', 'JPY') // => 430
 */
export function convert(table: RateTable, amount: number, fromCode: string, toCode: string): number {
  const fromRate = lookupRate(table, fromCode)
  const toRate = lookupRate(table, toCode)

  if (fromRate === null || toRate === null || fromRate === 0) {
    return 0
  }

  return amount * (toRate / fromRate)
}
