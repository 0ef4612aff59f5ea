/**
 * Rate Table
 *
 * The list of currencies the converter knows about. Rates are replaced when a
 * fetch succeeds; the set of codes is fixed at seeding time.
 */

import { assertCurrencyCode, isValidRate } from '@/lib/currency'
import type { CurrencyEntry, RateMapping, RateTable } from './types'

/**
 * Build a table from a seed list
 *
 * @throws Error when a code is not ISO 4217, repeats, or has a negative rate
 */
export function createRateTable(seed: readonly CurrencyEntry[]): RateTable {
  const seen = new Set<string>()

  for (const entry of seed) {
    assertCurrencyCode(entry.code)
    if (seen.has(entry.code)) {
      throw new Error(`Duplicate currency in rate table: ${entry.code}`)
    }
    if (!isValidRate(entry.rate)) {
      throw new Error(`Invalid seed rate for ${entry.code}: ${entry.rate}`)
    }
    seen.add(entry.code)
  }

  return seed.map((entry) => ({ ...entry }))
}

/**
 * Entries are the same currency when their codes match
 */
export function isSameCurrency(a: CurrencyEntry, b: CurrencyEntry): boolean {
  return a.code === b.code
}

export function findCurrency(table: RateTable, code: string): CurrencyEntry | null {
  return table.find((entry) => entry.code === code) ?? null
}

/**
 * Rate for a code, or null if the table doesn't carry it
 */
export function lookupRate(table: RateTable, code: string): number | null {
  return findCurrency(table, code)?.rate ?? null
}

/**
 * Overwrite the rate of every entry present in the mapping.
 * Codes missing from the mapping keep their rate; codes missing from the table are dropped.
 * Rates that are negative or not finite are skipped.
 * Returns the same table when nothing changed.
 */
export function applyFetchedRates(table: RateTable, rates: RateMapping): RateTable {
  let changed = false

  const next = table.map((entry) => {
    if (!Object.hasOwn(rates, entry.code)) return entry
    const rate = rates[entry.code]
    if (!isValidRate(rate) || rate === entry.rate) return entry
    changed = true
    return { ...entry, rate }
  })

  return changed ? next : table
}
