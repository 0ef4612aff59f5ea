/**
 * Types for Exchange Rate Service
 */

/**
 * One row of the rate table
 */
export interface CurrencyEntry {
  /** Display name: "US Dollar" */
  name: string
  /** ISO 4217 code, unique within a table: "USD" */
  code: string
  /** Units of this currency per 1 unit of the base currency (0 = not yet fetched) */
  rate: number
}

/**
 * Fixed-size, ordered list of currencies. Never grows after seeding.
 */
export type RateTable = readonly CurrencyEntry[]

/**
 * Currency code -> rate relative to the base currency
 */
export type RateMapping = Record<string, number>

/**
 * Raw API response. Only `rates` is read.
 */
export interface ExchangeRateApiResponse {
  base?: string
  date?: string
  time_last_updated?: number
  rates: Record<string, unknown>
}

export interface ConversionSelection {
  fromCode: string
  toCode: string
}
