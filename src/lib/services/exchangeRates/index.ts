/**
 * Exchange Rate Service
 *
 * Rate table, conversion, and the periodic fetch that keeps the table current.
 *
 * Features:
 * - Fixed table seeded at startup; fetched rates only update known codes
 * - Hourly refresh with a single in-flight request
 * - Fail-silent: network and payload errors leave the previous rates in place
 */

export {
  createRateTable,
  isSameCurrency,
  findCurrency,
  lookupRate,
  applyFetchedRates,
} from './rateTable'

export { convert } from './conversion'

export { buildRatesUrl, parseRates, fetchLatestRates } from './client'
export type { FetchFn, ExchangeRateClientOptions } from './client'

export { RateFetcher } from './fetcher'
export type { RateFetcherOptions } from './fetcher'

// =============================================================================
// Re-exports
// =============================================================================

export type {
  CurrencyEntry,
  RateTable,
  RateMapping,
  ExchangeRateApiResponse,
  ConversionSelection,
} from './types'
