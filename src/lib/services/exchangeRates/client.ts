/**
 * Exchange Rate API Client
 * Fetches the latest rates for a base currency from exchangerate-api.com
 */

import { isValidCurrencyFormat, isValidRate } from '@/lib/currency'
import type { ExchangeRateApiResponse, RateMapping } from './types'

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>

export interface ExchangeRateClientOptions {
  apiBaseUrl: string
  fetchFn?: FetchFn
}

/**
 * Build the endpoint URL for a base currency
 *
 * @example
 * buildRatesUrl('https://api.exchangerate-api.com/v4/latest', 'TWD')
 * // => "https://api.exchangerate-api.com/v4/latest/TWD"
 */
export function buildRatesUrl(apiBaseUrl: string, baseCurrency: string): string {
  return `${apiBaseUrl.replace(/\/+$/, '')}/${encodeURIComponent(baseCurrency)}`
}

function isApiResponse(value: unknown): value is ExchangeRateApiResponse {
  if (typeof value !== 'object' || value === null || !('rates' in value)) {
    return false
  }
  const { rates } = value
  return typeof rates === 'object' && rates !== null && !Array.isArray(rates)
}

/**
 * Keep well-formed codes with finite, non-negative rates
 */
export function parseRates(body: unknown): RateMapping {
  if (!isApiResponse(body)) {
    throw new Error('Malformed exchange rate payload: missing rates object')
  }

  const rates: RateMapping = {}
  for (const [code, rate] of Object.entries(body.rates)) {
    if (isValidCurrencyFormat(code) && isValidRate(rate)) {
      rates[code] = rate
    }
  }
  return rates
}

/**
 * Fetch the latest rates relative to `baseCurrency`
 *
 * @returns Map of currency code to rate
 * @throws Error on network failure, non-2xx status or malformed body
 */
export async function fetchLatestRates(
  baseCurrency: string,
  { apiBaseUrl, fetchFn = fetch }: ExchangeRateClientOptions
): Promise<RateMapping> {
  const url = buildRatesUrl(apiBaseUrl, baseCurrency)
  console.log(`[exchangeRateClient] Fetching: ${url}`)

  const response = await fetchFn(url, {
    method: 'GET',
    headers: {
      'Accept': 'application/json',
    },
  })

  console.log(`[exchangeRateClient] Response status: ${response.status}`)

  if (!response.ok) {
    throw new Error(`HTTP error: ${response.status}`)
  }

  let body: unknown
  try {
    body = await response.json()
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new Error(`Malformed exchange rate payload: ${reason}`)
  }

  const rates = parseRates(body)
  console.log(`[exchangeRateClient] Success! Got ${Object.keys(rates).length} rates`)
  return rates
}
