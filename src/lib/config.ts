import type { CurrencyEntry } from '@/lib/services/exchangeRates/types'

export const CONVERTER_CONFIG = {
  apiBaseUrl: 'https://api.exchangerate-api.com/v4/latest',
  baseCurrency: 'TWD',

  // Base currency first at rate 1, the rest unknown until the first fetch
  seed: [
    { name: 'New Taiwan Dollar', code: 'TWD', rate: 1 },
    { name: 'US Dollar', code: 'USD', rate: 0 },
    { name: 'Japanese Yen', code: 'JPY', rate: 0 },
    { name: 'Euro', code: 'EUR', rate: 0 },
  ],

  defaultSelection: {
    fromCode: 'TWD',
    toCode: 'JPY',
  },

  refreshIntervalMs: 60 * 60 * 1000, // 1 hour
  minFetchSpacingMs: 59 * 60 * 1000, // timers may fire up to a minute early or late
} as const

export interface ConverterConfig {
  apiBaseUrl: string
  baseCurrency: string
  seed: readonly CurrencyEntry[]
  defaultSelection: {
    fromCode: string
    toCode: string
  }
  refreshIntervalMs: number
  minFetchSpacingMs: number
}

export function resolveConfig(overrides: Partial<ConverterConfig> = {}): ConverterConfig {
  return { ...CONVERTER_CONFIG, ...overrides }
}
