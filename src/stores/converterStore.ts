import { createStore } from 'zustand/vanilla'
import { resolveConfig, type ConverterConfig } from '@/lib/config'
import { formatConvertedAmount } from '@/lib/currency'
import {
  INITIAL_KEYPAD_STATE,
  applyKey,
  getDisplayEntry,
  parseEntry,
  type KeyToken,
  type KeypadState,
} from '@/lib/calculator'
import {
  applyFetchedRates,
  convert,
  createRateTable,
  findCurrency,
  lookupRate,
  type ConversionSelection,
  type CurrencyEntry,
  type RateMapping,
  type RateTable,
} from '@/lib/services/exchangeRates'

export interface ConverterState {
  // Calculator
  keypad: KeypadState
  onKey: (key: KeyToken) => void
  getDisplayEntry: () => string

  // Currencies and selection
  currencies: RateTable
  selection: ConversionSelection
  getAvailableCurrencies: () => RateTable
  getSelectedCurrencies: () => { from: CurrencyEntry; to: CurrencyEntry }
  lookupRate: (code: string) => number | null
  selectFrom: (code: string) => void
  selectTo: (code: string) => void
  swap: () => void

  // Conversion
  getConvertedAmount: () => number
  getConvertedDisplay: () => string

  // Rate updates
  loading: boolean
  lastUpdatedAt: number | null // timestamp of the last applied fetch
  isLoading: () => boolean
  setLoading: (loading: boolean) => void
  applyFetchedRates: (rates: RateMapping) => void
}

export type ConverterStore = ReturnType<typeof createConverterStore>

function requireCurrency(table: RateTable, code: string): CurrencyEntry {
  const entry = findCurrency(table, code)
  if (!entry) {
    throw new Error(`Currency ${code} is not in the rate table`)
  }
  return entry
}

/**
 * Create a converter store seeded from config
 *
 * @throws Error when the seed is invalid or the default selection isn't in it
 */
export function createConverterStore(overrides: Partial<ConverterConfig> = {}) {
  const config = resolveConfig(overrides)
  const currencies = createRateTable(config.seed)
  const selection: ConversionSelection = { ...config.defaultSelection }

  requireCurrency(currencies, selection.fromCode)
  requireCurrency(currencies, selection.toCode)

  return createStore<ConverterState>()((set, get) => ({
    // Calculator
    keypad: INITIAL_KEYPAD_STATE,
    onKey: (key) =>
      set((state) => {
        const keypad = applyKey(state.keypad, key)
        return keypad === state.keypad ? state : { keypad }
      }),
    getDisplayEntry: () => getDisplayEntry(get().keypad),

    // Currencies and selection
    currencies,
    selection,
    getAvailableCurrencies: () => get().currencies,
    getSelectedCurrencies: () => {
      const { currencies, selection } = get()
      return {
        from: requireCurrency(currencies, selection.fromCode),
        to: requireCurrency(currencies, selection.toCode),
      }
    },
    lookupRate: (code) => lookupRate(get().currencies, code),
    selectFrom: (code) =>
      set((state) =>
        findCurrency(state.currencies, code)
          ? { selection: { ...state.selection, fromCode: code } }
          : state
      ),
    selectTo: (code) =>
      set((state) =>
        findCurrency(state.currencies, code)
          ? { selection: { ...state.selection, toCode: code } }
          : state
      ),
    swap: () =>
      set((state) => ({
        selection: {
          fromCode: state.selection.toCode,
          toCode: state.selection.fromCode,
        },
      })),

    // Conversion
    getConvertedAmount: () => {
      const { keypad, currencies, selection } = get()
      const amount = parseEntry(keypad.entry) ?? 0
      return convert(currencies, amount, selection.fromCode, selection.toCode)
    },
    getConvertedDisplay: () => formatConvertedAmount(get().getConvertedAmount()),

    // Rate updates
    loading: false,
    lastUpdatedAt: null,
    isLoading: () => get().loading,
    setLoading: (loading) => set({ loading }),
    applyFetchedRates: (rates) =>
      set((state) => ({
        currencies: applyFetchedRates(state.currencies, rates),
        lastUpdatedAt: Date.now(),
      })),
  }))
}
