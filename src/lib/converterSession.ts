import { resolveConfig, type ConverterConfig } from '@/lib/config'
import { RateFetcher, type FetchFn } from '@/lib/services/exchangeRates'
import { createConverterStore, type ConverterStore } from '@/stores/converterStore'

export interface ConverterSessionOptions {
  config?: Partial<ConverterConfig>
  fetchFn?: FetchFn
}

/**
 * One converter screen: the store plus the fetcher that keeps its rates fresh.
 * Call start() when the screen opens and dispose() when it goes away.
 */
export class ConverterSession {
  readonly store: ConverterStore
  private readonly fetcher: RateFetcher

  constructor({ config: overrides, fetchFn }: ConverterSessionOptions = {}) {
    const config = resolveConfig(overrides)
    this.store = createConverterStore(config)

    this.fetcher = new RateFetcher({
      apiBaseUrl: config.apiBaseUrl,
      baseCurrency: config.baseCurrency,
      refreshIntervalMs: config.refreshIntervalMs,
      minFetchSpacingMs: config.minFetchSpacingMs,
      fetchFn,
      onRates: (rates) => this.store.getState().applyFetchedRates(rates),
      onLoadingChange: (loading) => this.store.getState().setLoading(loading),
    })
  }

  get isRunning(): boolean {
    return this.fetcher.isRunning
  }

  start(): void {
    this.fetcher.start()
  }

  /**
   * Fetch now, outside the hourly schedule
   */
  refresh(): Promise<boolean> {
    return this.fetcher.fetchOnce()
  }

  dispose(): void {
    this.fetcher.stop()
  }
}
