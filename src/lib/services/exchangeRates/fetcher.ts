/**
 * Rate Fetcher
 *
 * Fetches rates once on start and then on a fixed interval. Failures are
 * logged and dropped; the table keeps its previous rates until the next tick.
 *
 * At most one request is in flight: calling fetchOnce() while a request is
 * outstanding returns the outstanding promise.
 */

import { fetchLatestRates, type FetchFn } from './client'
import type { RateMapping } from './types'

export interface RateFetcherOptions {
  apiBaseUrl: string
  baseCurrency: string
  refreshIntervalMs: number
  /** Ticks closer than this to the previous fetch are skipped */
  minFetchSpacingMs: number
  fetchFn?: FetchFn
  onRates: (rates: RateMapping) => void
  onLoadingChange: (loading: boolean) => void
}

export class RateFetcher {
  private inFlight: Promise<boolean> | null = null
  private timer: ReturnType<typeof setInterval> | null = null
  private lastStartedAt: number | null = null

  constructor(private readonly options: RateFetcherOptions) {}

  get isRunning(): boolean {
    return this.timer !== null
  }

  get isFetching(): boolean {
    return this.inFlight !== null
  }

  /**
   * Fetch and apply rates once
   *
   * @returns true if rates were applied. Never rejects.
   */
  fetchOnce(): Promise<boolean> {
    if (this.inFlight) {
      console.log('[rateFetcher] Fetch already in flight, reusing it')
      return this.inFlight
    }

    this.lastStartedAt = Date.now()
    this.options.onLoadingChange(true)

    this.inFlight = this.run().finally(() => {
      this.inFlight = null
      this.options.onLoadingChange(false)
    })
    return this.inFlight
  }

  /**
   * Fetch now, then every refreshIntervalMs until stop()
   */
  start(): void {
    if (this.timer) return

    void this.fetchOnce()
    this.timer = setInterval(() => this.tick(), this.options.refreshIntervalMs)
  }

  stop(): void {
    if (!this.timer) return
    clearInterval(this.timer)
    this.timer = null
  }

  private tick(): void {
    const { minFetchSpacingMs } = this.options
    if (this.lastStartedAt !== null && Date.now() - this.lastStartedAt < minFetchSpacingMs) {
      console.log('[rateFetcher] Skipping tick, last fetch was too recent')
      return
    }
    void this.fetchOnce()
  }

  private async run(): Promise<boolean> {
    const { apiBaseUrl, baseCurrency, fetchFn } = this.options
    try {
      const rates = await fetchLatestRates(baseCurrency, { apiBaseUrl, fetchFn })
      this.options.onRates(rates)
      return true
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      console.warn(`[rateFetcher] Fetch failed, keeping previous rates: ${message}`)
      return false
    }
  }
}
