import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { FetchFn } from '@/lib/services/exchangeRates'
import { ConverterSession } from './converterSession'

const HOUR = 60 * 60 * 1000

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status })
}

describe('ConverterSession', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  it('requests the base currency from the configured endpoint', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => jsonResponse({ rates: { TWD: 1, JPY: 4.35 } }))
    const session = new ConverterSession({
      config: { apiBaseUrl: 'https://rates.example.test/v4/latest' },
      fetchFn,
    })

    await expect(session.refresh()).resolves.toBe(true)

    expect(fetchFn).toHaveBeenCalledWith('https://rates.example.test/v4/latest/TWD', expect.anything())
    expect(session.store.getState().lookupRate('JPY')).toBe(4.35)
    expect(session.store.getState().isLoading()).toBe(false)
    expect(session.store.getState().lastUpdatedAt).not.toBeNull()
  })

  it('leaves rates untouched when the fetch fails', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => jsonResponse({ error: 'down' }, 502))
    const session = new ConverterSession({ fetchFn })
    const before = session.store.getState().currencies

    await expect(session.refresh()).resolves.toBe(false)

    expect(session.store.getState().currencies).toBe(before)
    expect(session.store.getState().isLoading()).toBe(false)
    expect(session.store.getState().lastUpdatedAt).toBeNull()
  })

  describe('lifecycle', () => {
    beforeEach(() => {
      vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval', 'Date'] })
    })

    afterEach(() => {
      vi.useRealTimers()
    })

    it('loads rates on start and stops refreshing after dispose', async () => {
      const fetchFn = vi.fn<FetchFn>(async () => jsonResponse({ rates: { JPY: 4.3 } }))
      const session = new ConverterSession({ fetchFn })

      session.start()
      expect(session.isRunning).toBe(true)
      expect(session.store.getState().isLoading()).toBe(true)
      expect(fetchFn).toHaveBeenCalledTimes(1)

      // Joins the request started by start()
      await session.refresh()
      expect(fetchFn).toHaveBeenCalledTimes(1)
      expect(session.store.getState().isLoading()).toBe(false)

      session.store.getState().onKey('1')
      session.store.getState().onKey('0')
      session.store.getState().onKey('0')
      expect(session.store.getState().getConvertedDisplay()).toBe('430.00')

      session.dispose()
      expect(session.isRunning).toBe(false)

      await vi.advanceTimersByTimeAsync(2 * HOUR)
      expect(fetchFn).toHaveBeenCalledTimes(1)
    })
  })
})
