// @vitest-environment jsdom
import { describe, it, expect, vi, beforeEach } from 'vitest'
import { act, renderHook } from '@testing-library/react'
import type { FetchFn } from '@/lib/services/exchangeRates'
import { createConverterStore } from '@/stores/converterStore'
import { useConverter, useConverterDisplay, useConverterSession } from './useConverter'

describe('useConverter', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  it('re-renders when a key is pressed', () => {
    const store = createConverterStore()
    const { result } = renderHook(() => useConverterDisplay(store))

    expect(result.current).toEqual({ entry: '0', converted: '0.00', loading: false })

    act(() => {
      store.getState().applyFetchedRates({ JPY: 4 })
      store.getState().onKey('2')
    })

    expect(result.current).toEqual({ entry: '2', converted: '8.00', loading: false })
  })

  it('selects a slice of the store', () => {
    const store = createConverterStore()
    const { result } = renderHook(() => useConverter(store, (state) => state.selection.fromCode))

    expect(result.current).toBe('TWD')

    act(() => {
      store.getState().swap()
    })

    expect(result.current).toBe('JPY')
  })

  it('runs the session while mounted', () => {
    // Never settles, so nothing is applied after the test ends
    const fetchFn = vi.fn<FetchFn>(() => new Promise<Response>(() => {}))
    const { result, unmount } = renderHook(() => useConverterSession({ fetchFn }))
    const session = result.current

    expect(session.isRunning).toBe(true)
    expect(fetchFn).toHaveBeenCalledTimes(1)
    expect(session.store.getState().isLoading()).toBe(true)

    unmount()

    expect(session.isRunning).toBe(false)
  })
})
