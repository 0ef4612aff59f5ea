import { useEffect, useState } from 'react'
import { useStore } from 'zustand'
import { ConverterSession, type ConverterSessionOptions } from '@/lib/converterSession'
import type { ConverterState, ConverterStore } from '@/stores/converterStore'

/**
 * Subscribe to a slice of a converter store
 */
export function useConverter<T>(store: ConverterStore, selector: (state: ConverterState) => T): T {
  return useStore(store, selector)
}

/**
 * Both display rows, re-rendered on every keypad, selection or rate change
 */
export function useConverterDisplay(store: ConverterStore) {
  const entry = useStore(store, (state) => state.getDisplayEntry())
  const converted = useStore(store, (state) => state.getConvertedDisplay())
  const loading = useStore(store, (state) => state.loading)
  return { entry, converted, loading }
}

/**
 * Own a session for the lifetime of the calling component.
 * Starts fetching on mount and cancels the timer on unmount.
 */
export function useConverterSession(options?: ConverterSessionOptions): ConverterSession {
  const [session] = useState(() => new ConverterSession(options))

  useEffect(() => {
    session.start()
    return () => session.dispose()
  }, [session])

  return session
}
