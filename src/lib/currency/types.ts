/**
 * Currency Types
 *
 * Currency codes are validated against the ISO 4217 list shipped by the
 * currency-codes-ts library.
 */

import { codes } from 'currency-codes-ts';

// Set cache for O(1) lookups (initialized immediately)
const _codesSetCache = new Set<string>(codes());

/**
 * Type guard for runtime validation of ISO 4217 currency codes
 */
export function isCurrencyCode(value: unknown): value is string {
  if (typeof value !== 'string') return false;
  return _codesSetCache.has(value);
}
