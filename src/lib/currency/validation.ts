/**
 * Currency Validation
 *
 * Runtime validation utilities for currency codes and rates.
 * Used at system boundaries (API payloads, configuration).
 */

import { isCurrencyCode } from './types';

/**
 * Check if a currency code format is valid (3 uppercase letters)
 * This is a quick syntactic check, not a semantic ISO 4217 validation
 */
export function isValidCurrencyFormat(value: string): boolean {
  return /^[A-Z]{3}$/.test(value);
}

/**
 * Assert that a value is a valid ISO 4217 currency code
 * Throws if invalid
 */
export function assertCurrencyCode(value: unknown): asserts value is string {
  if (!isCurrencyCode(value)) {
    throw new Error(`Invalid currency code: ${String(value)}`);
  }
}

/**
 * A usable rate is a finite, non-negative number (0 = not yet fetched)
 */
export function isValidRate(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}
