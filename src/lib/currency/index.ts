/**
 * Currency Module - Public API
 *
 * Import everything from '@/lib/currency' rather than individual files.
 *
 * @example
 * import { isCurrencyCode, formatFixed } from '@/lib/currency';
 */

// =============================================================================
// Types
// =============================================================================

export { isCurrencyCode } from './types';

// =============================================================================
// Formatting
// =============================================================================

export { formatFixed, formatConvertedAmount } from './format';

// =============================================================================
// Validation
// =============================================================================

export { isValidCurrencyFormat, assertCurrencyCode, isValidRate } from './validation';
