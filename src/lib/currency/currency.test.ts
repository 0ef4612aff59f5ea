import { describe, it, expect } from 'vitest'
import {
  assertCurrencyCode,
  formatConvertedAmount,
  formatFixed,
  isCurrencyCode,
  isValidCurrencyFormat,
  isValidRate,
} from '@/lib/currency'

describe('currency', () => {
  describe('isCurrencyCode', () => {
    it('accepts ISO 4217 codes', () => {
      expect(isCurrencyCode('TWD')).toBe(true)
      expect(isCurrencyCode('JPY')).toBe(true)
    })

    it('rejects other values', () => {
      expect(isCurrencyCode('twd')).toBe(false)
      expect(isCurrencyCode('QQQ')).toBe(false)
      expect(isCurrencyCode(42)).toBe(false)
      expect(isCurrencyCode(null)).toBe(false)
    })
  })

  it('asserts currency codes', () => {
    expect(() => assertCurrencyCode('EUR')).not.toThrow()
    expect(() => assertCurrencyCode('QQQ')).toThrow('Invalid currency code: QQQ')
  })

  it('checks the code format', () => {
    expect(isValidCurrencyFormat('ABC')).toBe(true)
    expect(isValidCurrencyFormat('AB')).toBe(false)
    expect(isValidCurrencyFormat('abc')).toBe(false)
    expect(isValidCurrencyFormat('ABCD')).toBe(false)
  })

  it('validates rates', () => {
    expect(isValidRate(0)).toBe(true)
    expect(isValidRate(4.35)).toBe(true)
    expect(isValidRate(-0.1)).toBe(false)
    expect(isValidRate(Infinity)).toBe(false)
    expect(isValidRate(NaN)).toBe(false)
    expect(isValidRate('4.35')).toBe(false)
  })

  describe('formatFixed', () => {
    it('uses two fraction digits by default', () => {
      expect(formatFixed(8)).toBe('8.00')
      expect(formatFixed(1 / 3)).toBe('0.33')
      expect(formatFixed(-3)).toBe('-3.00')
    })

    it('takes a digit count', () => {
      expect(formatFixed(2.5, 0)).toBe('3')
      expect(formatFixed(1 / 8, 3)).toBe('0.125')
    })

    it('spells out non-finite values', () => {
      expect(formatFixed(Infinity)).toBe('Infinity')
      expect(formatFixed(-Infinity)).toBe('-Infinity')
      expect(formatFixed(NaN)).toBe('NaN')
    })
  })

  it('formats converted amounts', () => {
    expect(formatConvertedAmount(430)).toBe('430.00')
    expect(formatConvertedAmount(0)).toBe('0.00')
  })
})
