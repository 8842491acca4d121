import { describe, it, expect } from 'vitest'
import { formatChange, formatCurrency, formatNumber, formatUnitValue } from '@/lib/utils/format'

describe('formatCurrency', () => {
  it('abbreviates and keeps the sign in front', () => {
    expect(formatCurrency(91.2e12)).toBe('$91.20T')
    expect(formatCurrency(-1500)).toBe('-$1.50K')
    expect(formatCurrency(999)).toBe('$999.00')
  })
})

describe('formatUnitValue', () => {
  it('formats per unit code', () => {
    expect(formatUnitValue(21.2, 'trillion_usd')).toBe('$21.20T')
    expect(formatUnitValue(4.33, 'percent')).toBe('4.33%')
    expect(formatUnitValue(122.6, 'percent_of_gdp')).toBe('123%')
    expect(formatUnitValue(51.24, 'pmi')).toBe('51.2')
    expect(formatUnitValue(3_500_000, 'national_currency')).toBe('3,500,000')
    expect(formatUnitValue(-0.5, 'index')).toBe('-0.50')
  })

  it('shows a dash for a missing value', () => {
    expect(formatUnitValue(null, 'percent')).toBe('—')
    expect(formatUnitValue(undefined, 'index')).toBe('—')
  })

  it('groups thousands', () => {
    expect(formatNumber(1234.5, 1)).toBe('1,234.5')
  })
})

describe('formatChange', () => {
  it('signs the change and marks percentage points', () => {
    expect(formatChange(0.25, 'percent')).toBe('+0.25pp')
    expect(formatChange(-1, 'pmi', 1)).toBe('-1.0')
    expect(formatChange(0, 'index')).toBe('0.00')
    expect(formatChange(null, 'index')).toBe('—')
  })
})
