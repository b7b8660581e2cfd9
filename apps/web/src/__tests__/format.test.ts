import { describe, expect, it } from 'vitest'
import { formatCurrency, formatDate, formatNumber } from '../lib/format'

describe('format', () => {
  it('formats average prices with cents', () => {
    expect(formatCurrency(12345.678)).toBe('$12,345.68')
    expect(formatCurrency(9000)).toBe('$9,000.00')
  })

  it('formats counts with thousands separators', () => {
    expect(formatNumber(426880)).toBe('426,880')
    expect(formatNumber(0)).toBe('0')
  })

  it('formats load timestamps', () => {
    expect(formatDate('2024-01-05T10:30:00')).toBe('Jan 5, 2024 10:30')
  })

  it('renders a dash for missing values', () => {
    expect(formatCurrency(null)).toBe('—')
    expect(formatNumber(undefined)).toBe('—')
    expect(formatDate(null)).toBe('—')
  })
})
