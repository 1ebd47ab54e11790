import { describe, it, expect } from 'vitest'
import { formatNumber, DEFAULT_PRECISION } from '../../../src/utils/format'

describe('formatNumber', () => {
  it('prints integers in full', () => {
    expect(formatNumber(600)).toBe('600')
    expect(formatNumber(-80)).toBe('-80')
    expect(formatNumber(1234567)).toBe('1234567')
  })

  it('rounds to two fraction digits by default', () => {
    expect(DEFAULT_PRECISION).toBe(2)
    expect(formatNumber(2 / 3)).toBe('0.67')
  })

  it('honours an explicit precision', () => {
    expect(formatNumber(2 / 3, 4)).toBe('0.6667')
    expect(formatNumber(2.5, 0)).toBe('3')
  })

  it('drops trailing zeros', () => {
    expect(formatNumber(4.9)).toBe('4.9')
    expect(formatNumber(1.5, 4)).toBe('1.5')
    expect(formatNumber(100.001)).toBe('100')
  })

  it('never prints negative zero', () => {
    expect(formatNumber(-0)).toBe('0')
    expect(formatNumber(-0.001)).toBe('0')
  })
})
