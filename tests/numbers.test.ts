import { describe, it, expect } from 'vitest'
import { expandExponent, formatNumber, isNumericString, parseNumericString } from '../src/index.js'

describe('formatNumber', () => {
  it('keeps plain decimals', () => {
    expect(formatNumber(3)).toBe('3')
    expect(formatNumber(-127.8)).toBe('-127.8')
    expect(formatNumber(0.25)).toBe('0.25')
  })

  it('never uses exponent notation', () => {
    expect(formatNumber(1e21)).toBe('1000000000000000000000')
    expect(formatNumber(1.5e-7)).toBe('0.00000015')
  })

  it('renders negative zero as 0', () => {
    expect(formatNumber(-0)).toBe('0')
  })
})

describe('expandExponent', () => {
  it('moves the decimal point', () => {
    expect(expandExponent('-1.2780E+2')).toBe('-127.8')
    expect(expandExponent('2.5e3')).toBe('2500')
    expect(expandExponent('4e-2')).toBe('0.04')
  })

  it('passes other text through', () => {
    expect(expandExponent('12.5')).toBe('12.5')
    expect(expandExponent('abc')).toBe('abc')
  })
})

describe('isNumericString', () => {
  it('accepts decimal literals', () => {
    expect(isNumericString('27')).toBe(true)
    expect(isNumericString('27.0')).toBe(true)
    expect(isNumericString('-3')).toBe(true)
    expect(isNumericString('.5')).toBe(true)
    expect(isNumericString('1e3')).toBe(true)
  })

  it('rejects everything else', () => {
    expect(isNumericString('')).toBe(false)
    expect(isNumericString(' 27')).toBe(false)
    expect(isNumericString('0x1A')).toBe(false)
    expect(isNumericString('27abc')).toBe(false)
  })

  it('parses to NaN when not numeric', () => {
    expect(parseNumericString('42.5')).toBe(42.5)
    expect(parseNumericString('abc')).toBeNaN()
  })
})
