import { describe, it, expect } from 'vitest'
import { applyScale, decimalsFor, parseRational } from './rational'

describe('parseRational', () => {
  it('reads fractions in lowest terms', () => {
    expect(parseRational('2/20')).toEqual({ numerator: 1, denominator: 10 })
    expect(parseRational(' -1 / 4 ')).toEqual({ numerator: -1, denominator: 4 })
  })

  it('reads decimals exactly', () => {
    expect(parseRational('0.1')).toEqual({ numerator: 1, denominator: 10 })
    expect(parseRational(0.25)).toEqual({ numerator: 1, denominator: 4 })
    expect(parseRational('1000')).toEqual({ numerator: 1000, denominator: 1 })
  })

  it('reads exponent notation, including small numbers', () => {
    expect(parseRational(0.0000001)).toEqual({ numerator: 1, denominator: 10_000_000 })
    expect(parseRational(1.5e-7)).toEqual({ numerator: 3, denominator: 20_000_000 })
    expect(parseRational('2.5E3')).toEqual({ numerator: 2500, denominator: 1 })
  })

  it('rejects a zero denominator and junk', () => {
    expect(parseRational('1/0')).toBeNull()
    expect(parseRational('ten')).toBeNull()
    expect(parseRational('')).toBeNull()
    expect(parseRational(1e300)).toBeNull()
  })
})

describe('decimalsFor', () => {
  it('derives precision from the step size', () => {
    expect(decimalsFor({ numerator: 1, denominator: 1 })).toBe(0)
    expect(decimalsFor({ numerator: 1, denominator: 10 })).toBe(1)
    expect(decimalsFor({ numerator: 1, denominator: 100 })).toBe(2)
    expect(decimalsFor({ numerator: 1, denominator: 4 })).toBe(2)
    expect(decimalsFor({ numerator: 1, denominator: 8 })).toBe(3)
    expect(decimalsFor({ numerator: 1000, denominator: 1 })).toBe(0)
  })

  it('caps repeating fractions', () => {
    expect(decimalsFor({ numerator: 1, denominator: 3 })).toBe(6)
  })
})

describe('applyScale', () => {
  it('multiplies before dividing', () => {
    expect(applyScale(3, { numerator: 1, denominator: 10 })).toBe(0.3)
    expect(applyScale(-55, { numerator: 1, denominator: 10 })).toBe(-5.5)
  })
})
