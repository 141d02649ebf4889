import { describe, expect, test } from 'vitest'
import { Fraction } from '../fraction.js'

describe('Fraction', () => {
  test('keeps values reduced with a positive denominator', () => {
    expect(Fraction.of(2, 4).toString()).toBe('1/2')
    expect(Fraction.of(3, -6).toString()).toBe('-1/2')
    expect(Fraction.of(6, 3).toString()).toBe('2')
  })

  test('adds, subtracts, multiplies and divides exactly', () => {
    expect(Fraction.of(1, 3).add(Fraction.of(1, 6)).toString()).toBe('1/2')
    expect(Fraction.of(1, 3).sub(Fraction.of(1, 2)).toString()).toBe('-1/6')
    expect(Fraction.of(100).mul(Fraction.of(1, 3)).toString()).toBe('100/3')
    expect(Fraction.of(100).div(Fraction.of(3)).mul(Fraction.of(3)).toString()).toBe('100')
  })

  test('rounds half to even', () => {
    expect(Fraction.of(5, 2).roundHalfEven()).toBe(2n)
    expect(Fraction.of(7, 2).roundHalfEven()).toBe(4n)
    expect(Fraction.of(-5, 2).roundHalfEven()).toBe(-2n)
    expect(Fraction.of(-7, 2).roundHalfEven()).toBe(-4n)
    expect(Fraction.of(1, 3).roundHalfEven()).toBe(0n)
    expect(Fraction.of(2, 3).roundHalfEven()).toBe(1n)
    expect(Fraction.of(-2, 3).roundHalfEven()).toBe(-1n)
  })

  test('compares by value', () => {
    expect(Fraction.of(1, 3).compare(Fraction.of(2, 6))).toBe(0)
    expect(Fraction.of(1, 3).compare(Fraction.of(1, 2))).toBe(-1)
    expect(Fraction.of(-1, 3).compare(Fraction.of(-1, 2))).toBe(1)
  })

  test('rejects a zero denominator', () => {
    expect(() => Fraction.of(1, 0)).toThrow(RangeError)
    expect(() => Fraction.of(1).div(Fraction.ZERO)).toThrow('Division by zero')
  })
})
