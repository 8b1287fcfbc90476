import { ECC_ERRORS, InvalidArgumentError } from '@symcode/types'
import { describe, expect, it } from 'vitest'
import {
  gf256,
  gfAdd,
  gfAntilog,
  gfLog,
  gfMultiply,
  gfPow,
} from '../gf256'

function iterativePow(a: number, n: number): number {
  if (n === 0) return 1
  let r = a
  for (let i = 0; i < n - 1; i++) r = gfMultiply(r, a)
  return r
}

describe('GF(2^8) with polynomial 301', () => {
  it('add is XOR', () => {
    expect(gfAdd(0x8e, 0xa4)).toBe(0x8e ^ 0xa4)
    expect(gfAdd(77, 77)).toBe(0)
  })

  it('multiply reduces by the field polynomial', () => {
    expect(gfMultiply(2, 128)).toBe(45)
    expect(gfMultiply(3, 7)).toBe(9)
    expect(gfMultiply(255, 255)).toBe(52)
    expect(gfMultiply(200, 100)).toBe(92)
    expect(gfMultiply(142, 228)).toBe(122)
  })

  it('multiply by zero is zero', () => {
    for (let a = 0; a < 256; a++) {
      expect(gfMultiply(a, 0)).toBe(0)
      expect(gfMultiply(0, a)).toBe(0)
    }
  })

  it('multiply is commutative with identity 1', () => {
    for (let a = 1; a < 256; a++) {
      expect(gfMultiply(a, 1)).toBe(a)
      for (let b = 1; b < 256; b++) {
        expect(gfMultiply(a, b)).toBe(gfMultiply(b, a))
      }
    }
  })

  it('multiply is associative', () => {
    const samples = [1, 2, 3, 29, 45, 128, 142, 200, 255]
    for (const a of samples) {
      for (const b of samples) {
        for (const c of samples) {
          expect(gfMultiply(gfMultiply(a, b), c)).toBe(
            gfMultiply(a, gfMultiply(b, c)),
          )
        }
      }
    }
  })

  it('power matches the definitions for 0, 1 and 3', () => {
    for (let a = 1; a < 256; a++) {
      expect(gfPow(a, 0)).toBe(1)
      expect(gfPow(a, 1)).toBe(a)
      expect(gfPow(a, 3)).toBe(gfMultiply(gfMultiply(a, a), a))
    }
    expect(gfPow(0, 0)).toBe(1)
    expect(gfPow(0, 5)).toBe(0)
  })

  it('power agrees with repeated multiplication', () => {
    for (const a of [2, 3, 5, 142, 255]) {
      for (let n = 0; n <= 300; n += 7) {
        expect(gfPow(a, n)).toBe(iterativePow(a, n))
      }
    }
    expect(gfPow(2, 8)).toBe(45)
    expect(gfPow(2, 255)).toBe(1)
    expect(gfPow(5, 10)).toBe(15)
  })

  it('log and antilog are inverse', () => {
    expect(gfLog(1)).toBe(0)
    expect(gfLog(2)).toBe(1)
    expect(gfAntilog(8)).toBe(45)
    expect(gfAntilog(255)).toBe(1)
    expect(gfAntilog(-1)).toBe(150)
    for (let a = 1; a < 256; a++) {
      expect(gfAntilog(gfLog(a))).toBe(a)
    }
  })

  it('2 generates every non-zero element', () => {
    const seen = new Set<number>()
    for (let i = 0; i < 255; i++) seen.add(gfAntilog(i))
    expect(seen.size).toBe(255)
    expect(seen.has(0)).toBe(false)
  })

  it('rejects out-of-range operands', () => {
    expect(() => gfMultiply(256, 1)).toThrow(InvalidArgumentError)
    expect(() => gfMultiply(1, -1)).toThrow(InvalidArgumentError)
    expect(() => gfMultiply(1.5, 2)).toThrow(InvalidArgumentError)
    expect(() => gfPow(2, -1)).toThrow(InvalidArgumentError)
    expect(() => gfPow(2, 0.5)).toThrow(InvalidArgumentError)
  })

  it('zero has no logarithm', () => {
    let caught: unknown
    try {
      gfLog(0)
    } catch (error) {
      caught = error
    }
    expect(caught).toBeInstanceOf(InvalidArgumentError)
    expect(caught).toMatchObject({ code: ECC_ERRORS.ZERO_HAS_NO_LOG })
  })

  it('exposes the field through the FiniteField interface', () => {
    expect(gf256.getSize()).toBe(256)
    expect(gf256.multiply(2, 128)).toBe(45)
    expect(gf256.power(2, 8)).toBe(45)
  })
})
