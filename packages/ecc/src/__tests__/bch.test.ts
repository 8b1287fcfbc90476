import { ECC_ERRORS } from '@symcode/types'
import { describe, expect, it } from 'vitest'
import {
  bchCodeword,
  bchRemainder,
  bchTable,
  formatInfoRemainder,
} from '../bch'

const FORMAT_REMAINDERS = [
  0, 311, 622, 857, 491, 220, 901, 690, 982, 737, 440, 143, 573, 778, 83, 356,
  667, 940, 245, 450, 880, 583, 286, 41, 333, 122, 803, 532, 166, 401, 712,
  1023,
]

/** Remainder of GF(2) polynomial division, for values below 2^31 */
function gf2Mod(value: number, generator: number, width: number): number {
  let remainder = value
  for (let bit = 30; bit >= width - 1; bit--) {
    if ((remainder >> bit) & 1) {
      remainder ^= generator << (bit - (width - 1))
    }
  }
  return remainder
}

describe('bchRemainder', () => {
  it('is zero for a zero value', () => {
    expect(bchRemainder(0, 5, 1335, 11)).toEqual([undefined, 0])
  })

  it('matches the worked divisions', () => {
    // x^3+x^2 quotient, r = x^8+x^6+x^5+x^2
    expect(bchRemainder(15, 5, 1335, 11)).toEqual([undefined, 356])
    // x^3+x+1 quotient, r = x^9+x^7+x^6+x^5+1
    expect(bchRemainder(9, 5, 1335, 11)).toEqual([undefined, 737])
  })

  it('matches the full 5-bit format table', () => {
    for (let value = 0; value < 32; value++) {
      const [error, remainder] = bchRemainder(value, 5, 1335, 11)
      expect(error).toBeUndefined()
      expect(remainder).toBe(FORMAT_REMAINDERS[value])
      expect(remainder).toBeLessThan(2 ** 10)
    }
  })

  it('is linear over XOR', () => {
    for (const [a, b] of [
      [3, 12],
      [7, 21],
      [16, 31],
    ]) {
      const [, ra] = bchRemainder(a, 5, 1335, 11)
      const [, rb] = bchRemainder(b, 5, 1335, 11)
      const [, rab] = bchRemainder(a ^ b, 5, 1335, 11)
      expect(rab).toBe((ra ?? 0) ^ (rb ?? 0))
    }
  })

  it('handles registers wider than 32 bits', () => {
    // x^32 mod (x^32 + 1) = 1
    expect(bchRemainder(1, 1, 2 ** 32 + 1, 33)).toEqual([undefined, 1])
  })

  it('rejects a value wider than its width', () => {
    const [error] = bchRemainder(32, 5, 1335, 11)
    expect(error?.code).toBe(ECC_ERRORS.BCH_VALUE_TOO_WIDE)
    expect(error?.message).toBe('Value 32 does not fit in 5 bits')
  })

  it('rejects a polynomial not as wide as declared', () => {
    const [error] = bchRemainder(1, 5, 1335, 12)
    expect(error?.code).toBe(ECC_ERRORS.BCH_POLYNOMIAL_WIDTH_MISMATCH)
    expect(bchRemainder(1, 5, 1335, 10)[0]?.code).toBe(
      ECC_ERRORS.BCH_POLYNOMIAL_WIDTH_MISMATCH,
    )
  })

  it('rejects a polynomial no wider than the value', () => {
    const [error] = bchRemainder(1, 11, 1335, 11)
    expect(error?.code).toBe(ECC_ERRORS.BCH_WIDTH_INVALID)
  })

  it('rejects negative or fractional arguments', () => {
    expect(bchRemainder(-1, 5, 1335, 11)[0]?.code).toBe(
      ECC_ERRORS.BCH_WIDTH_INVALID,
    )
    expect(bchRemainder(1, 5.5, 1335, 11)[0]?.code).toBe(
      ECC_ERRORS.BCH_WIDTH_INVALID,
    )
  })

  it('rejects registers beyond 53 bits', () => {
    const [error] = bchRemainder(1, 20, 2 ** 34 + 1, 35)
    expect(error?.code).toBe(ECC_ERRORS.BCH_REGISTER_TOO_WIDE)
  })
})

describe('bchCodeword', () => {
  it('places the value above its remainder', () => {
    expect(bchCodeword(15, 5, 1335, 11)).toEqual([undefined, 15716])
    expect(bchCodeword(9, 5, 1335, 11)).toEqual([undefined, 9953])
  })

  it('produces codewords divisible by the generator', () => {
    for (let value = 0; value < 32; value++) {
      const [, codeword] = bchCodeword(value, 5, 1335, 11)
      expect(gf2Mod(codeword ?? -1, 1335, 11)).toBe(0)
      expect((codeword ?? 0) >> 10).toBe(value)
    }
  })
})

describe('bchTable', () => {
  it('lists the 32 format remainders', () => {
    expect(bchTable(5, 1335, 11)).toEqual([undefined, FORMAT_REMAINDERS])
  })

  it('rejects widths outside 1..16', () => {
    expect(bchTable(0, 1335, 11)[0]?.code).toBe(ECC_ERRORS.BCH_WIDTH_INVALID)
    expect(bchTable(17, 2 ** 20 + 1, 21)[0]?.code).toBe(
      ECC_ERRORS.BCH_WIDTH_INVALID,
    )
  })

  it('propagates parameter errors', () => {
    expect(bchTable(5, 1335, 12)[0]?.code).toBe(
      ECC_ERRORS.BCH_POLYNOMIAL_WIDTH_MISMATCH,
    )
  })
})

describe('formatInfoRemainder', () => {
  it('uses the BCH(15,5) generator', () => {
    expect(formatInfoRemainder(15)).toEqual([undefined, 356])
    expect(formatInfoRemainder(31)).toEqual([undefined, 1023])
  })
})
