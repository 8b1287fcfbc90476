/**
 * GF(2^8) arithmetic over the primitive polynomial 301
 *
 * Multiplication goes through discrete log/antilog tables generated once at
 * module load. Addition and subtraction are both XOR.
 */

import type { FieldElement, FiniteField } from '@symcode/types'
import { ECC_ERRORS, InvalidArgumentError } from '@symcode/types'
import { FIELD_ORDER, FIELD_POLYNOMIAL, FIELD_SIZE } from './config'

/** Marks the zero element, which has no logarithm */
const LOG_UNDEFINED = -1

const GF_ANTILOG = new Uint8Array(FIELD_ORDER)
const GF_LOG = new Int16Array(FIELD_SIZE)

;(function initGF() {
  GF_LOG[0] = LOG_UNDEFINED
  let x = 1
  for (let i = 0; i < FIELD_ORDER; i++) {
    GF_ANTILOG[i] = x
    GF_LOG[x] = i
    x <<= 1
    if (x & FIELD_SIZE) {
      x ^= FIELD_POLYNOMIAL
    }
  }
})()

/**
 * Throw unless value is an integer in [0, 255]
 */
export function assertFieldElement(value: number, name = 'value'): void {
  if (!Number.isInteger(value) || value < 0 || value >= FIELD_SIZE) {
    throw new InvalidArgumentError(
      ECC_ERRORS.FIELD_ELEMENT_OUT_OF_RANGE,
      `${name} must be an integer in [0, ${FIELD_SIZE - 1}]; got ${value}`,
      { [name]: value },
    )
  }
}

function assertExponent(exponent: number): void {
  if (!Number.isSafeInteger(exponent) || exponent < 0) {
    throw new InvalidArgumentError(
      ECC_ERRORS.EXPONENT_INVALID,
      `Exponent must be a non-negative integer; got ${exponent}`,
      { exponent },
    )
  }
}

/** Addition in GF(2^8): XOR */
export function gfAdd(a: FieldElement, b: FieldElement): FieldElement {
  assertFieldElement(a, 'a')
  assertFieldElement(b, 'b')
  return a ^ b
}

/** Multiplication via log/antilog; zero is checked before any table read */
export function gfMultiply(a: FieldElement, b: FieldElement): FieldElement {
  assertFieldElement(a, 'a')
  assertFieldElement(b, 'b')
  if (a === 0 || b === 0) return 0
  return GF_ANTILOG[(GF_LOG[a] + GF_LOG[b]) % FIELD_ORDER]
}

/**
 * Exponentiation by square-and-multiply.
 *
 * Equal to multiplying `a` by itself `n - 1` times; `a^0` is 1 for every `a`,
 * including zero.
 */
export function gfPow(a: FieldElement, n: number): FieldElement {
  assertFieldElement(a, 'a')
  assertExponent(n)
  let base = a
  let exp = n
  let result = 1
  while (exp > 0) {
    if (exp % 2 === 1) result = gfMultiply(result, base)
    base = gfMultiply(base, base)
    exp = Math.floor(exp / 2)
  }
  return result
}

/** Discrete logarithm in [0, 254] */
export function gfLog(a: FieldElement): number {
  assertFieldElement(a, 'a')
  if (a === 0) {
    throw new InvalidArgumentError(
      ECC_ERRORS.ZERO_HAS_NO_LOG,
      'The zero element has no logarithm',
    )
  }
  return GF_LOG[a]
}

/** Element `2^exponent`, exponent reduced modulo 255 */
export function gfAntilog(exponent: number): FieldElement {
  if (!Number.isSafeInteger(exponent)) {
    throw new InvalidArgumentError(
      ECC_ERRORS.EXPONENT_INVALID,
      `Exponent must be an integer; got ${exponent}`,
      { exponent },
    )
  }
  return GF_ANTILOG[((exponent % FIELD_ORDER) + FIELD_ORDER) % FIELD_ORDER]
}

/**
 * The Data Matrix field as a FiniteField
 */
export const gf256 = {
  add: gfAdd,
  multiply: gfMultiply,
  power: gfPow,
  log: gfLog,
  antilog: gfAntilog,
  getSize: () => FIELD_SIZE,
} satisfies FiniteField
