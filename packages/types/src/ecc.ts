/**
 * Error-Correction Types
 *
 * Shared types for the Reed-Solomon and BCH encoders used by 2D symbols
 */

import type { InvalidArgumentError } from './errors'
import type { Safe } from './safe'

/**
 * GF(2^8) element, an integer in [0, 255]
 */
export type FieldElement = number

/**
 * Coefficients of the monic generator polynomial of degree `length`, without
 * the implicit leading 1
 */
export type FactorTable = readonly FieldElement[]

/**
 * Byte-valued input accepted by the encoders (Uint8Array, number[], ...)
 */
export type ByteSequence = ArrayLike<number>

/**
 * Finite field operations interface
 */
export interface FiniteField {
  /** Add two field elements (XOR) */
  add(a: FieldElement, b: FieldElement): FieldElement
  /** Multiply two field elements */
  multiply(a: FieldElement, b: FieldElement): FieldElement
  /** Raise a field element to a non-negative integer power */
  power(a: FieldElement, exponent: number): FieldElement
  /** Discrete logarithm of a non-zero element */
  log(a: FieldElement): number
  /** Element for an exponent, reduced modulo the multiplicative order */
  antilog(exponent: number): FieldElement
  /** Number of elements in the field */
  getSize(): number
}

/**
 * Source of generator-polynomial factor tables, keyed by ecc length
 */
export interface FactorTableProvider {
  get(eccSize: number): Safe<FactorTable, InvalidArgumentError>
  has(eccSize: number): boolean
  readonly size: number
}

/**
 * Result of assembling a full codeword
 */
export interface EncodedCodeword {
  /** Caller-supplied payload */
  data: Uint8Array
  /** Deterministic fill appended up to the data size */
  padding: Uint8Array
  /** Reed-Solomon redundancy bytes */
  ecc: Uint8Array
  /** data + padding + ecc */
  codeword: Uint8Array
}

/**
 * BCH remainder parameters
 */
export interface BchParams {
  /** Value to protect */
  value: number
  /** Bit width of value */
  valueWidth: number
  /** Generator polynomial, top bit at polynomialWidth - 1 */
  polynomial: number
  /** Bit width of the generator polynomial */
  polynomialWidth: number
}
