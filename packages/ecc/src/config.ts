/**
 * Error-correction configuration constants.
 *
 * Reed-Solomon over GF(2^8) as used by Data Matrix (ECC 200), and the BCH
 * format-information code used by QR-style symbols.
 */

/** Primitive polynomial of the field, x^8 + x^5 + x^3 + x^2 + 1 */
export const FIELD_POLYNOMIAL = 301

/** Number of elements in GF(2^8) */
export const FIELD_SIZE = 256

/** Order of the multiplicative group; exponents are reduced modulo this */
export const FIELD_ORDER = 255

/** Primitive element whose powers are the generator polynomial roots */
export const GENERATOR_ROOT = 2

/** First pad byte after the data */
export const PAD_SENTINEL = 129

/** Constants of the 253-state pad randomising algorithm */
export const PAD_MULTIPLIER = 149
export const PAD_MODULUS = 253
export const PAD_OFFSET = 130
export const PAD_RANGE = 254

/** QR format information: 5 data bits protected by BCH(15,5) */
export const FORMAT_INFO_BCH = {
  polynomial: 1335,
  polynomialWidth: 11,
  valueWidth: 5,
} as const

/** Widest shifted register whose value stays exact as a number */
export const MAX_BCH_REGISTER_BITS = 53

/** Widest value for which a full remainder table is built */
export const MAX_BCH_TABLE_WIDTH = 16
