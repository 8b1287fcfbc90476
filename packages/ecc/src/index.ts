/**
 * Error-correction codewords for 2D symbols
 *
 * Reed-Solomon redundancy over GF(2^8) (Data Matrix) and BCH remainders
 * over GF(2) (QR-style format information).
 */

export type {
  BchParams,
  ByteSequence,
  EncodedCodeword,
  FactorTable,
  FactorTableProvider,
  FieldElement,
  FiniteField,
} from '@symcode/types'
export {
  buildFactorTable,
  defaultFactorTableCache,
  encodeCodeword,
  encodeEcc,
  FactorTableCache,
  type FactorTableCacheOptions,
  ReedSolomonEncoder,
  rsFactorTable,
} from './algorithms'
export { bchCodeword, bchRemainder, bchTable, formatInfoRemainder } from './bch'
export {
  FIELD_ORDER,
  FIELD_POLYNOMIAL,
  FIELD_SIZE,
  FORMAT_INFO_BCH,
  GENERATOR_ROOT,
  PAD_SENTINEL,
} from './config'
export { KNOWN_FACTOR_TABLES } from './data/known-tables'
export {
  assertFieldElement,
  gf256,
  gfAdd,
  gfAntilog,
  gfLog,
  gfMultiply,
  gfPow,
} from './gf256'
export { padCodeword, randomizedPadByte } from './padding'
