/**
 * Reed-Solomon generator polynomial
 *
 * g(x) = (x + 2^1)(x + 2^2)...(x + 2^n) over GF(2^8). The factor table holds
 * its n low-order coefficients; the leading coefficient is always 1 and is not
 * stored.
 */

import type {
  FactorTable,
  FieldElement,
  FiniteField,
  InvalidArgumentError,
  Safe,
} from '@symcode/types'
import { ECC_ERRORS, safeError, safeResult } from '@symcode/types'
import { GENERATOR_ROOT } from '../config'
import { gf256 } from '../gf256'
import { eccSizeSchema, parseArgument } from '../validation/schemas'

/**
 * Build the factor table for `eccSize` redundancy bytes.
 *
 * The accumulator is multiplied by (x + 2^i) for i = 1..eccSize. On pass i the
 * slot i-1 is touched for the first time and stands for the leading 1 of the
 * previous product, so it is read as 1 rather than its stored 0.
 */
export function buildFactorTable(
  eccSize: number,
  field: FiniteField = gf256,
): Safe<FactorTable, InvalidArgumentError> {
  const [sizeError, size] = parseArgument(
    eccSizeSchema,
    eccSize,
    ECC_ERRORS.ECC_SIZE_NOT_POSITIVE,
    'eccSize',
  )
  if (sizeError) {
    return safeError(sizeError)
  }

  const factors: FieldElement[] = new Array(size).fill(0)
  for (let i = 1; i <= size; i++) {
    const root = field.power(GENERATOR_ROOT, i)
    for (let j = i - 1; j >= 0; j--) {
      const coefficient = j === i - 1 ? 1 : factors[j]
      const lower = j > 0 ? factors[j - 1] : 0
      factors[j] = field.add(field.multiply(coefficient, root), lower)
    }
  }

  return safeResult(Object.freeze(factors))
}
