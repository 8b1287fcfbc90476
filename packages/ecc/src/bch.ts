/**
 * BCH remainder over GF(2)
 *
 * Binary polynomial long division by XOR. The value is shifted left by
 * pw - 1 bits, then the generator is aligned under each value bit from the
 * top down and subtracted whenever that clears the current leading bit.
 *
 * `test < register` works as the "leading bit cleared" check only because the
 * generator's top bit sits exactly at pw - 1, giving pw - 1 bits of headroom
 * below the value. Other layouts need that check re-derived.
 */

import type { BchParams, Safe } from '@symcode/types'
import {
  ECC_ERRORS,
  InvalidArgumentError,
  safeError,
  safeResult,
} from '@symcode/types'
import {
  FORMAT_INFO_BCH,
  MAX_BCH_REGISTER_BITS,
  MAX_BCH_TABLE_WIDTH,
} from './config'
import { bchParamsSchema, parseArgument } from './validation'

function validateBchParams(
  params: BchParams,
): Safe<BchParams, InvalidArgumentError> {
  const [paramsError, parsed] = parseArgument(
    bchParamsSchema,
    params,
    ECC_ERRORS.BCH_WIDTH_INVALID,
    'bchParams',
  )
  if (paramsError) {
    return safeError(paramsError)
  }

  const { value, valueWidth, polynomial, polynomialWidth } = parsed

  if (valueWidth + polynomialWidth - 1 > MAX_BCH_REGISTER_BITS) {
    return safeError(
      new InvalidArgumentError(
        ECC_ERRORS.BCH_REGISTER_TOO_WIDE,
        `Shifted register needs ${valueWidth + polynomialWidth - 1} bits; at most ${MAX_BCH_REGISTER_BITS} are supported`,
        { valueWidth, polynomialWidth },
      ),
    )
  }

  if (BigInt(value) >> BigInt(valueWidth) !== 0n) {
    return safeError(
      new InvalidArgumentError(
        ECC_ERRORS.BCH_VALUE_TOO_WIDE,
        `Value ${value} does not fit in ${valueWidth} bits`,
        { value, valueWidth },
      ),
    )
  }

  if (BigInt(polynomial) >> BigInt(polynomialWidth - 1) !== 1n) {
    return safeError(
      new InvalidArgumentError(
        ECC_ERRORS.BCH_POLYNOMIAL_WIDTH_MISMATCH,
        `Polynomial ${polynomial} must have its top bit at position ${polynomialWidth - 1}`,
        { polynomial, polynomialWidth },
      ),
    )
  }

  return safeResult(parsed)
}

function divide(params: BchParams): bigint {
  const generator = BigInt(params.polynomial)
  let register = BigInt(params.value) << BigInt(params.polynomialWidth - 1)
  for (let i = params.valueWidth - 1; i >= 0; i--) {
    const test = register ^ (generator << BigInt(i))
    if (test < register) {
      register = test
    }
  }
  return register
}

/**
 * Remainder of `value` (vw bits) shifted by pw - 1, divided by `polynomial`
 * (pw bits). The result is narrower than pw - 1 bits.
 */
export function bchRemainder(
  value: number,
  valueWidth: number,
  polynomial: number,
  polynomialWidth: number,
): Safe<number, InvalidArgumentError> {
  const [error, params] = validateBchParams({
    value,
    valueWidth,
    polynomial,
    polynomialWidth,
  })
  if (error) {
    return safeError(error)
  }
  return safeResult(Number(divide(params)))
}

/**
 * Systematic codeword: the value in the high bits, its remainder below
 */
export function bchCodeword(
  value: number,
  valueWidth: number,
  polynomial: number,
  polynomialWidth: number,
): Safe<number, InvalidArgumentError> {
  const [error, params] = validateBchParams({
    value,
    valueWidth,
    polynomial,
    polynomialWidth,
  })
  if (error) {
    return safeError(error)
  }
  const shifted = BigInt(value) << BigInt(polynomialWidth - 1)
  return safeResult(Number(shifted | divide(params)))
}

/**
 * Remainders for every value in [0, 2^valueWidth)
 */
export function bchTable(
  valueWidth: number,
  polynomial: number,
  polynomialWidth: number,
): Safe<number[], InvalidArgumentError> {
  if (
    !Number.isInteger(valueWidth) ||
    valueWidth < 1 ||
    valueWidth > MAX_BCH_TABLE_WIDTH
  ) {
    return safeError(
      new InvalidArgumentError(
        ECC_ERRORS.BCH_WIDTH_INVALID,
        `Table value width must be an integer in [1, ${MAX_BCH_TABLE_WIDTH}]; got ${valueWidth}`,
        { valueWidth },
      ),
    )
  }

  const remainders: number[] = []
  for (let value = 0; value < 2 ** valueWidth; value++) {
    const [error, remainder] = bchRemainder(
      value,
      valueWidth,
      polynomial,
      polynomialWidth,
    )
    if (error) {
      return safeError(error)
    }
    remainders.push(remainder)
  }
  return safeResult(remainders)
}

/**
 * BCH(15,5) remainder of a 5-bit QR format-information value
 */
export function formatInfoRemainder(
  value: number,
): Safe<number, InvalidArgumentError> {
  return bchRemainder(
    value,
    FORMAT_INFO_BCH.valueWidth,
    FORMAT_INFO_BCH.polynomial,
    FORMAT_INFO_BCH.polynomialWidth,
  )
}
