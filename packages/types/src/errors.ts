/**
 * Error constants for the error-correction packages
 *
 * Every failure is a caller contract violation, so there is a single error
 * class. The code identifies which argument check failed.
 */

export const ECC_ERRORS = {
  FIELD_ELEMENT_OUT_OF_RANGE: 'field_element_out_of_range',
  EXPONENT_INVALID: 'exponent_invalid',
  ZERO_HAS_NO_LOG: 'zero_has_no_log',
  ECC_SIZE_NOT_POSITIVE: 'ecc_size_not_positive',
  DATA_SIZE_NOT_POSITIVE: 'data_size_not_positive',
  DATA_EXCEEDS_TARGET: 'data_exceeds_target',
  EMPTY_CODEWORD: 'empty_codeword',
  EMPTY_FACTOR_TABLE: 'empty_factor_table',
  FACTOR_LENGTH_MISMATCH: 'factor_length_mismatch',
  BCH_WIDTH_INVALID: 'bch_width_invalid',
  BCH_VALUE_TOO_WIDE: 'bch_value_too_wide',
  BCH_POLYNOMIAL_WIDTH_MISMATCH: 'bch_polynomial_width_mismatch',
  BCH_REGISTER_TOO_WIDE: 'bch_register_too_wide',
} as const

export type EccErrorCode = (typeof ECC_ERRORS)[keyof typeof ECC_ERRORS]

/**
 * Raised (or returned in a Safe tuple) when a caller passes malformed sizes,
 * mismatched lengths or out-of-range field values.
 */
export class InvalidArgumentError extends Error {
  readonly code: EccErrorCode
  readonly context: Record<string, unknown> | undefined

  constructor(
    code: EccErrorCode,
    message: string,
    context?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'InvalidArgumentError'
    this.code = code
    this.context = context
  }
}
