/**
 * Parameter schemas for the caller-facing operations
 */

import type { EccErrorCode, Safe } from '@symcode/types'
import {
  ECC_ERRORS,
  InvalidArgumentError,
  safeError,
  safeResult,
} from '@symcode/types'
import { z } from 'zod'
import { FIELD_SIZE } from '../config'

export const fieldElementSchema = z
  .number()
  .int()
  .min(0)
  .max(FIELD_SIZE - 1)

export const eccSizeSchema = z.number().int().positive()

export const dataSizeSchema = z.number().int().positive()

export const bitWidthSchema = z.number().int().positive()

export const bchParamsSchema = z
  .object({
    value: z.number().int().nonnegative(),
    valueWidth: bitWidthSchema,
    polynomial: z.number().int().positive(),
    polynomialWidth: bitWidthSchema,
  })
  .refine((params) => params.polynomialWidth > params.valueWidth, {
    message: 'polynomialWidth must be greater than valueWidth',
    path: ['polynomialWidth'],
  })

/**
 * Parse a value against a schema, turning zod issues into an
 * InvalidArgumentError with the given code
 */
export function parseArgument<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  code: EccErrorCode,
  label: string,
): Safe<z.infer<T>, InvalidArgumentError> {
  const result = schema.safeParse(value)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join('.')}: ${issue.message}`
          : issue.message,
      )
      .join('; ')
    return safeError(
      new InvalidArgumentError(code, `Invalid ${label}: ${issues}`, {
        [label]: value,
      }),
    )
  }
  return safeResult(result.data)
}

/**
 * Check that every entry of a byte sequence is a field element
 */
export function validateBytes(
  bytes: ArrayLike<number>,
  label: string,
): Safe<Uint8Array, InvalidArgumentError> {
  for (let i = 0; i < bytes.length; i++) {
    const value = bytes[i]
    if (!fieldElementSchema.safeParse(value).success) {
      return safeError(
        new InvalidArgumentError(
          ECC_ERRORS.FIELD_ELEMENT_OUT_OF_RANGE,
          `${label}[${i}] must be an integer in [0, ${FIELD_SIZE - 1}]; got ${value}`,
          { index: i, value },
        ),
      )
    }
  }
  return safeResult(Uint8Array.from(bytes))
}
