import { ECC_ERRORS, InvalidArgumentError } from '@symcode/types'
import { describe, expect, it } from 'vitest'
import {
  bchParamsSchema,
  eccSizeSchema,
  parseArgument,
  validateBytes,
} from '../validation'

describe('parseArgument', () => {
  it('returns the parsed value', () => {
    expect(
      parseArgument(eccSizeSchema, 5, ECC_ERRORS.ECC_SIZE_NOT_POSITIVE, 'eccSize'),
    ).toEqual([undefined, 5])
  })

  it('wraps zod issues in an InvalidArgumentError', () => {
    const [error] = parseArgument(
      eccSizeSchema,
      0,
      ECC_ERRORS.ECC_SIZE_NOT_POSITIVE,
      'eccSize',
    )
    expect(error).toBeInstanceOf(InvalidArgumentError)
    expect(error?.name).toBe('InvalidArgumentError')
    expect(error?.code).toBe(ECC_ERRORS.ECC_SIZE_NOT_POSITIVE)
    expect(error?.message).toBe('Invalid eccSize: Number must be greater than 0')
    expect(error?.context).toEqual({ eccSize: 0 })
  })

  it('prefixes object issues with their path', () => {
    const [error] = parseArgument(
      bchParamsSchema,
      { value: 1, valueWidth: 11, polynomial: 1335, polynomialWidth: 11 },
      ECC_ERRORS.BCH_WIDTH_INVALID,
      'bchParams',
    )
    expect(error?.message).toBe(
      'Invalid bchParams: polynomialWidth: polynomialWidth must be greater than valueWidth',
    )
  })
})

describe('validateBytes', () => {
  it('copies valid bytes into a Uint8Array', () => {
    const [error, bytes] = validateBytes([0, 128, 255], 'data')
    expect(error).toBeUndefined()
    expect(bytes).toEqual(new Uint8Array([0, 128, 255]))
  })

  it('reports the first invalid index', () => {
    const [error] = validateBytes([1, 2, -4, 900], 'codeword')
    expect(error?.context).toEqual({ index: 2, value: -4 })
  })
})
