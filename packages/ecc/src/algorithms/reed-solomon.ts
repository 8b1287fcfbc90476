/**
 * Reed-Solomon redundancy for Data Matrix codewords
 *
 * Synthetic division of the codeword by the generator polynomial. The
 * remainder register is shifted towards index 0 on every input byte, which
 * leaves the redundancy bytes in forward (transmission) order.
 */

import { logger } from '@symcode/core'
import type {
  ByteSequence,
  EncodedCodeword,
  FactorTableProvider,
  Safe,
} from '@symcode/types'
import {
  ECC_ERRORS,
  InvalidArgumentError,
  safeError,
  safeResult,
} from '@symcode/types'
import { gfMultiply } from '../gf256'
import { padCodeword } from '../padding'
import { validateBytes } from '../validation'
import { defaultFactorTableCache } from './factor-cache'

/**
 * Compute the redundancy bytes of `codeword`.
 *
 * For each input byte `d`, with `prev` the register after the previous byte:
 *
 *   t       = d ^ prev[0]
 *   next[j] = t * factors[n-1-j] ^ prev[j+1]   (j < n-1)
 *   next[n-1] = t * factors[0]
 *
 * `eccSize` defaults to the factor table length; passing it checks that the
 * table was built for the expected length.
 */
export function encodeEcc(
  codeword: ByteSequence,
  factors: ByteSequence,
  eccSize: number = factors.length,
): Safe<Uint8Array, InvalidArgumentError> {
  if (codeword.length === 0) {
    return safeError(
      new InvalidArgumentError(
        ECC_ERRORS.EMPTY_CODEWORD,
        'Codeword must contain at least one byte',
      ),
    )
  }
  if (factors.length === 0) {
    return safeError(
      new InvalidArgumentError(
        ECC_ERRORS.EMPTY_FACTOR_TABLE,
        'Factor table must contain at least one coefficient',
      ),
    )
  }
  if (factors.length !== eccSize) {
    return safeError(
      new InvalidArgumentError(
        ECC_ERRORS.FACTOR_LENGTH_MISMATCH,
        `Factor table length (${factors.length}) does not match ecc size (${eccSize})`,
        { factorsLength: factors.length, eccSize },
      ),
    )
  }

  const [codewordError, data] = validateBytes(codeword, 'codeword')
  if (codewordError) {
    return safeError(codewordError)
  }
  const [factorsError, generator] = validateBytes(factors, 'factors')
  if (factorsError) {
    return safeError(factorsError)
  }

  const n = generator.length
  let prev = new Uint8Array(n)
  let next = new Uint8Array(n)

  for (const byte of data) {
    const t = byte ^ prev[0]
    for (let j = 0; j < n; j++) {
      const product = t === 0 ? 0 : gfMultiply(t, generator[n - 1 - j])
      next[j] = j + 1 < n ? product ^ prev[j + 1] : product
    }
    ;[prev, next] = [next, prev]
  }

  return safeResult(prev)
}

/**
 * Pads data, looks up the factor table and appends redundancy
 */
export class ReedSolomonEncoder {
  private readonly factorTables: FactorTableProvider

  constructor(factorTables: FactorTableProvider = defaultFactorTableCache) {
    this.factorTables = factorTables
  }

  /**
   * Encode `data` into a codeword of `dataSize + eccSize` bytes
   */
  encode(
    data: ByteSequence,
    dataSize: number,
    eccSize: number,
  ): Safe<EncodedCodeword, InvalidArgumentError> {
    const [padError, padded] = padCodeword(data, dataSize)
    if (padError) {
      return safeError(padError)
    }

    const [factorsError, factors] = this.factorTables.get(eccSize)
    if (factorsError) {
      return safeError(factorsError)
    }

    const [eccError, ecc] = encodeEcc(padded, factors, eccSize)
    if (eccError) {
      return safeError(eccError)
    }

    logger.debug('Codeword encoded', {
      dataLength: data.length,
      dataSize,
      eccSize,
    })

    const codeword = new Uint8Array(padded.length + ecc.length)
    codeword.set(padded, 0)
    codeword.set(ecc, padded.length)

    return safeResult({
      data: padded.slice(0, data.length),
      padding: padded.slice(data.length),
      ecc,
      codeword,
    })
  }
}

/**
 * Encode with the shared factor table cache, or the one given
 */
export function encodeCodeword(
  data: ByteSequence,
  dataSize: number,
  eccSize: number,
  factorTables: FactorTableProvider = defaultFactorTableCache,
): Safe<EncodedCodeword, InvalidArgumentError> {
  return new ReedSolomonEncoder(factorTables).encode(data, dataSize, eccSize)
}
