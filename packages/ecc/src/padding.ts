/**
 * Codeword padding
 *
 * Unused data capacity is filled with the sentinel 129 followed by the
 * 253-state randomised sequence, so the fill never repeats a fixed byte.
 */

import type { ByteSequence, Safe } from '@symcode/types'
import {
  ECC_ERRORS,
  InvalidArgumentError,
  safeError,
  safeResult,
} from '@symcode/types'
import {
  PAD_MODULUS,
  PAD_MULTIPLIER,
  PAD_OFFSET,
  PAD_RANGE,
  PAD_SENTINEL,
} from './config'
import { dataSizeSchema, parseArgument, validateBytes } from './validation'

/**
 * Pad byte for the 0-based codeword position `index`
 */
export function randomizedPadByte(index: number): number {
  const pseudoRandom =
    (((PAD_MULTIPLIER * (index + 1)) % PAD_MODULUS) + PAD_OFFSET) % PAD_RANGE
  return pseudoRandom === 0 ? PAD_RANGE : pseudoRandom
}

/**
 * Extend `data` to exactly `targetDataSize` bytes.
 *
 * Data already at the target size is returned unchanged (as a copy). Longer
 * data is a sizing error and is not truncated.
 */
export function padCodeword(
  data: ByteSequence,
  targetDataSize: number,
): Safe<Uint8Array, InvalidArgumentError> {
  const [sizeError, size] = parseArgument(
    dataSizeSchema,
    targetDataSize,
    ECC_ERRORS.DATA_SIZE_NOT_POSITIVE,
    'targetDataSize',
  )
  if (sizeError) {
    return safeError(sizeError)
  }

  const [bytesError, bytes] = validateBytes(data, 'data')
  if (bytesError) {
    return safeError(bytesError)
  }

  if (bytes.length > size) {
    return safeError(
      new InvalidArgumentError(
        ECC_ERRORS.DATA_EXCEEDS_TARGET,
        `Data length (${bytes.length}) exceeds target data size (${size})`,
        { dataLength: bytes.length, targetDataSize: size },
      ),
    )
  }

  const padded = new Uint8Array(size)
  padded.set(bytes, 0)
  for (let i = bytes.length; i < size; i++) {
    padded[i] = i === bytes.length ? PAD_SENTINEL : randomizedPadByte(i)
  }

  return safeResult(padded)
}
