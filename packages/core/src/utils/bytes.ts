/**
 * Byte formatting utilities
 *
 * Render byte sequences the way the command line prints them
 */

import { bytesToHex, hexToBytes, isHex } from 'viem'

/**
 * Output formats for byte sequences
 */
export type ByteFormat = 'decimal' | 'hex'

/**
 * Comma-separated decimal rendering, e.g. `114,25,5,88,102`
 */
export function toDecimalList(bytes: ArrayLike<number>): string {
  return Array.from(bytes).join(',')
}

/**
 * Render bytes in the requested format
 */
export function formatBytes(
  bytes: ArrayLike<number>,
  format: ByteFormat,
): string {
  if (format === 'hex') {
    return bytesToHex(Uint8Array.from(bytes))
  }
  return toDecimalList(bytes)
}

/**
 * Parse a `0x`-prefixed hex string into bytes, or undefined if malformed
 */
export function parseHexBytes(value: string): Uint8Array | undefined {
  const prefixed = value.startsWith('0x') ? value : `0x${value}`
  if (!isHex(prefixed, { strict: true }) || prefixed.length % 2 !== 0) {
    return undefined
  }
  return hexToBytes(prefixed)
}
