/**
 * Render results for the terminal
 */

import { type ByteFormat, formatBytes } from '@symcode/core'
import type { EncodedCodeword, FactorTable } from '@symcode/ecc'

export function renderCodeword(
  encoded: EncodedCodeword,
  format: ByteFormat,
): string[] {
  return [
    `data bytes: ${formatBytes(encoded.data, format)}`,
    `pad bytes: ${formatBytes(encoded.padding, format)}`,
    `ecc bytes: ${formatBytes(encoded.ecc, format)}`,
    `codeword: ${formatBytes(encoded.codeword, format)}`,
  ]
}

export function codewordToJson(
  encoded: EncodedCodeword,
  dataSize: number,
  eccSize: number,
): string {
  return JSON.stringify({
    dataSize,
    eccSize,
    data: Array.from(encoded.data),
    padding: Array.from(encoded.padding),
    ecc: Array.from(encoded.ecc),
    codeword: Array.from(encoded.codeword),
  })
}

export function renderFactors(factors: FactorTable, format: ByteFormat): string {
  return formatBytes(factors, format)
}

export interface BchRow {
  value: number
  remainder: number
  codeword: number
}

export function renderBchRow(row: BchRow): string {
  return `value=${row.value} remainder=${row.remainder} codeword=${row.codeword}`
}
