/**
 * Turn command line input into codewords
 */

import { readFileSync } from 'node:fs'
import { parseHexBytes } from '@symcode/core'
import { safeError, safeResult, type Safe } from '@symcode/types'
import { tryit } from 'radash'

/** Latch to the upper half of the ASCII table */
const UPPER_SHIFT = 235

/** Offset of a two-digit pair codeword */
const DIGIT_PAIR_BASE = 130

function isDigit(code: number): boolean {
  return code >= 48 && code <= 57
}

/**
 * Data Matrix ASCII encodation.
 *
 * Two consecutive digits become one codeword (130 + pair value), other
 * characters 0-127 their code + 1, and 128-255 an upper shift followed by
 * code - 127.
 */
export function asciiCodewords(text: string): Safe<number[]> {
  const codewords: number[] = []
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i)
    const next = i + 1 < text.length ? text.charCodeAt(i + 1) : -1
    if (isDigit(code) && isDigit(next)) {
      codewords.push(DIGIT_PAIR_BASE + (code - 48) * 10 + (next - 48))
      i++
    } else if (code < 128) {
      codewords.push(code + 1)
    } else if (code < 256) {
      codewords.push(UPPER_SHIFT, code - 127)
    } else {
      return safeError(
        new Error(
          `Character ${JSON.stringify(text[i])} at ${i} cannot be encoded as ASCII`,
        ),
      )
    }
  }
  return safeResult(codewords)
}

/**
 * Parse byte arguments: decimal values separated by commas or spaces, or a
 * single hex string with a 0x prefix
 */
export function parseByteArguments(args: string[]): Safe<Uint8Array> {
  const joined = args.join(' ').trim()
  if (joined.startsWith('0x')) {
    const bytes = parseHexBytes(joined)
    if (!bytes) {
      return safeError(new Error(`Invalid hex byte string: ${joined}`))
    }
    return safeResult(bytes)
  }

  const tokens = joined.split(/[\s,]+/).filter((token) => token.length > 0)
  const bytes = new Uint8Array(tokens.length)
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i]
    const value = Number(token)
    if (!/^\d+$/.test(token) || value > 255) {
      return safeError(new Error(`Invalid byte value: ${token}`))
    }
    bytes[i] = value
  }
  return safeResult(bytes)
}

/**
 * Read a file's raw bytes as data codewords
 */
export function readByteFile(path: string): Safe<Uint8Array> {
  const [error, contents] = tryit((file: string) => readFileSync(file))(path)
  if (error) {
    return safeError(new Error(`Cannot read ${path}: ${error.message}`))
  }
  return safeResult(new Uint8Array(contents))
}
