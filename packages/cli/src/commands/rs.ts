import { logger } from '@symcode/core'
import { encodeCodeword } from '@symcode/ecc'
import { type Safe, safeError, safeResult } from '@symcode/types'
import { Command, Option } from 'commander'
import type { CliEnv } from '../env'
import type { RsOptions } from '../types'
import {
  asciiCodewords,
  parseByteArguments,
  readByteFile,
} from '../utils/input'
import { codewordToJson, renderCodeword } from '../utils/output'
import { parseInteger } from '../utils/parse'
import { findSymbolSize, smallestSquareSymbol } from '../utils/symbol-sizes'

function resolveData(args: string[], options: RsOptions): Safe<ArrayLike<number>> {
  const sources = [
    args.length > 0,
    options.text !== undefined,
    options.file !== undefined,
  ].filter(Boolean).length
  if (sources > 1) {
    return safeError(
      new Error('Give data as bytes, --text or --file, not several at once'),
    )
  }
  if (options.text !== undefined) {
    return asciiCodewords(options.text)
  }
  if (options.file !== undefined) {
    return readByteFile(options.file)
  }
  const [error, bytes] = parseByteArguments(args)
  if (error) {
    return safeError(error)
  }
  if (bytes.length === 0) {
    return safeError(new Error('No data given'))
  }
  return safeResult(bytes)
}

function resolveSizes(
  dataLength: number,
  options: RsOptions,
): Safe<{ dataSize: number; eccSize: number }> {
  if (options.symbol !== undefined) {
    const symbol = findSymbolSize(options.symbol)
    if (!symbol) {
      return safeError(new Error(`Unknown symbol size: ${options.symbol}`))
    }
    return safeResult({
      dataSize: options.dataSize ?? symbol.dataSize,
      eccSize: options.eccSize ?? symbol.eccSize,
    })
  }

  if (options.dataSize !== undefined && options.eccSize !== undefined) {
    return safeResult({ dataSize: options.dataSize, eccSize: options.eccSize })
  }
  if (options.dataSize !== undefined || options.eccSize !== undefined) {
    return safeError(
      new Error('--data-size and --ecc-size must be given together'),
    )
  }

  const symbol = smallestSquareSymbol(dataLength)
  if (!symbol) {
    return safeError(
      new Error(`No single-block symbol holds ${dataLength} codewords`),
    )
  }
  return safeResult({ dataSize: symbol.dataSize, eccSize: symbol.eccSize })
}

/**
 * Encode data into a Reed-Solomon protected codeword and render it
 */
export function runRs(
  args: string[],
  options: RsOptions,
  env: CliEnv,
): Safe<string[]> {
  const [dataError, data] = resolveData(args, options)
  if (dataError) {
    return safeError(dataError)
  }

  const [sizeError, sizes] = resolveSizes(data.length, options)
  if (sizeError) {
    return safeError(sizeError)
  }

  const [encodeError, encoded] = encodeCodeword(
    data,
    sizes.dataSize,
    sizes.eccSize,
  )
  if (encodeError) {
    return safeError(encodeError)
  }

  if (options.json) {
    return safeResult([
      codewordToJson(encoded, sizes.dataSize, sizes.eccSize),
    ])
  }
  return safeResult(
    renderCodeword(encoded, options.format ?? env.SYMCODE_OUTPUT_FORMAT),
  )
}

export function createRsCommand(env: CliEnv): Command {
  return new Command('rs')
    .description('Pad data and append Reed-Solomon error correction bytes')
    .argument('[bytes...]', 'Data codewords, e.g. "142,164,186" or 0x8ea4ba')
    .option('-t, --text <text>', 'Encode text with Data Matrix ASCII encodation')
    .option('-f, --file <path>', 'Use the raw bytes of a file as data')
    .option('-s, --symbol <size>', 'Symbol size preset, e.g. 10x10 or 8x18')
    .option('--data-size <n>', 'Data capacity including padding', parseInteger)
    .option('--ecc-size <n>', 'Number of error correction bytes', parseInteger)
    .addOption(
      new Option('--format <format>', 'Byte output format').choices([
        'decimal',
        'hex',
      ]),
    )
    .option('--json', 'Output the result as JSON')
    .action((bytes: string[], options: RsOptions) => {
      const [error, lines] = runRs(bytes, options, env)
      if (error) {
        logger.error('Failed to encode codeword:', error)
        process.exit(1)
      }
      console.log(lines.join('\n'))
    })
}
