import { logger } from '@symcode/core'
import {
  bchCodeword,
  bchRemainder,
  bchTable,
  FORMAT_INFO_BCH,
} from '@symcode/ecc'
import { type Safe, safeError, safeResult } from '@symcode/types'
import { Command } from 'commander'
import type { BchOptions } from '../types'
import { type BchRow, renderBchRow } from '../utils/output'
import { parseInteger } from '../utils/parse'

function bchRow(
  value: number,
  remainder: number,
  options: BchOptions,
): Safe<BchRow> {
  const [error, codeword] = bchCodeword(
    value,
    options.valueWidth,
    options.poly,
    options.polyWidth,
  )
  if (error) {
    return safeError(error)
  }
  return safeResult({ value, remainder, codeword })
}

function tableRows(options: BchOptions): Safe<BchRow[]> {
  const [tableError, remainders] = bchTable(
    options.valueWidth,
    options.poly,
    options.polyWidth,
  )
  if (tableError) {
    return safeError(tableError)
  }
  const rows: BchRow[] = []
  for (const [value, remainder] of remainders.entries()) {
    const [rowError, row] = bchRow(value, remainder, options)
    if (rowError) {
      return safeError(rowError)
    }
    rows.push(row)
  }
  return safeResult(rows)
}

function singleRow(value: number, options: BchOptions): Safe<BchRow[]> {
  const [remainderError, remainder] = bchRemainder(
    value,
    options.valueWidth,
    options.poly,
    options.polyWidth,
  )
  if (remainderError) {
    return safeError(remainderError)
  }
  const [rowError, row] = bchRow(value, remainder, options)
  if (rowError) {
    return safeError(rowError)
  }
  return safeResult([row])
}

/**
 * Render one BCH remainder, or the table for every value with --all
 */
export function runBch(
  value: number | undefined,
  options: BchOptions,
): Safe<string[]> {
  if (options.all && value !== undefined) {
    return safeError(new Error('Give a value or --all, not both'))
  }
  if (!options.all && value === undefined) {
    return safeError(new Error('Give a value or --all'))
  }

  const [error, rows] =
    value === undefined ? tableRows(options) : singleRow(value, options)
  if (error) {
    return safeError(error)
  }

  if (options.json) {
    return safeResult([JSON.stringify(rows)])
  }
  return safeResult(rows.map(renderBchRow))
}

export function createBchCommand(): Command {
  return new Command('bch')
    .description('Compute BCH remainders for format information fields')
    .argument('[value]', 'Value to protect', parseInteger)
    .option(
      '--value-width <n>',
      'Bit width of the value',
      parseInteger,
      FORMAT_INFO_BCH.valueWidth,
    )
    .option(
      '--poly <n>',
      'Generator polynomial (decimal or 0x hex)',
      parseInteger,
      FORMAT_INFO_BCH.polynomial,
    )
    .option(
      '--poly-width <n>',
      'Bit width of the generator polynomial',
      parseInteger,
      FORMAT_INFO_BCH.polynomialWidth,
    )
    .option('-a, --all', 'Print the remainder of every value')
    .option('--json', 'Output the result as JSON')
    .action((value: number | undefined, options: BchOptions) => {
      const [error, lines] = runBch(value, options)
      if (error) {
        logger.error('Failed to compute BCH remainder:', error)
        process.exit(1)
      }
      console.log(lines.join('\n'))
    })
}
