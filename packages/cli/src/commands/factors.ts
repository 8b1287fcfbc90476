import { logger } from '@symcode/core'
import { rsFactorTable } from '@symcode/ecc'
import { type Safe, safeError, safeResult } from '@symcode/types'
import { Command, Option } from 'commander'
import type { CliEnv } from '../env'
import type { GlobalOptions } from '../types'
import { renderFactors } from '../utils/output'
import { parseInteger } from '../utils/parse'

/**
 * Render the generator polynomial factor table for `eccSize`
 */
export function runFactors(
  eccSize: number,
  options: GlobalOptions,
  env: CliEnv,
): Safe<string[]> {
  const [error, factors] = rsFactorTable(eccSize)
  if (error) {
    return safeError(error)
  }
  if (options.json) {
    return safeResult([JSON.stringify({ eccSize, factors })])
  }
  return safeResult([
    renderFactors(factors, options.format ?? env.SYMCODE_OUTPUT_FORMAT),
  ])
}

export function createFactorsCommand(env: CliEnv): Command {
  return new Command('factors')
    .description('Print the Reed-Solomon factor table for an ecc length')
    .argument('<eccSize>', 'Number of error correction bytes', parseInteger)
    .addOption(
      new Option('--format <format>', 'Byte output format').choices([
        'decimal',
        'hex',
      ]),
    )
    .option('--json', 'Output the result as JSON')
    .action((eccSize: number, options: GlobalOptions) => {
      const [error, lines] = runFactors(eccSize, options, env)
      if (error) {
        logger.error('Failed to build factor table:', error)
        process.exit(1)
      }
      console.log(lines.join('\n'))
    })
}
