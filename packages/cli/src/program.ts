import { Command } from 'commander'
import { createBchCommand } from './commands/bch'
import { createFactorsCommand } from './commands/factors'
import { createRsCommand } from './commands/rs'
import type { CliEnv } from './env'

export function createProgram(env: CliEnv): Command {
  return new Command('symcode')
    .description('Error-correction codewords for 2D symbols')
    .version('0.1.0', '-v, --version')
    .addCommand(createRsCommand(env))
    .addCommand(createFactorsCommand(env))
    .addCommand(createBchCommand())
}
