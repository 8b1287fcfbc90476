import { createEnvSchema, loadEnvVariables } from '@symcode/core'
import type { Safe } from '@symcode/types'
import { z } from 'zod'

export const cliEnvSchema = createEnvSchema({
  SYMCODE_OUTPUT_FORMAT: z.enum(['decimal', 'hex']).default('decimal'),
})

export type CliEnv = z.infer<typeof cliEnvSchema>

export function loadCliEnv(envPath?: string): Safe<CliEnv> {
  return loadEnvVariables(cliEnvSchema, envPath)
}
