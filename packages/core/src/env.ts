import { safeError, safeResult, type Safe } from '@symcode/types'
import { config as dotenvConfig } from 'dotenv'
import { z } from 'zod'

export const baseEnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error'])
    .default('info'),
})

/**
 * Load `.env` into process.env, then validate `source` against `schema`.
 * Each failing variable becomes one `NAME: message` part of the error.
 */
export function loadEnvVariables<T extends z.ZodTypeAny>(
  schema: T,
  envPath?: string,
  source: NodeJS.ProcessEnv = process.env,
): Safe<z.infer<T>> {
  dotenvConfig({ path: envPath })

  const result = schema.safeParse(source)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    return safeError(new Error(`Invalid environment: ${issues}`))
  }
  return safeResult(result.data)
}

/**
 * Extend the base schema with package-specific variables
 */
export function createEnvSchema<T extends z.ZodRawShape>(additionalSchema: T) {
  return baseEnvSchema.extend(additionalSchema)
}
