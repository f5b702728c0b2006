import { config as dotenvConfig } from 'dotenv'
import { z } from 'zod'

// Base environment schema with common variables
export const baseEnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error'])
    .default('info'),
})

/**
 * Load and validate environment variables
 * @param schema - Zod schema to validate against
 * @param envPath - Optional path to .env file
 * @param source - Variables to validate, `process.env` after loading the .env file by default
 */
export function loadEnvVariables<T extends z.ZodTypeAny>(
  schema: T,
  envPath?: string,
  source?: Record<string, string | undefined>,
): z.infer<T> {
  if (source === undefined) {
    dotenvConfig({ path: envPath })
  }

  return schema.parse(source ?? process.env)
}

/**
 * Create a complete environment schema by extending the base schema
 */
export function createEnvSchema<T extends z.ZodRawShape>(additionalSchema: T) {
  return baseEnvSchema.extend(additionalSchema)
}
