import { config as dotenvConfig } from 'dotenv'
import { z } from 'zod'
import { LOG_LEVELS } from './logger'

// Base environment schema with common variables
export const baseEnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
})

export type BaseEnv = z.infer<typeof baseEnvSchema>

/**
 * Environment of the HRM tools
 * HRM_MAX_STEPS bounds every IO case when the CLI is not given --max-steps
 */
export const hrmEnvSchema = baseEnvSchema.extend({
  HRM_MAX_STEPS: z.coerce.number().int().positive().optional(),
})

export type HrmEnv = z.infer<typeof hrmEnvSchema>

/**
 * Load and validate environment variables
 * @param schema - Zod schema to validate against
 * @param envPath - Optional path to .env file
 * @returns Validated environment variables
 */
export function loadEnvVariables<T extends z.ZodTypeAny>(
  schema: T,
  envPath?: string,
): z.infer<T> {
  // Load environment variables from .env file
  dotenvConfig({ path: envPath })

  // Validate and parse environment variables
  return schema.parse(process.env)
}

/**
 * Load HRM environment variables
 * @param envPath - Optional path to .env file
 */
export function loadHrmEnv(envPath?: string): HrmEnv {
  return loadEnvVariables(hrmEnvSchema, envPath)
}
