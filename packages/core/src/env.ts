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

export type BaseEnv = z.infer<typeof baseEnvSchema>

const positiveInt = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) => Number.parseInt(val, 10))
    .pipe(z.number().int().positive())

// Message VM tuning knobs
export const vmEnvSchema = baseEnvSchema.extend({
  NIPVM_PAGE_CACHE_PAGES: positiveInt('200'),
  NIPVM_MAX_STEPS: positiveInt('5000'),
  NIPVM_MAX_CALL_DEPTH: positiveInt('32'),
  NIPVM_OUTPUT_CASE: z.enum(['as-is', 'upper']).default('as-is'),
})

export type VmEnv = z.infer<typeof vmEnvSchema>

/**
 * Load and validate environment variables
 * @param schema - Zod schema to validate against
 * @param envPath - Optional path to .env file
 * @returns Validated environment variables
 */
export function loadEnvVariables<T extends z.ZodType>(
  schema: T,
  envPath?: string,
): z.infer<T> {
  dotenvConfig({ path: envPath })

  return schema.parse(process.env)
}

/**
 * Validate an explicit environment record (no .env loading)
 */
export function parseVmEnv(env: Record<string, string | undefined>): VmEnv {
  return vmEnvSchema.parse(env)
}

export function loadVmEnv(envPath?: string): VmEnv {
  return loadEnvVariables(vmEnvSchema, envPath)
}
