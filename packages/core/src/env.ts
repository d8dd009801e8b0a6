import { DEFAULT_BUFFER_WORDS } from '@heappack/types'
import { config as dotenvConfig } from 'dotenv'
import { z } from 'zod'

// Environment variables read by every heappack program
export const packingEnvSchema = z.object({
  HEAPPACK_BUFFER_WORDS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_BUFFER_WORDS),
  HEAPPACK_EXECUTABLE: z.string().min(1).optional(),
})

export type PackingEnv = z.infer<typeof packingEnvSchema>

/**
 * Load and validate environment variables
 * @param schema - Zod schema to validate against
 * @param envPath - Optional path to .env file
 */
export function loadEnvVariables<T extends z.ZodType>(
  schema: T,
  envPath?: string,
): z.infer<T> {
  dotenvConfig({ path: envPath })

  return schema.parse(process.env)
}

let packingEnv: PackingEnv | undefined

/**
 * Packing environment, loaded on first use
 */
export function getPackingEnv(envPath?: string): PackingEnv {
  if (packingEnv === undefined) {
    packingEnv = loadEnvVariables(packingEnvSchema, envPath)
  }
  return packingEnv
}

/**
 * Drop the loaded environment so the next read sees process.env again
 */
export function resetPackingEnv(): void {
  packingEnv = undefined
}
