import { z } from 'zod'
import { TerrainError } from '@terrakit/utils'

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

const optionalPath = z.string().min(1).optional()

export const AppConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8007),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
  SCHEMA_PATH: optionalPath,
  PATTERN_DB_PATH: optionalPath,
  ALLOWED_ORIGINS: z
    .string()
    .default('*')
    .transform((raw) =>
      raw
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin !== ''),
    ),
  BODY_LIMIT: z.string().min(1).default('10mb'),
})
export type AppConfig = z.output<typeof AppConfigSchema>

// Empty variables count as unset.
function present(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') out[key] = value
  }
  return out
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = AppConfigSchema.safeParse(present(env))
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`)
      .join('; ')
    throw new TerrainError('VALIDATION', `Invalid configuration (${details})`)
  }
  return parsed.data
}
