import { z } from 'zod'

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly keys: string[],
  ) {
    super(message)
    this.name = 'ConfigError'
  }
}

const databaseEnvSchema = z.object({
  DATABASE_URL: z
    .string({ required_error: 'DATABASE_URL is required' })
    .url()
    .refine((value) => /^postgres(?:ql)?:\/\//.test(value), 'DATABASE_URL must be a postgres:// URL'),
  DATABASE_POOL_MAX: z.coerce.number().int().min(1).max(100).default(10),
})

export type DatabaseConfig = {
  url: string
  poolMax: number
}

/**
 * Read database settings from an environment map. Callers pass
 * `process.env` after loading `dotenv/config` themselves.
 */
export function loadDatabaseConfig(env: Record<string, string | undefined>): DatabaseConfig {
  const parsed = databaseEnvSchema.safeParse(env)
  if (!parsed.success) {
    throw configErrorFrom(parsed.error)
  }
  return { url: parsed.data.DATABASE_URL, poolMax: parsed.data.DATABASE_POOL_MAX }
}

export function configErrorFrom(error: z.ZodError): ConfigError {
  const keys = [...new Set(error.issues.map((issue) => String(issue.path[0] ?? '(root)')))]
  const detail = error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
  return new ConfigError(`Invalid configuration: ${detail}`, keys)
}
