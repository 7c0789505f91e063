import { z } from 'zod'
import { configErrorFrom, type DatabaseConfig } from '@shiftdesk/db'
import { DEFAULT_TOKEN_TTL_SECONDS } from './services/auth-tokens'

const apiEnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(6130),
  DATABASE_URL: z
    .string({ required_error: 'DATABASE_URL is required' })
    .url()
    .refine((value) => /^postgres(?:ql)?:\/\//.test(value), 'DATABASE_URL must be a postgres:// URL'),
  DATABASE_POOL_MAX: z.coerce.number().int().min(1).max(100).default(10),
  AUTH_TOKEN_SECRET: z
    .string({ required_error: 'AUTH_TOKEN_SECRET is required' })
    .min(16, 'AUTH_TOKEN_SECRET must be at least 16 characters'),
  AUTH_TOKEN_TTL_SECONDS: z.coerce.number().int().min(60).default(DEFAULT_TOKEN_TTL_SECONDS),
  PLATFORM_ADMIN_USER_IDS: z.string().default(''),
  CORS_ORIGIN: z.string().min(1).default('*'),
})

export type ApiConfig = {
  port: number
  database: DatabaseConfig
  authTokenSecret: string
  /** Lifetime of issued bearer tokens. */
  authTokenTtlSeconds: number
  /** Users allowed to create and hard-delete branches, and to act in any branch. */
  platformAdminUserIds: string[]
  corsOrigin: string
}

export function loadApiConfig(env: Record<string, string | undefined>): ApiConfig {
  const parsed = apiEnvSchema.safeParse(env)
  if (!parsed.success) {
    throw configErrorFrom(parsed.error)
  }

  const data = parsed.data
  return {
    port: data.PORT,
    database: { url: data.DATABASE_URL, poolMax: data.DATABASE_POOL_MAX },
    authTokenSecret: data.AUTH_TOKEN_SECRET,
    authTokenTtlSeconds: data.AUTH_TOKEN_TTL_SECONDS,
    platformAdminUserIds: data.PLATFORM_ADMIN_USER_IDS.split(',')
      .map((id) => id.trim())
      .filter(Boolean),
    corsOrigin: data.CORS_ORIGIN,
  }
}
