/**
 * Issue a bearer token for a user id.
 *
 * Usage: npm run token:issue -w @shiftdesk/api -- <userId>
 *
 * Only AUTH_TOKEN_SECRET and AUTH_TOKEN_TTL_SECONDS are read; the database
 * is not touched.
 */
import 'dotenv/config'
import { z } from 'zod'
import { DEFAULT_TOKEN_TTL_SECONDS, signUserToken } from '../services/auth-tokens'

const argsSchema = z.tuple([z.string().trim().min(1, 'userId is required')])
const secretSchema = z
  .string({ required_error: 'AUTH_TOKEN_SECRET is required' })
  .min(16, 'AUTH_TOKEN_SECRET must be at least 16 characters')
const ttlSchema = z.coerce.number().int().min(60).default(DEFAULT_TOKEN_TTL_SECONDS)

const args = argsSchema.safeParse(process.argv.slice(2))
const secret = secretSchema.safeParse(process.env.AUTH_TOKEN_SECRET)
const ttl = ttlSchema.safeParse(process.env.AUTH_TOKEN_TTL_SECONDS)

if (!args.success || !secret.success || !ttl.success) {
  const issues = [
    ...(args.error?.issues ?? []),
    ...(secret.error?.issues ?? []),
    ...(ttl.error?.issues ?? []),
  ]
  for (const issue of issues) console.error(issue.message)
  console.error('Usage: token:issue <userId>')
  process.exit(1)
}

console.log(signUserToken(args.data[0], secret.data, { ttlSeconds: ttl.data }))
