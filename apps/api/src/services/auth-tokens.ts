import { createHmac, timingSafeEqual } from 'node:crypto'
import { z } from 'zod'

/**
 * Bearer tokens for externally identified users.
 *
 * Format: `base64url(JSON{sub,exp}).base64url(HMAC-SHA256(secret, payload))`,
 * where `exp` is a unix timestamp in seconds. Identity lives elsewhere; the
 * API only checks that the claims were signed with the shared secret and
 * have not expired.
 */

export const DEFAULT_TOKEN_TTL_SECONDS = 60 * 60 * 12

const claimsSchema = z.object({
  sub: z.string().trim().min(1),
  exp: z.number().int().positive(),
})

export type UserTokenClaims = z.infer<typeof claimsSchema>

function signature(payload: string, secret: string): Buffer {
  return createHmac('sha256', secret).update(payload).digest()
}

function nowSeconds() {
  return Math.floor(Date.now() / 1000)
}

export function signUserToken(
  userId: string,
  secret: string,
  options: { ttlSeconds?: number } = {},
): string {
  if (!userId.trim()) {
    throw new Error('signUserToken: userId must not be blank')
  }
  const ttlSeconds = options.ttlSeconds ?? DEFAULT_TOKEN_TTL_SECONDS
  if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
    throw new Error('signUserToken: ttlSeconds must be a positive integer')
  }

  const claims: UserTokenClaims = { sub: userId, exp: nowSeconds() + ttlSeconds }
  const payload = Buffer.from(JSON.stringify(claims), 'utf8').toString('base64url')
  return `${payload}.${signature(payload, secret).toString('base64url')}`
}

function decodeClaims(payload: string): UserTokenClaims | null {
  let decoded: unknown
  try {
    decoded = JSON.parse(Buffer.from(payload, 'base64url').toString('utf8'))
  } catch {
    return null
  }
  const parsed = claimsSchema.safeParse(decoded)
  return parsed.success ? parsed.data : null
}

/** Returns the user id, or null when the token is malformed, forged or expired. */
export function verifyUserToken(token: string, secret: string): string | null {
  const parts = token.split('.')
  if (parts.length !== 2) return null
  const [payload, encodedSignature] = parts
  if (!payload || !encodedSignature) return null

  const expected = signature(payload, secret)
  const provided = Buffer.from(encodedSignature, 'base64url')
  if (provided.length !== expected.length) return null
  if (!timingSafeEqual(provided, expected)) return null

  const claims = decodeClaims(payload)
  if (!claims) return null
  return claims.exp > nowSeconds() ? claims.sub : null
}

/** Pull the token out of an `Authorization: Bearer ...` header value. */
export function readBearerToken(header: string | undefined): string | null {
  if (!header) return null
  const match = /^Bearer\s+(\S+)$/i.exec(header.trim())
  return match?.[1] ?? null
}
