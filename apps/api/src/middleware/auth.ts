/**
 * Authentication and branch authorization middleware.
 *
 * - Identity is external; requests prove it with a signed bearer token.
 * - `user_branches` is the source of truth for branch membership and role.
 * - Handlers never guess the branch; it comes from the `:branchId` param.
 */

import type { Context, Next } from 'hono'
import type { Database } from '@shiftdesk/db'
import type { BranchRole } from '@shiftdesk/schema'
import type { ApiConfig } from '../config'
import { BranchAccessPolicy, type AccessUser, type BranchPermission } from '../services/acl'
import { readBearerToken, verifyUserToken } from '../services/auth-tokens'
import { fail } from '../routes/_api'

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string
    db: Database
    config: ApiConfig
    user: AccessUser
    branchId: string
    branchRole: BranchRole | undefined
  }
}

/**
 * Ensure each request has a stable request id for tracing.
 */
export async function requestId(c: Context, next: Next) {
  const id = c.req.header('x-request-id') ?? crypto.randomUUID()
  c.set('requestId', id)
  c.header('x-request-id', id)
  await next()
}

/**
 * Require a valid bearer token and attach the caller.
 */
export async function requireAuth(c: Context, next: Next) {
  const config = c.get('config')
  const token = readBearerToken(c.req.header('authorization'))
  const userId = token ? verifyUserToken(token, config.authTokenSecret) : null

  if (!userId) {
    return fail(c, 'UNAUTHORIZED', 'Authentication required.', 401)
  }

  c.set('user', { id: userId, isPlatformAdmin: config.platformAdminUserIds.includes(userId) })
  await next()
}

/**
 * Require `permission` in the branch named by the route param. Runs the
 * branch access policy and records the branch and role for the handler.
 */
export function requireBranchPermission(permission: BranchPermission, branchIdParam = 'branchId') {
  return async (c: Context, next: Next) => {
    const user = c.get('user')
    const branchId = c.req.param(branchIdParam)

    if (!branchId) {
      return fail(c, 'BAD_REQUEST', `Missing branch scope. Provide :${branchIdParam}.`, 400)
    }
    if (!isUuid(branchId)) {
      return fail(c, 'NOT_FOUND', `Branch not found: ${branchId}`, 404)
    }

    const decision = await new BranchAccessPolicy(c.get('db')).evaluate(user, branchId, permission)
    if (!decision.allowed) {
      return fail(c, 'FORBIDDEN', `Permission denied: ${decision.reason}.`, 403)
    }

    c.set('branchId', branchId)
    c.set('branchRole', decision.role)
    await next()
  }
}

/**
 * Guard for platform-level administration routes (branch creation and
 * removal).
 */
export async function requirePlatformAdmin(c: Context, next: Next) {
  if (!c.get('user').isPlatformAdmin) {
    return fail(c, 'FORBIDDEN', 'Platform admin required.', 403)
  }
  await next()
}

export function getCurrentUser(c: Context): AccessUser {
  return c.get('user')
}

export function getCurrentBranchId(c: Context): string {
  return c.get('branchId')
}

function isUuid(value: string) {
  return /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i.test(value)
}
