/**
 * Branch routes.
 *
 * Listing and `/me/branches` need only a token. Creating and hard-deleting a
 * branch is for platform admins; everything else is checked against the
 * caller's role in that branch.
 */

import { Hono } from 'hono'
import { z } from 'zod'
import { BRANCH_ROLES, branchSettingsSchema } from '@shiftdesk/schema'
import {
  getCurrentBranchId,
  getCurrentUser,
  requireAuth,
  requireBranchPermission,
  requirePlatformAdmin,
} from '../middleware/auth'
import {
  createBranch,
  deactivateBranch,
  deleteBranch,
  getBranch,
  getShiftCodes,
  listBranchesForUser,
  listMembers,
  removeMember,
  setPrimaryBranch,
  setShiftCodes,
  updateBranch,
  upsertMember,
} from '../services/branches'
import { booleanQuery, fail, ok, readJson, validationFailed } from './_api'

const shiftCodeList = z.array(z.string().trim().min(1).max(20))

const createBodySchema = z.object({
  name: z.string().trim().min(1).max(200),
  code: z
    .string()
    .min(1)
    .max(50)
    .regex(/^[A-Z0-9_-]+$/, 'Codes are upper-case letters, digits, dashes and underscores'),
  timezone: z.string().min(1).max(50).optional(),
  settings: branchSettingsSchema.optional(),
  seedDefaults: z.boolean().default(true),
})

const updateBodySchema = z
  .object({
    name: z.string().trim().min(1).max(200),
    timezone: z.string().min(1).max(50),
    settings: branchSettingsSchema,
    isActive: z.boolean(),
  })
  .partial()
  .refine((patch) => Object.keys(patch).length > 0, 'Provide at least one field to update.')

const shiftCodesBodySchema = z.object({
  dayShifts: shiftCodeList,
  nightShifts: shiftCodeList,
  requiredShifts: shiftCodeList.default([]),
})

const memberBodySchema = z.object({
  userId: z.string().trim().min(1),
  role: z.enum(BRANCH_ROLES),
  isPrimary: z.boolean().optional(),
})

export const branchRoutes = new Hono()

branchRoutes.get('/branches', requireAuth, async (c) => {
  const rows = await listBranchesForUser(c.get('db'), getCurrentUser(c), {
    includeInactive: booleanQuery(c.req.query('includeInactive')),
  })
  return ok(c, rows)
})

/** Only branches the caller holds a grant in, primary first. */
branchRoutes.get('/me/branches', requireAuth, async (c) => {
  const user = getCurrentUser(c)
  const rows = await listBranchesForUser(c.get('db'), { id: user.id, isPlatformAdmin: false })
  return ok(c, rows)
})

branchRoutes.post('/branches', requireAuth, requirePlatformAdmin, async (c) => {
  const parsed = createBodySchema.safeParse(await readJson(c))
  if (!parsed.success) return validationFailed(c, 'body', parsed.error)

  const { seedDefaults, ...input } = parsed.data
  const result = await createBranch(c.get('db'), input, getCurrentUser(c).id, { seedDefaults })
  return ok(c, result.branch, 201, { seededConstraints: result.seededConstraints })
})

branchRoutes.get('/branches/:branchId', requireAuth, requireBranchPermission('branch.read'), async (c) => {
  return ok(c, await getBranch(c.get('db'), getCurrentBranchId(c)))
})

branchRoutes.patch('/branches/:branchId', requireAuth, requireBranchPermission('branch.update'), async (c) => {
  const parsed = updateBodySchema.safeParse(await readJson(c))
  if (!parsed.success) return validationFailed(c, 'body', parsed.error)

  return ok(c, await updateBranch(c.get('db'), getCurrentBranchId(c), parsed.data))
})

/** Soft deactivation by default; `?hard=true` removes the row (platform admins only). */
branchRoutes.delete('/branches/:branchId', requireAuth, requireBranchPermission('branch.update'), async (c) => {
  if (booleanQuery(c.req.query('hard'))) {
    if (!getCurrentUser(c).isPlatformAdmin) {
      return fail(c, 'FORBIDDEN', 'Platform admin required.', 403)
    }
    return ok(c, await deleteBranch(c.get('db'), getCurrentBranchId(c)))
  }
  return ok(c, await deactivateBranch(c.get('db'), getCurrentBranchId(c)))
})

branchRoutes.get(
  '/branches/:branchId/shift-codes',
  requireAuth,
  requireBranchPermission('branch.read'),
  async (c) => ok(c, getShiftCodes(await getBranch(c.get('db'), getCurrentBranchId(c)))),
)

branchRoutes.put(
  '/branches/:branchId/shift-codes',
  requireAuth,
  requireBranchPermission('branch.update'),
  async (c) => {
    const parsed = shiftCodesBodySchema.safeParse(await readJson(c))
    if (!parsed.success) return validationFailed(c, 'body', parsed.error)

    return ok(c, await setShiftCodes(c.get('db'), getCurrentBranchId(c), parsed.data))
  },
)

branchRoutes.get(
  '/branches/:branchId/members',
  requireAuth,
  requireBranchPermission('members.read'),
  async (c) => ok(c, await listMembers(c.get('db'), getCurrentBranchId(c))),
)

branchRoutes.put(
  '/branches/:branchId/members',
  requireAuth,
  requireBranchPermission('members.manage'),
  async (c) => {
    const parsed = memberBodySchema.safeParse(await readJson(c))
    if (!parsed.success) return validationFailed(c, 'body', parsed.error)

    return ok(c, await upsertMember(c.get('db'), getCurrentBranchId(c), parsed.data))
  },
)

branchRoutes.delete(
  '/branches/:branchId/members/:userId',
  requireAuth,
  requireBranchPermission('members.manage'),
  async (c) => {
    const userId = c.req.param('userId')
    await removeMember(c.get('db'), getCurrentBranchId(c), userId)
    return ok(c, { userId, removed: true })
  },
)

/** Any member may choose their own landing branch. */
branchRoutes.post(
  '/branches/:branchId/primary',
  requireAuth,
  requireBranchPermission('branch.read'),
  async (c) => ok(c, await setPrimaryBranch(c.get('db'), getCurrentUser(c).id, getCurrentBranchId(c))),
)
