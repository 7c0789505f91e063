/**
 * Staff routes (branch-scoped). Every write leaves a `staff_audit` row.
 */

import { Hono } from 'hono'
import { z } from 'zod'
import { idSchema, STAFF_GENDERS, STAFF_ROLES } from '@shiftdesk/schema'
import { getCurrentBranchId, getCurrentUser, requireAuth, requireBranchPermission } from '../middleware/auth'
import {
  createStaff,
  deactivateStaff,
  deleteStaff,
  getStaff,
  getStaffStats,
  listStaff,
  listStaffAudit,
  updateStaff,
} from '../services/staff'
import { booleanQuery, fail, ok, readJson, validationFailed } from './_api'

const tagsSchema = z.union([z.string().max(500), z.array(z.string().max(50))])

const createBodySchema = z.object({
  name: z.string().trim().min(1).max(100),
  gender: z.enum(STAFF_GENDERS).default('M'),
  role: z.enum(STAFF_ROLES).default('staff'),
  targetOff: z.number().int().min(0).max(31).default(8),
  nenkyu: z.number().int().min(0).default(0),
  skills: tagsSchema.default(''),
  prefer: tagsSchema.default(''),
  displayOrder: z.number().int().default(0),
  isActive: z.boolean().default(true),
})

const updateBodySchema = z
  .object({
    name: z.string().trim().min(1).max(100),
    gender: z.enum(STAFF_GENDERS),
    role: z.enum(STAFF_ROLES),
    targetOff: z.number().int().min(0).max(31),
    nenkyu: z.number().int().min(0),
    skills: tagsSchema,
    prefer: tagsSchema,
    displayOrder: z.number().int(),
    isActive: z.boolean(),
  })
  .partial()
  .refine((patch) => Object.keys(patch).length > 0, 'Provide at least one field to update.')

const listQuerySchema = z.object({
  includeInactive: z.string().optional(),
  skill: z.string().min(1).optional(),
})

function staffIdFrom(value: string) {
  return idSchema.safeParse(value).success ? value : null
}

export const staffRoutes = new Hono()

staffRoutes.get('/branches/:branchId/staff', requireAuth, requireBranchPermission('staff.read'), async (c) => {
  const parsed = listQuerySchema.safeParse(c.req.query())
  if (!parsed.success) return validationFailed(c, 'query', parsed.error)

  const rows = await listStaff(c.get('db'), getCurrentBranchId(c), {
    includeInactive: booleanQuery(parsed.data.includeInactive),
    skill: parsed.data.skill,
  })
  return ok(c, rows)
})

staffRoutes.get('/branches/:branchId/staff/stats', requireAuth, requireBranchPermission('staff.read'), async (c) => {
  return ok(c, await getStaffStats(c.get('db'), getCurrentBranchId(c)))
})

staffRoutes.post('/branches/:branchId/staff', requireAuth, requireBranchPermission('staff.write'), async (c) => {
  const parsed = createBodySchema.safeParse(await readJson(c))
  if (!parsed.success) return validationFailed(c, 'body', parsed.error)

  const created = await createStaff(c.get('db'), getCurrentBranchId(c), parsed.data, getCurrentUser(c).id)
  return ok(c, created, 201)
})

staffRoutes.get('/branches/:branchId/staff/:staffId', requireAuth, requireBranchPermission('staff.read'), async (c) => {
  const staffId = staffIdFrom(c.req.param('staffId'))
  if (!staffId) return fail(c, 'NOT_FOUND', `Staff not found: ${c.req.param('staffId')}`, 404)
  return ok(c, await getStaff(c.get('db'), getCurrentBranchId(c), staffId))
})

staffRoutes.get(
  '/branches/:branchId/staff/:staffId/audit',
  requireAuth,
  requireBranchPermission('staff.read'),
  async (c) => {
    const staffId = staffIdFrom(c.req.param('staffId'))
    if (!staffId) return fail(c, 'NOT_FOUND', `Staff not found: ${c.req.param('staffId')}`, 404)
    return ok(c, await listStaffAudit(c.get('db'), getCurrentBranchId(c), staffId))
  },
)

staffRoutes.patch(
  '/branches/:branchId/staff/:staffId',
  requireAuth,
  requireBranchPermission('staff.write'),
  async (c) => {
    const staffId = staffIdFrom(c.req.param('staffId'))
    if (!staffId) return fail(c, 'NOT_FOUND', `Staff not found: ${c.req.param('staffId')}`, 404)

    const parsed = updateBodySchema.safeParse(await readJson(c))
    if (!parsed.success) return validationFailed(c, 'body', parsed.error)

    const updated = await updateStaff(c.get('db'), getCurrentBranchId(c), staffId, parsed.data, getCurrentUser(c).id)
    return ok(c, updated)
  },
)

staffRoutes.post(
  '/branches/:branchId/staff/:staffId/deactivate',
  requireAuth,
  requireBranchPermission('staff.write'),
  async (c) => {
    const staffId = staffIdFrom(c.req.param('staffId'))
    if (!staffId) return fail(c, 'NOT_FOUND', `Staff not found: ${c.req.param('staffId')}`, 404)

    const updated = await deactivateStaff(c.get('db'), getCurrentBranchId(c), staffId, getCurrentUser(c).id)
    return ok(c, updated)
  },
)

staffRoutes.delete(
  '/branches/:branchId/staff/:staffId',
  requireAuth,
  requireBranchPermission('staff.delete'),
  async (c) => {
    const staffId = staffIdFrom(c.req.param('staffId'))
    if (!staffId) return fail(c, 'NOT_FOUND', `Staff not found: ${c.req.param('staffId')}`, 404)

    await deleteStaff(c.get('db'), getCurrentBranchId(c), staffId, getCurrentUser(c).id)
    return ok(c, { id: staffId, deleted: true })
  },
)
