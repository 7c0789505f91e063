/**
 * Swap request routes (branch-scoped).
 */

import { Hono } from 'hono'
import { z } from 'zod'
import { idSchema, SWAP_REQUEST_STATUSES } from '@shiftdesk/schema'
import { getCurrentBranchId, getCurrentUser, requireAuth, requireBranchPermission } from '../middleware/auth'
import {
  approveSwapRequest,
  createSwapRequest,
  getSwapRequest,
  listSwapRequestsByStatus,
  listSwapRequestsForStaff,
  rejectSwapRequest,
} from '../services/swaps'
import { fail, ok, readJson, validationFailed } from './_api'

const createBodySchema = z
  .object({
    requester: z.string().trim().min(1).max(100),
    target: z.string().trim().min(1).max(100),
    swapDate: z.string().date(),
    requesterShift: z.string().max(20).nullish(),
    targetShift: z.string().max(20).nullish(),
    reason: z.string().max(1000).nullish(),
  })
  .refine((body) => body.requester !== body.target, {
    message: 'A staff member cannot swap with themselves.',
    path: ['target'],
  })

/** `staff` lists every request that staff member is on; otherwise one status, pending by default. */
const listQuerySchema = z.object({
  staff: z.string().min(1).optional(),
  status: z.enum(SWAP_REQUEST_STATUSES).default('pending'),
})

export const swapRequestRoutes = new Hono()

swapRequestRoutes.get(
  '/branches/:branchId/swap-requests',
  requireAuth,
  requireBranchPermission('swaps.read'),
  async (c) => {
    const parsed = listQuerySchema.safeParse(c.req.query())
    if (!parsed.success) return validationFailed(c, 'query', parsed.error)

    const db = c.get('db')
    const branchId = getCurrentBranchId(c)
    const rows = parsed.data.staff
      ? await listSwapRequestsForStaff(db, branchId, parsed.data.staff)
      : await listSwapRequestsByStatus(db, branchId, parsed.data.status)
    return ok(c, rows)
  },
)

swapRequestRoutes.post(
  '/branches/:branchId/swap-requests',
  requireAuth,
  requireBranchPermission('swaps.create'),
  async (c) => {
    const parsed = createBodySchema.safeParse(await readJson(c))
    if (!parsed.success) return validationFailed(c, 'body', parsed.error)

    return ok(c, await createSwapRequest(c.get('db'), getCurrentBranchId(c), parsed.data), 201)
  },
)

swapRequestRoutes.get(
  '/branches/:branchId/swap-requests/:requestId',
  requireAuth,
  requireBranchPermission('swaps.read'),
  async (c) => {
    const requestId = c.req.param('requestId')
    if (!idSchema.safeParse(requestId).success) return fail(c, 'NOT_FOUND', `Swap request not found: ${requestId}`, 404)

    return ok(c, await getSwapRequest(c.get('db'), getCurrentBranchId(c), requestId))
  },
)

swapRequestRoutes.post(
  '/branches/:branchId/swap-requests/:requestId/approve',
  requireAuth,
  requireBranchPermission('swaps.review'),
  async (c) => {
    const requestId = c.req.param('requestId')
    if (!idSchema.safeParse(requestId).success) return fail(c, 'NOT_FOUND', `Swap request not found: ${requestId}`, 404)

    return ok(c, await approveSwapRequest(c.get('db'), getCurrentBranchId(c), requestId, getCurrentUser(c).id))
  },
)

swapRequestRoutes.post(
  '/branches/:branchId/swap-requests/:requestId/reject',
  requireAuth,
  requireBranchPermission('swaps.review'),
  async (c) => {
    const requestId = c.req.param('requestId')
    if (!idSchema.safeParse(requestId).success) return fail(c, 'NOT_FOUND', `Swap request not found: ${requestId}`, 404)

    return ok(c, await rejectSwapRequest(c.get('db'), getCurrentBranchId(c), requestId, getCurrentUser(c).id))
  },
)
