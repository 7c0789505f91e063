/**
 * Monthly shift grid routes (branch-scoped).
 */

import { Hono } from 'hono'
import type { Context } from 'hono'
import { z } from 'zod'
import { idSchema, monthSchema, shiftDataSchema, yearSchema } from '@shiftdesk/schema'
import { getCurrentBranchId, getCurrentUser, requireAuth, requireBranchPermission } from '../middleware/auth'
import {
  deleteMonth,
  getMonthlyGrid,
  listSavedMonths,
  saveMonthlyGrid,
  saveMonthlySummary,
  updateShiftRow,
} from '../services/shifts'
import { fail, ok, readJson, validationFailed } from './_api'

const periodSchema = z.object({ year: yearSchema, month: monthSchema })

const gridBodySchema = z.object({
  rows: z.array(
    z.object({
      staffName: z.string().trim().min(1).max(100),
      shiftData: shiftDataSchema,
    }),
  ),
  summary: z.record(z.unknown()).optional(),
})

const rowBodySchema = z.object({ shiftData: shiftDataSchema })

const summaryBodySchema = z.object({ summaryData: z.record(z.unknown()) })

function periodFrom(c: Context) {
  return periodSchema.safeParse({ year: c.req.param('year'), month: c.req.param('month') })
}

export const monthlyShiftRoutes = new Hono()

monthlyShiftRoutes.get(
  '/branches/:branchId/monthly-shifts',
  requireAuth,
  requireBranchPermission('shifts.read'),
  async (c) => ok(c, await listSavedMonths(c.get('db'), getCurrentBranchId(c))),
)

monthlyShiftRoutes.get(
  '/branches/:branchId/monthly-shifts/:year/:month',
  requireAuth,
  requireBranchPermission('shifts.read'),
  async (c) => {
    const period = periodFrom(c)
    if (!period.success) return fail(c, 'VALIDATION_ERROR', 'Invalid year or month.', 400, period.error.flatten())

    return ok(c, await getMonthlyGrid(c.get('db'), getCurrentBranchId(c), period.data.year, period.data.month))
  },
)

monthlyShiftRoutes.put(
  '/branches/:branchId/monthly-shifts/:year/:month',
  requireAuth,
  requireBranchPermission('shifts.write'),
  async (c) => {
    const period = periodFrom(c)
    if (!period.success) return fail(c, 'VALIDATION_ERROR', 'Invalid year or month.', 400, period.error.flatten())

    const parsed = gridBodySchema.safeParse(await readJson(c))
    if (!parsed.success) return validationFailed(c, 'body', parsed.error)

    const grid = await saveMonthlyGrid(
      c.get('db'),
      getCurrentBranchId(c),
      period.data.year,
      period.data.month,
      parsed.data,
      getCurrentUser(c).id,
    )
    return ok(c, grid)
  },
)

monthlyShiftRoutes.put(
  '/branches/:branchId/monthly-shifts/:year/:month/summary',
  requireAuth,
  requireBranchPermission('shifts.write'),
  async (c) => {
    const period = periodFrom(c)
    if (!period.success) return fail(c, 'VALIDATION_ERROR', 'Invalid year or month.', 400, period.error.flatten())

    const parsed = summaryBodySchema.safeParse(await readJson(c))
    if (!parsed.success) return validationFailed(c, 'body', parsed.error)

    const summary = await saveMonthlySummary(
      c.get('db'),
      getCurrentBranchId(c),
      period.data.year,
      period.data.month,
      parsed.data.summaryData,
      getCurrentUser(c).id,
    )
    return ok(c, summary)
  },
)

monthlyShiftRoutes.delete(
  '/branches/:branchId/monthly-shifts/:year/:month',
  requireAuth,
  requireBranchPermission('shifts.write'),
  async (c) => {
    const period = periodFrom(c)
    if (!period.success) return fail(c, 'VALIDATION_ERROR', 'Invalid year or month.', 400, period.error.flatten())

    return ok(c, await deleteMonth(c.get('db'), getCurrentBranchId(c), period.data.year, period.data.month))
  },
)

monthlyShiftRoutes.patch(
  '/branches/:branchId/monthly-shifts/rows/:rowId',
  requireAuth,
  requireBranchPermission('shifts.write'),
  async (c) => {
    const rowId = c.req.param('rowId')
    if (!idSchema.safeParse(rowId).success) return fail(c, 'NOT_FOUND', `Monthly shift not found: ${rowId}`, 404)

    const parsed = rowBodySchema.safeParse(await readJson(c))
    if (!parsed.success) return validationFailed(c, 'body', parsed.error)

    return ok(c, await updateShiftRow(c.get('db'), getCurrentBranchId(c), rowId, parsed.data.shiftData))
  },
)
