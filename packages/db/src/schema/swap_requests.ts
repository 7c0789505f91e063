import { date, index, pgTable, text, timestamp } from 'drizzle-orm/pg-core'
import { id, softBranchRef, withTimestamps } from './_common'

/**
 * swap_requests
 *
 * Proposed exchange of one day's shifts between two staff members.
 * `requester` and `target` are staff names, not ids.
 *
 * `status` is open text; the API only moves rows out of `pending`.
 */
export const swapRequests = pgTable(
  'swap_requests',
  {
    id,

    branchId: softBranchRef(),

    requester: text('requester').notNull(),

    target: text('target').notNull(),

    /** Calendar date, kept as `YYYY-MM-DD`. */
    swapDate: date('swap_date', { mode: 'string' }).notNull(),

    requesterShift: text('requester_shift'),

    targetShift: text('target_shift'),

    reason: text('reason'),

    status: text('status').default('pending').notNull(),

    approvedBy: text('approved_by'),

    approvedAt: timestamp('approved_at', { withTimezone: true }),

    ...withTimestamps(),
  },
  (table) => ({
    swapStatusIdx: index('idx_swap_status').on(table.status),
    swapRequesterIdx: index('idx_swap_requester').on(table.requester),
    swapTargetIdx: index('idx_swap_target').on(table.target),
    swapDateIdx: index('idx_swap_date').on(table.swapDate),
    swapBranchIdx: index('idx_swap_requests_branch_id').on(table.branchId),
  }),
)

export type SwapRequest = typeof swapRequests.$inferSelect
