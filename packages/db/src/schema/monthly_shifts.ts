import { index, integer, jsonb, pgTable, text, uniqueIndex } from 'drizzle-orm/pg-core'
import type { ShiftData } from '@shiftdesk/schema'
import { id, softBranchRef, withTimestamps } from './_common'

/**
 * monthly_shifts
 *
 * One staff member's grid for a month. `staff_name` is denormalized on
 * purpose and survives renames and removals of the staff row.
 */
export const monthlyShifts = pgTable(
  'monthly_shifts',
  {
    id,

    branchId: softBranchRef(),

    year: integer('year').notNull(),

    month: integer('month').notNull(),

    staffName: text('staff_name').notNull(),

    /** Day of month ("1".."31") -> shift code. */
    shiftData: jsonb('shift_data').$type<ShiftData>().default({}).notNull(),

    offDays: integer('off_days').default(0).notNull(),

    workDays: integer('work_days').default(0).notNull(),

    createdBy: text('created_by'),

    ...withTimestamps(),
  },
  (table) => ({
    monthlyShiftsBranchYmStaffUnique: uniqueIndex('monthly_shifts_branch_ym_staff_unique').on(
      table.branchId,
      table.year,
      table.month,
      table.staffName,
    ),
    monthlyShiftsYmIdx: index('idx_monthly_shifts_ym').on(table.year, table.month),
    monthlyShiftsStaffIdx: index('idx_monthly_shifts_staff').on(table.staffName),
    monthlyShiftsBranchIdx: index('idx_monthly_shifts_branch_id').on(table.branchId),
  }),
)

/** Aggregate document for a whole month, regenerated with the grid. */
export const monthlyShiftsSummary = pgTable(
  'monthly_shifts_summary',
  {
    id,
    branchId: softBranchRef(),
    year: integer('year').notNull(),
    month: integer('month').notNull(),
    summaryData: jsonb('summary_data').$type<Record<string, unknown>>().default({}).notNull(),
    createdBy: text('created_by'),
    ...withTimestamps(),
  },
  (table) => ({
    monthlySummaryBranchYmUnique: uniqueIndex('monthly_summary_branch_ym_unique').on(
      table.branchId,
      table.year,
      table.month,
    ),
    monthlySummaryYmIdx: index('idx_monthly_summary_ym').on(table.year, table.month),
    monthlySummaryBranchIdx: index('idx_monthly_summary_branch_id').on(table.branchId),
  }),
)

export type MonthlyShift = typeof monthlyShifts.$inferSelect
export type MonthlyShiftsSummary = typeof monthlyShiftsSummary.$inferSelect
