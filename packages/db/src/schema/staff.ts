import { boolean, index, integer, jsonb, pgTable, text, timestamp, uuid } from 'drizzle-orm/pg-core'
import { id, softBranchRef, withTimestamps } from './_common'

/**
 * staff
 *
 * Employees that can be scheduled. `skills` and `prefer` are comma-delimited
 * tag strings (for example `NIGHT,L1`).
 */
export const staff = pgTable(
  'staff',
  {
    id,

    branchId: softBranchRef(),

    name: text('name').notNull(),

    gender: text('gender').default('M').notNull(),

    role: text('role').default('staff').notNull(),

    /** Wanted off days per month. */
    targetOff: integer('target_off').default(8).notNull(),

    /** Remaining annual paid leave days. */
    nenkyu: integer('nenkyu').default(0).notNull(),

    skills: text('skills').default('').notNull(),

    prefer: text('prefer').default('').notNull(),

    displayOrder: integer('display_order').default(0).notNull(),

    isActive: boolean('is_active').default(true).notNull(),

    ...withTimestamps(),
  },
  (table) => ({
    staffNameIdx: index('idx_staff_name').on(table.name),
    staffActiveIdx: index('idx_staff_active').on(table.isActive),
    staffBranchIdx: index('idx_staff_branch_id').on(table.branchId),
  }),
)

/**
 * staff_audit
 *
 * Append-only history of staff changes. A trigger rejects UPDATE and DELETE.
 * `staff_id` carries no FK so entries outlive the row they describe.
 */
export const staffAudit = pgTable(
  'staff_audit',
  {
    id,

    staffId: uuid('staff_id'),

    /** `create`, `update`, `deactivate` or `delete`. */
    action: text('action').notNull(),

    beforeData: jsonb('before_data').$type<Record<string, unknown>>(),

    afterData: jsonb('after_data').$type<Record<string, unknown>>(),

    performedBy: text('performed_by'),

    performedAt: timestamp('performed_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    staffAuditStaffIdx: index('idx_staff_audit_staff').on(table.staffId),
    staffAuditPerformedIdx: index('idx_staff_audit_performed').on(table.performedAt),
  }),
)

export type Staff = typeof staff.$inferSelect
export type StaffAuditEntry = typeof staffAudit.$inferSelect
