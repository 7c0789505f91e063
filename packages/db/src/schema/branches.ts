import { boolean, index, jsonb, pgTable, text, uniqueIndex, uuid } from 'drizzle-orm/pg-core'
import type { BranchRole, BranchSettings } from '@shiftdesk/schema'
import { id, withTimestamps } from './_common'

/**
 * branches
 *
 * Tenant partition. Every other table is scoped by `branch_id`; only
 * `user_branches` and `constraints` enforce it with a cascading FK.
 */
export const branches = pgTable(
  'branches',
  {
    id,

    name: text('name').notNull(),

    /** Short unique handle, e.g. `MAIN`. */
    code: text('code').notNull(),

    /** IANA zone used to interpret dates of this branch. */
    timezone: text('timezone').default('Asia/Tokyo').notNull(),

    /** Soft-disable switch; branches are deactivated rather than removed. */
    isActive: boolean('is_active').default(true).notNull(),

    /** Open document: shift code lists and the `is_default` marker live here. */
    settings: jsonb('settings').$type<BranchSettings>().default({}).notNull(),

    ...withTimestamps(),
  },
  (table) => ({
    branchesCodeUnique: uniqueIndex('branches_code_unique').on(table.code),
    branchesActiveIdx: index('idx_branches_active').on(table.isActive),
  }),
)

/**
 * user_branches
 *
 * Role grant of an externally identified user inside one branch.
 */
export const userBranches = pgTable(
  'user_branches',
  {
    id,

    /** Opaque id from the identity provider. */
    userId: text('user_id').notNull(),

    branchId: uuid('branch_id')
      .references(() => branches.id, { onDelete: 'cascade' })
      .notNull(),

    role: text('role').$type<BranchRole>().default('viewer').notNull(),

    /** Branch the user lands on first. At most one per user by convention. */
    isPrimary: boolean('is_primary').default(false).notNull(),

    ...withTimestamps(),
  },
  (table) => ({
    userBranchesUserBranchUnique: uniqueIndex('user_branches_user_branch_unique').on(
      table.userId,
      table.branchId,
    ),
    userBranchesUserIdx: index('idx_user_branches_user').on(table.userId),
    userBranchesBranchIdx: index('idx_user_branches_branch').on(table.branchId),
    userBranchesPrimaryIdx: index('idx_user_branches_primary').on(table.isPrimary),
  }),
)

export type Branch = typeof branches.$inferSelect
export type UserBranch = typeof userBranches.$inferSelect
