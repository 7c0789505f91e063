import { timestamp, uuid } from 'drizzle-orm/pg-core'

/** Row creation timestamp (UTC timestamptz). */
export const createdAt = timestamp('created_at', { withTimezone: true }).defaultNow().notNull()

/**
 * Last update timestamp. The `update_updated_at_column()` trigger rewrites it
 * on every UPDATE, whatever value the statement supplied.
 */
export const updatedAt = timestamp('updated_at', { withTimezone: true }).defaultNow().notNull()

/** Database-generated uuid primary key (`gen_random_uuid()`). */
export const id = uuid('id').primaryKey().defaultRandom()

/** Both lifecycle timestamps. */
export const withTimestamps = () => ({
  createdAt,
  updatedAt,
})

/**
 * Branch id added to a base table after the fact.
 *
 * Soft reference: no FK, no cascade. Rows keep their branch id after the
 * branch row is removed, so readers must tolerate dangling ids.
 */
export const softBranchRef = () => uuid('branch_id')
