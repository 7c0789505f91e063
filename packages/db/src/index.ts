import { drizzle } from 'drizzle-orm/node-postgres'
import { sql } from 'drizzle-orm'
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core'
import { Pool } from 'pg'
import type { DatabaseConfig } from './config'

// Common utilities
export * from './schema/_common'

// Schema exports
export * from './schema/branches'
export * from './schema/staff'
export * from './schema/notifications'
export * from './schema/swap_requests'
export * from './schema/monthly_shifts'
export * from './schema/constraints'

export * from './config'
export * from './errors'
export * from './migrator'
export * from './seeds'
export * from './guard'

import * as branchesSchema from './schema/branches'
import * as staffSchema from './schema/staff'
import * as notificationsSchema from './schema/notifications'
import * as swapRequestsSchema from './schema/swap_requests'
import * as monthlyShiftsSchema from './schema/monthly_shifts'
import * as constraintsSchema from './schema/constraints'

/**
 * Drizzle schema registry.
 *
 * Order follows the migrations: base entities, then branches, then the
 * constraint catalog.
 */
export const schema = {
  staff: staffSchema.staff,
  staffAudit: staffSchema.staffAudit,
  notifications: notificationsSchema.notifications,
  swapRequests: swapRequestsSchema.swapRequests,
  monthlyShifts: monthlyShiftsSchema.monthlyShifts,
  monthlyShiftsSummary: monthlyShiftsSchema.monthlyShiftsSummary,
  branches: branchesSchema.branches,
  userBranches: branchesSchema.userBranches,
  constraints: constraintsSchema.constraints,
}

export type Schema = typeof schema

/**
 * Driver-agnostic handle. node-postgres in production, PGlite in tests; both
 * satisfy this type.
 */
export type Database = PgDatabase<PgQueryResultHKT, Schema>

/** Pools are created explicitly; importing this package never connects. */
export function createPool(config: DatabaseConfig): Pool {
  return new Pool({ connectionString: config.url, max: config.poolMax })
}

export function createDatabase(pool: Pool): Database {
  return drizzle(pool, { schema })
}

/** Round-trip a trivial query. Rejects when the database cannot be reached. */
export async function checkDatabaseConnection(db: Database): Promise<{ latencyMs: number }> {
  const started = Date.now()
  await db.execute(sql`SELECT 1`)
  return { latencyMs: Date.now() - started }
}
