import { readdirSync, readFileSync } from 'node:fs'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import type { PoolClient } from 'pg'
import { MigrationError } from './errors'
import { seedDefaultBranchConstraints } from './seeds'

/**
 * Minimal surface the runner needs from a connection. Adapters exist for a
 * node-postgres client and, in `./testing`, for PGlite.
 */
export interface MigrationSession {
  /** Run one or more statements without parameters. */
  exec(sqlText: string): Promise<void>
  query<TRow extends Record<string, unknown>>(text: string, params?: unknown[]): Promise<TRow[]>
}

export type MigrationLogger = {
  info(message: string): void
}

export type Migration = {
  /** File name without extension, e.g. `002_add_branches`. */
  id: string
  file: string
  /** Runs inside the migration's transaction, after its SQL. */
  afterSql?: (session: MigrationSession) => Promise<number>
}

export type RunMigrationsOptions = {
  /** Re-run recorded migrations too. Every statement is guarded, so this is a no-op on a current schema. */
  reapply?: boolean
  logger?: MigrationLogger
  migrations?: Migration[]
}

export type MigrationReport = {
  applied: string[]
  skipped: string[]
}

export const migrationsDir = fileURLToPath(new URL('../migrations/', import.meta.url))

const postSqlSteps: Record<string, Migration['afterSql']> = {
  '003_add_constraints': seedDefaultBranchConstraints,
}

/** Migration files in apply order. */
export function listMigrations(dir: string = migrationsDir): Migration[] {
  return readdirSync(dir)
    .filter((name) => /^\d{3}_[a-z0-9_]+\.sql$/.test(name))
    .sort()
    .map((name) => {
      const id = name.replace(/\.sql$/, '')
      return { id, file: join(dir, name), afterSql: postSqlSteps[id] }
    })
}

export function createPgMigrationSession(client: PoolClient): MigrationSession {
  return {
    async exec(sqlText) {
      await client.query(sqlText)
    },
    async query<TRow extends Record<string, unknown>>(text: string, params: unknown[] = []) {
      const result = await client.query<TRow>(text, params)
      return result.rows
    },
  }
}

/**
 * Apply pending migrations in order, each in its own transaction. The first
 * failure rolls back that migration and stops the run.
 */
export async function runMigrations(
  session: MigrationSession,
  options: RunMigrationsOptions = {},
): Promise<MigrationReport> {
  const logger = options.logger ?? console
  const migrations = options.migrations ?? listMigrations()

  await session.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `)
  const recorded = await session.query<{ id: string }>('SELECT id FROM schema_migrations')
  const done = new Set(recorded.map((row) => row.id))

  const report: MigrationReport = { applied: [], skipped: [] }

  for (const migration of migrations) {
    if (done.has(migration.id) && !options.reapply) {
      report.skipped.push(migration.id)
      logger.info(`[db] skip ${migration.id} (already applied)`)
      continue
    }

    await session.exec('BEGIN')
    try {
      await session.exec(readFileSync(migration.file, 'utf8'))
      if (migration.afterSql) {
        const seeded = await migration.afterSql(session)
        if (seeded > 0) logger.info(`[db] ${migration.id}: seeded ${seeded} row(s)`)
      }
      await session.query(
        `INSERT INTO schema_migrations (id) VALUES ($1)
         ON CONFLICT (id) DO UPDATE SET applied_at = NOW()`,
        [migration.id],
      )
      await session.exec('COMMIT')
    } catch (error) {
      const rollbackError = await session.exec('ROLLBACK').then(
        () => undefined,
        (failure: unknown) => failure,
      )
      throw new MigrationError(migration.id, error, rollbackError)
    }

    report.applied.push(migration.id)
    logger.info(`[db] applied ${migration.id}`)
  }

  return report
}
