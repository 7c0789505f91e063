import { PGlite } from '@electric-sql/pglite'
import { drizzle } from 'drizzle-orm/pglite'
import { schema, type Database } from './index'
import { runMigrations, type MigrationLogger, type MigrationSession } from './migrator'

/**
 * In-process PostgreSQL for tests. Each call gets an empty in-memory
 * database; nothing touches the network or disk.
 */

export const silentLogger: MigrationLogger = {
  info() {},
}

export function createPgliteMigrationSession(client: PGlite): MigrationSession {
  return {
    async exec(sqlText) {
      await client.exec(sqlText)
    },
    async query<TRow extends Record<string, unknown>>(text: string, params: unknown[] = []) {
      const result = await client.query<TRow>(text, params)
      return result.rows
    },
  }
}

export type TestDatabase = {
  client: PGlite
  db: Database
  session: MigrationSession
  close: () => Promise<void>
}

/** Fresh database; pass `migrate: false` to get an empty schema. */
export async function createTestDatabase(options: { migrate?: boolean } = {}): Promise<TestDatabase> {
  const client = new PGlite()
  const session = createPgliteMigrationSession(client)

  if (options.migrate ?? true) {
    await runMigrations(session, { logger: silentLogger })
  }

  return {
    client,
    db: drizzle(client, { schema }),
    session,
    close: () => client.close(),
  }
}

/** Id of the branch the migrations create. */
export async function mainBranchId(session: MigrationSession): Promise<string> {
  const rows = await session.query<{ id: string }>(`SELECT id FROM branches WHERE code = 'MAIN'`)
  const row = rows[0]
  if (!row) throw new Error('MAIN branch is missing; were the migrations applied?')
  return row.id
}

/** Resolve with the error `run` rejects with; fail if it succeeds. */
export async function captureError(run: () => Promise<unknown>): Promise<unknown> {
  try {
    await run()
  } catch (error) {
    return error
  }
  throw new Error('Expected the operation to fail, but it succeeded')
}

/** PGlite reads the wall clock at millisecond resolution. */
export function pause(ms = 5): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
