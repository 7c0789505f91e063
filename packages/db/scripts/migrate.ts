import 'dotenv/config'
import { createPgMigrationSession, createPool, loadDatabaseConfig, runMigrations } from '../src'

/**
 * Applies SQL migrations from `packages/db/migrations`.
 *
 * `--reapply` replays every migration; on a current schema nothing changes.
 */
async function run() {
  const pool = createPool(loadDatabaseConfig(process.env))
  const client = await pool.connect()
  try {
    const report = await runMigrations(createPgMigrationSession(client), {
      reapply: process.argv.includes('--reapply'),
    })
    console.log(
      `Database migrations done: ${report.applied.length} applied, ${report.skipped.length} skipped.`,
    )
  } finally {
    client.release()
    await pool.end()
  }
}

run().catch((error) => {
  console.error('Migration failed:', error)
  process.exit(1)
})
