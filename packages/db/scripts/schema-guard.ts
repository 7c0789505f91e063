import 'dotenv/config'
import { createPgMigrationSession, createPool, inspectSchema, loadDatabaseConfig } from '../src'

/**
 * Checks a migrated database for drift: updated_at triggers, row level
 * security, branch scoping and the append-only audit log.
 */
async function main() {
  const pool = createPool(loadDatabaseConfig(process.env))
  const client = await pool.connect()
  let errorCount = 0

  try {
    const findings = await inspectSchema(createPgMigrationSession(client))
    const errors = findings.filter((f) => f.level === 'error')
    const warns = findings.filter((f) => f.level === 'warn')
    errorCount = errors.length

    for (const finding of findings) {
      const prefix = finding.level === 'error' ? 'ERROR' : 'WARN '
      console.log(`${prefix} [${finding.rule}] ${finding.table} -> ${finding.detail}`)
    }

    console.log(`schema-guard: ${errors.length} error(s), ${warns.length} warning(s).`)
  } finally {
    client.release()
    await pool.end()
  }

  if (errorCount > 0) process.exit(1)
}

main().catch((error) => {
  console.error('schema-guard failed:', error)
  process.exit(1)
})
