import type { MigrationSession } from './migrator'

export type Finding = {
  level: 'error' | 'warn'
  rule: string
  table: string
  detail: string
}

/** Tables that must carry `branch_id`. */
export const BRANCH_SCOPED_TABLES = [
  'staff',
  'notifications',
  'swap_requests',
  'monthly_shifts',
  'monthly_shifts_summary',
  'user_branches',
  'constraints',
] as const

/** Bookkeeping tables outside the data model. */
const infrastructureTables = new Set(['schema_migrations'])

/**
 * Check the live catalog against the schema rules the migrations establish.
 * Reads only; an empty result means the database is consistent.
 */
export async function inspectSchema(session: MigrationSession): Promise<Finding[]> {
  const findings: Finding[] = []

  const untriggered = await session.query<{ table_name: string }>(`
    SELECT c.table_name::text AS table_name
    FROM information_schema.columns c
    WHERE c.table_schema = current_schema()
      AND c.column_name = 'updated_at'
      AND NOT EXISTS (
        SELECT 1
        FROM pg_trigger t
        JOIN pg_class r ON r.oid = t.tgrelid
        JOIN pg_namespace n ON n.oid = r.relnamespace
        JOIN pg_proc p ON p.oid = t.tgfoid
        WHERE n.nspname = current_schema()
          AND r.relname = c.table_name
          AND p.proname = 'update_updated_at_column'
          AND NOT t.tgisinternal
      )
    ORDER BY 1
  `)
  for (const row of untriggered) {
    findings.push({
      level: 'error',
      rule: 'updated-at-trigger-missing',
      table: row.table_name,
      detail: `Table "${row.table_name}" has updated_at but no trigger calling update_updated_at_column().`,
    })
  }

  const tables = await session.query<{ relname: string; relrowsecurity: boolean }>(`
    SELECT r.relname::text AS relname, r.relrowsecurity
    FROM pg_class r
    JOIN pg_namespace n ON n.oid = r.relnamespace
    WHERE n.nspname = current_schema() AND r.relkind = 'r'
    ORDER BY 1
  `)
  for (const table of tables) {
    if (infrastructureTables.has(table.relname) || table.relrowsecurity) continue
    findings.push({
      level: 'error',
      rule: 'row-level-security-disabled',
      table: table.relname,
      detail: `Table "${table.relname}" does not have row level security enabled.`,
    })
  }

  const branchColumns = await session.query<{ table_name: string }>(`
    SELECT table_name::text AS table_name
    FROM information_schema.columns
    WHERE table_schema = current_schema() AND column_name = 'branch_id'
  `)
  const withBranch = new Set(branchColumns.map((row) => row.table_name))
  const existing = new Set(tables.map((table) => table.relname))
  for (const name of BRANCH_SCOPED_TABLES) {
    if (!existing.has(name) || withBranch.has(name)) continue
    findings.push({
      level: 'error',
      rule: 'branch-scope-missing',
      table: name,
      detail: `Table "${name}" is branch scoped and must define branch_id.`,
    })
  }

  if (existing.has('staff_audit')) {
    const guards = await session.query<{ tgname: string }>(`
      SELECT t.tgname::text AS tgname
      FROM pg_trigger t
      JOIN pg_class r ON r.oid = t.tgrelid
      JOIN pg_namespace n ON n.oid = r.relnamespace
      JOIN pg_proc p ON p.oid = t.tgfoid
      WHERE n.nspname = current_schema()
        AND r.relname = 'staff_audit'
        AND p.proname = 'prevent_staff_audit_mutation'
    `)
    if (guards.length === 0) {
      findings.push({
        level: 'warn',
        rule: 'audit-log-mutable',
        table: 'staff_audit',
        detail: 'Table "staff_audit" accepts UPDATE and DELETE; expected the append-only trigger.',
      })
    }
  }

  return findings
}
