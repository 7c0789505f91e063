/**
 * PostgreSQL integrity errors, classified by SQLSTATE.
 *
 * Both node-postgres and PGlite surface the server error with `code`,
 * `constraint` and `detail` fields; anything without a known code is not an
 * integrity error and classifies to `null`.
 */

export type DatabaseErrorKind = 'unique' | 'foreign_key' | 'not_null' | 'check'

export type ClassifiedDatabaseError = {
  kind: DatabaseErrorKind
  /** Name of the violated constraint or index, when the server reports one. */
  constraint: string | null
  detail: string | null
}

const SQLSTATE_KINDS: Partial<Record<string, DatabaseErrorKind>> = {
  '23505': 'unique',
  '23503': 'foreign_key',
  '23502': 'not_null',
  '23514': 'check',
}

function stringField(source: object, key: string): string | null {
  if (!(key in source)) return null
  const value: unknown = Reflect.get(source, key)
  return typeof value === 'string' ? value : null
}

/**
 * Drizzle may wrap the driver error; follow `cause` a few levels down.
 */
export function classifyDatabaseError(error: unknown): ClassifiedDatabaseError | null {
  let current: unknown = error
  for (let depth = 0; depth < 4; depth += 1) {
    if (typeof current !== 'object' || current === null) return null

    const code = stringField(current, 'code')
    const kind = code ? SQLSTATE_KINDS[code] : undefined
    if (kind) {
      return {
        kind,
        constraint: stringField(current, 'constraint'),
        detail: stringField(current, 'detail'),
      }
    }

    current = 'cause' in current ? current.cause : undefined
  }
  return null
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}

/**
 * A migration failed and later ones did not run. `cause` is the migration's
 * own error; `rollbackError` is set when the rollback after it failed too.
 */
export class MigrationError extends Error {
  constructor(
    public readonly migrationId: string,
    cause: unknown,
    public readonly rollbackError?: unknown,
  ) {
    const rollback = rollbackError === undefined ? '' : ` (rollback also failed: ${describeCause(rollbackError)})`
    super(`Migration ${migrationId} failed: ${describeCause(cause)}${rollback}`, { cause })
    this.name = 'MigrationError'
  }
}
