import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { eq } from 'drizzle-orm'
import {
  constraintDefinitionListSchema,
  constraintTemplateCatalogSchema,
  DEFAULT_BRANCH_CODE,
  type ConstraintDefinition,
  type ConstraintTemplateCatalog,
} from '@shiftdesk/schema'
import { constraints } from './schema/constraints'
import type { Database } from './index'
import type { MigrationSession } from './migrator'

const defaultConstraintsFile = fileURLToPath(new URL('../seeds/default-constraints.json', import.meta.url))
const constraintTemplatesFile = fileURLToPath(new URL('../seeds/constraint-templates.json', import.meta.url))

/** Weight used for a soft rule whose code is not in the default catalog. */
export const FALLBACK_PENALTY_WEIGHT = 10000

let cachedDefaults: ConstraintDefinition[] | null = null
let cachedTemplates: ConstraintTemplateCatalog | null = null

/**
 * The default rule catalog every new branch starts from: five hard rules
 * (priority 1-5) and twelve soft rules (priority 10-21).
 */
export function loadDefaultConstraints(): ConstraintDefinition[] {
  if (!cachedDefaults) {
    const raw: unknown = JSON.parse(readFileSync(defaultConstraintsFile, 'utf8'))
    cachedDefaults = constraintDefinitionListSchema.parse(raw)
  }
  return cachedDefaults
}

/** Templates editors add rules from, and the parameters each rule type takes. */
export function loadConstraintTemplates(): ConstraintTemplateCatalog {
  if (!cachedTemplates) {
    const raw: unknown = JSON.parse(readFileSync(constraintTemplatesFile, 'utf8'))
    cachedTemplates = constraintTemplateCatalogSchema.parse(raw)
  }
  return cachedTemplates
}

/**
 * Migration step run after `003_add_constraints.sql`.
 *
 * One statement: the `NOT EXISTS` guard is evaluated against the snapshot
 * taken when the statement starts, so either all rows go in or none do.
 */
export async function seedDefaultBranchConstraints(session: MigrationSession): Promise<number> {
  const rows = await session.query<{ id: string }>(
    `INSERT INTO constraints (branch_id, name, code, category, constraint_type, is_enabled, penalty_weight, priority_order, rule_definition)
     SELECT b.id, d.name, d.code, d.category, d.constraint_type, d.is_enabled, d.penalty_weight, d.priority_order, d.rule_definition
     FROM branches b
     CROSS JOIN jsonb_to_recordset($1::jsonb) AS d(
       name text, code text, category text, constraint_type text, is_enabled boolean,
       penalty_weight integer, priority_order integer, rule_definition jsonb
     )
     WHERE b.code = $2
       AND NOT EXISTS (SELECT 1 FROM constraints c WHERE c.branch_id = b.id)
     RETURNING id`,
    [JSON.stringify(loadDefaultConstraints()), DEFAULT_BRANCH_CODE],
  )
  return rows.length
}

/**
 * Give a branch the default catalog when it has no rules yet.
 * Returns the number of rows inserted; 0 means the branch was left alone.
 */
export async function seedDefaultConstraints(db: Database, branchId: string): Promise<number> {
  return db.transaction(async (tx) => {
    const existing = await tx
      .select({ id: constraints.id })
      .from(constraints)
      .where(eq(constraints.branchId, branchId))
      .limit(1)
    if (existing.length > 0) return 0

    const inserted = await tx
      .insert(constraints)
      .values(
        loadDefaultConstraints().map((definition) => ({
          branchId,
          name: definition.name,
          code: definition.code,
          category: definition.category,
          constraintType: definition.constraint_type,
          isEnabled: definition.is_enabled,
          penaltyWeight: definition.penalty_weight,
          priorityOrder: definition.priority_order,
          ruleDefinition: definition.rule_definition,
        })),
      )
      .returning({ id: constraints.id })
    return inserted.length
  })
}

/** Soft weight multipliers. Hard rules are never rescaled. */
export const CONSTRAINT_PRESETS = {
  strict: 2,
  normal: 1,
  flexible: 0.5,
} as const

export type ConstraintPreset = keyof typeof CONSTRAINT_PRESETS

export const CONSTRAINT_PRESET_NAMES = ['strict', 'normal', 'flexible'] as const satisfies readonly ConstraintPreset[]

export function defaultPenaltyWeight(code: string): number {
  const match = loadDefaultConstraints().find((definition) => definition.code === code)
  return match ? match.penalty_weight : FALLBACK_PENALTY_WEIGHT
}

/** Preset weight for a soft rule, always derived from the catalog default. */
export function presetPenaltyWeight(code: string, preset: ConstraintPreset): number {
  return Math.trunc(defaultPenaltyWeight(code) * CONSTRAINT_PRESETS[preset])
}
