import { and, asc, eq, inArray, sql } from 'drizzle-orm'
import {
  constraints,
  presetPenaltyWeight,
  seedDefaultConstraints,
  type Constraint,
  type ConstraintPreset,
  type Database,
} from '@shiftdesk/db'
import {
  describeRule,
  parseRuleDefinition,
  type ConstraintCategory,
  type ConstraintDefinition,
  type ConstraintType,
  type Language,
  type ParsedRuleDefinition,
} from '@shiftdesk/schema'
import { NotFoundError, OrderingConventionError, type OrderingViolation } from '../lib/errors'

/**
 * Constraint catalog per branch: reads for administrators and for the
 * scheduling engine, plus rule authoring.
 *
 * Authoring writes (create, update, reorder, import, preset) run in one
 * transaction that ends with the ordering check, so a write that would put a
 * soft rule ahead of a hard one never commits.
 */

export type ConstraintPatch = Partial<ConstraintDefinition>

export type EngineConstraint = {
  id: string
  code: string
  name: string
  category: ConstraintCategory
  penaltyWeight: number
  priorityOrder: number
  /** Rule description in the requested language, or the rule name. */
  description: string
  rule: ParsedRuleDefinition
}

export type ConstraintFilter = {
  category?: ConstraintCategory
  type?: ConstraintType
}

export type EngineView = {
  hard: EngineConstraint[]
  soft: EngineConstraint[]
}

export type ConstraintSummary = {
  total: number
  enabled: number
  disabled: number
  hard: number
  soft: number
  byCategory: Record<ConstraintCategory, number>
}

type OrderingInput = Pick<Constraint, 'code' | 'constraintType' | 'priorityOrder' | 'penaltyWeight'>

/**
 * Pairs breaking the convention: a hard rule must come strictly before and
 * weigh strictly more than every soft rule.
 */
export function findOrderingViolations(rows: OrderingInput[]): OrderingViolation[] {
  const hard = rows.filter((row) => row.constraintType === 'hard')
  const soft = rows.filter((row) => row.constraintType === 'soft')
  const violations: OrderingViolation[] = []

  for (const h of hard) {
    for (const s of soft) {
      if (h.priorityOrder >= s.priorityOrder) {
        violations.push({ hard: h.code, soft: s.code, field: 'priority_order' })
      }
      if (h.penaltyWeight <= s.penaltyWeight) {
        violations.push({ hard: h.code, soft: s.code, field: 'penalty_weight' })
      }
    }
  }
  return violations
}

async function assertOrderingConvention(db: Database, branchId: string) {
  const rows = await db
    .select({
      code: constraints.code,
      constraintType: constraints.constraintType,
      priorityOrder: constraints.priorityOrder,
      penaltyWeight: constraints.penaltyWeight,
    })
    .from(constraints)
    .where(eq(constraints.branchId, branchId))
    .orderBy(asc(constraints.priorityOrder), asc(constraints.code))

  const violations = findOrderingViolations(rows)
  if (violations.length > 0) {
    throw new OrderingConventionError(violations)
  }
}

function toValues(branchId: string, definition: ConstraintDefinition) {
  return {
    branchId,
    name: definition.name,
    code: definition.code,
    category: definition.category,
    constraintType: definition.constraint_type,
    isEnabled: definition.is_enabled,
    penaltyWeight: definition.penalty_weight,
    priorityOrder: definition.priority_order,
    ruleDefinition: definition.rule_definition,
  }
}

/** Portable form: no id, no branch, snake_case keys. */
export function toDefinition(row: Constraint): ConstraintDefinition {
  return {
    name: row.name,
    code: row.code,
    category: row.category,
    constraint_type: row.constraintType,
    is_enabled: row.isEnabled,
    penalty_weight: row.penaltyWeight,
    priority_order: row.priorityOrder,
    rule_definition: row.ruleDefinition,
  }
}

export async function listConstraints(
  db: Database,
  branchId: string,
  filter: ConstraintFilter = {},
): Promise<Constraint[]> {
  return db
    .select()
    .from(constraints)
    .where(
      and(
        eq(constraints.branchId, branchId),
        filter.category ? eq(constraints.category, filter.category) : undefined,
        filter.type ? eq(constraints.constraintType, filter.type) : undefined,
      ),
    )
    .orderBy(asc(constraints.priorityOrder), asc(constraints.code))
}

export async function getConstraint(db: Database, branchId: string, id: string): Promise<Constraint> {
  const [row] = await db
    .select()
    .from(constraints)
    .where(and(eq(constraints.branchId, branchId), eq(constraints.id, id)))
    .limit(1)
  if (!row) throw new NotFoundError('Constraint', id)
  return row
}

/**
 * What a scheduling engine consumes: enabled rules only, split by type, each
 * list in priority order, rule payloads narrowed.
 */
export async function getEngineView(db: Database, branchId: string, lang: Language = 'ja'): Promise<EngineView> {
  const rows = await listConstraints(db, branchId)
  const view: EngineView = { hard: [], soft: [] }

  for (const row of rows) {
    if (!row.isEnabled) continue
    const entry: EngineConstraint = {
      id: row.id,
      code: row.code,
      name: row.name,
      category: row.category,
      penaltyWeight: row.penaltyWeight,
      priorityOrder: row.priorityOrder,
      description: describeRule(row.ruleDefinition, lang, row.name),
      rule: parseRuleDefinition(row.ruleDefinition),
    }
    if (row.constraintType === 'hard') view.hard.push(entry)
    else view.soft.push(entry)
  }
  return view
}

export async function summarizeConstraints(db: Database, branchId: string): Promise<ConstraintSummary> {
  const rows = await listConstraints(db, branchId)
  const enabled = rows.filter((row) => row.isEnabled)

  const byCategory: Record<ConstraintCategory, number> = {
    coverage: 0,
    sequence: 0,
    balance: 0,
    preference: 0,
    skill: 0,
  }
  for (const row of enabled) {
    byCategory[row.category] = (byCategory[row.category] ?? 0) + 1
  }

  return {
    total: rows.length,
    enabled: enabled.length,
    disabled: rows.length - enabled.length,
    hard: enabled.filter((row) => row.constraintType === 'hard').length,
    soft: enabled.filter((row) => row.constraintType === 'soft').length,
    byCategory,
  }
}

export async function createConstraint(
  db: Database,
  branchId: string,
  definition: ConstraintDefinition,
): Promise<Constraint> {
  return db.transaction(async (tx) => {
    const [created] = await tx.insert(constraints).values(toValues(branchId, definition)).returning()
    if (!created) throw new Error('constraint insert returned no row')
    await assertOrderingConvention(tx, branchId)
    return created
  })
}

export async function updateConstraint(
  db: Database,
  branchId: string,
  id: string,
  patch: ConstraintPatch,
): Promise<Constraint> {
  return db.transaction(async (tx) => {
    const [updated] = await tx
      .update(constraints)
      .set({
        name: patch.name,
        code: patch.code,
        category: patch.category,
        constraintType: patch.constraint_type,
        isEnabled: patch.is_enabled,
        penaltyWeight: patch.penalty_weight,
        priorityOrder: patch.priority_order,
        ruleDefinition: patch.rule_definition,
      })
      .where(and(eq(constraints.branchId, branchId), eq(constraints.id, id)))
      .returning()
    if (!updated) throw new NotFoundError('Constraint', id)
    await assertOrderingConvention(tx, branchId)
    return updated
  })
}

/** Flips the flag in the UPDATE itself, so concurrent toggles each take effect. */
export async function toggleConstraint(db: Database, branchId: string, id: string): Promise<Constraint> {
  const [updated] = await db
    .update(constraints)
    .set({ isEnabled: sql`not ${constraints.isEnabled}` })
    .where(and(eq(constraints.branchId, branchId), eq(constraints.id, id)))
    .returning()
  if (!updated) throw new NotFoundError('Constraint', id)
  return updated
}

/** `ids[i]` gets priority `i + 1`; rules not listed keep theirs. */
export async function reorderConstraints(db: Database, branchId: string, ids: string[]): Promise<Constraint[]> {
  return db.transaction(async (tx) => {
    const owned = await tx
      .select({ id: constraints.id })
      .from(constraints)
      .where(and(eq(constraints.branchId, branchId), inArray(constraints.id, ids)))
    const ownedIds = new Set(owned.map((row) => row.id))
    const missing = ids.find((id) => !ownedIds.has(id))
    if (missing) throw new NotFoundError('Constraint', missing)

    for (const [index, id] of ids.entries()) {
      await tx.update(constraints).set({ priorityOrder: index + 1 }).where(eq(constraints.id, id))
    }

    await assertOrderingConvention(tx, branchId)
    return listConstraints(tx, branchId)
  })
}

/** Rescale every soft rule from its catalog default weight. */
export async function applyPreset(db: Database, branchId: string, preset: ConstraintPreset): Promise<Constraint[]> {
  return db.transaction(async (tx) => {
    const soft = await tx
      .select({ id: constraints.id, code: constraints.code })
      .from(constraints)
      .where(and(eq(constraints.branchId, branchId), eq(constraints.constraintType, 'soft')))

    for (const row of soft) {
      await tx
        .update(constraints)
        .set({ penaltyWeight: presetPenaltyWeight(row.code, preset) })
        .where(eq(constraints.id, row.id))
    }

    await assertOrderingConvention(tx, branchId)
    return listConstraints(tx, branchId)
  })
}

export async function initializeDefaults(db: Database, branchId: string): Promise<{ inserted: number }> {
  return { inserted: await seedDefaultConstraints(db, branchId) }
}

export async function exportConstraints(db: Database, branchId: string): Promise<ConstraintDefinition[]> {
  const rows = await listConstraints(db, branchId)
  return rows.map(toDefinition)
}

/**
 * Insert definitions for a branch. With `replace`, existing rules are removed
 * first. All or nothing: a duplicate code or an ordering violation rolls the
 * whole import back.
 */
export async function importConstraints(
  db: Database,
  branchId: string,
  definitions: ConstraintDefinition[],
  options: { replace?: boolean } = {},
): Promise<{ imported: number; removed: number }> {
  return db.transaction(async (tx) => {
    let removed = 0
    if (options.replace) {
      const deleted = await tx
        .delete(constraints)
        .where(eq(constraints.branchId, branchId))
        .returning({ id: constraints.id })
      removed = deleted.length
    }

    if (definitions.length > 0) {
      await tx.insert(constraints).values(definitions.map((definition) => toValues(branchId, definition)))
    }

    await assertOrderingConvention(tx, branchId)
    return { imported: definitions.length, removed }
  })
}

export async function deleteConstraint(db: Database, branchId: string, id: string): Promise<void> {
  const deleted = await db
    .delete(constraints)
    .where(and(eq(constraints.branchId, branchId), eq(constraints.id, id)))
    .returning({ id: constraints.id })
  if (deleted.length === 0) throw new NotFoundError('Constraint', id)
}
