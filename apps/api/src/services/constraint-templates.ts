import { and, eq, max } from 'drizzle-orm'
import { constraints, loadConstraintTemplates, type Constraint, type Database } from '@shiftdesk/db'
import {
  applyTemplateParams,
  localizeText,
  type ConstraintTemplate,
  type ConstraintType,
  type Language,
  type RuleTypeInfo,
} from '@shiftdesk/schema'
import { ApiError, NotFoundError } from '../lib/errors'
import { createConstraint } from './constraints'

export type LocalizedTemplate = ConstraintTemplate & { name: string; description: string }
export type LocalizedRuleType = RuleTypeInfo & { type: string; name: string; description: string }

export type TemplateConstraintInput = {
  templateId: string
  code: string
  name?: string
  priorityOrder?: number
  isEnabled?: boolean
  params?: Record<string, unknown>
}

/** Where a new rule of each type lands when no priority is given and the branch has none of that type. */
const FIRST_PRIORITY: Record<ConstraintType, number> = { hard: 1, soft: 10 }

export function listConstraintTemplates(lang: Language): LocalizedTemplate[] {
  return loadConstraintTemplates().templates.map((template) => ({
    ...template,
    ...localizeText(template, lang),
  }))
}

export function listRuleTypes(lang: Language): LocalizedRuleType[] {
  const ruleTypes: LocalizedRuleType[] = []
  for (const [type, info] of Object.entries(loadConstraintTemplates().rule_types)) {
    if (info) ruleTypes.push({ ...info, type, ...localizeText(info, lang) })
  }
  return ruleTypes
}

export function getConstraintTemplate(templateId: string): ConstraintTemplate {
  const template = loadConstraintTemplates().templates.find((candidate) => candidate.template_id === templateId)
  if (!template) throw new NotFoundError('Constraint template', templateId)
  return template
}

async function nextPriority(db: Database, branchId: string, type: ConstraintType): Promise<number> {
  const [row] = await db
    .select({ highest: max(constraints.priorityOrder) })
    .from(constraints)
    .where(and(eq(constraints.branchId, branchId), eq(constraints.constraintType, type)))
  return row?.highest == null ? FIRST_PRIORITY[type] : row.highest + 1
}

/**
 * Add a rule built from a template. Overrides apply to the template's
 * editable parameters only; the ordering convention is checked like any
 * other create.
 */
export async function createConstraintFromTemplate(
  db: Database,
  branchId: string,
  input: TemplateConstraintInput,
): Promise<Constraint> {
  const template = getConstraintTemplate(input.templateId)
  const applied = applyTemplateParams(template, input.params ?? {})
  if (!applied.ok) {
    throw new ApiError(400, 'VALIDATION_ERROR', `Invalid parameters for template ${template.template_id}.`, {
      issues: applied.issues,
    })
  }

  return createConstraint(db, branchId, {
    name: input.name ?? template.template_id,
    code: input.code,
    category: template.category,
    constraint_type: template.constraint_type,
    is_enabled: input.isEnabled ?? true,
    penalty_weight: applied.penaltyWeight,
    priority_order: input.priorityOrder ?? (await nextPriority(db, branchId, template.constraint_type)),
    rule_definition: applied.ruleDefinition,
  })
}
