import { z } from 'zod'
import { isKnownRuleType } from './rule-definition'
import { CONSTRAINT_CATEGORIES, CONSTRAINT_TYPES, type Language } from './vocabulary'

/**
 * Constraint templates: ready-made rules an editor can add to a branch,
 * each exposing a few parameters the user may change before it is created.
 * The rule type catalog lists the parameters every rule type understands,
 * for building a rule from scratch.
 */

const labels = {
  label_ja: z.string().min(1),
  label_ko: z.string().min(1),
  label_en: z.string().min(1),
}

const templateParamSchema = z.discriminatedUnion('type', [
  z.object({ key: z.string().min(1), ...labels, type: z.literal('text'), default: z.string() }),
  z.object({
    key: z.string().min(1),
    ...labels,
    type: z.literal('number'),
    default: z.number(),
    min: z.number().optional(),
    max: z.number().optional(),
  }),
  z.object({ key: z.string().min(1), ...labels, type: z.literal('bool'), default: z.boolean() }),
  z.object({ key: z.string().min(1), ...labels, type: z.literal('json'), default: z.record(z.unknown()) }),
])
type TemplateParam = z.infer<typeof templateParamSchema>

const knownRuleType = z.string().refine(isKnownRuleType, (value) => ({ message: `Unknown rule type: ${value}` }))

const localizedText = {
  name_ja: z.string().min(1),
  name_ko: z.string().min(1),
  name_en: z.string().min(1),
  description_ja: z.string().min(1),
  description_ko: z.string().min(1),
  description_en: z.string().min(1),
}
const localizedTextSchema = z.object(localizedText)
type LocalizedText = z.infer<typeof localizedTextSchema>

const constraintTemplateSchema = z.object({
  template_id: z.string().regex(/^[a-z0-9_]+$/, 'Template ids are lower-case snake_case'),
  ...localizedText,
  category: z.enum(CONSTRAINT_CATEGORIES),
  constraint_type: z.enum(CONSTRAINT_TYPES),
  default_weight: z.number().int().min(0),
  rule_definition: z.object({ type: knownRuleType, rule: z.record(z.unknown()) }).passthrough(),
  editable_params: z.array(templateParamSchema).default([]),
})
export type ConstraintTemplate = z.infer<typeof constraintTemplateSchema>

const ruleTypeInfoSchema = z.object({
  ...localizedText,
  params: z.array(templateParamSchema),
})
export type RuleTypeInfo = z.infer<typeof ruleTypeInfoSchema>

export const constraintTemplateCatalogSchema = z
  .object({
    rule_types: z.record(knownRuleType, ruleTypeInfoSchema),
    templates: z.array(constraintTemplateSchema),
  })
  .superRefine((catalog, ctx) => {
    const seen = new Set<string>()
    for (const [index, template] of catalog.templates.entries()) {
      if (seen.has(template.template_id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['templates', index, 'template_id'],
          message: `Duplicate template id: ${template.template_id}`,
        })
      }
      seen.add(template.template_id)
    }
  })
export type ConstraintTemplateCatalog = z.infer<typeof constraintTemplateCatalogSchema>

/** Name and description of a template or rule type in one language. */
export function localizeText(entry: LocalizedText, lang: Language) {
  const name = `name_${lang}` as const
  const description = `description_${lang}` as const
  return { name: entry[name], description: entry[description] }
}

/** Overrides that change the weight column rather than the rule payload. */
const PENALTY_WEIGHT_PARAM = 'penalty_weight'

type ParamValue = string | number | boolean | Record<string, unknown>

function paramValueSchema(param: TemplateParam): z.ZodType<ParamValue> {
  switch (param.type) {
    case 'text':
      return z.string().max(500)
    case 'number': {
      let schema = z.number().int()
      if (param.min !== undefined) schema = schema.min(param.min)
      if (param.max !== undefined) schema = schema.max(param.max)
      return schema
    }
    case 'bool':
      return z.boolean()
    case 'json':
      return z.record(z.unknown())
  }
}

type TemplateApplication =
  | { ok: true; ruleDefinition: Record<string, unknown>; penaltyWeight: number }
  | { ok: false; issues: string[] }

/**
 * Rule payload and weight for a template with user overrides applied.
 *
 * Only the template's editable parameters may be overridden. A text value
 * replacing a list in the rule is split on commas, so `"Q1, X1"` becomes
 * `["Q1", "X1"]`. The template's descriptions are copied onto the payload.
 */
export function applyTemplateParams(
  template: ConstraintTemplate,
  overrides: Record<string, unknown>,
): TemplateApplication {
  const issues: string[] = []
  const rule: Record<string, unknown> = { ...template.rule_definition.rule }
  let penaltyWeight = template.default_weight

  for (const [key, value] of Object.entries(overrides)) {
    const param = template.editable_params.find((candidate) => candidate.key === key)
    if (!param) {
      issues.push(`${key}: not an editable parameter of ${template.template_id}`)
      continue
    }

    const parsed = paramValueSchema(param).safeParse(value)
    if (!parsed.success) {
      issues.push(`${key}: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`)
      continue
    }

    if (key === PENALTY_WEIGHT_PARAM && typeof parsed.data === 'number') {
      penaltyWeight = parsed.data
    } else if (typeof parsed.data === 'string' && Array.isArray(rule[key])) {
      rule[key] = parsed.data
        .split(',')
        .map((code) => code.trim())
        .filter(Boolean)
    } else {
      rule[key] = parsed.data
    }
  }

  if (issues.length > 0) return { ok: false, issues }

  return {
    ok: true,
    penaltyWeight,
    ruleDefinition: {
      ...template.rule_definition,
      description_ja: template.description_ja,
      description_ko: template.description_ko,
      description_en: template.description_en,
      rule,
    },
  }
}
