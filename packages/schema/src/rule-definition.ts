import { z } from 'zod'
import { SUPPORTED_LANGUAGES, type Language } from './vocabulary'

/**
 * Constraint rule payloads (`constraints.rule_definition`).
 *
 * The column is an open JSON document and the database checks nothing inside
 * it. Consumers narrow it here: one variant per known `type`, each carrying
 * its own `rule` parameters, and an opaque fallback for anything else so new
 * rule types can be stored before this package knows about them.
 *
 * Unknown keys survive parsing on both the document and its `rule`.
 */

const shiftCodes = z.array(z.string().min(1))

/** Localized human text kept inline, not as i18n keys. */
const descriptions = {
  description_ja: z.string().optional(),
  description_ko: z.string().optional(),
  description_en: z.string().optional(),
}

const ruleVariant = <TType extends string, TRule extends z.ZodTypeAny>(type: TType, rule: TRule) =>
  z.object({ type: z.literal(type), ...descriptions, rule }).passthrough()

export const sequenceRuleSchema = ruleVariant(
  'sequence',
  z
    .object({
      after_shifts: shiftCodes.optional(),
      next_day_must_be: shiftCodes.optional(),
    })
    .passthrough()
    .default({}),
)

export const rollingWindowRuleSchema = ruleVariant(
  'rolling_window',
  z
    .object({
      max_consecutive_work_days: z.number().int().min(1).max(31).optional(),
      max_consecutive_off_days: z.number().int().min(1).max(31).optional(),
    })
    .passthrough()
    .default({}),
)

export const basicRuleSchema = ruleVariant(
  'basic',
  z
    .object({
      exactly_one_shift_per_day: z.boolean().optional(),
    })
    .passthrough()
    .default({}),
)

export const skillMatchRuleSchema = ruleVariant(
  'skill_match',
  z
    .object({
      /** Shift code -> skill tag a staff member needs to work it. */
      shift_skill_map: z.record(z.string()).optional(),
    })
    .passthrough()
    .default({}),
)

export const forbiddenRuleSchema = ruleVariant(
  'forbidden',
  z
    .object({
      respect_ng_assignments: z.boolean().optional(),
    })
    .passthrough()
    .default({}),
)

export const preferenceRuleSchema = ruleVariant(
  'preference',
  z
    .object({
      maximize_request_satisfaction: z.boolean().optional(),
      prefer_full_weekend_off_or_work: z.boolean().optional(),
      honor_staff_preference: z.boolean().optional(),
      prefer_field: z.string().optional(),
    })
    .passthrough()
    .default({}),
)

export const balanceRuleSchema = ruleVariant(
  'balance',
  z
    .object({
      balance_shifts: shiftCodes.optional(),
      among_staff_with_skill: z.string().optional(),
      balance_weekend_work: z.boolean().optional(),
      target_off_days_field: z.string().optional(),
      deviation_penalty: z.boolean().optional(),
      leave_balance_field: z.string().optional(),
      consume_leave_balance: z.boolean().optional(),
    })
    .passthrough()
    .default({}),
)

export const coverageRuleSchema = ruleVariant(
  'coverage',
  z
    .object({
      min_staff_per_day: z.number().int().min(0).optional(),
      exclude_shifts: shiftCodes.optional(),
      shift_code: z.string().optional(),
      exactly_per_day: z.number().int().min(0).optional(),
      on_closed_days: z.boolean().optional(),
      night_shift_count: z.number().int().min(0).optional(),
    })
    .passthrough()
    .default({}),
)

export const knownRuleDefinitionSchema = z.discriminatedUnion('type', [
  sequenceRuleSchema,
  rollingWindowRuleSchema,
  basicRuleSchema,
  skillMatchRuleSchema,
  forbiddenRuleSchema,
  preferenceRuleSchema,
  balanceRuleSchema,
  coverageRuleSchema,
])

export type KnownRuleDefinition = z.infer<typeof knownRuleDefinitionSchema>
export type RuleType = KnownRuleDefinition['type']

export const KNOWN_RULE_TYPES: readonly RuleType[] = [
  'sequence',
  'rolling_window',
  'basic',
  'skill_match',
  'forbidden',
  'preference',
  'balance',
  'coverage',
]

/** What the storage layer accepts: any JSON object. */
export const ruleDefinitionDocumentSchema = z.record(z.unknown())
export type RuleDefinitionDocument = z.infer<typeof ruleDefinitionDocumentSchema>

export type ParsedRuleDefinition =
  | { kind: 'known'; definition: KnownRuleDefinition }
  | { kind: 'opaque'; type: string | null; document: RuleDefinitionDocument; issues: string[] }

/**
 * Narrow a stored document to its variant. Never throws: unknown types and
 * payloads that do not fit their variant come back as `opaque` with the
 * reasons listed in `issues`.
 */
export function parseRuleDefinition(document: RuleDefinitionDocument): ParsedRuleDefinition {
  const parsed = knownRuleDefinitionSchema.safeParse(document)
  if (parsed.success) {
    return { kind: 'known', definition: parsed.data }
  }

  return {
    kind: 'opaque',
    type: typeof document.type === 'string' ? document.type : null,
    document,
    issues: parsed.error.issues.map((issue) => {
      const path = issue.path.join('.')
      return `${path || '(root)'}: ${issue.message}`
    }),
  }
}

export function isKnownRuleType(value: unknown): value is RuleType {
  return typeof value === 'string' && KNOWN_RULE_TYPES.some((type) => type === value)
}

/**
 * Localized description of a rule, or `fallback` (usually the constraint
 * name) when the document has none for that language.
 */
export function describeRule(document: RuleDefinitionDocument, lang: Language, fallback: string): string {
  const value = document[`description_${lang}`]
  return typeof value === 'string' && value.trim() ? value : fallback
}

export const languageSchema = z.enum(SUPPORTED_LANGUAGES)
