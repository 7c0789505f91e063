import { z } from 'zod'
import {
  CONSTRAINT_CATEGORIES,
  CONSTRAINT_TYPES,
} from './vocabulary'
import { ruleDefinitionDocumentSchema } from './rule-definition'

export * from './vocabulary'
export * from './rule-definition'
export * from './templates'

// Common schemas
export const idSchema = z.string().uuid()

export const yearSchema = z.coerce.number().int().min(2000).max(2100)
export const monthSchema = z.coerce.number().int().min(1).max(12)

/** Day of month ("1".."31") -> shift code; empty string means unassigned. */
export const shiftDataSchema = z.record(
  z.string().regex(/^(?:[1-9]|[12]\d|3[01])$/, 'Expected a day of month between 1 and 31'),
  z.string().max(20),
)
export type ShiftData = z.infer<typeof shiftDataSchema>

/** Branch `settings` document; extra keys are kept as-is. */
export const branchSettingsSchema = z
  .object({
    is_default: z.boolean().optional(),
    day_shifts: z.array(z.string().min(1)).optional(),
    night_shifts: z.array(z.string().min(1)).optional(),
    required_shifts: z.array(z.string().min(1)).optional(),
  })
  .passthrough()
export type BranchSettings = z.infer<typeof branchSettingsSchema>

/**
 * Portable constraint definition: the shape of the seed catalog and of
 * constraint export/import files. Snake_case keys match the column names.
 */
export const constraintDefinitionSchema = z.object({
  name: z.string().min(1).max(200),
  code: z
    .string()
    .min(1)
    .max(100)
    .regex(/^[A-Z0-9_]+$/, 'Codes are upper-case letters, digits and underscores'),
  category: z.enum(CONSTRAINT_CATEGORIES).default('coverage'),
  constraint_type: z.enum(CONSTRAINT_TYPES).default('soft'),
  is_enabled: z.boolean().default(true),
  penalty_weight: z.number().int().min(0).default(10000),
  priority_order: z.number().int().min(0).default(50),
  rule_definition: ruleDefinitionDocumentSchema.default({}),
})
export type ConstraintDefinition = z.infer<typeof constraintDefinitionSchema>

export const constraintDefinitionListSchema = z.array(constraintDefinitionSchema)
