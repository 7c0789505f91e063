/**
 * Constraint catalog routes: the shared template catalog, and each branch's
 * rules.
 *
 * Rule bodies use the portable snake_case definition, the same shape export
 * returns and import takes. Creating from a template takes a camelCase body
 * like the other modules.
 */

import { Hono } from 'hono'
import { z } from 'zod'
import { CONSTRAINT_PRESET_NAMES } from '@shiftdesk/db'
import {
  CONSTRAINT_CATEGORIES,
  CONSTRAINT_TYPES,
  constraintDefinitionListSchema,
  constraintDefinitionSchema,
  idSchema,
  languageSchema,
} from '@shiftdesk/schema'
import { getCurrentBranchId, requireAuth, requireBranchPermission } from '../middleware/auth'
import { roleHasPermission } from '../services/acl'
import {
  createConstraintFromTemplate,
  listConstraintTemplates,
  listRuleTypes,
} from '../services/constraint-templates'
import {
  applyPreset,
  createConstraint,
  deleteConstraint,
  exportConstraints,
  getConstraint,
  getEngineView,
  importConstraints,
  initializeDefaults,
  listConstraints,
  reorderConstraints,
  summarizeConstraints,
  toggleConstraint,
  updateConstraint,
} from '../services/constraints'
import { fail, ok, readJson, validationFailed } from './_api'

/** No defaults here: a patch only touches the keys it names. */
const updateBodySchema = constraintDefinitionSchema
  .partial()
  .refine((patch) => Object.values(patch).some((value) => value !== undefined), 'Provide at least one field to update.')

/** Fields editors may tune; renaming, retyping or rewriting a rule needs `constraints.manage`. */
const TUNABLE_FIELDS = new Set(['is_enabled', 'penalty_weight', 'priority_order'])

const reorderBodySchema = z.object({
  ids: z
    .array(idSchema)
    .min(1)
    .refine((ids) => new Set(ids).size === ids.length, 'Each constraint id may appear only once.'),
})

const listQuerySchema = z.object({
  category: z.enum(CONSTRAINT_CATEGORIES).optional(),
  type: z.enum(CONSTRAINT_TYPES).optional(),
})

const langQuerySchema = z.object({
  lang: languageSchema.default('ja'),
})

const fromTemplateBodySchema = z.object({
  templateId: z.string().min(1),
  code: constraintDefinitionSchema.shape.code,
  name: constraintDefinitionSchema.shape.name.optional(),
  priorityOrder: z.number().int().min(0).optional(),
  isEnabled: z.boolean().optional(),
  params: z.record(z.unknown()).default({}),
})

const presetBodySchema = z.object({
  preset: z.enum(CONSTRAINT_PRESET_NAMES),
})

const importBodySchema = z.object({
  constraints: constraintDefinitionListSchema,
  replace: z.boolean().default(false),
})

export const constraintRoutes = new Hono()

/** Branch-independent catalog; any signed-in user may read it. */
constraintRoutes.get('/constraint-templates', requireAuth, (c) => {
  const parsed = langQuerySchema.safeParse(c.req.query())
  if (!parsed.success) return validationFailed(c, 'query', parsed.error)

  return ok(c, listConstraintTemplates(parsed.data.lang))
})

constraintRoutes.get('/constraint-rule-types', requireAuth, (c) => {
  const parsed = langQuerySchema.safeParse(c.req.query())
  if (!parsed.success) return validationFailed(c, 'query', parsed.error)

  return ok(c, listRuleTypes(parsed.data.lang))
})

constraintRoutes.get(
  '/branches/:branchId/constraints',
  requireAuth,
  requireBranchPermission('constraints.read'),
  async (c) => {
    const parsed = listQuerySchema.safeParse(c.req.query())
    if (!parsed.success) return validationFailed(c, 'query', parsed.error)

    return ok(c, await listConstraints(c.get('db'), getCurrentBranchId(c), parsed.data))
  },
)

constraintRoutes.get(
  '/branches/:branchId/constraints/engine',
  requireAuth,
  requireBranchPermission('constraints.read'),
  async (c) => {
    const parsed = langQuerySchema.safeParse(c.req.query())
    if (!parsed.success) return validationFailed(c, 'query', parsed.error)

    return ok(c, await getEngineView(c.get('db'), getCurrentBranchId(c), parsed.data.lang))
  },
)

constraintRoutes.get(
  '/branches/:branchId/constraints/summary',
  requireAuth,
  requireBranchPermission('constraints.read'),
  async (c) => ok(c, await summarizeConstraints(c.get('db'), getCurrentBranchId(c))),
)

constraintRoutes.get(
  '/branches/:branchId/constraints/export',
  requireAuth,
  requireBranchPermission('constraints.read'),
  async (c) => ok(c, await exportConstraints(c.get('db'), getCurrentBranchId(c))),
)

constraintRoutes.post(
  '/branches/:branchId/constraints',
  requireAuth,
  requireBranchPermission('constraints.manage'),
  async (c) => {
    const parsed = constraintDefinitionSchema.safeParse(await readJson(c))
    if (!parsed.success) return validationFailed(c, 'body', parsed.error)

    return ok(c, await createConstraint(c.get('db'), getCurrentBranchId(c), parsed.data), 201)
  },
)

constraintRoutes.post(
  '/branches/:branchId/constraints/from-template',
  requireAuth,
  requireBranchPermission('constraints.manage'),
  async (c) => {
    const parsed = fromTemplateBodySchema.safeParse(await readJson(c))
    if (!parsed.success) return validationFailed(c, 'body', parsed.error)

    return ok(c, await createConstraintFromTemplate(c.get('db'), getCurrentBranchId(c), parsed.data), 201)
  },
)

constraintRoutes.post(
  '/branches/:branchId/constraints/reorder',
  requireAuth,
  requireBranchPermission('constraints.tune'),
  async (c) => {
    const parsed = reorderBodySchema.safeParse(await readJson(c))
    if (!parsed.success) return validationFailed(c, 'body', parsed.error)

    return ok(c, await reorderConstraints(c.get('db'), getCurrentBranchId(c), parsed.data.ids))
  },
)

constraintRoutes.post(
  '/branches/:branchId/constraints/preset',
  requireAuth,
  requireBranchPermission('constraints.tune'),
  async (c) => {
    const parsed = presetBodySchema.safeParse(await readJson(c))
    if (!parsed.success) return validationFailed(c, 'body', parsed.error)

    return ok(c, await applyPreset(c.get('db'), getCurrentBranchId(c), parsed.data.preset))
  },
)

constraintRoutes.post(
  '/branches/:branchId/constraints/defaults',
  requireAuth,
  requireBranchPermission('constraints.manage'),
  async (c) => {
    const result = await initializeDefaults(c.get('db'), getCurrentBranchId(c))
    return ok(c, result, result.inserted > 0 ? 201 : 200)
  },
)

constraintRoutes.post(
  '/branches/:branchId/constraints/import',
  requireAuth,
  requireBranchPermission('constraints.manage'),
  async (c) => {
    const parsed = importBodySchema.safeParse(await readJson(c))
    if (!parsed.success) return validationFailed(c, 'body', parsed.error)

    const result = await importConstraints(c.get('db'), getCurrentBranchId(c), parsed.data.constraints, {
      replace: parsed.data.replace,
    })
    return ok(c, result)
  },
)

constraintRoutes.get(
  '/branches/:branchId/constraints/:constraintId',
  requireAuth,
  requireBranchPermission('constraints.read'),
  async (c) => {
    const constraintId = c.req.param('constraintId')
    if (!idSchema.safeParse(constraintId).success) {
      return fail(c, 'NOT_FOUND', `Constraint not found: ${constraintId}`, 404)
    }
    return ok(c, await getConstraint(c.get('db'), getCurrentBranchId(c), constraintId))
  },
)

constraintRoutes.patch(
  '/branches/:branchId/constraints/:constraintId',
  requireAuth,
  requireBranchPermission('constraints.tune'),
  async (c) => {
    const constraintId = c.req.param('constraintId')
    if (!idSchema.safeParse(constraintId).success) {
      return fail(c, 'NOT_FOUND', `Constraint not found: ${constraintId}`, 404)
    }

    const parsed = updateBodySchema.safeParse(await readJson(c))
    if (!parsed.success) return validationFailed(c, 'body', parsed.error)

    const role = c.get('branchRole')
    const structural = Object.keys(parsed.data).filter((key) => !TUNABLE_FIELDS.has(key))
    if (structural.length > 0 && role !== undefined && !roleHasPermission(role, 'constraints.manage')) {
      return fail(c, 'FORBIDDEN', `Permission denied: editing ${structural.join(', ')} needs constraints.manage.`, 403)
    }

    return ok(c, await updateConstraint(c.get('db'), getCurrentBranchId(c), constraintId, parsed.data))
  },
)

constraintRoutes.post(
  '/branches/:branchId/constraints/:constraintId/toggle',
  requireAuth,
  requireBranchPermission('constraints.tune'),
  async (c) => {
    const constraintId = c.req.param('constraintId')
    if (!idSchema.safeParse(constraintId).success) {
      return fail(c, 'NOT_FOUND', `Constraint not found: ${constraintId}`, 404)
    }
    return ok(c, await toggleConstraint(c.get('db'), getCurrentBranchId(c), constraintId))
  },
)

constraintRoutes.delete(
  '/branches/:branchId/constraints/:constraintId',
  requireAuth,
  requireBranchPermission('constraints.manage'),
  async (c) => {
    const constraintId = c.req.param('constraintId')
    if (!idSchema.safeParse(constraintId).success) {
      return fail(c, 'NOT_FOUND', `Constraint not found: ${constraintId}`, 404)
    }
    await deleteConstraint(c.get('db'), getCurrentBranchId(c), constraintId)
    return ok(c, { id: constraintId, deleted: true })
  },
)
