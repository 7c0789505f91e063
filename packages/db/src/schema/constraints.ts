import { boolean, index, integer, jsonb, pgTable, text, uniqueIndex, uuid } from 'drizzle-orm/pg-core'
import type { ConstraintCategory, ConstraintType, RuleDefinitionDocument } from '@shiftdesk/schema'
import { branches } from './branches'
import { id, withTimestamps } from './_common'

/**
 * constraints
 *
 * Named, weighted scheduling rules per branch. A scheduling engine reads the
 * enabled rows ordered by `priority_order` and split by `constraint_type`.
 *
 * `rule_definition` is opaque to the database; see `parseRuleDefinition`
 * in `@shiftdesk/schema` for the typed view.
 */
export const constraints = pgTable(
  'constraints',
  {
    id,

    branchId: uuid('branch_id')
      .references(() => branches.id, { onDelete: 'cascade' })
      .notNull(),

    /** Human key, snake_case (e.g. `night_after_night_off`). */
    name: text('name').notNull(),

    /** Machine key, unique per branch (e.g. `NIGHT_AFTER_OFF`). */
    code: text('code').notNull(),

    category: text('category').$type<ConstraintCategory>().default('coverage').notNull(),

    constraintType: text('constraint_type').$type<ConstraintType>().default('soft').notNull(),

    isEnabled: boolean('is_enabled').default(true).notNull(),

    /** Cost of one violation; meaningful for soft rules only. */
    penaltyWeight: integer('penalty_weight').default(10000).notNull(),

    /** Lower runs first. */
    priorityOrder: integer('priority_order').default(50).notNull(),

    ruleDefinition: jsonb('rule_definition').$type<RuleDefinitionDocument>().default({}).notNull(),

    ...withTimestamps(),
  },
  (table) => ({
    constraintsBranchCodeUnique: uniqueIndex('constraints_branch_code_unique').on(
      table.branchId,
      table.code,
    ),
    constraintsBranchIdx: index('idx_constraints_branch').on(table.branchId),
    constraintsCodeIdx: index('idx_constraints_code').on(table.code),
    constraintsCategoryIdx: index('idx_constraints_category').on(table.category),
    constraintsTypeIdx: index('idx_constraints_type').on(table.constraintType),
    constraintsEnabledIdx: index('idx_constraints_enabled').on(table.isEnabled),
    constraintsPriorityIdx: index('idx_constraints_priority').on(table.priorityOrder),
  }),
)

export type Constraint = typeof constraints.$inferSelect
