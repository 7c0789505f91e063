import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import { eq } from 'drizzle-orm'
import { branches, constraints } from '../index'
import {
  CONSTRAINT_PRESET_NAMES,
  defaultPenaltyWeight,
  loadConstraintTemplates,
  loadDefaultConstraints,
  presetPenaltyWeight,
  seedDefaultConstraints,
} from '../seeds'
import { createTestDatabase, mainBranchId, type TestDatabase } from '../testing'

describe('default constraint catalog', () => {
  it('has unique codes and unique priorities', () => {
    const defaults = loadDefaultConstraints()

    expect(defaults).toHaveLength(17)
    expect(new Set(defaults.map((definition) => definition.code)).size).toBe(17)
    expect(new Set(defaults.map((definition) => definition.priority_order)).size).toBe(17)
  })

  it('gives every row a typed rule document with three descriptions', () => {
    for (const definition of loadDefaultConstraints()) {
      expect(definition.rule_definition).toHaveProperty('type')
      expect(definition.rule_definition).toHaveProperty('description_ja')
      expect(definition.rule_definition).toHaveProperty('description_ko')
      expect(definition.rule_definition).toHaveProperty('description_en')
    }
  })
})

describe('constraint template catalog', () => {
  it('loads every template and rule type', () => {
    const catalog = loadConstraintTemplates()

    expect(catalog.templates.map((template) => template.template_id)).toEqual([
      'night_after_off',
      'max_consecutive_work',
      'one_shift_per_day',
      'skill_required',
      'ng_forbidden',
      'request_satisfaction',
      'target_off_days',
      'night_balance',
      'min_coverage',
      'weekend_balance',
      'shift_coverage',
      'avoid_split_weekend',
    ])
    expect(Object.keys(catalog.rule_types)).toEqual([
      'sequence',
      'rolling_window',
      'basic',
      'skill_match',
      'forbidden',
      'preference',
      'balance',
      'coverage',
    ])
  })

  it('keeps hard templates heavier than soft ones', () => {
    const { templates } = loadConstraintTemplates()
    const lightestHard = Math.min(...templates.filter((t) => t.constraint_type === 'hard').map((t) => t.default_weight))
    const heaviestSoft = Math.max(...templates.filter((t) => t.constraint_type === 'soft').map((t) => t.default_weight))

    expect(lightestHard).toBeGreaterThan(heaviestSoft)
  })
})

describe('presets', () => {
  it('scales soft weights from the catalog default', () => {
    expect(CONSTRAINT_PRESET_NAMES).toEqual(['strict', 'normal', 'flexible'])
    expect(presetPenaltyWeight('REQ_SATISFY', 'strict')).toBe(100000)
    expect(presetPenaltyWeight('REQ_SATISFY', 'normal')).toBe(50000)
    expect(presetPenaltyWeight('WEEKEND_BALANCE', 'flexible')).toBe(7500)
  })

  it('uses the fallback weight for codes outside the catalog', () => {
    expect(defaultPenaltyWeight('CUSTOM_RULE')).toBe(10000)
    expect(presetPenaltyWeight('CUSTOM_RULE', 'flexible')).toBe(5000)
  })
})

describe('seedDefaultConstraints', () => {
  let test: TestDatabase

  beforeAll(async () => {
    test = await createTestDatabase()
  })

  afterAll(async () => {
    await test.close()
  })

  it('initializes an empty branch once', async () => {
    const [branch] = await test.db.insert(branches).values({ name: 'Nagoya', code: 'NAGOYA' }).returning()
    if (!branch) throw new Error('branch insert returned nothing')

    expect(await seedDefaultConstraints(test.db, branch.id)).toBe(17)
    expect(await seedDefaultConstraints(test.db, branch.id)).toBe(0)

    const rows = await test.db.select().from(constraints).where(eq(constraints.branchId, branch.id))
    expect(rows).toHaveLength(17)
    expect(rows.find((row) => row.code === 'MAX_CONSEC_WORK')).toMatchObject({
      name: 'max_consecutive_work',
      category: 'sequence',
      constraintType: 'hard',
      penaltyWeight: 200000,
      priorityOrder: 2,
      ruleDefinition: { type: 'rolling_window', rule: { max_consecutive_work_days: 5 } },
    })
  })

  it('leaves a branch that already has rules alone', async () => {
    expect(await seedDefaultConstraints(test.db, await mainBranchId(test.session))).toBe(0)
  })
})
