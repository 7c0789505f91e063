/**
 * @fileoverview Constraint template tests
 *
 * @description
 * Applying editable parameter overrides to a template, and the catalog
 * shape checks.
 */

import { describe, it, expect } from 'vitest'
import { applyTemplateParams, constraintTemplateCatalogSchema, localizeText, type ConstraintTemplate } from '../index'

const nightBalance: ConstraintTemplate = {
  template_id: 'night_balance',
  name_ja: '夜勤均等配分',
  name_ko: '야간 근무 균등 배분',
  name_en: 'Night shift balance',
  description_ja: '夜勤をスタッフに均等に配分',
  description_ko: '야간 근무를 직원들에게 균등하게 배분',
  description_en: 'Spread night shifts evenly across staff',
  category: 'balance',
  constraint_type: 'soft',
  default_weight: 20000,
  rule_definition: { type: 'balance', rule: { balance_shifts: ['Q1', 'X1', 'R1'], among_staff_with_skill: 'NIGHT' } },
  editable_params: [
    { key: 'balance_shifts', label_ja: '対象シフト', label_ko: '대상 시프트', label_en: 'Shifts', type: 'text', default: 'Q1,X1,R1' },
    {
      key: 'penalty_weight',
      label_ja: '重み',
      label_ko: '가중치',
      label_en: 'Weight',
      type: 'number',
      default: 20000,
      min: 0,
      max: 200000,
    },
  ],
}

describe('applyTemplateParams', () => {
  it('returns the template as-is without overrides', () => {
    expect(applyTemplateParams(nightBalance, {})).toEqual({
      ok: true,
      penaltyWeight: 20000,
      ruleDefinition: {
        type: 'balance',
        description_ja: '夜勤をスタッフに均等に配分',
        description_ko: '야간 근무를 직원들에게 균등하게 배분',
        description_en: 'Spread night shifts evenly across staff',
        rule: { balance_shifts: ['Q1', 'X1', 'R1'], among_staff_with_skill: 'NIGHT' },
      },
    })
  })

  it('splits text overrides of list parameters and moves the weight to the column', () => {
    const applied = applyTemplateParams(nightBalance, { balance_shifts: 'Q1, X1 ,', penalty_weight: 25000 })

    expect(applied.ok).toBe(true)
    if (!applied.ok) return
    expect(applied.penaltyWeight).toBe(25000)
    expect(applied.ruleDefinition.rule).toEqual({ balance_shifts: ['Q1', 'X1'], among_staff_with_skill: 'NIGHT' })
  })

  it('reports parameters the template does not expose', () => {
    expect(applyTemplateParams(nightBalance, { among_staff_with_skill: 'L1' })).toEqual({
      ok: false,
      issues: ['among_staff_with_skill: not an editable parameter of night_balance'],
    })
  })

  it('checks values against the parameter type and bounds', () => {
    const applied = applyTemplateParams(nightBalance, { penalty_weight: 500000, balance_shifts: 3 })

    expect(applied.ok).toBe(false)
    if (applied.ok) return
    expect(applied.issues).toHaveLength(2)
    expect(applied.issues[0]).toMatch(/^penalty_weight: /)
    expect(applied.issues[1]).toMatch(/^balance_shifts: /)
  })
})

describe('localizeText', () => {
  it('picks the name and description for one language', () => {
    expect(localizeText(nightBalance, 'en')).toEqual({
      name: 'Night shift balance',
      description: 'Spread night shifts evenly across staff',
    })
    expect(localizeText(nightBalance, 'ko').name).toBe('야간 근무 균등 배분')
  })
})

describe('constraintTemplateCatalogSchema', () => {
  it('rejects duplicate template ids', () => {
    const parsed = constraintTemplateCatalogSchema.safeParse({ rule_types: {}, templates: [nightBalance, nightBalance] })

    expect(parsed.success).toBe(false)
    if (parsed.success) return
    expect(parsed.error.issues.map((issue) => issue.message)).toEqual(['Duplicate template id: night_balance'])
  })

  it('rejects templates of unknown rule types', () => {
    const fatigue = { ...nightBalance, rule_definition: { type: 'fatigue_score', rule: {} } }

    expect(constraintTemplateCatalogSchema.safeParse({ rule_types: {}, templates: [fatigue] }).success).toBe(false)
  })
})
