/**
 * @fileoverview Constraint template service tests
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { captureError, createTestDatabase, mainBranchId, type TestDatabase } from '@shiftdesk/db/testing'
import { ApiError, NotFoundError, OrderingConventionError } from '../../lib/errors'
import {
  createConstraintFromTemplate,
  getConstraintTemplate,
  listConstraintTemplates,
  listRuleTypes,
} from '../constraint-templates'
import { listConstraints } from '../constraints'

describe('template catalog', () => {
  it('localizes template names', () => {
    const [first] = listConstraintTemplates('en')

    expect(first).toMatchObject({ template_id: 'night_after_off', name: 'Off after night shift' })
    expect(listConstraintTemplates('ja')[0]?.name).toBe('夜勤後の休み')
  })

  it('lists rule types with their parameters', () => {
    const rollingWindow = listRuleTypes('en').find((info) => info.type === 'rolling_window')

    expect(rollingWindow?.name).toBe('Rolling Window')
    expect(rollingWindow?.params.map((param) => param.key)).toEqual(['max_consecutive_work_days'])
  })

  it('throws NotFound for unknown templates', () => {
    expect(() => getConstraintTemplate('fatigue_score')).toThrow(NotFoundError)
  })
})

describe('createConstraintFromTemplate', () => {
  let test: TestDatabase
  let mainId: string

  beforeEach(async () => {
    test = await createTestDatabase()
    mainId = await mainBranchId(test.session)
  })

  afterEach(async () => {
    await test.close()
  })

  it('creates a soft rule after the last soft priority with overrides applied', async () => {
    const created = await createConstraintFromTemplate(test.db, mainId, {
      templateId: 'night_balance',
      code: 'NIGHT_BALANCE_2',
      params: { balance_shifts: 'Q1,X1', penalty_weight: 25000 },
    })

    expect(created).toMatchObject({
      name: 'night_balance',
      code: 'NIGHT_BALANCE_2',
      category: 'balance',
      constraintType: 'soft',
      isEnabled: true,
      penaltyWeight: 25000,
      priorityOrder: 22,
    })
    expect(created.ruleDefinition).toMatchObject({
      type: 'balance',
      description_en: 'Spread night shifts evenly across staff',
      rule: { balance_shifts: ['Q1', 'X1'], among_staff_with_skill: 'NIGHT' },
    })
  })

  it('places a hard rule after the last hard priority', async () => {
    const created = await createConstraintFromTemplate(test.db, mainId, {
      templateId: 'one_shift_per_day',
      code: 'ONE_SHIFT_DAY_2',
      name: 'one shift, second copy',
    })

    expect(created.priorityOrder).toBe(6)
    expect(created.penaltyWeight).toBe(200000)
    expect(created.name).toBe('one shift, second copy')
  })

  it('starts an empty branch at the first priority of the type', async () => {
    await test.session.query('DELETE FROM constraints WHERE branch_id = $1', [mainId])

    const created = await createConstraintFromTemplate(test.db, mainId, {
      templateId: 'weekend_balance',
      code: 'WEEKEND',
    })

    expect(created.priorityOrder).toBe(10)
  })

  it('rejects bad parameters without writing', async () => {
    const error = await captureError(() =>
      createConstraintFromTemplate(test.db, mainId, {
        templateId: 'min_coverage',
        code: 'MIN_COVERAGE_2',
        params: { min_staff_per_day: 0 },
      }),
    )

    expect(error).toBeInstanceOf(ApiError)
    if (!(error instanceof ApiError)) return
    expect(error.status).toBe(400)
    expect(error.message).toBe('Invalid parameters for template min_coverage.')
    expect(await listConstraints(test.db, mainId)).toHaveLength(17)
  })

  it('still enforces the hard-before-soft ordering', async () => {
    const error = await captureError(() =>
      createConstraintFromTemplate(test.db, mainId, {
        templateId: 'request_satisfaction',
        code: 'REQ_FIRST',
        priorityOrder: 1,
      }),
    )

    expect(error).toBeInstanceOf(OrderingConventionError)
  })
})
