/**
 * @fileoverview Monthly shift service tests
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { classifyDatabaseError } from '@shiftdesk/db'
import { captureError, createTestDatabase, mainBranchId, type TestDatabase } from '@shiftdesk/db/testing'
import { ApiError, NotFoundError } from '../../lib/errors'
import {
  countShiftDays,
  daysInMonth,
  deleteMonth,
  getMonthlyGrid,
  listSavedMonths,
  saveMonthlyGrid,
  updateShiftRow,
} from '../shifts'

describe('countShiftDays', () => {
  it('counts - and 公 as off and other codes as work, skipping blanks', () => {
    expect(countShiftDays({ '1': '-', '2': '公', '3': 'E1', '4': '', '5': ' Q1 ', '6': '  ' })).toEqual({
      offDays: 2,
      workDays: 2,
    })
  })

  it('returns zeros for an empty grid', () => {
    expect(countShiftDays({})).toEqual({ offDays: 0, workDays: 0 })
  })
})

describe('daysInMonth', () => {
  it('knows leap years', () => {
    expect(daysInMonth(2024, 2)).toBe(29)
    expect(daysInMonth(2023, 2)).toBe(28)
    expect(daysInMonth(2025, 12)).toBe(31)
  })
})

describe('shift service', () => {
  let test: TestDatabase
  let mainId: string

  beforeEach(async () => {
    test = await createTestDatabase()
    mainId = await mainBranchId(test.session)
  })

  afterEach(async () => {
    await test.close()
  })

  it('saves a grid with derived counts and its summary', async () => {
    const grid = await saveMonthlyGrid(
      test.db,
      mainId,
      2025,
      4,
      {
        rows: [
          { staffName: 'Ueda', shiftData: { '1': 'E1', '2': '-', '3': 'Q1' } },
          { staffName: 'Kato', shiftData: { '1': '公', '2': 'L1' } },
        ],
        summary: { coverage: { '1': 2 } },
      },
      'user-1',
    )

    expect(grid.rows.map((row) => [row.staffName, row.offDays, row.workDays])).toEqual([
      ['Kato', 1, 1],
      ['Ueda', 1, 2],
    ])
    expect(grid.rows[0]?.createdBy).toBe('user-1')
    expect(grid.summary?.summaryData).toEqual({ coverage: { '1': 2 } })
  })

  it('replaces the whole month on save', async () => {
    await saveMonthlyGrid(test.db, mainId, 2025, 4, { rows: [{ staffName: 'Ueda', shiftData: { '1': 'E1' } }] }, 'u')
    await saveMonthlyGrid(test.db, mainId, 2025, 4, { rows: [{ staffName: 'Kato', shiftData: { '1': 'E1' } }] }, 'u')

    const grid = await getMonthlyGrid(test.db, mainId, 2025, 4)
    expect(grid.rows.map((row) => row.staffName)).toEqual(['Kato'])
    expect(grid.summary).toBeNull()
  })

  it('leaves the stored month alone when a staff name repeats', async () => {
    await saveMonthlyGrid(test.db, mainId, 2025, 4, { rows: [{ staffName: 'Ueda', shiftData: { '1': 'E1' } }] }, 'u')

    const error = await captureError(() =>
      saveMonthlyGrid(
        test.db,
        mainId,
        2025,
        4,
        {
          rows: [
            { staffName: 'Kato', shiftData: {} },
            { staffName: 'Kato', shiftData: {} },
          ],
        },
        'u',
      ),
    )

    expect(classifyDatabaseError(error)?.kind).toBe('unique')
    expect((await getMonthlyGrid(test.db, mainId, 2025, 4)).rows.map((row) => row.staffName)).toEqual(['Ueda'])
  })

  it('rejects days past the end of the month', async () => {
    const error = await captureError(() =>
      saveMonthlyGrid(test.db, mainId, 2025, 2, { rows: [{ staffName: 'Ueda', shiftData: { '29': 'E1' } }] }, 'u'),
    )

    expect(error).toBeInstanceOf(ApiError)
    if (!(error instanceof ApiError)) return
    expect(error.code).toBe('VALIDATION_ERROR')
    expect(error.message).toBe('2025-2 has 28 days; got day(s) 29.')
  })

  it('lists saved months newest first', async () => {
    for (const [year, month] of [
      [2024, 12],
      [2025, 3],
      [2025, 1],
    ] as const) {
      await saveMonthlyGrid(test.db, mainId, year, month, { rows: [{ staffName: 'Ueda', shiftData: {} }] }, 'u')
    }

    expect(await listSavedMonths(test.db, mainId)).toEqual([
      { year: 2025, month: 3 },
      { year: 2025, month: 1 },
      { year: 2024, month: 12 },
    ])
  })

  it('recomputes counts when one row changes', async () => {
    const grid = await saveMonthlyGrid(
      test.db,
      mainId,
      2025,
      4,
      { rows: [{ staffName: 'Ueda', shiftData: { '1': 'E1' } }] },
      'u',
    )
    const row = grid.rows[0]
    if (!row) throw new Error('grid has no rows')

    const updated = await updateShiftRow(test.db, mainId, row.id, { '1': '-', '2': '-', '3': 'H1' })

    expect(updated).toMatchObject({ offDays: 2, workDays: 1 })
    expect(await captureError(() => updateShiftRow(test.db, mainId, crypto.randomUUID(), {}))).toBeInstanceOf(
      NotFoundError,
    )
  })

  it('deletes a month with its summary', async () => {
    await saveMonthlyGrid(
      test.db,
      mainId,
      2025,
      4,
      {
        rows: [
          { staffName: 'Ueda', shiftData: {} },
          { staffName: 'Kato', shiftData: {} },
        ],
        summary: {},
      },
      'u',
    )

    expect(await deleteMonth(test.db, mainId, 2025, 4)).toEqual({ rows: 2, summary: true })
    expect(await deleteMonth(test.db, mainId, 2025, 4)).toEqual({ rows: 0, summary: false })
  })
})
