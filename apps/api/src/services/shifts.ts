import { and, asc, desc, eq } from 'drizzle-orm'
import {
  monthlyShifts,
  monthlyShiftsSummary,
  type Database,
  type MonthlyShift,
  type MonthlyShiftsSummary,
} from '@shiftdesk/db'
import { OFF_SHIFT_CODES, type ShiftData } from '@shiftdesk/schema'
import { ApiError, NotFoundError } from '../lib/errors'

export type GridRowInput = {
  staffName: string
  shiftData: ShiftData
}

export type MonthlyGrid = {
  year: number
  month: number
  rows: MonthlyShift[]
  summary: MonthlyShiftsSummary | null
}

const offCodes: ReadonlySet<string> = new Set(OFF_SHIFT_CODES)

/** `-` and `公` are days off; any other non-empty code is a work day. */
export function countShiftDays(shiftData: ShiftData): { offDays: number; workDays: number } {
  let offDays = 0
  let workDays = 0
  for (const code of Object.values(shiftData)) {
    const trimmed = code.trim()
    if (!trimmed) continue
    if (offCodes.has(trimmed)) offDays += 1
    else workDays += 1
  }
  return { offDays, workDays }
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate()
}

function assertDaysWithinMonth(year: number, month: number, shiftData: ShiftData) {
  const lastDay = daysInMonth(year, month)
  const outside = Object.keys(shiftData).filter((day) => Number(day) > lastDay)
  if (outside.length > 0) {
    throw new ApiError(400, 'VALIDATION_ERROR', `${year}-${month} has ${lastDay} days; got day(s) ${outside.join(', ')}.`)
  }
}

export async function getMonthlyGrid(db: Database, branchId: string, year: number, month: number): Promise<MonthlyGrid> {
  const rows = await db
    .select()
    .from(monthlyShifts)
    .where(and(eq(monthlyShifts.branchId, branchId), eq(monthlyShifts.year, year), eq(monthlyShifts.month, month)))
    .orderBy(asc(monthlyShifts.staffName))

  const [summary] = await db
    .select()
    .from(monthlyShiftsSummary)
    .where(
      and(
        eq(monthlyShiftsSummary.branchId, branchId),
        eq(monthlyShiftsSummary.year, year),
        eq(monthlyShiftsSummary.month, month),
      ),
    )
    .limit(1)

  return { year, month, rows, summary: summary ?? null }
}

/** Months that have at least one grid row, newest first. */
export async function listSavedMonths(db: Database, branchId: string): Promise<Array<{ year: number; month: number }>> {
  return db
    .selectDistinct({ year: monthlyShifts.year, month: monthlyShifts.month })
    .from(monthlyShifts)
    .where(eq(monthlyShifts.branchId, branchId))
    .orderBy(desc(monthlyShifts.year), desc(monthlyShifts.month))
}

export async function saveMonthlySummary(
  db: Database,
  branchId: string,
  year: number,
  month: number,
  summaryData: Record<string, unknown>,
  createdBy: string,
): Promise<MonthlyShiftsSummary> {
  const [row] = await db
    .insert(monthlyShiftsSummary)
    .values({ branchId, year, month, summaryData, createdBy })
    .onConflictDoUpdate({
      target: [monthlyShiftsSummary.branchId, monthlyShiftsSummary.year, monthlyShiftsSummary.month],
      set: { summaryData, createdBy },
    })
    .returning()
  if (!row) throw new Error('summary upsert returned no row')
  return row
}

/**
 * Replace a month's grid. Counts are derived from the codes; a repeated
 * staff name fails on the unique key and nothing is written.
 */
export async function saveMonthlyGrid(
  db: Database,
  branchId: string,
  year: number,
  month: number,
  input: { rows: GridRowInput[]; summary?: Record<string, unknown> },
  createdBy: string,
): Promise<MonthlyGrid> {
  for (const row of input.rows) {
    assertDaysWithinMonth(year, month, row.shiftData)
  }

  return db.transaction(async (tx) => {
    await tx
      .delete(monthlyShifts)
      .where(and(eq(monthlyShifts.branchId, branchId), eq(monthlyShifts.year, year), eq(monthlyShifts.month, month)))

    if (input.rows.length > 0) {
      await tx.insert(monthlyShifts).values(
        input.rows.map((row) => ({
          branchId,
          year,
          month,
          staffName: row.staffName,
          shiftData: row.shiftData,
          ...countShiftDays(row.shiftData),
          createdBy,
        })),
      )
    }

    if (input.summary) {
      await saveMonthlySummary(tx, branchId, year, month, input.summary, createdBy)
    }

    return getMonthlyGrid(tx, branchId, year, month)
  })
}

export async function updateShiftRow(
  db: Database,
  branchId: string,
  id: string,
  shiftData: ShiftData,
): Promise<MonthlyShift> {
  const [current] = await db
    .select({ id: monthlyShifts.id, year: monthlyShifts.year, month: monthlyShifts.month })
    .from(monthlyShifts)
    .where(and(eq(monthlyShifts.branchId, branchId), eq(monthlyShifts.id, id)))
    .limit(1)
  if (!current) throw new NotFoundError('Monthly shift', id)
  assertDaysWithinMonth(current.year, current.month, shiftData)

  const [updated] = await db
    .update(monthlyShifts)
    .set({ shiftData, ...countShiftDays(shiftData) })
    .where(eq(monthlyShifts.id, current.id))
    .returning()
  if (!updated) throw new NotFoundError('Monthly shift', id)
  return updated
}

export async function deleteMonth(
  db: Database,
  branchId: string,
  year: number,
  month: number,
): Promise<{ rows: number; summary: boolean }> {
  return db.transaction(async (tx) => {
    const rows = await tx
      .delete(monthlyShifts)
      .where(and(eq(monthlyShifts.branchId, branchId), eq(monthlyShifts.year, year), eq(monthlyShifts.month, month)))
      .returning({ id: monthlyShifts.id })
    const summaries = await tx
      .delete(monthlyShiftsSummary)
      .where(
        and(
          eq(monthlyShiftsSummary.branchId, branchId),
          eq(monthlyShiftsSummary.year, year),
          eq(monthlyShiftsSummary.month, month),
        ),
      )
      .returning({ id: monthlyShiftsSummary.id })
    return { rows: rows.length, summary: summaries.length > 0 }
  })
}
