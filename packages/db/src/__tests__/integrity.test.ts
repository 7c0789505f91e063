/**
 * @fileoverview Relational integrity tests
 *
 * @description
 * Uniqueness, cascades, timestamp triggers and the append-only audit log,
 * exercised through the Drizzle tables against migrated PGlite databases.
 */

import { and, eq } from 'drizzle-orm'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { classifyDatabaseError } from '../errors'
import {
  branches,
  constraints,
  monthlyShifts,
  monthlyShiftsSummary,
  notifications,
  staff,
  staffAudit,
  swapRequests,
  userBranches,
} from '../index'
import { seedDefaultConstraints } from '../seeds'
import { captureError, createTestDatabase, mainBranchId, pause, type TestDatabase } from '../testing'

describe('schema integrity', () => {
  let test: TestDatabase
  let mainId: string

  beforeEach(async () => {
    test = await createTestDatabase()
    mainId = await mainBranchId(test.session)
  })

  afterEach(async () => {
    await test.close()
  })

  const addBranch = async (code: string): Promise<string> => {
    const [row] = await test.db.insert(branches).values({ name: code, code }).returning({ id: branches.id })
    if (!row) throw new Error('branch insert returned nothing')
    return row.id
  }

  describe('updated_at trigger', () => {
    it('moves updated_at forward even when the caller supplies an old value', async () => {
      const [created] = await test.db.insert(staff).values({ branchId: mainId, name: 'Alice' }).returning()
      if (!created) throw new Error('staff insert returned nothing')
      await pause()

      const [updated] = await test.db
        .update(staff)
        .set({ nenkyu: 3, updatedAt: new Date('2000-01-01T00:00:00Z') })
        .where(eq(staff.id, created.id))
        .returning()

      expect(updated?.nenkyu).toBe(3)
      expect(updated?.updatedAt.getTime()).toBeGreaterThan(created.updatedAt.getTime())
      expect(updated?.createdAt.getTime()).toBe(created.createdAt.getTime())
    })

    it('fires on branches, grants and constraints too', async () => {
      const [branch] = await test.db.select().from(branches).where(eq(branches.id, mainId))
      const [grant] = await test.db
        .insert(userBranches)
        .values({ userId: 'user-1', branchId: mainId })
        .returning()
      const [rule] = await test.db.select().from(constraints).where(eq(constraints.branchId, mainId)).limit(1)
      if (!branch || !grant || !rule) throw new Error('fixtures missing')
      await pause()

      const [branchAfter] = await test.db
        .update(branches)
        .set({ timezone: 'Asia/Seoul' })
        .where(eq(branches.id, mainId))
        .returning()
      const [grantAfter] = await test.db
        .update(userBranches)
        .set({ role: 'editor' })
        .where(eq(userBranches.id, grant.id))
        .returning()
      const [ruleAfter] = await test.db
        .update(constraints)
        .set({ isEnabled: false })
        .where(eq(constraints.id, rule.id))
        .returning()

      expect(branchAfter?.updatedAt.getTime()).toBeGreaterThan(branch.updatedAt.getTime())
      expect(grantAfter?.updatedAt.getTime()).toBeGreaterThan(grant.updatedAt.getTime())
      expect(ruleAfter?.updatedAt.getTime()).toBeGreaterThan(rule.updatedAt.getTime())
    })

    it('fires on notifications, swap requests and monthly summaries', async () => {
      const [note] = await test.db
        .insert(notifications)
        .values({ branchId: mainId, userId: 'user-1', title: 'Hello' })
        .returning()
      const [swap] = await test.db
        .insert(swapRequests)
        .values({ branchId: mainId, requester: 'Ueda', target: 'Kato', swapDate: '2025-04-10' })
        .returning()
      const [summary] = await test.db
        .insert(monthlyShiftsSummary)
        .values({ branchId: mainId, year: 2025, month: 4, summaryData: { staffCount: 2 } })
        .returning()
      if (!note || !swap || !summary) throw new Error('fixtures missing')
      await pause()

      const stale = new Date('2000-01-01T00:00:00Z')
      const [noteAfter] = await test.db
        .update(notifications)
        .set({ read: true, updatedAt: stale })
        .where(eq(notifications.id, note.id))
        .returning()
      const [swapAfter] = await test.db
        .update(swapRequests)
        .set({ status: 'approved', updatedAt: stale })
        .where(eq(swapRequests.id, swap.id))
        .returning()
      const [summaryAfter] = await test.db
        .update(monthlyShiftsSummary)
        .set({ summaryData: { staffCount: 3 }, updatedAt: stale })
        .where(eq(monthlyShiftsSummary.id, summary.id))
        .returning()

      expect(noteAfter?.read).toBe(true)
      expect(noteAfter?.updatedAt.getTime()).toBeGreaterThan(note.updatedAt.getTime())
      expect(noteAfter?.createdAt.getTime()).toBe(note.createdAt.getTime())
      expect(swapAfter?.status).toBe('approved')
      expect(swapAfter?.updatedAt.getTime()).toBeGreaterThan(swap.updatedAt.getTime())
      expect(swapAfter?.createdAt.getTime()).toBe(swap.createdAt.getTime())
      expect(summaryAfter?.summaryData).toEqual({ staffCount: 3 })
      expect(summaryAfter?.updatedAt.getTime()).toBeGreaterThan(summary.updatedAt.getTime())
      expect(summaryAfter?.createdAt.getTime()).toBe(summary.createdAt.getTime())
    })
  })

  describe('unique keys', () => {
    it('rejects a second MAIN branch', async () => {
      const error = await captureError(() => test.db.insert(branches).values({ name: 'Copy', code: 'MAIN' }))

      expect(classifyDatabaseError(error)?.kind).toBe('unique')
      const all = await test.db.select({ id: branches.id }).from(branches)
      expect(all).toHaveLength(1)
    })

    it('scopes constraint codes per branch', async () => {
      const duplicate = await captureError(() =>
        test.db.insert(constraints).values({ branchId: mainId, name: 'copy', code: 'SKILL_REQ' }),
      )
      expect(classifyDatabaseError(duplicate)?.kind).toBe('unique')

      const otherId = await addBranch('OSAKA')
      const [inserted] = await test.db
        .insert(constraints)
        .values({ branchId: otherId, name: 'skill_required', code: 'SKILL_REQ' })
        .returning()

      expect(inserted).toMatchObject({
        branchId: otherId,
        code: 'SKILL_REQ',
        category: 'coverage',
        constraintType: 'soft',
        isEnabled: true,
        penaltyWeight: 10000,
        priorityOrder: 50,
        ruleDefinition: {},
      })
    })

    it('allows one grid row per branch, month and staff name', async () => {
      const key = { branchId: mainId, year: 2024, month: 3, staffName: 'Alice' }
      const [first] = await test.db.insert(monthlyShifts).values(key).returning()
      if (!first) throw new Error('grid insert returned nothing')

      const error = await captureError(() => test.db.insert(monthlyShifts).values(key))
      expect(classifyDatabaseError(error)?.kind).toBe('unique')

      await pause()
      const [updated] = await test.db
        .update(monthlyShifts)
        .set({ shiftData: { '1': 'Q1', '2': '-' } })
        .where(eq(monthlyShifts.id, first.id))
        .returning()

      expect(updated?.shiftData).toEqual({ '1': 'Q1', '2': '-' })
      expect(updated?.updatedAt.getTime()).toBeGreaterThan(first.updatedAt.getTime())
    })

    it('allows one summary per branch and month', async () => {
      await test.db.insert(monthlyShiftsSummary).values({ branchId: mainId, year: 2024, month: 3 })
      const error = await captureError(() =>
        test.db.insert(monthlyShiftsSummary).values({ branchId: mainId, year: 2024, month: 3 }),
      )

      expect(classifyDatabaseError(error)?.kind).toBe('unique')
    })

    it('allows one grant per user and branch', async () => {
      await test.db.insert(userBranches).values({ userId: 'user-1', branchId: mainId })
      const error = await captureError(() =>
        test.db.insert(userBranches).values({ userId: 'user-1', branchId: mainId, role: 'super' }),
      )

      expect(classifyDatabaseError(error)?.kind).toBe('unique')
    })
  })

  describe('required fields and references', () => {
    it('rejects constraints for a missing branch', async () => {
      const error = await captureError(() =>
        test.db.insert(constraints).values({
          branchId: '00000000-0000-4000-8000-000000000000',
          name: 'orphan',
          code: 'ORPHAN',
        }),
      )

      expect(classifyDatabaseError(error)?.kind).toBe('foreign_key')
    })

    it('rejects a swap request without a date', async () => {
      const error = await captureError(() =>
        test.session.query(`INSERT INTO swap_requests (requester, target) VALUES ('Alice', 'Bob')`),
      )

      expect(classifyDatabaseError(error)).toMatchObject({ kind: 'not_null' })
    })

    it('defaults a new swap request to pending', async () => {
      const [request] = await test.db
        .insert(swapRequests)
        .values({ branchId: mainId, requester: 'Alice', target: 'Bob', swapDate: '2024-03-05' })
        .returning()

      expect(request).toMatchObject({ status: 'pending', approvedBy: null, approvedAt: null, swapDate: '2024-03-05' })
    })
  })

  describe('branch removal', () => {
    it('cascades to grants and constraints but keeps soft-referenced rows', async () => {
      const branchId = await addBranch('KOBE')
      expect(await seedDefaultConstraints(test.db, branchId)).toBe(17)
      await test.db.insert(userBranches).values({ userId: 'user-2', branchId, role: 'super' })
      await test.db.insert(staff).values({ branchId, name: 'Kenji' })
      await test.db.insert(notifications).values({ branchId, userId: 'user-2', title: 'Hello' })
      await test.db
        .insert(swapRequests)
        .values({ branchId, requester: 'Kenji', target: 'Mai', swapDate: '2024-04-01' })
      await test.db.insert(monthlyShifts).values({ branchId, year: 2024, month: 4, staffName: 'Kenji' })

      await test.db.delete(branches).where(eq(branches.id, branchId))

      expect(await test.db.select().from(constraints).where(eq(constraints.branchId, branchId))).toHaveLength(0)
      expect(await test.db.select().from(userBranches).where(eq(userBranches.branchId, branchId))).toHaveLength(0)
      expect(await test.db.select().from(staff).where(eq(staff.branchId, branchId))).toHaveLength(1)
      expect(
        await test.db.select().from(notifications).where(eq(notifications.branchId, branchId)),
      ).toHaveLength(1)
      expect(
        await test.db.select().from(swapRequests).where(eq(swapRequests.branchId, branchId)),
      ).toHaveLength(1)
      expect(
        await test.db
          .select()
          .from(monthlyShifts)
          .where(and(eq(monthlyShifts.branchId, branchId), eq(monthlyShifts.staffName, 'Kenji'))),
      ).toHaveLength(1)
      // MAIN is untouched.
      expect(await test.db.select().from(constraints).where(eq(constraints.branchId, mainId))).toHaveLength(17)
    })
  })

  describe('staff_audit', () => {
    it('accepts inserts and rejects updates and deletes', async () => {
      const [entry] = await test.db
        .insert(staffAudit)
        .values({ action: 'create', afterData: { name: 'Alice' }, performedBy: 'user-1' })
        .returning()
      if (!entry) throw new Error('audit insert returned nothing')

      const updateError = await captureError(() =>
        test.db.update(staffAudit).set({ action: 'delete' }).where(eq(staffAudit.id, entry.id)),
      )
      const deleteError = await captureError(() => test.db.delete(staffAudit).where(eq(staffAudit.id, entry.id)))

      expect(String(updateError)).toContain('staff_audit is append-only (UPDATE rejected)')
      expect(String(deleteError)).toContain('staff_audit is append-only (DELETE rejected)')
      const rows = await test.db.select().from(staffAudit)
      expect(rows).toEqual([entry])
    })
  })
})
