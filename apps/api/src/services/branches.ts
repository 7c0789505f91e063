import { and, asc, count, desc, eq, isNotNull, ne, sql } from 'drizzle-orm'
import {
  branches,
  constraints,
  monthlyShifts,
  monthlyShiftsSummary,
  notifications,
  seedDefaultConstraints,
  staff,
  swapRequests,
  userBranches,
  type Branch,
  type Database,
  type UserBranch,
} from '@shiftdesk/db'
import {
  DEFAULT_DAY_SHIFTS,
  DEFAULT_NIGHT_SHIFTS,
  type BranchRole,
  type BranchSettings,
} from '@shiftdesk/schema'
import { NotFoundError } from '../lib/errors'
import type { AccessUser } from './acl'

/**
 * Branch lifecycle and membership.
 *
 * Deleting a branch only cascades to its constraints and role grants. Staff,
 * grids, swap requests and notifications carry `branch_id` without a foreign
 * key and stay behind; `deleteBranch` reports how many rows that leaves.
 */

export type BranchWithRole = Branch & {
  /** Caller's role; null when a platform admin sees a branch without a grant. */
  role: BranchRole | null
  isPrimary: boolean
}

export type BranchInput = {
  name: string
  code: string
  timezone?: string
  settings?: BranchSettings
}

export type BranchPatch = Partial<Omit<BranchInput, 'code'>> & { isActive?: boolean }

export type ShiftCodes = {
  dayShifts: string[]
  nightShifts: string[]
  requiredShifts: string[]
}

export type RetainedRows = {
  staff: number
  notifications: number
  swapRequests: number
  monthlyShifts: number
  monthlyShiftsSummary: number
}

export type BranchDeletion = {
  id: string
  cascaded: { constraints: number; members: number }
  retained: RetainedRows
}

export type MemberInput = {
  userId: string
  role: BranchRole
  isPrimary?: boolean
}

/**
 * Branches the user can open, primary first, then by name. Platform admins
 * see every branch.
 */
export async function listBranchesForUser(
  db: Database,
  user: AccessUser,
  options: { includeInactive?: boolean } = {},
): Promise<BranchWithRole[]> {
  const rows = await db
    .select({ branch: branches, role: userBranches.role, isPrimary: userBranches.isPrimary })
    .from(branches)
    .leftJoin(userBranches, and(eq(userBranches.branchId, branches.id), eq(userBranches.userId, user.id)))
    .where(
      and(
        user.isPlatformAdmin ? undefined : isNotNull(userBranches.id),
        options.includeInactive ? undefined : eq(branches.isActive, true),
      ),
    )
    .orderBy(desc(sql`coalesce(${userBranches.isPrimary}, false)`), asc(branches.name))

  return rows.map((row) => ({ ...row.branch, role: row.role, isPrimary: row.isPrimary ?? false }))
}

export async function getBranch(db: Database, id: string): Promise<Branch> {
  const [row] = await db.select().from(branches).where(eq(branches.id, id)).limit(1)
  if (!row) throw new NotFoundError('Branch', id)
  return row
}

/**
 * Create a branch and make the creator its `super`. The grant becomes the
 * creator's primary branch when they have none yet.
 */
export async function createBranch(
  db: Database,
  input: BranchInput,
  createdBy: string,
  options: { seedDefaults?: boolean } = {},
): Promise<{ branch: Branch; seededConstraints: number }> {
  return db.transaction(async (tx) => {
    const [branch] = await tx
      .insert(branches)
      .values({ name: input.name, code: input.code, timezone: input.timezone, settings: input.settings })
      .returning()
    if (!branch) throw new Error('branch insert returned no row')

    const [primary] = await tx
      .select({ id: userBranches.id })
      .from(userBranches)
      .where(and(eq(userBranches.userId, createdBy), eq(userBranches.isPrimary, true)))
      .limit(1)

    await tx.insert(userBranches).values({
      userId: createdBy,
      branchId: branch.id,
      role: 'super',
      isPrimary: !primary,
    })

    const seededConstraints = options.seedDefaults ? await seedDefaultConstraints(tx, branch.id) : 0
    return { branch, seededConstraints }
  })
}

export async function updateBranch(db: Database, id: string, patch: BranchPatch): Promise<Branch> {
  const [updated] = await db
    .update(branches)
    .set({ name: patch.name, timezone: patch.timezone, settings: patch.settings, isActive: patch.isActive })
    .where(eq(branches.id, id))
    .returning()
  if (!updated) throw new NotFoundError('Branch', id)
  return updated
}

export async function deactivateBranch(db: Database, id: string): Promise<Branch> {
  return updateBranch(db, id, { isActive: false })
}

async function countRows(query: PromiseLike<Array<{ total: number }>>): Promise<number> {
  const [row] = await query
  return row?.total ?? 0
}

/** Hard delete. Soft-referenced rows are counted, not removed. */
export async function deleteBranch(db: Database, id: string): Promise<BranchDeletion> {
  return db.transaction(async (tx) => {
    const branch = await getBranch(tx, id)

    const [constraintCount] = await tx
      .select({ total: count() })
      .from(constraints)
      .where(eq(constraints.branchId, branch.id))
    const [memberCount] = await tx
      .select({ total: count() })
      .from(userBranches)
      .where(eq(userBranches.branchId, branch.id))

    await tx.delete(branches).where(eq(branches.id, branch.id))

    const retained: RetainedRows = {
      staff: await countRows(tx.select({ total: count() }).from(staff).where(eq(staff.branchId, branch.id))),
      notifications: await countRows(
        tx.select({ total: count() }).from(notifications).where(eq(notifications.branchId, branch.id)),
      ),
      swapRequests: await countRows(
        tx.select({ total: count() }).from(swapRequests).where(eq(swapRequests.branchId, branch.id)),
      ),
      monthlyShifts: await countRows(
        tx.select({ total: count() }).from(monthlyShifts).where(eq(monthlyShifts.branchId, branch.id)),
      ),
      monthlyShiftsSummary: await countRows(
        tx.select({ total: count() }).from(monthlyShiftsSummary).where(eq(monthlyShiftsSummary.branchId, branch.id)),
      ),
    }

    return {
      id: branch.id,
      cascaded: { constraints: constraintCount?.total ?? 0, members: memberCount?.total ?? 0 },
      retained,
    }
  })
}

/** Shift code lists from `settings`, falling back to the built-in codes. */
export function getShiftCodes(branch: Pick<Branch, 'settings'>): ShiftCodes {
  return {
    dayShifts: branch.settings.day_shifts ?? [...DEFAULT_DAY_SHIFTS],
    nightShifts: branch.settings.night_shifts ?? [...DEFAULT_NIGHT_SHIFTS],
    requiredShifts: branch.settings.required_shifts ?? [],
  }
}

/** Replaces the three lists; other settings keys are kept. */
export async function setShiftCodes(db: Database, id: string, codes: ShiftCodes): Promise<ShiftCodes> {
  return db.transaction(async (tx) => {
    const branch = await getBranch(tx, id)
    const updated = await updateBranch(tx, branch.id, {
      settings: {
        ...branch.settings,
        day_shifts: codes.dayShifts,
        night_shifts: codes.nightShifts,
        required_shifts: codes.requiredShifts,
      },
    })
    return getShiftCodes(updated)
  })
}

export async function listMembers(db: Database, branchId: string): Promise<UserBranch[]> {
  return db
    .select()
    .from(userBranches)
    .where(eq(userBranches.branchId, branchId))
    .orderBy(asc(userBranches.userId))
}

async function clearOtherPrimaries(db: Database, userId: string, keepBranchId: string) {
  await db
    .update(userBranches)
    .set({ isPrimary: false })
    .where(and(eq(userBranches.userId, userId), ne(userBranches.branchId, keepBranchId), eq(userBranches.isPrimary, true)))
}

/** Grant or change a role. Marking it primary clears the user's other primaries. */
export async function upsertMember(db: Database, branchId: string, input: MemberInput): Promise<UserBranch> {
  return db.transaction(async (tx) => {
    const [member] = await tx
      .insert(userBranches)
      .values({ userId: input.userId, branchId, role: input.role, isPrimary: input.isPrimary ?? false })
      .onConflictDoUpdate({
        target: [userBranches.userId, userBranches.branchId],
        set: { role: input.role, ...(input.isPrimary === undefined ? {} : { isPrimary: input.isPrimary }) },
      })
      .returning()
    if (!member) throw new Error('member upsert returned no row')

    if (member.isPrimary) {
      await clearOtherPrimaries(tx, member.userId, branchId)
    }
    return member
  })
}

export async function removeMember(db: Database, branchId: string, userId: string): Promise<void> {
  const deleted = await db
    .delete(userBranches)
    .where(and(eq(userBranches.branchId, branchId), eq(userBranches.userId, userId)))
    .returning({ id: userBranches.id })
  if (deleted.length === 0) throw new NotFoundError('Member', userId)
}

/** Make `branchId` the user's only primary branch. */
export async function setPrimaryBranch(db: Database, userId: string, branchId: string): Promise<UserBranch> {
  return db.transaction(async (tx) => {
    const [member] = await tx
      .update(userBranches)
      .set({ isPrimary: true })
      .where(and(eq(userBranches.userId, userId), eq(userBranches.branchId, branchId)))
      .returning()
    if (!member) throw new NotFoundError('Membership', `${userId} in ${branchId}`)

    await clearOtherPrimaries(tx, userId, branchId)
    return member
  })
}
