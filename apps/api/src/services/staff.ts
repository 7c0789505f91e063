import { and, asc, desc, eq } from 'drizzle-orm'
import { staff, staffAudit, type Database, type Staff, type StaffAuditEntry } from '@shiftdesk/db'
import { SKILL_L1, SKILL_NIGHT } from '@shiftdesk/schema'
import { NotFoundError } from '../lib/errors'

export type StaffInput = {
  name: string
  gender: string
  role: string
  targetOff: number
  nenkyu: number
  skills: string | string[]
  prefer: string | string[]
  displayOrder: number
  isActive: boolean
}

export type StaffPatch = Partial<StaffInput>

export type StaffStats = {
  total: number
  managers: number
  staff: number
  male: number
  female: number
  nightCapable: number
  l1Capable: number
}

export type StaffAuditAction = 'create' | 'update' | 'deactivate' | 'delete'

/** Split a comma-delimited tag string. */
export function parseTags(value: string): string[] {
  return value
    .split(',')
    .map((tag) => tag.trim())
    .filter(Boolean)
}

/** Canonical tag string: trimmed, empties and repeats dropped. */
export function normalizeTags(value: string | string[]): string {
  const tags = Array.isArray(value) ? value.flatMap(parseTags) : parseTags(value)
  return [...new Set(tags)].join(',')
}

export function hasSkill(member: Pick<Staff, 'skills'>, skill: string): boolean {
  return parseTags(member.skills).includes(skill)
}

function snapshot(row: Staff): Record<string, unknown> {
  return { ...row, createdAt: row.createdAt.toISOString(), updatedAt: row.updatedAt.toISOString() }
}

async function appendAudit(
  db: Database,
  entry: {
    staffId: string
    action: StaffAuditAction
    before: Staff | null
    after: Staff | null
    performedBy: string
  },
) {
  await db.insert(staffAudit).values({
    staffId: entry.staffId,
    action: entry.action,
    beforeData: entry.before ? snapshot(entry.before) : null,
    afterData: entry.after ? snapshot(entry.after) : null,
    performedBy: entry.performedBy,
  })
}

async function findStaff(db: Database, branchId: string, id: string): Promise<Staff> {
  const [row] = await db
    .select()
    .from(staff)
    .where(and(eq(staff.branchId, branchId), eq(staff.id, id)))
    .limit(1)
  if (!row) throw new NotFoundError('Staff', id)
  return row
}

export async function listStaff(
  db: Database,
  branchId: string,
  options: { includeInactive?: boolean; skill?: string } = {},
): Promise<Staff[]> {
  const rows = await db
    .select()
    .from(staff)
    .where(and(eq(staff.branchId, branchId), options.includeInactive ? undefined : eq(staff.isActive, true)))
    .orderBy(asc(staff.displayOrder), asc(staff.name))

  const { skill } = options
  return skill ? rows.filter((row) => hasSkill(row, skill)) : rows
}

export async function getStaff(db: Database, branchId: string, id: string): Promise<Staff> {
  return findStaff(db, branchId, id)
}

/** Counts over active staff. */
export async function getStaffStats(db: Database, branchId: string): Promise<StaffStats> {
  const rows = await listStaff(db, branchId)
  const managers = rows.filter((row) => row.role === 'manager').length

  return {
    total: rows.length,
    managers,
    staff: rows.length - managers,
    male: rows.filter((row) => row.gender === 'M').length,
    female: rows.filter((row) => row.gender === 'F').length,
    nightCapable: rows.filter((row) => hasSkill(row, SKILL_NIGHT)).length,
    l1Capable: rows.filter((row) => hasSkill(row, SKILL_L1)).length,
  }
}

export async function createStaff(
  db: Database,
  branchId: string,
  input: StaffInput,
  performedBy: string,
): Promise<Staff> {
  return db.transaction(async (tx) => {
    const [created] = await tx
      .insert(staff)
      .values({
        ...input,
        branchId,
        skills: normalizeTags(input.skills),
        prefer: normalizeTags(input.prefer),
      })
      .returning()
    if (!created) throw new Error('staff insert returned no row')

    await appendAudit(tx, { staffId: created.id, action: 'create', before: null, after: created, performedBy })
    return created
  })
}

export async function updateStaff(
  db: Database,
  branchId: string,
  id: string,
  patch: StaffPatch,
  performedBy: string,
): Promise<Staff> {
  return db.transaction(async (tx) => {
    const before = await findStaff(tx, branchId, id)
    const [updated] = await tx
      .update(staff)
      .set({
        ...patch,
        skills: patch.skills === undefined ? undefined : normalizeTags(patch.skills),
        prefer: patch.prefer === undefined ? undefined : normalizeTags(patch.prefer),
      })
      .where(eq(staff.id, before.id))
      .returning()
    if (!updated) throw new NotFoundError('Staff', id)

    await appendAudit(tx, { staffId: id, action: 'update', before, after: updated, performedBy })
    return updated
  })
}

/** Soft retirement; the row and its history stay. */
export async function deactivateStaff(
  db: Database,
  branchId: string,
  id: string,
  performedBy: string,
): Promise<Staff> {
  return db.transaction(async (tx) => {
    const before = await findStaff(tx, branchId, id)
    const [updated] = await tx.update(staff).set({ isActive: false }).where(eq(staff.id, before.id)).returning()
    if (!updated) throw new NotFoundError('Staff', id)

    await appendAudit(tx, { staffId: id, action: 'deactivate', before, after: updated, performedBy })
    return updated
  })
}

/**
 * Remove the row. Grids and swap requests reference staff by name and keep
 * their rows; the audit trail keeps the last snapshot.
 */
export async function deleteStaff(db: Database, branchId: string, id: string, performedBy: string): Promise<void> {
  await db.transaction(async (tx) => {
    const before = await findStaff(tx, branchId, id)
    await tx.delete(staff).where(eq(staff.id, before.id))
    await appendAudit(tx, { staffId: id, action: 'delete', before, after: null, performedBy })
  })
}

/** Newest first. The staff row must still exist in the branch. */
export async function listStaffAudit(db: Database, branchId: string, id: string): Promise<StaffAuditEntry[]> {
  const member = await findStaff(db, branchId, id)
  return db
    .select()
    .from(staffAudit)
    .where(eq(staffAudit.staffId, member.id))
    .orderBy(desc(staffAudit.performedAt))
}
