import { and, desc, eq, or } from 'drizzle-orm'
import { swapRequests, type Database, type SwapRequest } from '@shiftdesk/db'
import type { SwapRequestStatus } from '@shiftdesk/schema'
import { InvalidTransitionError, NotFoundError } from '../lib/errors'
import { createNotification } from './notifications'

/**
 * Shift swap workflow: pending -> approved | rejected, nothing else.
 *
 * Requester and target are staff names, and a staff name is also the
 * notification recipient; staff sign in under their display name.
 */

export type SwapRequestInput = {
  requester: string
  target: string
  swapDate: string
  requesterShift?: string | null
  targetShift?: string | null
  reason?: string | null
}

export type SwapDecision = Exclude<SwapRequestStatus, 'pending'>

export async function createSwapRequest(
  db: Database,
  branchId: string,
  input: SwapRequestInput,
): Promise<SwapRequest> {
  return db.transaction(async (tx) => {
    const [created] = await tx
      .insert(swapRequests)
      .values({
        branchId,
        requester: input.requester,
        target: input.target,
        swapDate: input.swapDate,
        requesterShift: input.requesterShift ?? null,
        targetShift: input.targetShift ?? null,
        reason: input.reason ?? null,
      })
      .returning()
    if (!created) throw new Error('swap request insert returned no row')

    await createNotification(tx, branchId, {
      userId: created.target,
      title: 'Shift swap requested',
      message: `${created.requester} asked to swap shifts on ${created.swapDate}.`,
      type: 'swap',
    })
    return created
  })
}

export async function getSwapRequest(db: Database, branchId: string, id: string): Promise<SwapRequest> {
  const [row] = await db
    .select()
    .from(swapRequests)
    .where(and(eq(swapRequests.branchId, branchId), eq(swapRequests.id, id)))
    .limit(1)
  if (!row) throw new NotFoundError('Swap request', id)
  return row
}

export async function listSwapRequestsByStatus(
  db: Database,
  branchId: string,
  status: SwapRequestStatus,
): Promise<SwapRequest[]> {
  return db
    .select()
    .from(swapRequests)
    .where(and(eq(swapRequests.branchId, branchId), eq(swapRequests.status, status)))
    .orderBy(desc(swapRequests.createdAt))
}

/** Requests where the staff member is either side. */
export async function listSwapRequestsForStaff(
  db: Database,
  branchId: string,
  staffName: string,
): Promise<SwapRequest[]> {
  return db
    .select()
    .from(swapRequests)
    .where(
      and(
        eq(swapRequests.branchId, branchId),
        or(eq(swapRequests.requester, staffName), eq(swapRequests.target, staffName)),
      ),
    )
    .orderBy(desc(swapRequests.createdAt))
}

/**
 * Resolve a pending request. The status guard sits in the UPDATE itself, so
 * two reviewers racing on one request cannot both win.
 */
export async function resolveSwapRequest(
  db: Database,
  branchId: string,
  id: string,
  decision: SwapDecision,
  reviewedBy: string,
): Promise<SwapRequest> {
  return db.transaction(async (tx) => {
    const current = await getSwapRequest(tx, branchId, id)
    if (current.status !== 'pending') {
      throw new InvalidTransitionError(current.status, decision)
    }

    const [updated] = await tx
      .update(swapRequests)
      .set({ status: decision, approvedBy: reviewedBy, approvedAt: new Date() })
      .where(and(eq(swapRequests.id, current.id), eq(swapRequests.status, 'pending')))
      .returning()
    if (!updated) throw new InvalidTransitionError('resolved', decision)

    await createNotification(tx, branchId, {
      userId: updated.requester,
      title: decision === 'approved' ? 'Shift swap approved' : 'Shift swap rejected',
      message: `Your swap with ${updated.target} on ${updated.swapDate} was ${decision} by ${reviewedBy}.`,
      type: decision === 'approved' ? 'success' : 'warning',
    })
    return updated
  })
}

export const approveSwapRequest = (db: Database, branchId: string, id: string, reviewedBy: string) =>
  resolveSwapRequest(db, branchId, id, 'approved', reviewedBy)

export const rejectSwapRequest = (db: Database, branchId: string, id: string, reviewedBy: string) =>
  resolveSwapRequest(db, branchId, id, 'rejected', reviewedBy)
