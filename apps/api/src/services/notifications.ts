import { and, count, desc, eq } from 'drizzle-orm'
import { notifications, type Database, type Notification } from '@shiftdesk/db'
import type { NotificationType } from '@shiftdesk/schema'
import { NotFoundError } from '../lib/errors'

/** Rows are always filtered to the caller; nobody reads another user's inbox. */

export const NOTIFICATION_LIST_LIMIT = 50

export type NotificationInput = {
  userId: string
  title: string
  message?: string | null
  type?: NotificationType
}

function ownedBy(branchId: string, userId: string) {
  return and(eq(notifications.branchId, branchId), eq(notifications.userId, userId))
}

export async function listMyNotifications(
  db: Database,
  branchId: string,
  userId: string,
  options: { unreadOnly?: boolean } = {},
): Promise<Notification[]> {
  return db
    .select()
    .from(notifications)
    .where(and(ownedBy(branchId, userId), options.unreadOnly ? eq(notifications.read, false) : undefined))
    .orderBy(desc(notifications.createdAt))
    .limit(NOTIFICATION_LIST_LIMIT)
}

export async function countUnread(db: Database, branchId: string, userId: string): Promise<number> {
  const [row] = await db
    .select({ total: count() })
    .from(notifications)
    .where(and(ownedBy(branchId, userId), eq(notifications.read, false)))
  return row?.total ?? 0
}

export async function createNotification(
  db: Database,
  branchId: string,
  input: NotificationInput,
): Promise<Notification> {
  const [created] = await db
    .insert(notifications)
    .values({
      branchId,
      userId: input.userId,
      title: input.title,
      message: input.message ?? null,
      type: input.type ?? 'info',
    })
    .returning()
  if (!created) throw new Error('notification insert returned no row')
  return created
}

/** Only the recipient can mark a notification; anything else reads as missing. */
export async function markRead(db: Database, branchId: string, userId: string, id: string): Promise<Notification> {
  const [updated] = await db
    .update(notifications)
    .set({ read: true })
    .where(and(ownedBy(branchId, userId), eq(notifications.id, id)))
    .returning()
  if (!updated) throw new NotFoundError('Notification', id)
  return updated
}

export async function markAllRead(db: Database, branchId: string, userId: string): Promise<{ updated: number }> {
  const rows = await db
    .update(notifications)
    .set({ read: true })
    .where(and(ownedBy(branchId, userId), eq(notifications.read, false)))
    .returning({ id: notifications.id })
  return { updated: rows.length }
}
