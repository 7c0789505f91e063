import { boolean, index, pgTable, text } from 'drizzle-orm/pg-core'
import { id, softBranchRef, withTimestamps } from './_common'

/** User-directed messages; only `read` changes after insert. */
export const notifications = pgTable(
  'notifications',
  {
    id,
    branchId: softBranchRef(),
    userId: text('user_id').notNull(),
    title: text('title').notNull(),
    message: text('message'),
    type: text('type').default('info').notNull(),
    read: boolean('read').default(false).notNull(),
    ...withTimestamps(),
  },
  (table) => ({
    notificationsUserIdx: index('idx_notifications_user').on(table.userId),
    notificationsReadIdx: index('idx_notifications_read').on(table.read),
    notificationsCreatedIdx: index('idx_notifications_created').on(table.createdAt),
    notificationsBranchIdx: index('idx_notifications_branch_id').on(table.branchId),
  }),
)

export type Notification = typeof notifications.$inferSelect
