/**
 * Notification routes. Reads and marks are limited to the caller's own rows.
 */

import { Hono } from 'hono'
import { z } from 'zod'
import { idSchema, NOTIFICATION_TYPES } from '@shiftdesk/schema'
import { getCurrentBranchId, getCurrentUser, requireAuth, requireBranchPermission } from '../middleware/auth'
import {
  countUnread,
  createNotification,
  listMyNotifications,
  markAllRead,
  markRead,
} from '../services/notifications'
import { booleanQuery, fail, ok, readJson, validationFailed } from './_api'

const createBodySchema = z.object({
  userId: z.string().trim().min(1),
  title: z.string().trim().min(1).max(200),
  message: z.string().max(2000).nullish(),
  type: z.enum(NOTIFICATION_TYPES).default('info'),
})

export const notificationRoutes = new Hono()

notificationRoutes.get(
  '/branches/:branchId/notifications',
  requireAuth,
  requireBranchPermission('notifications.read'),
  async (c) => {
    const rows = await listMyNotifications(c.get('db'), getCurrentBranchId(c), getCurrentUser(c).id, {
      unreadOnly: booleanQuery(c.req.query('unreadOnly')),
    })
    return ok(c, rows)
  },
)

notificationRoutes.get(
  '/branches/:branchId/notifications/unread-count',
  requireAuth,
  requireBranchPermission('notifications.read'),
  async (c) => {
    const unread = await countUnread(c.get('db'), getCurrentBranchId(c), getCurrentUser(c).id)
    return ok(c, { unread })
  },
)

notificationRoutes.post(
  '/branches/:branchId/notifications',
  requireAuth,
  requireBranchPermission('notifications.create'),
  async (c) => {
    const parsed = createBodySchema.safeParse(await readJson(c))
    if (!parsed.success) return validationFailed(c, 'body', parsed.error)

    return ok(c, await createNotification(c.get('db'), getCurrentBranchId(c), parsed.data), 201)
  },
)

notificationRoutes.post(
  '/branches/:branchId/notifications/read-all',
  requireAuth,
  requireBranchPermission('notifications.read'),
  async (c) => ok(c, await markAllRead(c.get('db'), getCurrentBranchId(c), getCurrentUser(c).id)),
)

notificationRoutes.post(
  '/branches/:branchId/notifications/:notificationId/read',
  requireAuth,
  requireBranchPermission('notifications.read'),
  async (c) => {
    const notificationId = c.req.param('notificationId')
    if (!idSchema.safeParse(notificationId).success) {
      return fail(c, 'NOT_FOUND', `Notification not found: ${notificationId}`, 404)
    }
    return ok(c, await markRead(c.get('db'), getCurrentBranchId(c), getCurrentUser(c).id, notificationId))
  },
)
