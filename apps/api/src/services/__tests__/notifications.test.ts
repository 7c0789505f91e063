/**
 * @fileoverview Notification service tests
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { captureError, createTestDatabase, mainBranchId, type TestDatabase } from '@shiftdesk/db/testing'
import { NotFoundError } from '../../lib/errors'
import {
  countUnread,
  createNotification,
  listMyNotifications,
  markAllRead,
  markRead,
  NOTIFICATION_LIST_LIMIT,
} from '../notifications'

describe('notifications', () => {
  let test: TestDatabase
  let mainId: string

  beforeEach(async () => {
    test = await createTestDatabase()
    mainId = await mainBranchId(test.session)
  })

  afterEach(async () => {
    await test.close()
  })

  it('defaults to an unread info message', async () => {
    const created = await createNotification(test.db, mainId, { userId: 'user-1', title: 'Hello' })

    expect(created).toMatchObject({ userId: 'user-1', title: 'Hello', message: null, type: 'info', read: false })
  })

  it('caps the list and filters unread', async () => {
    for (let i = 0; i < NOTIFICATION_LIST_LIMIT + 5; i += 1) {
      await createNotification(test.db, mainId, { userId: 'user-1', title: `n${i}` })
    }
    const [first] = await listMyNotifications(test.db, mainId, 'user-1')
    if (!first) throw new Error('inbox is empty')
    await markRead(test.db, mainId, 'user-1', first.id)

    expect(await listMyNotifications(test.db, mainId, 'user-1')).toHaveLength(50)
    expect(await countUnread(test.db, mainId, 'user-1')).toBe(54)
  })

  it('keeps inboxes apart', async () => {
    const mine = await createNotification(test.db, mainId, { userId: 'user-1', title: 'Mine' })
    await createNotification(test.db, mainId, { userId: 'user-2', title: 'Theirs' })

    expect((await listMyNotifications(test.db, mainId, 'user-1')).map((row) => row.title)).toEqual(['Mine'])
    expect(await captureError(() => markRead(test.db, mainId, 'user-2', mine.id))).toBeInstanceOf(NotFoundError)
  })

  it('marks everything read and reports how many changed', async () => {
    await createNotification(test.db, mainId, { userId: 'user-1', title: 'a' })
    await createNotification(test.db, mainId, { userId: 'user-1', title: 'b' })
    await createNotification(test.db, mainId, { userId: 'user-2', title: 'c' })

    expect(await markAllRead(test.db, mainId, 'user-1')).toEqual({ updated: 2 })
    expect(await listMyNotifications(test.db, mainId, 'user-1', { unreadOnly: true })).toEqual([])
    expect(await countUnread(test.db, mainId, 'user-2')).toBe(1)
  })
})
