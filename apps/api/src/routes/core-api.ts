/**
 * Canonical API router, mounted at `/api/v1`.
 *
 * Route modules are split by domain but share the same auth and branch
 * access model.
 */

import { Hono } from 'hono'
import { checkDatabaseConnection } from '@shiftdesk/db'
import { branchRoutes } from './branches'
import { staffRoutes } from './staff'
import { constraintRoutes } from './constraints'
import { monthlyShiftRoutes } from './monthly-shifts'
import { swapRequestRoutes } from './swap-requests'
import { notificationRoutes } from './notifications'
import { logError } from '../lib/log'
import { fail, ok } from './_api'

export const coreApiRoutes = new Hono()

coreApiRoutes.route('/', branchRoutes)
coreApiRoutes.route('/', staffRoutes)
coreApiRoutes.route('/', constraintRoutes)
coreApiRoutes.route('/', monthlyShiftRoutes)
coreApiRoutes.route('/', swapRequestRoutes)
coreApiRoutes.route('/', notificationRoutes)

coreApiRoutes.get('/health', async (c) => {
  const service = { service: 'shiftdesk-api', version: '0.1.0' }
  try {
    const { latencyMs } = await checkDatabaseConnection(c.get('db'))
    return ok(c, { ...service, status: 'healthy', database: { status: 'up', latencyMs } })
  } catch (error) {
    logError(`health: database unreachable: ${error instanceof Error ? error.message : String(error)}`)
    return fail(c, 'SERVICE_UNAVAILABLE', 'Database is unreachable.', 503, {
      ...service,
      status: 'degraded',
      database: { status: 'down' },
    })
  }
})
