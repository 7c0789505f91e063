import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { classifyDatabaseError, type Database, type DatabaseErrorKind } from '@shiftdesk/db'
import type { ContentfulStatusCode } from 'hono/utils/http-status'
import type { ApiConfig } from './config'
import { ApiError } from './lib/errors'
import { logError } from './lib/log'
import { requestId } from './middleware/auth'
import { coreApiRoutes } from './routes/core-api'
import { fail } from './routes/_api'

const DATABASE_ERRORS: Record<DatabaseErrorKind, { status: ContentfulStatusCode; code: string; message: string }> = {
  unique: { status: 409, code: 'CONFLICT', message: 'A row with the same key already exists.' },
  foreign_key: { status: 409, code: 'REFERENCE_NOT_FOUND', message: 'A referenced row does not exist.' },
  not_null: { status: 400, code: 'MISSING_FIELD', message: 'A required field is missing.' },
  check: { status: 400, code: 'CHECK_VIOLATION', message: 'A value failed a database check.' },
}

export type AppDependencies = {
  db: Database
  config: ApiConfig
}

/**
 * Build the HTTP app. The server entrypoint and the tests both go through
 * here, so they see the same middleware and error mapping.
 */
export function createApp({ db, config }: AppDependencies) {
  const app = new Hono()

  app.use('*', requestId)
  app.use('*', cors({ origin: config.corsOrigin }))
  app.use('*', async (c, next) => {
    c.set('db', db)
    c.set('config', config)
    await next()
  })

  app.route('/api/v1', coreApiRoutes)

  app.onError((err, c) => {
    if (err instanceof ApiError) {
      return fail(c, err.code, err.message, err.status, err.details)
    }

    const dbError = classifyDatabaseError(err)
    if (dbError) {
      const mapped = DATABASE_ERRORS[dbError.kind]
      return fail(c, mapped.code, mapped.message, mapped.status, {
        constraint: dbError.constraint,
        detail: dbError.detail,
      })
    }

    logError(`ERROR [${c.get('requestId') ?? 'no-request-id'}]: ${err.message}`)
    return fail(c, 'INTERNAL_ERROR', 'Internal server error.', 500)
  })

  app.notFound((c) => fail(c, 'NOT_FOUND', `Route not found: ${c.req.method} ${c.req.path}`, 404))

  return app
}
