import type { Context } from 'hono'
import type { ContentfulStatusCode } from 'hono/utils/http-status'
import type { ZodError } from 'zod'

export function requestMeta(c: Context) {
  return {
    requestId: c.get('requestId') ?? crypto.randomUUID(),
    timestamp: new Date().toISOString(),
  }
}

export function ok<T>(c: Context, data: T, status: ContentfulStatusCode = 200, extra?: Record<string, unknown>) {
  return c.json(
    {
      success: true,
      data,
      meta: requestMeta(c),
      ...(extra ?? {}),
    },
    status,
  )
}

export function fail(
  c: Context,
  code: string,
  message: string,
  status: ContentfulStatusCode = 400,
  details?: unknown,
) {
  return c.json(
    {
      success: false,
      error: {
        code,
        message,
        ...(details !== undefined ? { details } : {}),
      },
      meta: requestMeta(c),
    },
    status,
  )
}

export function validationFailed(c: Context, what: 'body' | 'query', error: ZodError) {
  return fail(
    c,
    'VALIDATION_ERROR',
    what === 'body' ? 'Invalid request body.' : 'Invalid query parameters.',
    400,
    error.flatten(),
  )
}

/** Parsed JSON body, or null when the body is missing or not JSON. */
export async function readJson(c: Context): Promise<unknown> {
  return c.req.json<unknown>().catch(() => null)
}

export const booleanQuery = (value: string | undefined) => value === 'true' || value === '1'
