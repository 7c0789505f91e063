import type { ContentfulStatusCode } from 'hono/utils/http-status'

/**
 * Errors services throw on purpose. The app error handler turns them into
 * the standard failure envelope with their status and code.
 */
export class ApiError extends Error {
  constructor(
    public readonly status: ContentfulStatusCode,
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message)
    this.name = 'ApiError'
  }
}

export class NotFoundError extends ApiError {
  constructor(entity: string, id: string) {
    super(404, 'NOT_FOUND', `${entity} not found: ${id}`)
  }
}

export class InvalidTransitionError extends ApiError {
  constructor(from: string, to: string) {
    super(409, 'INVALID_TRANSITION', `Cannot move a swap request from "${from}" to "${to}"; only pending requests can be resolved.`)
  }
}

export type OrderingViolation = {
  hard: string
  soft: string
  field: 'priority_order' | 'penalty_weight'
}

/** Hard rules must sort before, and weigh more than, every soft rule. */
export class OrderingConventionError extends ApiError {
  constructor(public readonly violations: OrderingViolation[]) {
    super(
      422,
      'ORDERING_CONVENTION',
      'Every hard constraint must have a lower priority_order and a higher penalty_weight than every soft constraint.',
      { violations },
    )
  }
}
