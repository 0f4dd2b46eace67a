import type { Context } from 'hono'
import type { ContentfulStatusCode } from 'hono/utils/http-status'
import type { ZodError } from 'zod'
import { idSchema } from '@assetdesk/schema'
import { describeInventoryError, type InventoryError } from '../services/inventory-errors.js'

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

const STATUS_BY_CODE: Record<InventoryError['code'], ContentfulStatusCode> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  ALREADY_ASSIGNED: 409,
  ALREADY_UNASSIGNED: 409,
  INSUFFICIENT_AVAILABLE_SEATS: 409,
  NO_AVAILABLE_SEATS: 409,
  LICENSE_HAS_ASSIGNED_SEATS: 409,
  DUPLICATE_TAG: 409,
  NO_AVAILABLE_QUANTITY: 409,
  ACCESSORY_HAS_CHECKOUTS: 409,
  NOT_REASSIGNABLE: 422,
}

/** Business error → envelope; the error object itself goes out as `details`. */
export function failWith(c: Context, error: InventoryError) {
  return fail(c, error.code, describeInventoryError(error), STATUS_BY_CODE[error.code], error)
}

export function failValidation(c: Context, message: string, error: ZodError) {
  return fail(c, 'VALIDATION_ERROR', message, 400, error.flatten())
}

/** Numeric path parameter, or null when it is not a positive integer. */
export function parseIdParam(c: Context, name: string): number | null {
  const parsed = idSchema.safeParse(c.req.param(name))
  return parsed.success ? parsed.data : null
}

export function pagination(page: number, perPage: number, total: number) {
  return {
    pagination: {
      page,
      perPage,
      total,
      hasMore: page * perPage < total,
    },
  }
}
