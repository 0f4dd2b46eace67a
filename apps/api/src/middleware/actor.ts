/**
 * Request context middleware.
 *
 * The API does not authenticate. Whoever sits in front of it (gateway, UI
 * backend, script) names the acting user in `x-actor-id`; the value is
 * opaque and only ends up in audit columns.
 */

import type { Context, Next } from 'hono'
import { normalizeActor } from '../services/audit.js'
import { fail } from '../routes/_api.js'

export const ACTOR_HEADER = 'x-actor-id'

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string
    actorId: string
  }
}

/**
 * Ensure each request has a stable request id for tracing.
 */
export async function requestId(c: Context, next: Next) {
  const id = c.req.header('x-request-id') ?? crypto.randomUUID()
  c.set('requestId', id)
  c.header('x-request-id', id)
  await next()
}

/**
 * Reject mutating calls that do not say who is acting.
 */
export async function requireActor(c: Context, next: Next) {
  const actor = normalizeActor(c.req.header(ACTOR_HEADER) ?? '')
  if (!actor) {
    return fail(c, 'UNAUTHENTICATED', `The ${ACTOR_HEADER} header is required.`, 401)
  }
  c.set('actorId', actor)
  await next()
}

export function getActor(c: Context): string {
  return c.get('actorId')
}
