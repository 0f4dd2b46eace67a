import { Hono } from 'hono'
import { z } from 'zod'
import { assignmentFieldsQuerySchema, assignmentTargetKindSchema } from '@assetdesk/schema'
import { fieldsFor, fieldsForScope } from '../services/target-fields.js'
import { fail, failValidation, ok } from './_api.js'

/** `none` asks for the rules before any kind is chosen. */
const kindParamSchema = z.union([assignmentTargetKindSchema, z.literal('none')])

/**
 * Field rules for the checkout form: which target fields are enabled,
 * which one is required and which must be cleared for a given kind.
 */
export const assignmentFieldRoutes = new Hono()

assignmentFieldRoutes.get('/assignment-fields/:kind', (c) => {
  const kind = kindParamSchema.safeParse(c.req.param('kind'))
  if (!kind.success) {
    return fail(c, 'VALIDATION_ERROR', 'kind must be one of user, location, asset or none.', 400)
  }
  const query = assignmentFieldsQuerySchema.safeParse(c.req.query())
  if (!query.success) return failValidation(c, 'Invalid query parameters.', query.error)

  const { scope } = query.data
  const chosen = kind.data === 'none' ? null : kind.data
  if (chosen !== null && !fieldsForScope(scope).includes(chosen)) {
    return fail(c, 'VALIDATION_ERROR', `A ${scope} cannot be assigned to a ${chosen}.`, 400)
  }

  return ok(c, { kind: chosen, scope, fields: fieldsForScope(scope), ...fieldsFor(chosen, scope) })
})
