/**
 * Accessory routes.
 *
 * Stock CRUD plus checkout of single units to users and their checkin.
 */

import { Hono } from 'hono'
import {
  accessoryCheckoutSchema,
  createAccessorySchema,
  listAccessoriesQuerySchema,
  updateAccessorySchema,
} from '@assetdesk/schema'
import type { InventoryServices } from '../services/inventory.js'
import { getActor, requireActor } from '../middleware/actor.js'
import { fail, failValidation, failWith, ok, pagination, parseIdParam } from './_api.js'

export function createAccessoryRoutes(services: InventoryServices) {
  const { accessories, workflow } = services
  const accessoryRoutes = new Hono()

  accessoryRoutes.get('/accessories', async (c) => {
    const parsed = listAccessoriesQuerySchema.safeParse(c.req.query())
    if (!parsed.success) return failValidation(c, 'Invalid query parameters.', parsed.error)

    const { page, perPage, search } = parsed.data
    const result = await accessories.listAccessories({ limit: perPage, offset: (page - 1) * perPage, search })
    if (!result.ok) return failWith(c, result.error)

    return ok(c, result.value.rows, 200, pagination(page, perPage, result.value.total))
  })

  accessoryRoutes.post('/accessories', requireActor, async (c) => {
    const body = await c.req.json().catch(() => null)
    const parsed = createAccessorySchema.safeParse(body)
    if (!parsed.success) return failValidation(c, 'Invalid request body.', parsed.error)

    const result = await accessories.createAccessory(parsed.data, getActor(c))
    if (!result.ok) return failWith(c, result.error)
    return ok(c, result.value, 201)
  })

  accessoryRoutes.get('/accessories/:accessoryId', async (c) => {
    const accessoryId = parseIdParam(c, 'accessoryId')
    if (accessoryId === null) return fail(c, 'VALIDATION_ERROR', 'accessoryId must be a positive integer.', 400)

    const result = await accessories.getAccessory(accessoryId)
    if (!result.ok) return failWith(c, result.error)
    return ok(c, result.value)
  })

  accessoryRoutes.patch('/accessories/:accessoryId', requireActor, async (c) => {
    const accessoryId = parseIdParam(c, 'accessoryId')
    if (accessoryId === null) return fail(c, 'VALIDATION_ERROR', 'accessoryId must be a positive integer.', 400)

    const body = await c.req.json().catch(() => null)
    const parsed = updateAccessorySchema.safeParse(body)
    if (!parsed.success) return failValidation(c, 'Invalid request body.', parsed.error)

    const result = await accessories.updateAccessory(accessoryId, parsed.data, getActor(c))
    if (!result.ok) return failWith(c, result.error)
    return ok(c, result.value)
  })

  accessoryRoutes.delete('/accessories/:accessoryId', requireActor, async (c) => {
    const accessoryId = parseIdParam(c, 'accessoryId')
    if (accessoryId === null) return fail(c, 'VALIDATION_ERROR', 'accessoryId must be a positive integer.', 400)

    const result = await accessories.deleteAccessory(accessoryId, getActor(c))
    if (!result.ok) return failWith(c, result.error)
    return ok(c, result.value)
  })

  accessoryRoutes.get('/accessories/:accessoryId/checkouts', async (c) => {
    const accessoryId = parseIdParam(c, 'accessoryId')
    if (accessoryId === null) return fail(c, 'VALIDATION_ERROR', 'accessoryId must be a positive integer.', 400)

    const result = await accessories.listCheckouts(accessoryId)
    if (!result.ok) return failWith(c, result.error)
    return ok(c, result.value)
  })

  accessoryRoutes.post('/accessories/:accessoryId/checkout', requireActor, async (c) => {
    const accessoryId = parseIdParam(c, 'accessoryId')
    if (accessoryId === null) return fail(c, 'VALIDATION_ERROR', 'accessoryId must be a positive integer.', 400)

    const body = await c.req.json().catch(() => null)
    const parsed = accessoryCheckoutSchema.safeParse(body)
    if (!parsed.success) return failValidation(c, 'Invalid request body.', parsed.error)

    const result = await workflow.assignAccessory({ accessoryId, ...parsed.data, actor: getActor(c) })
    if (!result.ok) return failWith(c, result.error)
    return ok(c, result.value, 201)
  })

  accessoryRoutes.post('/accessories/:accessoryId/checkouts/:checkoutId/checkin', requireActor, async (c) => {
    const accessoryId = parseIdParam(c, 'accessoryId')
    const checkoutId = parseIdParam(c, 'checkoutId')
    if (accessoryId === null || checkoutId === null) {
      return fail(c, 'VALIDATION_ERROR', 'accessoryId and checkoutId must be positive integers.', 400)
    }

    const result = await workflow.releaseAccessory({ accessoryId, checkoutId, actor: getActor(c) })
    if (!result.ok) return failWith(c, result.error)

    // Respond with the accessory so the caller sees the unit back in stock.
    const view = await accessories.getAccessory(accessoryId)
    if (!view.ok) return failWith(c, view.error)
    return ok(c, view.value)
  })

  return accessoryRoutes
}
