/**
 * Asset routes.
 *
 * CRUD over hardware assets plus checkout/checkin. Every handler is a thin
 * shell: parse, call the engine, map the result.
 */

import { Hono } from 'hono'
import {
  assetCheckinSchema,
  checkoutSchema,
  createAssetSchema,
  listAssetsQuerySchema,
  updateAssetSchema,
} from '@assetdesk/schema'
import type { InventoryServices } from '../services/inventory.js'
import { getActor, requireActor } from '../middleware/actor.js'
import { fail, failValidation, failWith, ok, pagination, parseIdParam } from './_api.js'

export function createAssetRoutes(services: InventoryServices) {
  const { assets, workflow } = services
  const assetRoutes = new Hono()

  assetRoutes.get('/assets', async (c) => {
    const parsed = listAssetsQuerySchema.safeParse(c.req.query())
    if (!parsed.success) return failValidation(c, 'Invalid query parameters.', parsed.error)

    const { page, perPage, search, assigned } = parsed.data
    const result = await assets.listAssets({
      limit: perPage,
      offset: (page - 1) * perPage,
      search,
      assigned: assigned === undefined ? undefined : assigned === 'true',
    })
    if (!result.ok) return failWith(c, result.error)

    return ok(c, result.value.rows, 200, pagination(page, perPage, result.value.total))
  })

  assetRoutes.post('/assets', requireActor, async (c) => {
    const body = await c.req.json().catch(() => null)
    const parsed = createAssetSchema.safeParse(body)
    if (!parsed.success) return failValidation(c, 'Invalid request body.', parsed.error)

    const result = await assets.createAsset(parsed.data, getActor(c))
    if (!result.ok) return failWith(c, result.error)
    return ok(c, result.value, 201)
  })

  assetRoutes.get('/assets/:assetId', async (c) => {
    const assetId = parseIdParam(c, 'assetId')
    if (assetId === null) return fail(c, 'VALIDATION_ERROR', 'assetId must be a positive integer.', 400)

    const result = await assets.getAsset(assetId)
    if (!result.ok) return failWith(c, result.error)
    return ok(c, result.value)
  })

  assetRoutes.patch('/assets/:assetId', requireActor, async (c) => {
    const assetId = parseIdParam(c, 'assetId')
    if (assetId === null) return fail(c, 'VALIDATION_ERROR', 'assetId must be a positive integer.', 400)

    const body = await c.req.json().catch(() => null)
    const parsed = updateAssetSchema.safeParse(body)
    if (!parsed.success) return failValidation(c, 'Invalid request body.', parsed.error)

    const result = await assets.updateAsset(assetId, parsed.data, getActor(c))
    if (!result.ok) return failWith(c, result.error)
    return ok(c, result.value)
  })

  assetRoutes.delete('/assets/:assetId', requireActor, async (c) => {
    const assetId = parseIdParam(c, 'assetId')
    if (assetId === null) return fail(c, 'VALIDATION_ERROR', 'assetId must be a positive integer.', 400)

    const result = await assets.deleteAsset(assetId, getActor(c))
    if (!result.ok) return failWith(c, result.error)
    return ok(c, result.value)
  })

  assetRoutes.post('/assets/:assetId/checkout', requireActor, async (c) => {
    const assetId = parseIdParam(c, 'assetId')
    if (assetId === null) return fail(c, 'VALIDATION_ERROR', 'assetId must be a positive integer.', 400)

    const body = await c.req.json().catch(() => null)
    const parsed = checkoutSchema.safeParse(body)
    if (!parsed.success) return failValidation(c, 'Invalid request body.', parsed.error)

    const checkedOut = await workflow.assignAsset({ assetId, ...parsed.data, actor: getActor(c) })
    if (!checkedOut.ok) return failWith(c, checkedOut.error)

    // Respond with the same view GET returns so the label is included.
    const view = await assets.getAsset(assetId)
    if (!view.ok) return failWith(c, view.error)
    return ok(c, view.value)
  })

  assetRoutes.post('/assets/:assetId/checkin', requireActor, async (c) => {
    const assetId = parseIdParam(c, 'assetId')
    if (assetId === null) return fail(c, 'VALIDATION_ERROR', 'assetId must be a positive integer.', 400)

    // An empty body is a plain checkin.
    const body = await c.req.json().catch(() => ({}))
    const parsed = assetCheckinSchema.safeParse(body ?? {})
    if (!parsed.success) return failValidation(c, 'Invalid request body.', parsed.error)

    const checkedIn = await workflow.releaseAsset({ assetId, ...parsed.data, actor: getActor(c) })
    if (!checkedIn.ok) return failWith(c, checkedIn.error)

    const view = await assets.getAsset(assetId)
    if (!view.ok) return failWith(c, view.error)
    return ok(c, view.value)
  })

  assetRoutes.get('/assets/:assetId/seats', async (c) => {
    const assetId = parseIdParam(c, 'assetId')
    if (assetId === null) return fail(c, 'VALIDATION_ERROR', 'assetId must be a positive integer.', 400)

    const result = await assets.listAssetSeats(assetId)
    if (!result.ok) return failWith(c, result.error)
    return ok(c, result.value)
  })

  return assetRoutes
}
