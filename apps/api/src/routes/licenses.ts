/**
 * License and seat routes.
 */

import { Hono } from 'hono'
import {
  createLicenseSchema,
  listLicensesQuerySchema,
  seatCheckoutSchema,
  updateLicenseSchema,
} from '@assetdesk/schema'
import type { LicenseSeat } from '@assetdesk/db'
import type { Context } from 'hono'
import type { InventoryServices } from '../services/inventory.js'
import { getActor, requireActor } from '../middleware/actor.js'
import { fail, failValidation, failWith, ok, pagination, parseIdParam } from './_api.js'

export function createLicenseRoutes(services: InventoryServices) {
  const { licenses, workflow } = services
  const licenseRoutes = new Hono()

  /** Re-read the seat through the license listing so the response carries its label. */
  async function seatView(c: Context, seat: LicenseSeat) {
    const seats = await licenses.listSeats(seat.licenseId)
    if (!seats.ok) return failWith(c, seats.error)
    const view = seats.value.find((candidate) => candidate.id === seat.id)
    return ok(c, view ?? seat)
  }

  licenseRoutes.get('/licenses', async (c) => {
    const parsed = listLicensesQuerySchema.safeParse(c.req.query())
    if (!parsed.success) return failValidation(c, 'Invalid query parameters.', parsed.error)

    const { page, perPage, search } = parsed.data
    const result = await licenses.listLicenses({ limit: perPage, offset: (page - 1) * perPage, search })
    if (!result.ok) return failWith(c, result.error)

    return ok(c, result.value.rows, 200, pagination(page, perPage, result.value.total))
  })

  licenseRoutes.post('/licenses', requireActor, async (c) => {
    const body = await c.req.json().catch(() => null)
    const parsed = createLicenseSchema.safeParse(body)
    if (!parsed.success) return failValidation(c, 'Invalid request body.', parsed.error)

    const result = await licenses.createLicense(parsed.data, getActor(c))
    if (!result.ok) return failWith(c, result.error)
    return ok(c, result.value, 201)
  })

  licenseRoutes.get('/licenses/:licenseId', async (c) => {
    const licenseId = parseIdParam(c, 'licenseId')
    if (licenseId === null) return fail(c, 'VALIDATION_ERROR', 'licenseId must be a positive integer.', 400)

    const result = await licenses.getLicense(licenseId)
    if (!result.ok) return failWith(c, result.error)
    return ok(c, result.value)
  })

  licenseRoutes.patch('/licenses/:licenseId', requireActor, async (c) => {
    const licenseId = parseIdParam(c, 'licenseId')
    if (licenseId === null) return fail(c, 'VALIDATION_ERROR', 'licenseId must be a positive integer.', 400)

    const body = await c.req.json().catch(() => null)
    const parsed = updateLicenseSchema.safeParse(body)
    if (!parsed.success) return failValidation(c, 'Invalid request body.', parsed.error)

    const result = await licenses.updateLicense(licenseId, parsed.data, getActor(c))
    if (!result.ok) return failWith(c, result.error)
    return ok(c, result.value)
  })

  licenseRoutes.delete('/licenses/:licenseId', requireActor, async (c) => {
    const licenseId = parseIdParam(c, 'licenseId')
    if (licenseId === null) return fail(c, 'VALIDATION_ERROR', 'licenseId must be a positive integer.', 400)

    const result = await licenses.deleteLicense(licenseId, getActor(c))
    if (!result.ok) return failWith(c, result.error)
    return ok(c, result.value)
  })

  licenseRoutes.get('/licenses/:licenseId/seats', async (c) => {
    const licenseId = parseIdParam(c, 'licenseId')
    if (licenseId === null) return fail(c, 'VALIDATION_ERROR', 'licenseId must be a positive integer.', 400)

    const result = await licenses.listSeats(licenseId)
    if (!result.ok) return failWith(c, result.error)
    return ok(c, result.value)
  })

  licenseRoutes.post('/licenses/:licenseId/seats/checkout', requireActor, async (c) => {
    const licenseId = parseIdParam(c, 'licenseId')
    if (licenseId === null) return fail(c, 'VALIDATION_ERROR', 'licenseId must be a positive integer.', 400)

    const body = await c.req.json().catch(() => null)
    const parsed = seatCheckoutSchema.safeParse(body)
    if (!parsed.success) return failValidation(c, 'Invalid request body.', parsed.error)

    const result = await workflow.assignNextAvailableSeat({ licenseId, ...parsed.data, actor: getActor(c) })
    if (!result.ok) return failWith(c, result.error)
    return seatView(c, result.value)
  })

  licenseRoutes.post('/licenses/:licenseId/seats/:seatId/checkout', requireActor, async (c) => {
    const licenseId = parseIdParam(c, 'licenseId')
    const seatId = parseIdParam(c, 'seatId')
    if (licenseId === null || seatId === null) {
      return fail(c, 'VALIDATION_ERROR', 'licenseId and seatId must be positive integers.', 400)
    }

    const body = await c.req.json().catch(() => null)
    const parsed = seatCheckoutSchema.safeParse(body)
    if (!parsed.success) return failValidation(c, 'Invalid request body.', parsed.error)

    const result = await workflow.assignSeat({ seatId, licenseId, ...parsed.data, actor: getActor(c) })
    if (!result.ok) return failWith(c, result.error)
    return seatView(c, result.value)
  })

  licenseRoutes.post('/licenses/:licenseId/seats/:seatId/checkin', requireActor, async (c) => {
    const licenseId = parseIdParam(c, 'licenseId')
    const seatId = parseIdParam(c, 'seatId')
    if (licenseId === null || seatId === null) {
      return fail(c, 'VALIDATION_ERROR', 'licenseId and seatId must be positive integers.', 400)
    }

    const result = await workflow.releaseSeat({ seatId, licenseId, actor: getActor(c) })
    if (!result.ok) return failWith(c, result.error)
    return seatView(c, result.value)
  })

  return licenseRoutes
}
