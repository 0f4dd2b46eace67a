/**
 * Seat pool reconciliation.
 *
 * Keeps the active `license_seats` rows of a license in line with its
 * declared seat count. Runs inside the unit of work of the license save so
 * that a rejected reduction rolls the license update back too.
 */

import { MAX_LICENSE_SEATS } from '@assetdesk/schema'
import type { ActorId, AuditLedger } from './audit.js'
import {
  err,
  notFound,
  ok,
  validationError,
  type Result,
  type SeatReconcileError,
} from './inventory-errors.js'
import type { InventoryUnitOfWork } from './inventory-store.js'

export type SeatReconcileOutcome = {
  /** Ids of the seats created by this call. */
  created: number[]
  /** Ids of the available seats soft-deleted by this call. */
  retired: number[]
}

export type SeatPoolManager = {
  reconcile(
    uow: InventoryUnitOfWork,
    licenseId: number,
    previousSeatCount: number,
    newSeatCount: number,
    actor: ActorId,
  ): Promise<Result<SeatReconcileOutcome, SeatReconcileError>>
}

function isSeatCount(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_LICENSE_SEATS
}

const SEAT_COUNT_MESSAGE = `Seat counts must be integers from 0 to ${MAX_LICENSE_SEATS}.`

export function createSeatPoolManager(audit: AuditLedger): SeatPoolManager {
  return {
    async reconcile(uow, licenseId, previousSeatCount, newSeatCount, actor) {
      if (!isSeatCount(previousSeatCount)) {
        return validationError('previousSeatCount', SEAT_COUNT_MESSAGE)
      }
      if (!isSeatCount(newSeatCount)) {
        return validationError('seats', SEAT_COUNT_MESSAGE)
      }

      const license = await uow.licenses.findById(licenseId)
      if (!license) return notFound('license', licenseId)

      const delta = newSeatCount - previousSeatCount
      if (delta === 0) return ok({ created: [], retired: [] })

      if (delta > 0) {
        const stamp = audit.stampCreated(actor)
        const rows = Array.from({ length: delta }, () => ({ licenseId, ...stamp }))
        const created = await uow.seats.insertMany(rows)
        return ok({ created: created.map((seat) => seat.id), retired: [] })
      }

      const required = -delta
      const { available } = await uow.seats.countByLicense(licenseId)
      if (available < required) {
        return err({
          code: 'INSUFFICIENT_AVAILABLE_SEATS',
          licenseId,
          required,
          available,
          currentlyAssigned: previousSeatCount - available,
        })
      }

      const candidates = await uow.seats.findAvailable(licenseId, {
        limit: required,
        order: 'newest',
        forUpdate: true,
      })
      // Locked rows can only shrink the set if another writer raced us past the count.
      if (candidates.length < required) {
        return err({
          code: 'INSUFFICIENT_AVAILABLE_SEATS',
          licenseId,
          required,
          available: candidates.length,
          currentlyAssigned: previousSeatCount - candidates.length,
        })
      }

      const retiredIds = candidates.map((seat) => seat.id)
      await uow.seats.softDelete(retiredIds, audit.stampDeleted(actor))
      return ok({ created: [], retired: retiredIds })
    },
  }
}
