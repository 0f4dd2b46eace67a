/**
 * License lifecycle around the seat pool.
 *
 * Saving a license and reconciling its seats happen in one unit of work: a
 * seat reduction that cannot be honoured leaves the license untouched.
 */

import type { License, LicenseSeat } from '@assetdesk/db'
import type { CreateLicenseInput, UpdateLicenseInput } from '@assetdesk/schema'
import { seatTargetOf, type AssignmentTarget } from './assignment-target.js'
import { normalizeActor, type ActorId, type AuditLedger } from './audit.js'
import {
  err,
  notFound,
  ok,
  validationError,
  type InventoryError,
  type LicenseHasAssignedSeatsError,
  type NotFoundError,
  type Result,
  type SeatReconcileError,
  type ValidationError,
} from './inventory-errors.js'
import type { InventoryStore, InventoryUnitOfWork, LicenseListQuery, PageOf } from './inventory-store.js'
import { checkReferences, type ReferenceCheck } from './references.js'
import type { SeatPoolManager } from './seat-pool.js'
import { createTargetResolver } from './target-resolver.js'

export type SeatAvailability = {
  seats: number
  available: number
  assigned: number
}

export type LicenseView = License & { availability: SeatAvailability }

export type SeatState = 'available' | 'assigned'

export type SeatView = {
  id: number
  licenseId: number
  /** 1-based position among the license's active seats: `Seat 1`, `Seat 2`… */
  label: string
  state: SeatState
  assignment: AssignmentTarget
  assignedToLabel: string | null
  custodianUserId: number | null
  assignedAt: Date | null
}

export type LicenseRegistry = {
  createLicense(input: CreateLicenseInput, actor: ActorId): Promise<Result<LicenseView, ValidationError | SeatReconcileError>>
  updateLicense(
    licenseId: number,
    patch: UpdateLicenseInput,
    actor: ActorId,
  ): Promise<Result<LicenseView, ValidationError | SeatReconcileError>>
  deleteLicense(
    licenseId: number,
    actor: ActorId,
  ): Promise<Result<{ id: number; retiredSeats: number }, ValidationError | NotFoundError | LicenseHasAssignedSeatsError>>
  getLicense(licenseId: number): Promise<Result<LicenseView, NotFoundError>>
  listLicenses(query: LicenseListQuery): Promise<Result<PageOf<LicenseView>, InventoryError>>
  listSeats(licenseId: number): Promise<Result<SeatView[], NotFoundError>>
}

function licenseReferences(input: UpdateLicenseInput): ReferenceCheck[] {
  return [
    ['categoryId', 'category', input.categoryId],
    ['manufacturerId', 'manufacturer', input.manufacturerId],
    ['supplierId', 'supplier', input.supplierId],
    ['companyId', 'company', input.companyId],
  ]
}

async function availabilityOf(uow: InventoryUnitOfWork, license: License): Promise<SeatAvailability> {
  const counts = await uow.seats.countByLicense(license.id)
  return {
    seats: license.seats,
    available: counts.available,
    assigned: counts.active - counts.available,
  }
}

/**
 * Seat rows as shown on a license. `offset` is the 0-based position of the
 * first row among the license's active seats.
 */
export async function describeSeats(
  uow: InventoryUnitOfWork,
  seats: LicenseSeat[],
  offset = 0,
): Promise<SeatView[]> {
  const resolver = createTargetResolver(uow.lookups)
  const views: SeatView[] = []
  for (const [index, seat] of seats.entries()) {
    const assignment = seatTargetOf(seat)
    views.push({
      id: seat.id,
      licenseId: seat.licenseId,
      label: `Seat ${offset + index + 1}`,
      state: assignment.kind === 'unassigned' ? 'available' : 'assigned',
      assignment,
      assignedToLabel: await resolver.describe(assignment),
      custodianUserId: seat.custodianUserId,
      assignedAt: seat.assignedAt,
    })
  }
  return views
}

export function createLicenseRegistry(deps: {
  store: InventoryStore
  audit: AuditLedger
  seatPool: SeatPoolManager
}): LicenseRegistry {
  const { store, audit, seatPool } = deps

  return {
    async createLicense(input, actorInput) {
      const actor = normalizeActor(actorInput)
      if (!actor) return validationError('actor', 'An acting user id is required.')

      return store.transaction<LicenseView, ValidationError | SeatReconcileError>(async (uow) => {
        const refs = await checkReferences(uow, licenseReferences(input))
        if (!refs.ok) return refs

        const license = await uow.licenses.insert({ ...input, ...audit.stampCreated(actor) })
        const pool = await seatPool.reconcile(uow, license.id, 0, license.seats, actor)
        if (!pool.ok) return pool

        return ok({ ...license, availability: await availabilityOf(uow, license) })
      })
    },

    async updateLicense(licenseId, patch, actorInput) {
      const actor = normalizeActor(actorInput)
      if (!actor) return validationError('actor', 'An acting user id is required.')

      return store.transaction<LicenseView, ValidationError | SeatReconcileError>(async (uow) => {
        const existing = await uow.licenses.findById(licenseId, { lock: 'update' })
        if (!existing) return notFound('license', licenseId)

        const refs = await checkReferences(uow, licenseReferences(patch))
        if (!refs.ok) return refs

        const license = await uow.licenses.update(licenseId, { ...patch, ...audit.stampUpdated(actor) })

        // Reconcile from the physical count, so a pool that drifted is healed too.
        const { active } = await uow.seats.countByLicense(licenseId)
        const pool = await seatPool.reconcile(uow, licenseId, active, license.seats, actor)
        if (!pool.ok) return pool

        return ok({ ...license, availability: await availabilityOf(uow, license) })
      })
    },

    async deleteLicense(licenseId, actorInput) {
      const actor = normalizeActor(actorInput)
      if (!actor) return validationError('actor', 'An acting user id is required.')

      return store.transaction<
        { id: number; retiredSeats: number },
        ValidationError | NotFoundError | LicenseHasAssignedSeatsError
      >(async (uow) => {
        const license = await uow.licenses.findById(licenseId, { lock: 'update' })
        if (!license) return notFound('license', licenseId)

        // Seat checkouts hold the license FOR SHARE, so none can land after this read.
        const seats = await uow.seats.listByLicense(licenseId, { lock: 'update' })
        const assigned = seats.filter((seat) => seatTargetOf(seat).kind !== 'unassigned').length
        if (assigned > 0) {
          return err({ code: 'LICENSE_HAS_ASSIGNED_SEATS', licenseId, assigned })
        }

        const stamp = audit.stampDeleted(actor)
        const retiredSeats = await uow.seats.softDelete(seats.map((seat) => seat.id), stamp)
        await uow.licenses.update(licenseId, stamp)
        return ok({ id: licenseId, retiredSeats })
      })
    },

    async getLicense(licenseId) {
      return store.transaction<LicenseView, NotFoundError>(async (uow) => {
        const license = await uow.licenses.findById(licenseId)
        if (!license) return notFound('license', licenseId)
        return ok({ ...license, availability: await availabilityOf(uow, license) })
      })
    },

    async listLicenses(query) {
      return store.transaction<PageOf<LicenseView>, InventoryError>(async (uow) => {
        const page = await uow.licenses.list(query)
        const rows: LicenseView[] = []
        for (const license of page.rows) {
          rows.push({ ...license, availability: await availabilityOf(uow, license) })
        }
        return ok({ rows, total: page.total })
      })
    },

    async listSeats(licenseId) {
      return store.transaction<SeatView[], NotFoundError>(async (uow) => {
        const license = await uow.licenses.findById(licenseId)
        if (!license) return notFound('license', licenseId)
        const seats = await uow.seats.listByLicense(licenseId)
        return ok(await describeSeats(uow, seats))
      })
    },
  }
}
