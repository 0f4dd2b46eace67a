/**
 * Assignment workflow: checkout and checkin of assets, license seats and
 * accessory units.
 *
 * Each operation is one unit of work. Preconditions are checked against
 * rows locked for update, so of two concurrent checkouts of the same entity
 * the second one re-reads the first one's result and fails with
 * `ALREADY_ASSIGNED` instead of overwriting it.
 */

import type { AccessoryUser, Asset, License, LicenseSeat } from '@assetdesk/db'
import {
  UNASSIGNED,
  assetAssignmentColumns,
  assetTargetOf,
  isAssigned,
  parseAssignmentTarget,
  parseSeatTarget,
  seatAssignmentColumns,
  seatTargetOf,
  type AssignedTarget,
  type AssignmentTarget,
  type SeatTarget,
} from './assignment-target.js'
import { normalizeActor, type ActorId, type AuditLedger } from './audit.js'
import {
  err,
  notFound,
  ok,
  validationError,
  type AccessoryCheckoutError,
  type AssignError,
  type NotFoundError,
  type ReleaseError,
  type Result,
  type ValidationError,
} from './inventory-errors.js'
import type { InventoryStore, InventoryUnitOfWork } from './inventory-store.js'
import { checkRowIds } from './references.js'

export type AssetAssignInput = {
  assetId: number
  target: AssignmentTarget
  /** Defaults to now. */
  assignedAt?: Date | null
  expectedCheckin?: Date | null
  actor: ActorId
}

export type AssetReleaseInput = {
  assetId: number
  actor: ActorId
  /** Status recorded when the asset comes back, e.g. "In repair". */
  statusId?: number | null
  /** Where the asset was put back. */
  locationId?: number | null
  /** Defaults to now. */
  releasedAt?: Date | null
}

export type SeatAssignInput = {
  seatId: number
  /** When given, the seat must belong to this license. */
  licenseId?: number
  target: AssignmentTarget
  assignedAt?: Date | null
  actor: ActorId
}

export type NextSeatAssignInput = {
  licenseId: number
  target: AssignmentTarget
  assignedAt?: Date | null
  actor: ActorId
}

export type SeatReleaseInput = {
  seatId: number
  licenseId?: number
  actor: ActorId
}

export type AccessoryAssignInput = {
  accessoryId: number
  userId: number
  note?: string | null
  /** Defaults to now. */
  assignedAt?: Date | null
  actor: ActorId
}

export type AccessoryReleaseInput = {
  accessoryId: number
  checkoutId: number
  actor: ActorId
}

export type AssignmentWorkflow = {
  assignAsset(input: AssetAssignInput): Promise<Result<Asset, AssignError>>
  releaseAsset(input: AssetReleaseInput): Promise<Result<Asset, ReleaseError>>
  assignSeat(input: SeatAssignInput): Promise<Result<LicenseSeat, AssignError>>
  assignNextAvailableSeat(input: NextSeatAssignInput): Promise<Result<LicenseSeat, AssignError>>
  releaseSeat(input: SeatReleaseInput): Promise<Result<LicenseSeat, ReleaseError>>
  assignAccessory(input: AccessoryAssignInput): Promise<Result<AccessoryUser, AccessoryCheckoutError>>
  releaseAccessory(input: AccessoryReleaseInput): Promise<Result<AccessoryUser, ValidationError | NotFoundError>>
}

type ResolvedAssetTarget = {
  custodianUserId: number | null
  /** `undefined` keeps the asset where it is. */
  locationId: number | null | undefined
}

function checkActor(actor: ActorId): Result<ActorId, ValidationError> {
  const normalized = normalizeActor(actor)
  return normalized ? ok(normalized) : validationError('actor', 'An acting user id is required.')
}

function checkDate(field: string, value: Date | null | undefined): Result<Date | null, ValidationError> {
  if (value === null || value === undefined) return ok(null)
  if (Number.isNaN(value.getTime())) return validationError(field, 'Not a valid date.')
  return ok(value)
}

function utcDayStart(value: Date): number {
  return Date.UTC(value.getUTCFullYear(), value.getUTCMonth(), value.getUTCDate())
}

/**
 * The user answerable for an asset: its user assignee, or the custodian
 * frozen when it was itself checked out to another asset.
 */
function custodianOf(asset: Asset): number | null {
  if (asset.assignedType === 'user') return asset.assignedTo
  return asset.custodianUserId
}

/** True when following `start`'s assignment chain reaches `assetId`. */
async function chainReaches(uow: InventoryUnitOfWork, start: Asset, assetId: number): Promise<boolean> {
  const seen = new Set<number>([start.id])
  let cursor = assetTargetOf(start)
  while (cursor.kind === 'asset') {
    if (cursor.id === assetId) return true
    if (seen.has(cursor.id)) return false
    seen.add(cursor.id)
    const next = await uow.assets.findById(cursor.id)
    if (!next) return false
    cursor = assetTargetOf(next)
  }
  return false
}

async function resolveAssetTarget(
  uow: InventoryUnitOfWork,
  assetId: number,
  target: AssignedTarget,
): Promise<Result<ResolvedAssetTarget, ValidationError>> {
  switch (target.kind) {
    case 'user':
      if (!(await uow.references.exists('user', target.id))) {
        return validationError('target.id', `User ${target.id} does not exist.`)
      }
      return ok({ custodianUserId: target.id, locationId: undefined })
    case 'location':
      if (!(await uow.references.exists('location', target.id))) {
        return validationError('target.id', `Location ${target.id} does not exist.`)
      }
      return ok({ custodianUserId: null, locationId: target.id })
    case 'asset': {
      if (target.id === assetId) {
        return validationError('target.id', 'An asset cannot be assigned to itself.')
      }
      const other = await uow.assets.findById(target.id)
      if (!other) {
        return validationError('target.id', `Asset ${target.id} does not exist.`)
      }
      if (await chainReaches(uow, other, assetId)) {
        return validationError('target.id', `Asset ${target.id} is already assigned, directly or not, to asset ${assetId}.`)
      }
      return ok({ custodianUserId: custodianOf(other), locationId: other.locationId })
    }
  }
}

async function resolveSeatCustodian(
  uow: InventoryUnitOfWork,
  target: SeatTarget,
): Promise<Result<number | null, ValidationError>> {
  if (target.kind === 'user') {
    if (!(await uow.references.exists('user', target.id))) {
      return validationError('target.id', `User ${target.id} does not exist.`)
    }
    return ok(target.id)
  }
  const asset = await uow.assets.findById(target.id)
  if (!asset) return validationError('target.id', `Asset ${target.id} does not exist.`)
  return ok(custodianOf(asset))
}

/**
 * Lock a seat for a checkout or checkin.
 *
 * The license is taken FOR SHARE before the seat FOR UPDATE: license saves
 * and deletions lock the license first too, so a seat cannot change hands
 * while its pool is being resized or retired.
 */
async function lockSeat(
  uow: InventoryUnitOfWork,
  seatId: number,
  licenseId: number | undefined,
): Promise<Result<{ seat: LicenseSeat; license: License }, NotFoundError>> {
  const peek = await uow.seats.findById(seatId)
  if (!peek || (licenseId !== undefined && peek.licenseId !== licenseId)) {
    return notFound('seat', seatId)
  }
  const license = await uow.licenses.findById(peek.licenseId, { lock: 'share' })
  if (!license) return notFound('license', peek.licenseId)
  const seat = await uow.seats.findById(seatId, { lock: 'update' })
  if (!seat) return notFound('seat', seatId)
  return ok({ seat, license })
}

export function createAssignmentWorkflow(deps: {
  store: InventoryStore
  audit: AuditLedger
}): AssignmentWorkflow {
  const { store, audit } = deps

  async function checkoutSeat(
    uow: InventoryUnitOfWork,
    seat: LicenseSeat,
    target: SeatTarget,
    assignedAt: Date,
    actor: ActorId,
  ): Promise<Result<LicenseSeat, AssignError>> {
    const current = seatTargetOf(seat)
    if (isAssigned(current)) {
      return err({ code: 'ALREADY_ASSIGNED', entity: 'seat', id: seat.id, current })
    }

    const custodian = await resolveSeatCustodian(uow, target)
    if (!custodian.ok) return custodian

    const updated = await uow.seats.update(seat.id, {
      ...seatAssignmentColumns(target),
      custodianUserId: custodian.value,
      assignedAt,
      ...audit.stampUpdated(actor),
    })
    return ok(updated)
  }

  return {
    async assignAsset(input) {
      const actor = checkActor(input.actor)
      if (!actor.ok) return actor
      const ids = checkRowIds({ assetId: input.assetId })
      if (!ids.ok) return ids
      const target = parseAssignmentTarget(input.target)
      if (!target.ok) return target
      const assignedAtInput = checkDate('assignedAt', input.assignedAt)
      if (!assignedAtInput.ok) return assignedAtInput
      const expectedCheckin = checkDate('expectedCheckin', input.expectedCheckin)
      if (!expectedCheckin.ok) return expectedCheckin

      const assignedAt = assignedAtInput.value ?? audit.now()
      if (expectedCheckin.value && expectedCheckin.value.getTime() < utcDayStart(assignedAt)) {
        return validationError('expectedCheckin', 'The expected checkin cannot precede the checkout.')
      }

      return store.transaction<Asset, AssignError>(async (uow) => {
        const asset = await uow.assets.findById(input.assetId, { lock: 'update' })
        if (!asset) return notFound('asset', input.assetId)

        const current = assetTargetOf(asset)
        if (isAssigned(current)) {
          return err({ code: 'ALREADY_ASSIGNED', entity: 'asset', id: asset.id, current })
        }

        const resolved = await resolveAssetTarget(uow, asset.id, target.value)
        if (!resolved.ok) return resolved
        const { custodianUserId, locationId } = resolved.value

        const updated = await uow.assets.update(
          asset.id,
          {
            ...assetAssignmentColumns(target.value),
            assignedAt,
            expectedCheckin: expectedCheckin.value,
            custodianUserId,
            ...(locationId !== undefined ? { locationId } : {}),
            ...audit.stampUpdated(actor.value),
          },
          'checkout',
        )
        return ok(updated)
      })
    },

    async releaseAsset(input) {
      const actor = checkActor(input.actor)
      if (!actor.ok) return actor
      const ids = checkRowIds({ assetId: input.assetId, statusId: input.statusId, locationId: input.locationId })
      if (!ids.ok) return ids
      const releasedAtInput = checkDate('releasedAt', input.releasedAt)
      if (!releasedAtInput.ok) return releasedAtInput
      const releasedAt = releasedAtInput.value ?? audit.now()
      const { statusId, locationId } = input

      return store.transaction<Asset, ReleaseError>(async (uow) => {
        const asset = await uow.assets.findById(input.assetId, { lock: 'update' })
        if (!asset) return notFound('asset', input.assetId)
        if (!isAssigned(assetTargetOf(asset))) {
          return err({ code: 'ALREADY_UNASSIGNED', entity: 'asset', id: asset.id })
        }

        if (statusId != null && !(await uow.references.exists('status', statusId))) {
          return validationError('statusId', `Status ${statusId} does not exist.`)
        }
        if (locationId != null && !(await uow.references.exists('location', locationId))) {
          return validationError('locationId', `Location ${locationId} does not exist.`)
        }

        const updated = await uow.assets.update(
          asset.id,
          {
            ...assetAssignmentColumns(UNASSIGNED),
            assignedAt: null,
            expectedCheckin: null,
            custodianUserId: null,
            lastCheckinAt: releasedAt,
            ...(statusId != null ? { statusId } : {}),
            ...(locationId != null ? { locationId } : {}),
            ...audit.stampUpdated(actor.value),
          },
          'checkin',
        )
        return ok(updated)
      })
    },

    async assignSeat(input) {
      const actor = checkActor(input.actor)
      if (!actor.ok) return actor
      const ids = checkRowIds({ seatId: input.seatId, licenseId: input.licenseId })
      if (!ids.ok) return ids
      const target = parseSeatTarget(input.target)
      if (!target.ok) return target
      const assignedAtInput = checkDate('assignedAt', input.assignedAt)
      if (!assignedAtInput.ok) return assignedAtInput
      const assignedAt = assignedAtInput.value ?? audit.now()

      return store.transaction<LicenseSeat, AssignError>(async (uow) => {
        const locked = await lockSeat(uow, input.seatId, input.licenseId)
        if (!locked.ok) return locked
        return checkoutSeat(uow, locked.value.seat, target.value, assignedAt, actor.value)
      })
    },

    async assignNextAvailableSeat(input) {
      const actor = checkActor(input.actor)
      if (!actor.ok) return actor
      const ids = checkRowIds({ licenseId: input.licenseId })
      if (!ids.ok) return ids
      const target = parseSeatTarget(input.target)
      if (!target.ok) return target
      const assignedAtInput = checkDate('assignedAt', input.assignedAt)
      if (!assignedAtInput.ok) return assignedAtInput
      const assignedAt = assignedAtInput.value ?? audit.now()

      return store.transaction<LicenseSeat, AssignError>(async (uow) => {
        const license = await uow.licenses.findById(input.licenseId, { lock: 'update' })
        if (!license) return notFound('license', input.licenseId)

        const [seat] = await uow.seats.findAvailable(license.id, { limit: 1, order: 'oldest', forUpdate: true })
        if (!seat) return err({ code: 'NO_AVAILABLE_SEATS', licenseId: license.id })

        return checkoutSeat(uow, seat, target.value, assignedAt, actor.value)
      })
    },

    async releaseSeat(input) {
      const actor = checkActor(input.actor)
      if (!actor.ok) return actor
      const ids = checkRowIds({ seatId: input.seatId, licenseId: input.licenseId })
      if (!ids.ok) return ids

      return store.transaction<LicenseSeat, ReleaseError>(async (uow) => {
        const locked = await lockSeat(uow, input.seatId, input.licenseId)
        if (!locked.ok) return locked
        const { seat, license } = locked.value

        if (!isAssigned(seatTargetOf(seat))) {
          return err({ code: 'ALREADY_UNASSIGNED', entity: 'seat', id: seat.id })
        }
        if (!license.reassignable) {
          return err({ code: 'NOT_REASSIGNABLE', licenseId: license.id, seatId: seat.id })
        }

        const updated = await uow.seats.update(seat.id, {
          ...seatAssignmentColumns(UNASSIGNED),
          custodianUserId: null,
          assignedAt: null,
          ...audit.stampUpdated(actor.value),
        })
        return ok(updated)
      })
    },

    async assignAccessory(input) {
      const actor = checkActor(input.actor)
      if (!actor.ok) return actor
      const ids = checkRowIds({ accessoryId: input.accessoryId, userId: input.userId })
      if (!ids.ok) return ids
      const assignedAtInput = checkDate('assignedAt', input.assignedAt)
      if (!assignedAtInput.ok) return assignedAtInput
      const assignedAt = assignedAtInput.value ?? audit.now()
      const note = input.note?.trim() || null

      return store.transaction<AccessoryUser, AccessoryCheckoutError>(async (uow) => {
        // The accessory row lock serializes checkouts against its quantity.
        const accessory = await uow.accessories.findById(input.accessoryId, { lock: 'update' })
        if (!accessory) return notFound('accessory', input.accessoryId)
        if (!(await uow.references.exists('user', input.userId))) {
          return validationError('userId', `User ${input.userId} does not exist.`)
        }

        const assigned = await uow.accessories.countCheckouts(accessory.id)
        if (assigned >= accessory.qty) {
          return err({ code: 'NO_AVAILABLE_QUANTITY', accessoryId: accessory.id, qty: accessory.qty, assigned })
        }

        const checkout = await uow.accessories.insertCheckout({
          accessoryId: accessory.id,
          assignedTo: input.userId,
          note,
          assignedAt,
          ...audit.stampCreated(actor.value),
        })
        return ok(checkout)
      })
    },

    async releaseAccessory(input) {
      const actor = checkActor(input.actor)
      if (!actor.ok) return actor
      const ids = checkRowIds({ accessoryId: input.accessoryId, checkoutId: input.checkoutId })
      if (!ids.ok) return ids

      return store.transaction<AccessoryUser, ValidationError | NotFoundError>(async (uow) => {
        const accessory = await uow.accessories.findById(input.accessoryId, { lock: 'update' })
        if (!accessory) return notFound('accessory', input.accessoryId)
        const checkout = await uow.accessories.findCheckout(input.checkoutId, { lock: 'update' })
        if (!checkout || checkout.accessoryId !== accessory.id) {
          return notFound('accessory-checkout', input.checkoutId)
        }
        return ok(await uow.accessories.closeCheckout(checkout.id, audit.stampDeleted(actor.value)))
      })
    },
  }
}
