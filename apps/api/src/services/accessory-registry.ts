/**
 * Accessory stock: create, edit, soft-delete and read.
 *
 * Units are handed out and taken back by the assignment workflow; this
 * module only guards the quantity against the units already out.
 */

import type { Accessory, AccessoryUser } from '@assetdesk/db'
import type { CreateAccessoryInput, UpdateAccessoryInput } from '@assetdesk/schema'
import { normalizeActor, type ActorId, type AuditLedger } from './audit.js'
import {
  err,
  notFound,
  ok,
  validationError,
  type AccessoryHasCheckoutsError,
  type InventoryError,
  type NotFoundError,
  type Result,
  type ValidationError,
} from './inventory-errors.js'
import type { AccessoryListQuery, InventoryStore, InventoryUnitOfWork, PageOf } from './inventory-store.js'
import { checkReferences, type ReferenceCheck } from './references.js'

export type AccessoryAvailability = {
  qty: number
  assigned: number
  available: number
  /** True once availability has fallen below `minAmt`. */
  belowMinimum: boolean
}

export type AccessoryView = Accessory & { availability: AccessoryAvailability }

export type AccessoryCheckoutView = AccessoryUser & { assignedToLabel: string | null }

export type AccessoryRegistry = {
  createAccessory(input: CreateAccessoryInput, actor: ActorId): Promise<Result<AccessoryView, ValidationError>>
  updateAccessory(
    accessoryId: number,
    patch: UpdateAccessoryInput,
    actor: ActorId,
  ): Promise<Result<AccessoryView, ValidationError | NotFoundError>>
  deleteAccessory(
    accessoryId: number,
    actor: ActorId,
  ): Promise<Result<{ id: number }, ValidationError | NotFoundError | AccessoryHasCheckoutsError>>
  getAccessory(accessoryId: number): Promise<Result<AccessoryView, NotFoundError>>
  listAccessories(query: AccessoryListQuery): Promise<Result<PageOf<AccessoryView>, InventoryError>>
  listCheckouts(accessoryId: number): Promise<Result<AccessoryCheckoutView[], NotFoundError>>
}

/** Accessory names are stored trimmed and upper-case. */
export function normalizeAccessoryName(name: string): string {
  return name.trim().toUpperCase()
}

function accessoryReferences(input: UpdateAccessoryInput): ReferenceCheck[] {
  return [
    ['companyId', 'company', input.companyId],
    ['categoryId', 'category', input.categoryId],
    ['supplierId', 'supplier', input.supplierId],
    ['manufacturerId', 'manufacturer', input.manufacturerId],
    ['locationId', 'location', input.locationId],
  ]
}

export function availabilityOf(accessory: Pick<Accessory, 'qty' | 'minAmt'>, assigned: number): AccessoryAvailability {
  const available = Math.max(accessory.qty - assigned, 0)
  return {
    qty: accessory.qty,
    assigned,
    available,
    belowMinimum: accessory.minAmt !== null && available < accessory.minAmt,
  }
}

async function toView(uow: InventoryUnitOfWork, accessory: Accessory): Promise<AccessoryView> {
  const assigned = await uow.accessories.countCheckouts(accessory.id)
  return { ...accessory, availability: availabilityOf(accessory, assigned) }
}

export function createAccessoryRegistry(deps: { store: InventoryStore; audit: AuditLedger }): AccessoryRegistry {
  const { store, audit } = deps

  return {
    async createAccessory(input, actorInput) {
      const actor = normalizeActor(actorInput)
      if (!actor) return validationError('actor', 'An acting user id is required.')
      const name = normalizeAccessoryName(input.name)
      if (!name) return validationError('name', 'A name is required.')

      return store.transaction<AccessoryView, ValidationError>(async (uow) => {
        const refs = await checkReferences(uow, accessoryReferences(input))
        if (!refs.ok) return refs

        const accessory = await uow.accessories.insert({ ...input, name, ...audit.stampCreated(actor) })
        return ok(await toView(uow, accessory))
      })
    },

    async updateAccessory(accessoryId, patch, actorInput) {
      const actor = normalizeActor(actorInput)
      if (!actor) return validationError('actor', 'An acting user id is required.')
      const name = patch.name === undefined ? undefined : normalizeAccessoryName(patch.name)
      if (name === '') return validationError('name', 'A name is required.')

      return store.transaction<AccessoryView, ValidationError | NotFoundError>(async (uow) => {
        const existing = await uow.accessories.findById(accessoryId, { lock: 'update' })
        if (!existing) return notFound('accessory', accessoryId)

        const refs = await checkReferences(uow, accessoryReferences(patch))
        if (!refs.ok) return refs

        if (patch.qty !== undefined) {
          const assigned = await uow.accessories.countCheckouts(accessoryId)
          if (patch.qty < assigned) {
            return validationError('qty', `Quantity cannot drop below the ${assigned} unit(s) checked out.`)
          }
        }

        const accessory = await uow.accessories.update(accessoryId, {
          ...patch,
          ...(name !== undefined ? { name } : {}),
          ...audit.stampUpdated(actor),
        })
        return ok(await toView(uow, accessory))
      })
    },

    async deleteAccessory(accessoryId, actorInput) {
      const actor = normalizeActor(actorInput)
      if (!actor) return validationError('actor', 'An acting user id is required.')

      return store.transaction<{ id: number }, ValidationError | NotFoundError | AccessoryHasCheckoutsError>(
        async (uow) => {
          const existing = await uow.accessories.findById(accessoryId, { lock: 'update' })
          if (!existing) return notFound('accessory', accessoryId)

          const assigned = await uow.accessories.countCheckouts(accessoryId)
          if (assigned > 0) return err({ code: 'ACCESSORY_HAS_CHECKOUTS', accessoryId, assigned })

          await uow.accessories.update(accessoryId, audit.stampDeleted(actor))
          return ok({ id: accessoryId })
        },
      )
    },

    async getAccessory(accessoryId) {
      return store.transaction<AccessoryView, NotFoundError>(async (uow) => {
        const accessory = await uow.accessories.findById(accessoryId)
        if (!accessory) return notFound('accessory', accessoryId)
        return ok(await toView(uow, accessory))
      })
    },

    async listAccessories(query) {
      return store.transaction<PageOf<AccessoryView>, InventoryError>(async (uow) => {
        const page = await uow.accessories.list(query)
        const rows: AccessoryView[] = []
        for (const accessory of page.rows) {
          rows.push(await toView(uow, accessory))
        }
        return ok({ rows, total: page.total })
      })
    },

    async listCheckouts(accessoryId) {
      return store.transaction<AccessoryCheckoutView[], NotFoundError>(async (uow) => {
        const accessory = await uow.accessories.findById(accessoryId)
        if (!accessory) return notFound('accessory', accessoryId)

        const checkouts = await uow.accessories.listCheckouts(accessoryId)
        const views: AccessoryCheckoutView[] = []
        for (const checkout of checkouts) {
          views.push({ ...checkout, assignedToLabel: await uow.lookups.users.nameOf(checkout.assignedTo) })
        }
        return ok(views)
      })
    },
  }
}
