/**
 * Asset records: create, edit, soft-delete and read.
 *
 * Assignment columns are not writable from here; they belong to the
 * assignment workflow.
 */

import type { Asset, License } from '@assetdesk/db'
import type { CreateAssetInput, UpdateAssetInput } from '@assetdesk/schema'
import { assetTargetOf, type AssignmentTarget } from './assignment-target.js'
import { normalizeActor, type ActorId, type AuditLedger } from './audit.js'
import {
  err,
  notFound,
  ok,
  validationError,
  type DuplicateTagError,
  type InventoryError,
  type NotFoundError,
  type Result,
  type ValidationError,
} from './inventory-errors.js'
import type { AssetListQuery, InventoryStore, InventoryUnitOfWork, PageOf } from './inventory-store.js'
import { describeSeats, type SeatView } from './license-registry.js'
import { checkReferences, type ReferenceCheck } from './references.js'
import { createTargetResolver } from './target-resolver.js'

export type AssetView = Asset & {
  assignment: AssignmentTarget
  assignedToLabel: string | null
}

export type AssetSeatView = SeatView & {
  license: Pick<License, 'id' | 'name' | 'serial' | 'reassignable'>
}

export type AssetRegistry = {
  createAsset(input: CreateAssetInput, actor: ActorId): Promise<Result<AssetView, ValidationError | DuplicateTagError>>
  updateAsset(
    assetId: number,
    patch: UpdateAssetInput,
    actor: ActorId,
  ): Promise<Result<AssetView, ValidationError | NotFoundError | DuplicateTagError>>
  deleteAsset(assetId: number, actor: ActorId): Promise<Result<{ id: number }, ValidationError | NotFoundError>>
  getAsset(assetId: number): Promise<Result<AssetView, NotFoundError>>
  listAssets(query: AssetListQuery): Promise<Result<PageOf<AssetView>, InventoryError>>
  listAssetSeats(assetId: number): Promise<Result<AssetSeatView[], NotFoundError>>
}

/** Tags are compared and stored trimmed and upper-case. */
export function normalizeTag(tag: string): string {
  return tag.trim().toUpperCase()
}

function normalizeSerial(serial: string | null | undefined): string | null | undefined {
  if (serial === null || serial === undefined) return serial
  const trimmed = serial.trim()
  return trimmed ? trimmed.toUpperCase() : null
}

function assetReferences(input: UpdateAssetInput): ReferenceCheck[] {
  return [
    ['modelId', 'model', input.modelId],
    ['statusId', 'status', input.statusId],
    ['companyId', 'company', input.companyId],
    ['locationId', 'location', input.locationId],
    ['defaultLocationId', 'location', input.defaultLocationId],
    ['supplierId', 'supplier', input.supplierId],
  ]
}

async function checkTagFree(
  uow: InventoryUnitOfWork,
  tag: string,
  selfId?: number,
): Promise<Result<void, DuplicateTagError>> {
  const holder = await uow.assets.findByTagIncludingDeleted(tag)
  if (holder && holder.id !== selfId) {
    return err({ code: 'DUPLICATE_TAG', tag, existingAssetId: holder.id })
  }
  return ok(undefined)
}

async function toView(uow: InventoryUnitOfWork, asset: Asset): Promise<AssetView> {
  const assignment = assetTargetOf(asset)
  const assignedToLabel = await createTargetResolver(uow.lookups).describe(assignment)
  return { ...asset, assignment, assignedToLabel }
}

export function createAssetRegistry(deps: { store: InventoryStore; audit: AuditLedger }): AssetRegistry {
  const { store, audit } = deps

  return {
    async createAsset(input, actorInput) {
      const actor = normalizeActor(actorInput)
      if (!actor) return validationError('actor', 'An acting user id is required.')
      const tag = normalizeTag(input.tag)
      if (!tag) return validationError('tag', 'A tag is required.')

      return store.transaction<AssetView, ValidationError | DuplicateTagError>(async (uow) => {
        const free = await checkTagFree(uow, tag)
        if (!free.ok) return free
        const refs = await checkReferences(uow, assetReferences(input))
        if (!refs.ok) return refs

        const asset = await uow.assets.insert({
          ...input,
          tag,
          serial: normalizeSerial(input.serial),
          ...audit.stampCreated(actor),
        })
        return ok(await toView(uow, asset))
      })
    },

    async updateAsset(assetId, patch, actorInput) {
      const actor = normalizeActor(actorInput)
      if (!actor) return validationError('actor', 'An acting user id is required.')
      const tag = patch.tag === undefined ? undefined : normalizeTag(patch.tag)
      if (tag === '') return validationError('tag', 'A tag is required.')

      return store.transaction<AssetView, ValidationError | NotFoundError | DuplicateTagError>(async (uow) => {
        const existing = await uow.assets.findById(assetId, { lock: 'update' })
        if (!existing) return notFound('asset', assetId)

        if (tag !== undefined && tag !== existing.tag) {
          const free = await checkTagFree(uow, tag, existing.id)
          if (!free.ok) return free
        }
        const refs = await checkReferences(uow, assetReferences(patch))
        if (!refs.ok) return refs

        const asset = await uow.assets.update(assetId, {
          ...patch,
          ...(tag !== undefined ? { tag } : {}),
          ...(patch.serial !== undefined ? { serial: normalizeSerial(patch.serial) } : {}),
          ...audit.stampUpdated(actor),
        })
        return ok(await toView(uow, asset))
      })
    },

    async deleteAsset(assetId, actorInput) {
      const actor = normalizeActor(actorInput)
      if (!actor) return validationError('actor', 'An acting user id is required.')

      return store.transaction<{ id: number }, ValidationError | NotFoundError>(async (uow) => {
        const existing = await uow.assets.findById(assetId, { lock: 'update' })
        if (!existing) return notFound('asset', assetId)
        await uow.assets.update(assetId, audit.stampDeleted(actor))
        return ok({ id: assetId })
      })
    },

    async getAsset(assetId) {
      return store.transaction<AssetView, NotFoundError>(async (uow) => {
        const asset = await uow.assets.findById(assetId)
        if (!asset) return notFound('asset', assetId)
        return ok(await toView(uow, asset))
      })
    },

    async listAssets(query) {
      return store.transaction<PageOf<AssetView>, InventoryError>(async (uow) => {
        const page = await uow.assets.list(query)
        const rows: AssetView[] = []
        for (const asset of page.rows) {
          rows.push(await toView(uow, asset))
        }
        return ok({ rows, total: page.total })
      })
    },

    async listAssetSeats(assetId) {
      return store.transaction<AssetSeatView[], NotFoundError>(async (uow) => {
        const asset = await uow.assets.findById(assetId)
        if (!asset) return notFound('asset', assetId)

        const seats = await uow.seats.listByAsset(assetId)
        const views: AssetSeatView[] = []
        for (const seat of seats) {
          const license = await uow.licenses.findById(seat.licenseId)
          if (!license) continue
          // Position among the license's own seats, not among this asset's.
          const siblings = await uow.seats.listByLicense(license.id)
          const position = siblings.findIndex((candidate) => candidate.id === seat.id)
          const [view] = await describeSeats(uow, [seat], Math.max(position, 0))
          views.push({
            ...view,
            license: { id: license.id, name: license.name, serial: license.serial, reassignable: license.reassignable },
          })
        }
        return ok(views)
      })
    },
  }
}
