/**
 * Persistence contract of the inventory engine.
 *
 * Services only ever talk to these interfaces. The Drizzle implementation
 * lives in `drizzle-inventory-store.ts`; tests run against an in-process
 * store with the same behaviour.
 *
 * Every repository read skips soft-deleted rows unless its name says
 * otherwise.
 */

import type {
  Accessory,
  AccessoryUser,
  Asset,
  License,
  LicenseSeat,
  NewAccessory,
  NewAccessoryUser,
  NewAsset,
  NewLicense,
  NewLicenseSeat,
} from '@assetdesk/db'
import type { DeletedStamp, UpdatedStamp } from './audit.js'
import type { Result } from './inventory-errors.js'

/**
 * `update` for rows the unit of work will change; `share` for a parent row
 * that must not change or disappear underneath it.
 */
export type RowLock = 'update' | 'share'

export type ReadOptions = {
  /** Lock the returned rows until the unit of work ends. */
  lock?: RowLock
}

export type Page = {
  limit: number
  offset: number
}

export type PageOf<T> = {
  rows: T[]
  total: number
}

export type AssetCounter = 'checkout' | 'checkin'

/** Columns a caller may write on an asset; ids and counters are managed here. */
export type AssetPatch = Partial<
  Omit<NewAsset, 'id' | 'checkoutCounter' | 'checkinCounter' | 'createdAt' | 'createdBy'>
>

export type LicensePatch = Partial<Omit<NewLicense, 'id' | 'createdAt' | 'createdBy'>>

export type SeatPatch = Partial<
  Pick<LicenseSeat, 'assignedToUser' | 'assetId' | 'custodianUserId' | 'assignedAt'>
> & UpdatedStamp

export type AssetListQuery = Page & {
  search?: string
  assigned?: boolean
}

export type LicenseListQuery = Page & {
  search?: string
}

export type SeatCounts = {
  active: number
  available: number
}

export interface AssetRepository {
  findById(id: number, options?: ReadOptions): Promise<Asset | undefined>
  /** Looks at every row, deleted or not: tags stay unique forever. */
  findByTagIncludingDeleted(tag: string): Promise<Asset | undefined>
  list(query: AssetListQuery): Promise<PageOf<Asset>>
  insert(values: NewAsset): Promise<Asset>
  /** Applies `patch`; `counter` bumps the matching counter by one in the same statement. */
  update(id: number, patch: AssetPatch, counter?: AssetCounter): Promise<Asset>
}

export interface LicenseRepository {
  findById(id: number, options?: ReadOptions): Promise<License | undefined>
  list(query: LicenseListQuery): Promise<PageOf<License>>
  insert(values: NewLicense): Promise<License>
  update(id: number, patch: LicensePatch): Promise<License>
}

export type AvailableSeatQuery = {
  limit: number
  /** `oldest` hands out low ids first, `newest` retires high ids first. */
  order: 'oldest' | 'newest'
  forUpdate?: boolean
}

export interface LicenseSeatRepository {
  findById(id: number, options?: ReadOptions): Promise<LicenseSeat | undefined>
  /** Active seats of a license, by ascending id. */
  listByLicense(licenseId: number, options?: ReadOptions): Promise<LicenseSeat[]>
  /** Active seats checked out to an asset, by ascending id. */
  listByAsset(assetId: number): Promise<LicenseSeat[]>
  countByLicense(licenseId: number): Promise<SeatCounts>
  findAvailable(licenseId: number, query: AvailableSeatQuery): Promise<LicenseSeat[]>
  insertMany(rows: NewLicenseSeat[]): Promise<LicenseSeat[]>
  update(id: number, patch: SeatPatch): Promise<LicenseSeat>
  /**
   * Soft-deletes the rows among `ids` that are still active and free; an
   * assigned seat is never retired. Returns how many rows were retired.
   */
  softDelete(ids: number[], stamp: DeletedStamp): Promise<number>
}

export type AccessoryPatch = Partial<Omit<NewAccessory, 'id' | 'createdAt' | 'createdBy'>>

export type AccessoryListQuery = Page & {
  search?: string
}

export interface AccessoryRepository {
  findById(id: number, options?: ReadOptions): Promise<Accessory | undefined>
  list(query: AccessoryListQuery): Promise<PageOf<Accessory>>
  insert(values: NewAccessory): Promise<Accessory>
  update(id: number, patch: AccessoryPatch): Promise<Accessory>
  /** Active checkouts of an accessory, oldest first. */
  listCheckouts(accessoryId: number): Promise<AccessoryUser[]>
  countCheckouts(accessoryId: number): Promise<number>
  findCheckout(id: number, options?: ReadOptions): Promise<AccessoryUser | undefined>
  insertCheckout(values: NewAccessoryUser): Promise<AccessoryUser>
  /** Soft-deletes one active checkout row. */
  closeCheckout(id: number, stamp: DeletedStamp): Promise<AccessoryUser>
}

export type ReferenceEntity =
  | 'user'
  | 'location'
  | 'status'
  | 'model'
  | 'company'
  | 'supplier'
  | 'category'
  | 'manufacturer'

export interface ReferenceRepository {
  exists(entity: ReferenceEntity, id: number): Promise<boolean>
}

export interface UserLookup {
  nameOf(id: number): Promise<string | null>
}

export interface LocationLookup {
  nameOf(id: number): Promise<string | null>
}

export interface AssetLookup {
  describe(id: number): Promise<string | null>
}

export type TargetLookups = {
  users: UserLookup
  locations: LocationLookup
  assets: AssetLookup
}

export type InventoryUnitOfWork = {
  assets: AssetRepository
  licenses: LicenseRepository
  seats: LicenseSeatRepository
  accessories: AccessoryRepository
  references: ReferenceRepository
  lookups: TargetLookups
}

export interface InventoryStore {
  /**
   * Run `work` atomically.
   *
   * An `ok: false` result rolls everything back and is returned as is. A
   * thrown error rolls back too and surfaces as `InfrastructureError`.
   */
  transaction<T, E>(work: (uow: InventoryUnitOfWork) => Promise<Result<T, E>>): Promise<Result<T, E>>

  /** Read-only lookups outside any unit of work. */
  lookups: TargetLookups
}
