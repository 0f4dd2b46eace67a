/**
 * Drizzle/PostgreSQL implementation of the inventory store.
 *
 * Row locks use `SELECT … FOR UPDATE` or `FOR SHARE`; handing out the next
 * free seat skips rows another transaction already holds. Bulk seat writes
 * go out in batches.
 */

import { TransactionRollbackError, and, asc, count, desc, eq, ilike, inArray, isNotNull, isNull, or, sql } from 'drizzle-orm'
import {
  accessories,
  accessoryUsers,
  assetModels,
  assets,
  categories,
  companies,
  licenseSeats,
  licenses,
  locations,
  manufacturers,
  statusLabels,
  suppliers,
  users,
  type Database,
  type DatabaseExecutor,
  type LicenseSeat,
} from '@assetdesk/db'
import { inBatches } from './batches.js'
import { InfrastructureError, type Result } from './inventory-errors.js'
import type {
  AccessoryRepository,
  AssetRepository,
  InventoryStore,
  InventoryUnitOfWork,
  LicenseRepository,
  LicenseSeatRepository,
  ReferenceEntity,
  ReferenceRepository,
  TargetLookups,
} from './inventory-store.js'
import { composeAssetDescription, userDisplayName } from './target-resolver.js'

function firstOrThrow<T>(rows: T[], what: string): T {
  const [row] = rows
  if (row === undefined) {
    throw new InfrastructureError(`${what} returned no row`)
  }
  return row
}

function likePattern(search: string): string {
  return `%${search.replace(/[\\%_]/g, (match) => `\\${match}`)}%`
}

function assetRepository(db: DatabaseExecutor): AssetRepository {
  const active = (id: number) => and(eq(assets.id, id), isNull(assets.deletedAt))

  return {
    async findById(id, options = {}) {
      const query = db.select().from(assets).where(active(id)).limit(1)
      const [row] = options.lock ? await query.for(options.lock) : await query
      return row
    },

    async findByTagIncludingDeleted(tag) {
      const [row] = await db.select().from(assets).where(eq(assets.tag, tag)).limit(1)
      return row
    },

    async list(query) {
      const where = and(
        isNull(assets.deletedAt),
        query.search
          ? or(
              ilike(assets.tag, likePattern(query.search)),
              ilike(assets.name, likePattern(query.search)),
              ilike(assets.serial, likePattern(query.search)),
            )
          : undefined,
        query.assigned === true ? isNotNull(assets.assignedType) : undefined,
        query.assigned === false ? isNull(assets.assignedType) : undefined,
      )
      const [rows, countRows] = await Promise.all([
        db.select().from(assets).where(where).orderBy(asc(assets.tag)).limit(query.limit).offset(query.offset),
        db.select({ count: count() }).from(assets).where(where),
      ])
      return { rows, total: countRows[0]?.count ?? 0 }
    },

    async insert(values) {
      return firstOrThrow(await db.insert(assets).values(values).returning(), 'insert into assets')
    },

    async update(id, patch, counter) {
      const bump =
        counter === 'checkout'
          ? { checkoutCounter: sql`${assets.checkoutCounter} + 1` }
          : counter === 'checkin'
            ? { checkinCounter: sql`${assets.checkinCounter} + 1` }
            : {}
      const rows = await db
        .update(assets)
        .set({ ...patch, ...bump })
        .where(eq(assets.id, id))
        .returning()
      return firstOrThrow(rows, `update of asset ${id}`)
    },
  }
}

function licenseRepository(db: DatabaseExecutor): LicenseRepository {
  return {
    async findById(id, options = {}) {
      const query = db
        .select()
        .from(licenses)
        .where(and(eq(licenses.id, id), isNull(licenses.deletedAt)))
        .limit(1)
      const [row] = options.lock ? await query.for(options.lock) : await query
      return row
    },

    async list(query) {
      const where = and(
        isNull(licenses.deletedAt),
        query.search
          ? or(ilike(licenses.name, likePattern(query.search)), ilike(licenses.licenseName, likePattern(query.search)))
          : undefined,
      )
      const [rows, countRows] = await Promise.all([
        db.select().from(licenses).where(where).orderBy(asc(licenses.name), asc(licenses.id)).limit(query.limit).offset(query.offset),
        db.select({ count: count() }).from(licenses).where(where),
      ])
      return { rows, total: countRows[0]?.count ?? 0 }
    },

    async insert(values) {
      return firstOrThrow(await db.insert(licenses).values(values).returning(), 'insert into licenses')
    },

    async update(id, patch) {
      const rows = await db.update(licenses).set(patch).where(eq(licenses.id, id)).returning()
      return firstOrThrow(rows, `update of license ${id}`)
    },
  }
}

function seatRepository(db: DatabaseExecutor): LicenseSeatRepository {
  const available = and(isNull(licenseSeats.assignedToUser), isNull(licenseSeats.assetId))

  return {
    async findById(id, options = {}) {
      const query = db
        .select()
        .from(licenseSeats)
        .where(and(eq(licenseSeats.id, id), isNull(licenseSeats.deletedAt)))
        .limit(1)
      const [row] = options.lock ? await query.for(options.lock) : await query
      return row
    },

    async listByLicense(licenseId, options = {}) {
      const query = db
        .select()
        .from(licenseSeats)
        .where(and(eq(licenseSeats.licenseId, licenseId), isNull(licenseSeats.deletedAt)))
        .orderBy(asc(licenseSeats.id))
      return options.lock ? query.for(options.lock) : query
    },

    async listByAsset(assetId) {
      return db
        .select()
        .from(licenseSeats)
        .where(and(eq(licenseSeats.assetId, assetId), isNull(licenseSeats.deletedAt)))
        .orderBy(asc(licenseSeats.id))
    },

    async countByLicense(licenseId) {
      const [row] = await db
        .select({
          active: count(),
          available: sql<number>`count(*) filter (where ${available})`.mapWith(Number),
        })
        .from(licenseSeats)
        .where(and(eq(licenseSeats.licenseId, licenseId), isNull(licenseSeats.deletedAt)))
      return { active: row?.active ?? 0, available: row?.available ?? 0 }
    },

    async findAvailable(licenseId, query) {
      const select = db
        .select()
        .from(licenseSeats)
        .where(and(eq(licenseSeats.licenseId, licenseId), isNull(licenseSeats.deletedAt), available))
        .orderBy(query.order === 'oldest' ? asc(licenseSeats.id) : desc(licenseSeats.id))
        .limit(query.limit)
      if (!query.forUpdate) return select
      // Handing out one seat may skip locked rows; retiring must see them all.
      return query.order === 'oldest' ? select.for('update', { skipLocked: true }) : select.for('update')
    },

    async insertMany(rows) {
      const created: LicenseSeat[] = []
      for (const batch of inBatches(rows)) {
        created.push(...(await db.insert(licenseSeats).values(batch).returning()))
      }
      return created
    },

    async update(id, patch) {
      const rows = await db.update(licenseSeats).set(patch).where(eq(licenseSeats.id, id)).returning()
      return firstOrThrow(rows, `update of license seat ${id}`)
    },

    async softDelete(ids, stamp) {
      let retired = 0
      for (const batch of inBatches(ids)) {
        const rows = await db
          .update(licenseSeats)
          .set(stamp)
          .where(and(inArray(licenseSeats.id, batch), isNull(licenseSeats.deletedAt), available))
          .returning({ id: licenseSeats.id })
        retired += rows.length
      }
      return retired
    },
  }
}

function accessoryRepository(db: DatabaseExecutor): AccessoryRepository {
  const activeCheckouts = (accessoryId: number) =>
    and(eq(accessoryUsers.accessoryId, accessoryId), isNull(accessoryUsers.deletedAt))

  return {
    async findById(id, options = {}) {
      const query = db
        .select()
        .from(accessories)
        .where(and(eq(accessories.id, id), isNull(accessories.deletedAt)))
        .limit(1)
      const [row] = options.lock ? await query.for(options.lock) : await query
      return row
    },

    async list(query) {
      const where = and(
        isNull(accessories.deletedAt),
        query.search
          ? or(ilike(accessories.name, likePattern(query.search)), ilike(accessories.modelNumber, likePattern(query.search)))
          : undefined,
      )
      const [rows, countRows] = await Promise.all([
        db.select().from(accessories).where(where).orderBy(asc(accessories.name), asc(accessories.id)).limit(query.limit).offset(query.offset),
        db.select({ count: count() }).from(accessories).where(where),
      ])
      return { rows, total: countRows[0]?.count ?? 0 }
    },

    async insert(values) {
      return firstOrThrow(await db.insert(accessories).values(values).returning(), 'insert into accessories')
    },

    async update(id, patch) {
      const rows = await db.update(accessories).set(patch).where(eq(accessories.id, id)).returning()
      return firstOrThrow(rows, `update of accessory ${id}`)
    },

    async listCheckouts(accessoryId) {
      return db.select().from(accessoryUsers).where(activeCheckouts(accessoryId)).orderBy(asc(accessoryUsers.id))
    },

    async countCheckouts(accessoryId) {
      const [row] = await db.select({ count: count() }).from(accessoryUsers).where(activeCheckouts(accessoryId))
      return row?.count ?? 0
    },

    async findCheckout(id, options = {}) {
      const query = db
        .select()
        .from(accessoryUsers)
        .where(and(eq(accessoryUsers.id, id), isNull(accessoryUsers.deletedAt)))
        .limit(1)
      const [row] = options.lock ? await query.for(options.lock) : await query
      return row
    },

    async insertCheckout(values) {
      return firstOrThrow(await db.insert(accessoryUsers).values(values).returning(), 'insert into accessory_users')
    },

    async closeCheckout(id, stamp) {
      const rows = await db
        .update(accessoryUsers)
        .set(stamp)
        .where(and(eq(accessoryUsers.id, id), isNull(accessoryUsers.deletedAt)))
        .returning()
      return firstOrThrow(rows, `checkin of accessory checkout ${id}`)
    },
  }
}

const REFERENCE_TABLES = {
  user: users,
  location: locations,
  status: statusLabels,
  model: assetModels,
  company: companies,
  supplier: suppliers,
  category: categories,
  manufacturer: manufacturers,
} satisfies Record<ReferenceEntity, unknown>

function referenceRepository(db: DatabaseExecutor): ReferenceRepository {
  return {
    async exists(entity, id) {
      const table = REFERENCE_TABLES[entity]
      const result = await db.execute(
        sql`select 1 from ${table} where ${table.id} = ${id} and ${table.deletedAt} is null limit 1`,
      )
      return result.rows.length > 0
    },
  }
}

function targetLookups(db: DatabaseExecutor): TargetLookups {
  return {
    users: {
      async nameOf(id) {
        const [row] = await db
          .select({ name: users.name, username: users.username })
          .from(users)
          .where(and(eq(users.id, id), isNull(users.deletedAt)))
          .limit(1)
        return row ? userDisplayName(row) : null
      },
    },
    locations: {
      async nameOf(id) {
        const [row] = await db
          .select({ name: locations.name })
          .from(locations)
          .where(and(eq(locations.id, id), isNull(locations.deletedAt)))
          .limit(1)
        return row ? row.name : null
      },
    },
    assets: {
      async describe(id) {
        const [row] = await db
          .select({ tag: assets.tag, name: assets.name, modelName: assetModels.name })
          .from(assets)
          .leftJoin(assetModels, eq(assetModels.id, assets.modelId))
          .where(and(eq(assets.id, id), isNull(assets.deletedAt)))
          .limit(1)
        return row ? composeAssetDescription(row) : null
      },
    },
  }
}

function unitOfWork(db: DatabaseExecutor): InventoryUnitOfWork {
  return {
    assets: assetRepository(db),
    licenses: licenseRepository(db),
    seats: seatRepository(db),
    accessories: accessoryRepository(db),
    references: referenceRepository(db),
    lookups: targetLookups(db),
  }
}

function guardLookups(lookups: TargetLookups): TargetLookups {
  const guard = async <T>(what: string, run: () => Promise<T>): Promise<T> => {
    try {
      return await run()
    } catch (error) {
      throw new InfrastructureError(`${what} failed`, { cause: error })
    }
  }
  return {
    users: { nameOf: (id) => guard(`user lookup ${id}`, () => lookups.users.nameOf(id)) },
    locations: { nameOf: (id) => guard(`location lookup ${id}`, () => lookups.locations.nameOf(id)) },
    assets: { describe: (id) => guard(`asset lookup ${id}`, () => lookups.assets.describe(id)) },
  }
}

export function createDrizzleInventoryStore(db: Database): InventoryStore {
  return {
    async transaction<T, E>(work: (uow: InventoryUnitOfWork) => Promise<Result<T, E>>): Promise<Result<T, E>> {
      const settled: { outcome?: Result<T, E> } = {}
      try {
        await db.transaction(async (tx) => {
          const outcome = await work(unitOfWork(tx))
          settled.outcome = outcome
          if (!outcome.ok) tx.rollback()
        })
      } catch (error) {
        if (!(error instanceof TransactionRollbackError)) {
          if (error instanceof InfrastructureError) throw error
          throw new InfrastructureError('Inventory transaction failed', { cause: error })
        }
      }
      if (settled.outcome === undefined) {
        throw new InfrastructureError('Inventory transaction finished without an outcome')
      }
      return settled.outcome
    },

    lookups: guardLookups(targetLookups(db)),
  }
}
