import { sql } from 'drizzle-orm'
import { boolean, check, date, index, integer, numeric, pgTable, text, timestamp, varchar } from 'drizzle-orm/pg-core'
import { id, idRef, withAudit } from './_common.js'
import { assets } from './assets.js'
import { categories, companies, manufacturers, suppliers } from './catalog.js'
import { users } from './users.js'

/**
 * licenses
 *
 * Software licenses with a declared seat count. The license owns its seat
 * rows; `seats` always matches the number of active `license_seats` rows
 * once a save commits.
 */
export const licenses = pgTable('licenses', {
  id,

  /** Software name. */
  name: varchar('name', { length: 120 }).notNull(),

  /** Product key. */
  serial: text('serial'),

  /** Name the license is registered to. */
  licenseName: varchar('license_name', { length: 120 }),
  licenseEmail: varchar('license_email', { length: 120 }),

  seats: integer('seats').default(1).notNull(),

  /** When false, a seat, once handed out, can never be released. */
  reassignable: boolean('reassignable').default(true).notNull(),

  categoryId: idRef('category_id').references(() => categories.id),
  manufacturerId: idRef('manufacturer_id').references(() => manufacturers.id),
  supplierId: idRef('supplier_id').references(() => suppliers.id),
  companyId: idRef('company_id').references(() => companies.id),

  orderNumber: varchar('order_number', { length: 50 }),
  purchaseCost: numeric('purchase_cost', { precision: 20, scale: 2 }),
  purchaseDate: date('purchase_date', { mode: 'date' }),
  expirationDate: date('expiration_date', { mode: 'date' }),

  notes: text('notes'),

  ...withAudit(),
}, (table) => ({
  licensesSeatsCheck: check('licenses_seats_check', sql`${table.seats} >= 0`),
}))

/**
 * license_seats
 *
 * One row per seat. Created and retired only by the seat pool, assigned and
 * released only by the assignment workflow.
 *
 * A seat goes either to a user (`assigned_to_user`) or to an asset
 * (`asset_id`), never both. `custodian_user_id` keeps the user behind an
 * asset checkout, resolved when the seat was handed out.
 */
export const licenseSeats = pgTable('license_seats', {
  id,

  licenseId: idRef('license_id')
    .references(() => licenses.id)
    .notNull(),

  assignedToUser: idRef('assigned_to_user').references(() => users.id),
  assetId: idRef('asset_id').references(() => assets.id),
  custodianUserId: idRef('custodian_user_id').references(() => users.id),
  assignedAt: timestamp('assigned_at', { withTimezone: true }),

  ...withAudit(),
}, (table) => ({
  licenseSeatsLicenseIdx: index('license_seats_license_idx').on(table.licenseId),
  licenseSeatsAssetIdx: index('license_seats_asset_idx').on(table.assetId),
  licenseSeatsUserIdx: index('license_seats_user_idx').on(table.assignedToUser),
  licenseSeatsSingleChannelCheck: check(
    'license_seats_single_channel_check',
    sql`${table.assignedToUser} IS NULL OR ${table.assetId} IS NULL`,
  ),
}))

export type License = typeof licenses.$inferSelect
export type NewLicense = typeof licenses.$inferInsert
export type LicenseSeat = typeof licenseSeats.$inferSelect
export type NewLicenseSeat = typeof licenseSeats.$inferInsert
