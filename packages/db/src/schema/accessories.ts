import { sql } from 'drizzle-orm'
import { check, date, index, integer, numeric, pgTable, text, timestamp, varchar } from 'drizzle-orm/pg-core'
import { id, idRef, withAudit } from './_common.js'
import { categories, companies, manufacturers, suppliers } from './catalog.js'
import { locations } from './locations.js'
import { users } from './users.js'

/**
 * accessories
 *
 * Stocked items handed out by quantity (mice, chargers, headsets) rather
 * than tracked one by one. The available quantity is `qty` minus the active
 * `accessory_users` rows; it is never stored.
 */
export const accessories = pgTable('accessories', {
  id,

  name: varchar('name', { length: 100 }).notNull(),

  companyId: idRef('company_id').references(() => companies.id),
  categoryId: idRef('category_id').references(() => categories.id),
  supplierId: idRef('supplier_id').references(() => suppliers.id),
  manufacturerId: idRef('manufacturer_id').references(() => manufacturers.id),
  locationId: idRef('location_id').references(() => locations.id),

  modelNumber: varchar('model_number', { length: 100 }),
  orderNumber: varchar('order_number', { length: 100 }),
  purchaseDate: date('purchase_date', { mode: 'date' }),
  purchaseCost: numeric('purchase_cost', { precision: 20, scale: 2 }),

  /** Units owned. */
  qty: integer('qty').notNull(),

  /** Restock threshold: the stock is low once availability falls below it. */
  minAmt: integer('min_amt'),

  notes: text('notes'),

  ...withAudit(),
}, (table) => ({
  accessoriesQtyCheck: check('accessories_qty_check', sql`${table.qty} >= 0`),
  accessoriesMinAmtCheck: check('accessories_min_amt_check', sql`${table.minAmt} IS NULL OR ${table.minAmt} >= 0`),
}))

/**
 * accessory_users
 *
 * One row per unit checked out to a user. Checking the unit back in
 * soft-deletes the row, so the history stays queryable.
 */
export const accessoryUsers = pgTable('accessory_users', {
  id,

  accessoryId: idRef('accessory_id')
    .references(() => accessories.id)
    .notNull(),

  assignedTo: idRef('assigned_to')
    .references(() => users.id)
    .notNull(),

  note: text('note'),
  assignedAt: timestamp('assigned_at', { withTimezone: true }).notNull(),

  ...withAudit(),
}, (table) => ({
  accessoryUsersAccessoryIdx: index('accessory_users_accessory_idx').on(table.accessoryId),
  accessoryUsersUserIdx: index('accessory_users_user_idx').on(table.assignedTo),
}))

export type Accessory = typeof accessories.$inferSelect
export type NewAccessory = typeof accessories.$inferInsert
export type AccessoryUser = typeof accessoryUsers.$inferSelect
export type NewAccessoryUser = typeof accessoryUsers.$inferInsert
