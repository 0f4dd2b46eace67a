import { sql } from 'drizzle-orm'
import { check, index, uniqueIndex } from 'drizzle-orm/pg-core'
import { date, integer, numeric, pgTable, text, timestamp, varchar } from 'drizzle-orm/pg-core'
import { id, idRef, withAudit } from './_common.js'
import { assetModels, companies, statusLabels, suppliers } from './catalog.js'
import { assignmentTargetKindEnum } from './enums.js'
import { locations } from './locations.js'
import { users } from './users.js'

/**
 * assets
 *
 * Tangible inventory records (laptops, screens, servers, phones).
 *
 * Assignment columns:
 * - `assigned_type` + `assigned_to` name the target (user, location or
 *   another asset). Both null means unassigned; the check constraint keeps
 *   them in step.
 * - `custodian_user_id` is the user answerable for the asset, frozen at
 *   checkout. For an asset checked out to another asset it is that asset's
 *   user at the time of the checkout.
 * - These columns are written only by the assignment workflow.
 */
export const assets = pgTable(
  'assets',
  {
    id,

    /** Inventory tag; upper-case, unique. */
    tag: varchar('tag', { length: 100 }).notNull(),

    serial: varchar('serial', { length: 100 }),

    name: varchar('name', { length: 255 }),

    modelId: idRef('model_id').references(() => assetModels.id),
    statusId: idRef('status_id').references(() => statusLabels.id),
    companyId: idRef('company_id').references(() => companies.id),

    /** Where the asset currently is. */
    locationId: idRef('location_id').references(() => locations.id),

    /** Where the asset returns to by default. */
    defaultLocationId: idRef('default_location_id').references(() => locations.id),

    assignedType: assignmentTargetKindEnum('assigned_type'),
    assignedTo: integer('assigned_to'),
    assignedAt: timestamp('assigned_at', { withTimezone: true }),
    expectedCheckin: date('expected_checkin', { mode: 'date' }),
    lastCheckinAt: timestamp('last_checkin_at', { withTimezone: true }),
    custodianUserId: idRef('custodian_user_id').references(() => users.id),

    /** Audit-only counters; never decremented. */
    checkoutCounter: integer('checkout_counter').default(0).notNull(),
    checkinCounter: integer('checkin_counter').default(0).notNull(),

    supplierId: idRef('supplier_id').references(() => suppliers.id),
    orderNumber: varchar('order_number', { length: 50 }),
    purchaseDate: date('purchase_date', { mode: 'date' }),
    purchaseCost: numeric('purchase_cost', { precision: 20, scale: 2 }),
    warrantyMonths: integer('warranty_months'),

    notes: text('notes'),

    ...withAudit(),
  },
  (table) => ({
    assetsTagUnique: uniqueIndex('assets_tag_unique').on(table.tag),
    assetsAssignmentIdx: index('assets_assignment_idx').on(table.assignedType, table.assignedTo),
    assetsLocationIdx: index('assets_location_idx').on(table.locationId),
    assetsAssignmentPairCheck: check(
      'assets_assignment_pair_check',
      sql`(${table.assignedType} IS NULL) = (${table.assignedTo} IS NULL)`,
    ),
    assetsAssignedAtCheck: check(
      'assets_assigned_at_check',
      sql`${table.assignedType} IS NOT NULL OR ${table.assignedAt} IS NULL`,
    ),
  }),
)

export type Asset = typeof assets.$inferSelect
export type NewAsset = typeof assets.$inferInsert
