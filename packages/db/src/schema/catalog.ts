import { boolean, index, pgTable, varchar } from 'drizzle-orm/pg-core'
import { id, idRef, withAudit } from './_common.js'
import { categoryTypeEnum } from './enums.js'

/**
 * Reference dictionaries behind assets and licenses.
 *
 * These rows are maintained by plain CRUD screens; the inventory services
 * only read them (labels, existence checks).
 */

export const companies = pgTable('companies', {
  id,
  name: varchar('name', { length: 255 }).notNull(),
  ...withAudit(),
})

export const categories = pgTable('categories', {
  id,
  name: varchar('name', { length: 255 }).notNull(),
  categoryType: categoryTypeEnum('category_type').default('asset').notNull(),
  ...withAudit(),
}, (table) => ({
  categoriesTypeIdx: index('categories_type_idx').on(table.categoryType),
}))

export const manufacturers = pgTable('manufacturers', {
  id,
  name: varchar('name', { length: 255 }).notNull(),
  url: varchar('url', { length: 255 }),
  supportEmail: varchar('support_email', { length: 255 }),
  ...withAudit(),
})

export const suppliers = pgTable('suppliers', {
  id,
  name: varchar('name', { length: 255 }).notNull(),
  contact: varchar('contact', { length: 100 }),
  email: varchar('email', { length: 150 }),
  phone: varchar('phone', { length: 35 }),
  ...withAudit(),
})

/** Product models ("ThinkPad T14 Gen 3"); assets reference one. */
export const assetModels = pgTable('asset_models', {
  id,
  name: varchar('name', { length: 255 }).notNull(),
  modelNumber: varchar('model_number', { length: 255 }),
  manufacturerId: idRef('manufacturer_id').references(() => manufacturers.id),
  categoryId: idRef('category_id').references(() => categories.id),
  ...withAudit(),
})

/**
 * Status labels ("Ready to deploy", "In repair", "Archived").
 * `deployable` tells the UI whether the status allows a checkout.
 */
export const statusLabels = pgTable('status_labels', {
  id,
  name: varchar('name', { length: 100 }).notNull(),
  deployable: boolean('deployable').default(false).notNull(),
  pending: boolean('pending').default(false).notNull(),
  archived: boolean('archived').default(false).notNull(),
  ...withAudit(),
})

export type Company = typeof companies.$inferSelect
export type Category = typeof categories.$inferSelect
export type Manufacturer = typeof manufacturers.$inferSelect
export type Supplier = typeof suppliers.$inferSelect
export type AssetModel = typeof assetModels.$inferSelect
export type StatusLabel = typeof statusLabels.$inferSelect
