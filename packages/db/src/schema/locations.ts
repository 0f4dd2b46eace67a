import { type AnyPgColumn, index, pgTable, varchar } from 'drizzle-orm/pg-core'
import { id, idRef, withAudit } from './_common.js'

/**
 * locations
 *
 * Physical places an asset can sit in or be checked out to. Locations nest
 * (building > floor > room) through `parent_id`.
 */
export const locations = pgTable('locations', {
  id,

  name: varchar('name', { length: 255 }).notNull(),

  parentId: idRef('parent_id').references((): AnyPgColumn => locations.id),

  address: varchar('address', { length: 255 }),
  city: varchar('city', { length: 100 }),
  country: varchar('country', { length: 100 }),

  ...withAudit(),
}, (table) => ({
  locationsParentIdx: index('locations_parent_idx').on(table.parentId),
}))

export type Location = typeof locations.$inferSelect
export type NewLocation = typeof locations.$inferInsert
