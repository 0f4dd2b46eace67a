import { index, uniqueIndex } from 'drizzle-orm/pg-core'
import { pgTable, varchar } from 'drizzle-orm/pg-core'
import { id, idRef, withAudit } from './_common.js'
import { locations } from './locations.js'

/**
 * users
 *
 * People that assets and license seats can be assigned to. Identity and
 * login live elsewhere; this row only has to resolve to a display name.
 */
export const users = pgTable('users', {
  id,

  username: varchar('username', { length: 191 }).notNull(),

  firstName: varchar('first_name', { length: 191 }),
  lastName: varchar('last_name', { length: 191 }),

  /** Denormalized display name, used by assignment labels. */
  name: varchar('name', { length: 255 }).default('').notNull(),

  email: varchar('email', { length: 255 }),

  /** Default location of the person, if known. */
  locationId: idRef('location_id').references(() => locations.id),

  ...withAudit(),
}, (table) => ({
  usersUsernameUnique: uniqueIndex('users_username_unique').on(table.username),
  usersLocationIdx: index('users_location_idx').on(table.locationId),
}))

export type User = typeof users.$inferSelect
export type NewUser = typeof users.$inferInsert
