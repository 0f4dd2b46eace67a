import { integer, serial, text, timestamp } from 'drizzle-orm/pg-core'

/** Row creation timestamp (UTC timestamptz). */
export const createdAt = timestamp('created_at', { withTimezone: true }).defaultNow().notNull()

/** Last update timestamp (application refreshes it on every mutation). */
export const updatedAt = timestamp('updated_at', { withTimezone: true }).defaultNow().notNull()

/** Soft-delete marker; null means active. */
export const deletedAt = timestamp('deleted_at', { withTimezone: true })

/** Integer FK helper. */
export const idRef = (name: string) => integer(name)

/** Serial primary key shared by every inventory table. */
export const id = serial('id').primaryKey()

/**
 * Actor columns.
 *
 * Actors are opaque ids handed in by the caller, so there is no FK to
 * `users`: an integration account or a script can act without a user row.
 */
export const withActorIds = () => ({
  createdBy: text('created_by'),
  updatedBy: text('updated_by'),
  deletedBy: text('deleted_by'),
})

/**
 * Full audit set: timestamps, soft-delete marker and actor ids.
 * Every inventory table carries it.
 */
export const withAudit = () => ({
  createdAt,
  updatedAt,
  deletedAt,
  ...withActorIds(),
})
