import { drizzle, type NodePgDatabase, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres'
import type { PgDatabase } from 'drizzle-orm/pg-core'
import pg from 'pg'

export * from './schema/_common.js'
export * from './schema/enums.js'
export * from './schema/locations.js'
export * from './schema/users.js'
export * from './schema/catalog.js'
export * from './schema/assets.js'
export * from './schema/licenses.js'
export * from './schema/accessories.js'

import * as enumsSchema from './schema/enums.js'
import * as locationsSchema from './schema/locations.js'
import * as usersSchema from './schema/users.js'
import * as catalogSchema from './schema/catalog.js'
import * as assetsSchema from './schema/assets.js'
import * as licensesSchema from './schema/licenses.js'
import * as accessoriesSchema from './schema/accessories.js'

/**
 * Unified Drizzle schema registry.
 *
 * Reference tables first, then the inventory tables that point at them.
 */
export const schema = {
  ...enumsSchema,
  ...locationsSchema,
  ...usersSchema,
  ...catalogSchema,
  ...assetsSchema,
  ...licensesSchema,
  ...accessoriesSchema,
}

export type Database = NodePgDatabase<typeof schema>

/** The database or an open transaction; both run the same queries. */
export type DatabaseExecutor = PgDatabase<NodePgQueryResultHKT, typeof schema>

export type DatabaseHandle = {
  db: Database
  pool: pg.Pool
}

/**
 * Open a pool and wrap it in a Drizzle client.
 *
 * The caller owns the pool and ends it on shutdown.
 */
export function createDatabase(connectionString: string): DatabaseHandle {
  if (!connectionString) {
    throw new Error('createDatabase: a connection string is required')
  }
  const pool = new pg.Pool({ connectionString })
  const db = drizzle(pool, { schema })
  return { db, pool }
}

export async function checkDatabaseConnection(pool: pg.Pool): Promise<boolean> {
  const client = await pool.connect()
  try {
    await client.query('SELECT 1')
    return true
  } finally {
    client.release()
  }
}
