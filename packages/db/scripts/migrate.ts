import 'dotenv/config'
import { migrate } from 'drizzle-orm/node-postgres/migrator'
import { createDatabase } from '../src/index.js'

/**
 * Applies SQL migrations from `packages/db/migrations`.
 *
 * Migrations are produced by `npm run db:generate -w @assetdesk/db`.
 */
async function run() {
  const { db, pool } = createDatabase(process.env.DATABASE_URL ?? '')
  try {
    await migrate(db, { migrationsFolder: './migrations' })
    console.log('[db] migrations applied successfully.')
  } finally {
    await pool.end()
  }
}

run().catch((error) => {
  console.error('[db] migration failed:', error)
  process.exit(1)
})
