import 'dotenv/config'
import { serve } from '@hono/node-server'
import { checkDatabaseConnection, createDatabase } from '@assetdesk/db'
import { createApp } from './app.js'
import { corsOrigins, loadConfig } from './config.js'
import { createDrizzleInventoryStore } from './services/drizzle-inventory-store.js'
import { createInventoryServices } from './services/inventory.js'
import { log, logError } from './log.js'

const config = loadConfig()
const { db, pool } = createDatabase(config.DATABASE_URL)

const services = createInventoryServices(createDrizzleInventoryStore(db))

const app = createApp(services, {
  corsOrigin: corsOrigins(config),
  accessLog: config.NODE_ENV !== 'test',
  checkDatabase: () =>
    checkDatabaseConnection(pool).catch((error: unknown) => {
      logError('[api] database health check failed', error)
      return false
    }),
})

// ============================================
// Server
// ============================================

const server = serve(
  {
    fetch: app.fetch,
    port: config.PORT,
  },
  (info) => {
    console.log('')
    console.log(' assetdesk API http://localhost:' + info.port + '/api/v1')
    console.log('')
  },
)

function shutdown(signal: string) {
  log(`[api] ${signal} received, closing`)
  server.close(() => {
    pool
      .end()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logError('[api] failed to close the database pool', error)
        process.exit(1)
      })
  })
}

process.on('SIGINT', () => shutdown('SIGINT'))
process.on('SIGTERM', () => shutdown('SIGTERM'))
