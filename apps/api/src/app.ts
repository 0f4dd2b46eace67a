import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { logger } from 'hono/logger'
import type { InventoryServices } from './services/inventory.js'
import { InfrastructureError } from './services/inventory-errors.js'
import { createCoreApiRoutes, type HealthCheck } from './routes/core-api.js'
import { requestId } from './middleware/actor.js'
import { fail } from './routes/_api.js'
import { log, logError } from './log.js'

export type AppOptions = {
  corsOrigin?: string | string[]
  checkDatabase?: HealthCheck
  /** Per-request access log; off in tests. */
  accessLog?: boolean
}

export function createApp(services: InventoryServices, options: AppOptions = {}) {
  const app = new Hono()

  app.use('/*', requestId)
  app.use('/*', cors({ origin: options.corsOrigin ?? '*' }))
  if (options.accessLog ?? true) {
    app.use('/*', logger((message, ...rest) => log(message, ...rest)))
  }

  app.route('/api/v1', createCoreApiRoutes(services, { checkDatabase: options.checkDatabase }))

  app.onError((err, c) => {
    if (err instanceof InfrastructureError) {
      logError(`[api] ${c.req.method} ${c.req.path} infrastructure failure: ${err.message}`, err.cause)
      return fail(c, 'INFRASTRUCTURE_ERROR', 'The inventory store is unavailable. Try again later.', 503)
    }
    logError(`[api] ${c.req.method} ${c.req.path}`, err)
    return fail(c, 'INTERNAL_ERROR', 'Unexpected server error.', 500)
  })

  app.notFound((c) => fail(c, 'NOT_FOUND', `No route for ${c.req.method} ${c.req.path}.`, 404))

  return app
}
