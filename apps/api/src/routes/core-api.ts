/**
 * Canonical API router.
 *
 * Everything the inventory exposes hangs off `/api/v1`. Route modules are
 * split by domain and share the same envelope and actor model.
 */

import { Hono } from 'hono'
import type { InventoryServices } from '../services/inventory.js'
import { createAccessoryRoutes } from './accessories.js'
import { createAssetRoutes } from './assets.js'
import { createLicenseRoutes } from './licenses.js'
import { assignmentFieldRoutes } from './assignment-fields.js'
import { ok } from './_api.js'

export type HealthCheck = () => Promise<boolean>

export function createCoreApiRoutes(services: InventoryServices, options: { checkDatabase?: HealthCheck } = {}) {
  const coreApiRoutes = new Hono()

  coreApiRoutes.route('/', createAssetRoutes(services))
  coreApiRoutes.route('/', createLicenseRoutes(services))
  coreApiRoutes.route('/', createAccessoryRoutes(services))
  coreApiRoutes.route('/', assignmentFieldRoutes)

  coreApiRoutes.get('/health', async (c) => {
    const database = options.checkDatabase ? await options.checkDatabase() : null
    const healthy = database !== false
    return ok(
      c,
      {
        service: 'assetdesk-core-api',
        status: healthy ? 'healthy' : 'degraded',
        version: '0.1.0',
        ...(database === null ? {} : { database: database ? 'up' : 'down' }),
      },
      healthy ? 200 : 503,
    )
  })

  return coreApiRoutes
}
