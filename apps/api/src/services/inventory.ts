/**
 * Wires the inventory engine on top of a store.
 */

import { createAccessoryRegistry, type AccessoryRegistry } from './accessory-registry.js'
import { createAssetRegistry, type AssetRegistry } from './asset-registry.js'
import { createAssignmentWorkflow, type AssignmentWorkflow } from './assignment-workflow.js'
import { createAuditLedger, systemClock, type Clock } from './audit.js'
import type { InventoryStore } from './inventory-store.js'
import { createLicenseRegistry, type LicenseRegistry } from './license-registry.js'
import { createSeatPoolManager, type SeatPoolManager } from './seat-pool.js'
import { createTargetResolver, type TargetResolver } from './target-resolver.js'

export type InventoryServices = {
  workflow: AssignmentWorkflow
  seatPool: SeatPoolManager
  licenses: LicenseRegistry
  assets: AssetRegistry
  accessories: AccessoryRegistry
  resolver: TargetResolver
}

export function createInventoryServices(store: InventoryStore, clock: Clock = systemClock): InventoryServices {
  const audit = createAuditLedger(clock)
  const seatPool = createSeatPoolManager(audit)
  return {
    workflow: createAssignmentWorkflow({ store, audit }),
    seatPool,
    licenses: createLicenseRegistry({ store, audit, seatPool }),
    assets: createAssetRegistry({ store, audit }),
    accessories: createAccessoryRegistry({ store, audit }),
    resolver: createTargetResolver(store.lookups),
  }
}
