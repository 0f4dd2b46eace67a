import { createInventoryServices } from '../inventory.js'
import { MemoryInventoryStore } from './memory-store.js'

export const NOW = new Date('2025-03-10T09:00:00.000Z')

export const ACTOR = 'user-42'

/**
 * A store seeded with one location, two people, one status and one model,
 * and the engine wired on top of it with a frozen clock.
 *
 * Ids are deterministic: every table starts at 1.
 */
export function createFixture() {
  const store = new MemoryInventoryStore()
  const services = createInventoryServices(store, () => NOW)

  const headOffice = store.addLocation('Head Office')
  const storeRoom = store.addLocation('IT Store Room')
  const alice = store.addUser({ username: 'alice', name: 'Alice Martin', locationId: headOffice })
  const bruno = store.addUser({ username: 'bruno', name: 'Bruno Petit' })
  const ready = store.addCatalogEntry('status', 'Ready to deploy')
  const repair = store.addCatalogEntry('status', 'In repair')
  const t14 = store.addModel('ThinkPad T14')

  return {
    store,
    services,
    ids: { headOffice, storeRoom, alice, bruno, ready, repair, t14 },
  }
}
