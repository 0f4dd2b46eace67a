/**
 * @fileoverview Accessory registry tests
 *
 * @description
 * Stock edits are checked against the units currently out; checkout and
 * checkin themselves are covered with the assignment workflow.
 */

import { describe, it, expect } from 'vitest'
import { availabilityOf } from '../accessory-registry.js'
import { ACTOR, createFixture } from './fixtures.js'

async function chargersOut(qty: number, holders: number[]) {
  const fixture = createFixture()
  const chargers = fixture.store.addAccessory({ name: 'USB-C CHARGER', qty })
  for (const userId of holders) {
    const result = await fixture.services.workflow.assignAccessory({ accessoryId: chargers.id, userId, actor: ACTOR })
    expect(result.ok).toBe(true)
  }
  return { ...fixture, chargers }
}

describe('accessory-registry.ts', () => {
  describe('availabilityOf', () => {
    it('should flag stock under the minimum', () => {
      expect(availabilityOf({ qty: 10, minAmt: 2 }, 9)).toEqual({
        qty: 10,
        assigned: 9,
        available: 1,
        belowMinimum: true,
      })
      expect(availabilityOf({ qty: 10, minAmt: 2 }, 8)).toMatchObject({ available: 2, belowMinimum: false })
      expect(availabilityOf({ qty: 3, minAmt: null }, 5)).toMatchObject({ available: 0, belowMinimum: false })
    })
  })

  describe('createAccessory', () => {
    it('should store the name upper-case with its availability', async () => {
      const { services } = createFixture()

      const result = await services.accessories.createAccessory({ name: '  hdmi cable ', qty: 5, minAmt: 2 }, ACTOR)

      expect(result).toMatchObject({
        ok: true,
        value: {
          id: 1,
          name: 'HDMI CABLE',
          createdBy: ACTOR,
          availability: { qty: 5, assigned: 0, available: 5, belowMinimum: false },
        },
      })
    })

    it('should refuse a blank name and a dangling category', async () => {
      const { services } = createFixture()

      const blank = await services.accessories.createAccessory({ name: '   ', qty: 1 }, ACTOR)
      const dangling = await services.accessories.createAccessory({ name: 'Mouse', qty: 1, categoryId: 9 }, ACTOR)

      expect(blank).toEqual({ ok: false, error: { code: 'VALIDATION_ERROR', field: 'name', message: 'A name is required.' } })
      expect(dangling).toEqual({
        ok: false,
        error: { code: 'VALIDATION_ERROR', field: 'categoryId', message: 'category 9 does not exist.' },
      })
    })
  })

  describe('updateAccessory', () => {
    it('should not drop the quantity below the units out', async () => {
      const { store, services, ids, chargers } = await chargersOut(3, [1, 2])

      const refused = await services.accessories.updateAccessory(chargers.id, { qty: 1 }, ACTOR)
      const shrunk = await services.accessories.updateAccessory(chargers.id, { qty: 2, name: 'dock' }, ACTOR)

      expect(refused).toEqual({
        ok: false,
        error: { code: 'VALIDATION_ERROR', field: 'qty', message: 'Quantity cannot drop below the 2 unit(s) checked out.' },
      })
      expect(shrunk).toMatchObject({
        ok: true,
        value: { name: 'DOCK', qty: 2, updatedBy: ACTOR, availability: { assigned: 2, available: 0 } },
      })
      expect(store.checkoutsOf(chargers.id).map((row) => row.assignedTo)).toEqual([ids.alice, ids.bruno])
    })

    it('should report a missing accessory', async () => {
      const { services } = createFixture()

      const result = await services.accessories.updateAccessory(12, { qty: 4 }, ACTOR)

      expect(result).toEqual({ ok: false, error: { code: 'NOT_FOUND', entity: 'accessory', id: 12 } })
    })
  })

  describe('deleteAccessory', () => {
    it('should wait until every unit is back', async () => {
      const { services, chargers } = await chargersOut(2, [1])
      const [checkout] = await services.accessories
        .listCheckouts(chargers.id)
        .then((result) => (result.ok ? result.value : []))
      if (!checkout) throw new Error('accessory fixture failed')

      const refused = await services.accessories.deleteAccessory(chargers.id, ACTOR)
      expect(refused).toEqual({
        ok: false,
        error: { code: 'ACCESSORY_HAS_CHECKOUTS', accessoryId: chargers.id, assigned: 1 },
      })

      await services.workflow.releaseAccessory({ accessoryId: chargers.id, checkoutId: checkout.id, actor: ACTOR })
      const deleted = await services.accessories.deleteAccessory(chargers.id, ACTOR)

      expect(deleted).toEqual({ ok: true, value: { id: chargers.id } })
      expect(await services.accessories.getAccessory(chargers.id)).toEqual({
        ok: false,
        error: { code: 'NOT_FOUND', entity: 'accessory', id: chargers.id },
      })
    })
  })

  describe('listCheckouts', () => {
    it('should label each holder', async () => {
      const { services, chargers } = await chargersOut(5, [1, 2])

      const result = await services.accessories.listCheckouts(chargers.id)
      const missing = await services.accessories.listCheckouts(99)

      expect(result.ok && result.value.map((row) => row.assignedToLabel)).toEqual(['Alice Martin', 'Bruno Petit'])
      expect(missing).toEqual({ ok: false, error: { code: 'NOT_FOUND', entity: 'accessory', id: 99 } })
    })
  })

  describe('listAccessories', () => {
    it('should order by name and search model numbers', async () => {
      const { store, services } = createFixture()
      store.addAccessory({ name: 'USB-C CHARGER', qty: 4 })
      store.addAccessory({ name: 'MOUSE', qty: 2, modelNumber: 'MX-300' })

      const all = await services.accessories.listAccessories({ limit: 20, offset: 0 })
      const found = await services.accessories.listAccessories({ limit: 20, offset: 0, search: 'mx' })

      expect(all.ok && all.value.rows.map((row) => row.name)).toEqual(['MOUSE', 'USB-C CHARGER'])
      expect(found).toMatchObject({ ok: true, value: { total: 1, rows: [{ name: 'MOUSE' }] } })
    })
  })
})
