/**
 * @fileoverview Assignment workflow tests
 *
 * @description
 * Checkout and checkin of assets, license seats and accessory units against
 * the in-process store: preconditions, side effects, custodians, lock order
 * and rollback.
 */

import { describe, it, expect } from 'vitest'
import { UNASSIGNED, assetTarget, locationTarget, userTarget } from '../assignment-target.js'
import { InfrastructureError } from '../inventory-errors.js'
import { ACTOR, NOW, createFixture } from './fixtures.js'

function assetFixture() {
  const fixture = createFixture()
  const { store, ids } = fixture
  const laptop = store.addAsset({ tag: 'LAPTOP-0001', name: 'Spare laptop', modelId: ids.t14, locationId: ids.storeRoom })
  const dock = store.addAsset({ tag: 'DOCK-0001', name: 'USB-C dock', locationId: ids.storeRoom })
  return { ...fixture, laptop, dock }
}

function seatFixture(reassignable = true) {
  const fixture = assetFixture()
  const license = fixture.store.addLicense({ name: 'Office Suite', seats: 3, reassignable })
  return { ...fixture, license }
}

describe('assignment-workflow.ts', () => {
  describe('assignAsset', () => {
    it('should check out an unassigned asset to a user once', async () => {
      const { store, services, ids, laptop } = assetFixture()

      const first = await services.workflow.assignAsset({ assetId: laptop.id, target: userTarget(ids.alice), actor: ACTOR })

      expect(first.ok).toBe(true)
      expect(store.asset(laptop.id)).toMatchObject({
        assignedType: 'user',
        assignedTo: ids.alice,
        assignedAt: NOW,
        custodianUserId: ids.alice,
        checkoutCounter: 1,
        locationId: ids.storeRoom,
        updatedAt: NOW,
        updatedBy: ACTOR,
      })

      const second = await services.workflow.assignAsset({ assetId: laptop.id, target: userTarget(ids.bruno), actor: ACTOR })

      expect(second).toEqual({
        ok: false,
        error: { code: 'ALREADY_ASSIGNED', entity: 'asset', id: laptop.id, current: { kind: 'user', id: ids.alice } },
      })
      expect(store.asset(laptop.id)?.checkoutCounter).toBe(1)
    })

    it('should move the asset to a location target', async () => {
      const { store, services, ids, laptop } = assetFixture()

      const result = await services.workflow.assignAsset({
        assetId: laptop.id,
        target: locationTarget(ids.headOffice),
        actor: ACTOR,
      })

      expect(result.ok).toBe(true)
      expect(store.asset(laptop.id)).toMatchObject({
        assignedType: 'location',
        assignedTo: ids.headOffice,
        locationId: ids.headOffice,
        custodianUserId: null,
      })
    })

    it("should freeze the other asset's user as custodian", async () => {
      const { store, services, ids, laptop, dock } = assetFixture()
      await services.workflow.assignAsset({ assetId: laptop.id, target: userTarget(ids.alice), actor: ACTOR })

      const result = await services.workflow.assignAsset({ assetId: dock.id, target: assetTarget(laptop.id), actor: ACTOR })

      expect(result.ok).toBe(true)
      expect(store.asset(dock.id)).toMatchObject({
        assignedType: 'asset',
        assignedTo: laptop.id,
        custodianUserId: ids.alice,
        locationId: ids.storeRoom,
      })

      // Re-pointing the laptop later does not touch the dock.
      await services.workflow.releaseAsset({ assetId: laptop.id, actor: ACTOR })
      expect(store.asset(dock.id)?.custodianUserId).toBe(ids.alice)
    })

    it('should refuse self and circular asset assignments', async () => {
      const { services, laptop, dock } = assetFixture()

      const self = await services.workflow.assignAsset({ assetId: laptop.id, target: assetTarget(laptop.id), actor: ACTOR })
      expect(self).toEqual({
        ok: false,
        error: { code: 'VALIDATION_ERROR', field: 'target.id', message: 'An asset cannot be assigned to itself.' },
      })

      await services.workflow.assignAsset({ assetId: dock.id, target: assetTarget(laptop.id), actor: ACTOR })
      const cycle = await services.workflow.assignAsset({ assetId: laptop.id, target: assetTarget(dock.id), actor: ACTOR })
      expect(cycle).toEqual({
        ok: false,
        error: {
          code: 'VALIDATION_ERROR',
          field: 'target.id',
          message: `Asset ${dock.id} is already assigned, directly or not, to asset ${laptop.id}.`,
        },
      })
    })

    it('should validate the target, actor and dates before touching the store', async () => {
      const { store, services, laptop } = assetFixture()

      const missingUser = await services.workflow.assignAsset({ assetId: laptop.id, target: userTarget(999), actor: ACTOR })
      const unassigned = await services.workflow.assignAsset({ assetId: laptop.id, target: UNASSIGNED, actor: ACTOR })
      const noActor = await services.workflow.assignAsset({ assetId: laptop.id, target: userTarget(1), actor: '   ' })
      const early = await services.workflow.assignAsset({
        assetId: laptop.id,
        target: userTarget(1),
        expectedCheckin: new Date('2025-03-09'),
        actor: ACTOR,
      })

      expect(missingUser).toEqual({
        ok: false,
        error: { code: 'VALIDATION_ERROR', field: 'target.id', message: 'User 999 does not exist.' },
      })
      expect(unassigned).toMatchObject({ ok: false, error: { code: 'VALIDATION_ERROR', field: 'target.kind' } })
      expect(noActor).toMatchObject({ ok: false, error: { code: 'VALIDATION_ERROR', field: 'actor' } })
      expect(early).toMatchObject({ ok: false, error: { code: 'VALIDATION_ERROR', field: 'expectedCheckin' } })
      expect(store.asset(laptop.id)?.assignedType).toBeNull()
    })

    it('should accept an expected checkin on the checkout day', async () => {
      const { store, services, ids, laptop } = assetFixture()

      const result = await services.workflow.assignAsset({
        assetId: laptop.id,
        target: userTarget(ids.bruno),
        expectedCheckin: new Date('2025-03-10'),
        actor: ACTOR,
      })

      expect(result.ok).toBe(true)
      expect(store.asset(laptop.id)?.expectedCheckin).toEqual(new Date('2025-03-10T00:00:00.000Z'))
    })

    it('should reject an asset id no id column can hold', async () => {
      const { store, services, ids } = assetFixture()

      const result = await services.workflow.assignAsset({
        assetId: 3_000_000_000,
        target: userTarget(ids.alice),
        actor: ACTOR,
      })

      expect(result).toEqual({
        ok: false,
        error: { code: 'VALIDATION_ERROR', field: 'assetId', message: 'Expected an id between 1 and 2147483647.' },
      })
      expect(store.locks).toEqual([])
    })

    it('should keep the asset and its counter when the checkout write fails', async () => {
      const { store, services, ids, laptop } = assetFixture()
      store.failNext('assets.update')

      await expect(
        services.workflow.assignAsset({ assetId: laptop.id, target: userTarget(ids.alice), actor: ACTOR }),
      ).rejects.toBeInstanceOf(InfrastructureError)

      expect(store.asset(laptop.id)).toMatchObject({
        assignedType: null,
        assignedTo: null,
        assignedAt: null,
        custodianUserId: null,
        checkoutCounter: 0,
      })
      expect(store.rollbacks).toBe(1)
    })

    it('should report a missing asset', async () => {
      const { services, ids } = assetFixture()

      const result = await services.workflow.assignAsset({ assetId: 404, target: userTarget(ids.alice), actor: ACTOR })

      expect(result).toEqual({ ok: false, error: { code: 'NOT_FOUND', entity: 'asset', id: 404 } })
    })
  })

  describe('releaseAsset', () => {
    it('should undo a checkout', async () => {
      const { store, services, ids, laptop } = assetFixture()
      await services.workflow.assignAsset({ assetId: laptop.id, target: userTarget(ids.alice), actor: ACTOR })

      const result = await services.workflow.releaseAsset({ assetId: laptop.id, statusId: ids.repair, actor: ACTOR })

      expect(result.ok).toBe(true)
      expect(store.asset(laptop.id)).toMatchObject({
        assignedType: null,
        assignedTo: null,
        assignedAt: null,
        expectedCheckin: null,
        custodianUserId: null,
        lastCheckinAt: NOW,
        statusId: ids.repair,
        checkoutCounter: 1,
        checkinCounter: 1,
      })
    })

    it('should refuse to release an unassigned asset', async () => {
      const { services, laptop } = assetFixture()

      const result = await services.workflow.releaseAsset({ assetId: laptop.id, actor: ACTOR })

      expect(result).toEqual({ ok: false, error: { code: 'ALREADY_UNASSIGNED', entity: 'asset', id: laptop.id } })
    })

    it('should leave the asset assigned when the checkin data is invalid', async () => {
      const { store, services, ids, laptop } = assetFixture()
      await services.workflow.assignAsset({ assetId: laptop.id, target: userTarget(ids.alice), actor: ACTOR })

      const result = await services.workflow.releaseAsset({ assetId: laptop.id, locationId: 77, actor: ACTOR })

      expect(result).toEqual({
        ok: false,
        error: { code: 'VALIDATION_ERROR', field: 'locationId', message: 'Location 77 does not exist.' },
      })
      expect(store.asset(laptop.id)).toMatchObject({ assignedType: 'user', checkinCounter: 0 })
    })

    it('should keep the asset assigned when the checkin write fails', async () => {
      const { store, services, ids, laptop } = assetFixture()
      await services.workflow.assignAsset({ assetId: laptop.id, target: userTarget(ids.alice), actor: ACTOR })
      store.failNext('assets.update')

      await expect(
        services.workflow.releaseAsset({ assetId: laptop.id, statusId: ids.repair, actor: ACTOR }),
      ).rejects.toBeInstanceOf(InfrastructureError)

      expect(store.asset(laptop.id)).toMatchObject({
        assignedType: 'user',
        assignedTo: ids.alice,
        custodianUserId: ids.alice,
        lastCheckinAt: null,
        statusId: null,
        checkoutCounter: 1,
        checkinCounter: 0,
      })
    })
  })

  describe('assignSeat', () => {
    it('should give a seat to a user', async () => {
      const { store, services, ids, license } = seatFixture()
      const [seat] = store.activeSeatsOf(license.id)
      if (!seat) throw new Error('fixture has no seat')

      const result = await services.workflow.assignSeat({
        seatId: seat.id,
        licenseId: license.id,
        target: userTarget(ids.bruno),
        actor: ACTOR,
      })

      expect(result).toMatchObject({
        ok: true,
        value: { assignedToUser: ids.bruno, assetId: null, custodianUserId: ids.bruno, assignedAt: NOW },
      })
    })

    it("should give a seat to an asset and record the asset's user", async () => {
      const { store, services, ids, laptop, license } = seatFixture()
      await services.workflow.assignAsset({ assetId: laptop.id, target: userTarget(ids.alice), actor: ACTOR })
      const seat = store.activeSeatsOf(license.id)[1]
      if (!seat) throw new Error('fixture has no second seat')

      const result = await services.workflow.assignSeat({ seatId: seat.id, target: assetTarget(laptop.id), actor: ACTOR })

      expect(result).toMatchObject({
        ok: true,
        value: { assignedToUser: null, assetId: laptop.id, custodianUserId: ids.alice },
      })
    })

    it('should refuse a seat of another license', async () => {
      const { store, services, ids, license } = seatFixture()
      const other = store.addLicense({ name: 'Antivirus', seats: 1 })
      const [foreign] = store.activeSeatsOf(other.id)
      if (!foreign) throw new Error('fixture has no seat')

      const result = await services.workflow.assignSeat({
        seatId: foreign.id,
        licenseId: license.id,
        target: userTarget(ids.alice),
        actor: ACTOR,
      })

      expect(result).toEqual({ ok: false, error: { code: 'NOT_FOUND', entity: 'seat', id: foreign.id } })
    })

    it('should lock the license before the seat', async () => {
      const { store, services, ids, license } = seatFixture()
      const [seat] = store.activeSeatsOf(license.id)
      if (!seat) throw new Error('fixture has no seat')

      await services.workflow.assignSeat({ seatId: seat.id, target: userTarget(ids.alice), actor: ACTOR })

      expect(store.locks).toEqual([`license ${license.id} share`, `seat ${seat.id} update`])
    })

    it('should leave the seat free when the checkout write fails', async () => {
      const { store, services, ids, license } = seatFixture()
      const [seat] = store.activeSeatsOf(license.id)
      if (!seat) throw new Error('fixture has no seat')
      store.failNext('seats.update')

      await expect(
        services.workflow.assignSeat({ seatId: seat.id, target: userTarget(ids.alice), actor: ACTOR }),
      ).rejects.toBeInstanceOf(InfrastructureError)

      expect(store.activeSeatsOf(license.id)[0]).toMatchObject({
        assignedToUser: null,
        assetId: null,
        custodianUserId: null,
        assignedAt: null,
      })
    })

    it('should refuse an occupied seat', async () => {
      const { store, services, ids, license } = seatFixture()
      const [seat] = store.activeSeatsOf(license.id)
      if (!seat) throw new Error('fixture has no seat')
      await services.workflow.assignSeat({ seatId: seat.id, target: userTarget(ids.alice), actor: ACTOR })

      const result = await services.workflow.assignSeat({ seatId: seat.id, target: userTarget(ids.bruno), actor: ACTOR })

      expect(result).toEqual({
        ok: false,
        error: { code: 'ALREADY_ASSIGNED', entity: 'seat', id: seat.id, current: { kind: 'user', id: ids.alice } },
      })
    })
  })

  describe('assignNextAvailableSeat', () => {
    it('should hand out the oldest free seat until none is left', async () => {
      const { services, ids, license } = seatFixture()
      const handed: number[] = []

      for (let round = 0; round < 3; round += 1) {
        const result = await services.workflow.assignNextAvailableSeat({
          licenseId: license.id,
          target: userTarget(ids.alice),
          actor: ACTOR,
        })
        if (result.ok) handed.push(result.value.id)
      }
      const exhausted = await services.workflow.assignNextAvailableSeat({
        licenseId: license.id,
        target: userTarget(ids.bruno),
        actor: ACTOR,
      })

      expect(handed).toEqual([1, 2, 3])
      expect(exhausted).toEqual({ ok: false, error: { code: 'NO_AVAILABLE_SEATS', licenseId: license.id } })
    })
  })

  describe('releaseSeat', () => {
    it('should free a seat of a reassignable license', async () => {
      const { store, services, ids, license } = seatFixture()
      const [seat] = store.activeSeatsOf(license.id)
      if (!seat) throw new Error('fixture has no seat')
      await services.workflow.assignSeat({ seatId: seat.id, target: userTarget(ids.alice), actor: ACTOR })

      const result = await services.workflow.releaseSeat({ seatId: seat.id, licenseId: license.id, actor: ACTOR })

      expect(result).toMatchObject({
        ok: true,
        value: { assignedToUser: null, assetId: null, custodianUserId: null, assignedAt: null },
      })
    })

    it('should keep a seat of a non-reassignable license assigned', async () => {
      const { store, services, ids, license } = seatFixture(false)
      const [seat] = store.activeSeatsOf(license.id)
      if (!seat) throw new Error('fixture has no seat')
      await services.workflow.assignSeat({ seatId: seat.id, target: userTarget(ids.bruno), actor: ACTOR })

      const result = await services.workflow.releaseSeat({ seatId: seat.id, actor: ACTOR })

      expect(result).toEqual({
        ok: false,
        error: { code: 'NOT_REASSIGNABLE', licenseId: license.id, seatId: seat.id },
      })
      expect(store.activeSeatsOf(license.id)[0]?.assignedToUser).toBe(ids.bruno)
    })

    it('should refuse to release a free seat', async () => {
      const { store, services, license } = seatFixture(false)
      const [seat] = store.activeSeatsOf(license.id)
      if (!seat) throw new Error('fixture has no seat')

      const result = await services.workflow.releaseSeat({ seatId: seat.id, actor: ACTOR })

      expect(result).toEqual({ ok: false, error: { code: 'ALREADY_UNASSIGNED', entity: 'seat', id: seat.id } })
    })
  })

  describe('assignAccessory', () => {
    function accessoryFixture(qty: number) {
      const fixture = createFixture()
      const chargers = fixture.store.addAccessory({ name: 'USB-C CHARGER', qty })
      return { ...fixture, chargers }
    }

    it('should hand out units until the quantity is used up', async () => {
      const { store, services, ids, chargers } = accessoryFixture(2)

      const first = await services.workflow.assignAccessory({
        accessoryId: chargers.id,
        userId: ids.alice,
        note: '  spare for the meeting room  ',
        actor: ACTOR,
      })
      const second = await services.workflow.assignAccessory({ accessoryId: chargers.id, userId: ids.bruno, actor: ACTOR })
      const third = await services.workflow.assignAccessory({ accessoryId: chargers.id, userId: ids.alice, actor: ACTOR })

      expect(first).toMatchObject({
        ok: true,
        value: { id: 1, accessoryId: chargers.id, assignedTo: ids.alice, note: 'spare for the meeting room', assignedAt: NOW },
      })
      expect(second).toMatchObject({ ok: true, value: { id: 2, assignedTo: ids.bruno, note: null } })
      expect(third).toEqual({
        ok: false,
        error: { code: 'NO_AVAILABLE_QUANTITY', accessoryId: chargers.id, qty: 2, assigned: 2 },
      })
      expect(store.checkoutsOf(chargers.id)).toHaveLength(2)
    })

    it('should refuse an unknown user and a missing accessory', async () => {
      const { services, chargers } = accessoryFixture(1)

      const ghost = await services.workflow.assignAccessory({ accessoryId: chargers.id, userId: 77, actor: ACTOR })
      const missing = await services.workflow.assignAccessory({ accessoryId: 404, userId: 1, actor: ACTOR })

      expect(ghost).toEqual({
        ok: false,
        error: { code: 'VALIDATION_ERROR', field: 'userId', message: 'User 77 does not exist.' },
      })
      expect(missing).toEqual({ ok: false, error: { code: 'NOT_FOUND', entity: 'accessory', id: 404 } })
    })

    it('should keep no checkout when the write fails', async () => {
      const { store, services, ids, chargers } = accessoryFixture(3)
      store.failNext('accessories.insertCheckout')

      await expect(
        services.workflow.assignAccessory({ accessoryId: chargers.id, userId: ids.alice, actor: ACTOR }),
      ).rejects.toBeInstanceOf(InfrastructureError)

      expect(store.checkoutsOf(chargers.id)).toEqual([])
    })
  })

  describe('releaseAccessory', () => {
    it('should take a unit back once', async () => {
      const { store, services, ids } = createFixture()
      const chargers = store.addAccessory({ name: 'USB-C CHARGER', qty: 1 })
      const out = await services.workflow.assignAccessory({ accessoryId: chargers.id, userId: ids.alice, actor: ACTOR })
      if (!out.ok) throw new Error('accessory fixture failed')

      const back = await services.workflow.releaseAccessory({ accessoryId: chargers.id, checkoutId: out.value.id, actor: ACTOR })
      const twice = await services.workflow.releaseAccessory({ accessoryId: chargers.id, checkoutId: out.value.id, actor: ACTOR })

      expect(back).toMatchObject({ ok: true, value: { id: out.value.id, deletedAt: NOW, deletedBy: ACTOR } })
      expect(twice).toEqual({ ok: false, error: { code: 'NOT_FOUND', entity: 'accessory-checkout', id: out.value.id } })

      const again = await services.workflow.assignAccessory({ accessoryId: chargers.id, userId: ids.bruno, actor: ACTOR })
      expect(again.ok).toBe(true)
    })

    it('should not take back a unit of another accessory', async () => {
      const { store, services, ids } = createFixture()
      const chargers = store.addAccessory({ name: 'USB-C CHARGER', qty: 1 })
      const mice = store.addAccessory({ name: 'MOUSE', qty: 1 })
      const out = await services.workflow.assignAccessory({ accessoryId: chargers.id, userId: ids.alice, actor: ACTOR })
      if (!out.ok) throw new Error('accessory fixture failed')

      const result = await services.workflow.releaseAccessory({ accessoryId: mice.id, checkoutId: out.value.id, actor: ACTOR })

      expect(result).toEqual({ ok: false, error: { code: 'NOT_FOUND', entity: 'accessory-checkout', id: out.value.id } })
      expect(store.checkoutsOf(chargers.id)[0]?.deletedAt).toBeNull()
    })
  })

  describe('single channel', () => {
    it('should never leave a seat with both a user and an asset', async () => {
      const { store, services, ids, laptop, license } = seatFixture()
      const [seat] = store.activeSeatsOf(license.id)
      if (!seat) throw new Error('fixture has no seat')

      await services.workflow.assignSeat({ seatId: seat.id, target: assetTarget(laptop.id), actor: ACTOR })
      await services.workflow.releaseSeat({ seatId: seat.id, actor: ACTOR })
      await services.workflow.assignSeat({ seatId: seat.id, target: userTarget(ids.alice), actor: ACTOR })

      for (const row of store.seatsOf(license.id)) {
        expect(row.assignedToUser === null || row.assetId === null).toBe(true)
      }
      expect(store.activeSeatsOf(license.id)[0]).toMatchObject({ assignedToUser: ids.alice, assetId: null })
    })
  })
})
