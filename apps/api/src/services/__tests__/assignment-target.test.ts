/**
 * @fileoverview Assignment target unit tests
 *
 * @description
 * Column mapping and input parsing for the closed target union.
 */

import { describe, it, expect } from 'vitest'
import {
  UNASSIGNED,
  assetAssignmentColumns,
  assetTargetOf,
  isRowId,
  locationTarget,
  parseAssignmentTarget,
  parseSeatTarget,
  seatAssignmentColumns,
  seatTargetOf,
} from '../assignment-target.js'

describe('assignment-target.ts', () => {
  describe('assetTargetOf', () => {
    it('should read an empty pair as unassigned', () => {
      expect(assetTargetOf({ id: 1, assignedType: null, assignedTo: null })).toEqual({ kind: 'unassigned' })
    })

    it('should read each kind from the column pair', () => {
      expect(assetTargetOf({ id: 1, assignedType: 'user', assignedTo: 7 })).toEqual({ kind: 'user', id: 7 })
      expect(assetTargetOf({ id: 1, assignedType: 'location', assignedTo: 3 })).toEqual({ kind: 'location', id: 3 })
      expect(assetTargetOf({ id: 1, assignedType: 'asset', assignedTo: 2 })).toEqual({ kind: 'asset', id: 2 })
    })

    it('should refuse a half-written pair', () => {
      expect(() => assetTargetOf({ id: 4, assignedType: 'user', assignedTo: null })).toThrow(
        'Asset 4 has a half-written assignment (user, null)',
      )
    })
  })

  describe('assetAssignmentColumns', () => {
    it('should write the kind and id into the pair', () => {
      expect(assetAssignmentColumns(locationTarget(3))).toEqual({ assignedType: 'location', assignedTo: 3 })
      expect(assetAssignmentColumns(UNASSIGNED)).toEqual({ assignedType: null, assignedTo: null })
    })
  })

  describe('seat channels', () => {
    it('should map user and asset targets to one column each', () => {
      expect(seatAssignmentColumns({ kind: 'user', id: 9 })).toEqual({ assignedToUser: 9, assetId: null })
      expect(seatAssignmentColumns({ kind: 'asset', id: 5 })).toEqual({ assignedToUser: null, assetId: 5 })
      expect(seatAssignmentColumns(UNASSIGNED)).toEqual({ assignedToUser: null, assetId: null })
    })

    it('should refuse a seat holding both channels', () => {
      expect(() => seatTargetOf({ id: 12, assignedToUser: 9, assetId: 5 })).toThrow(
        'Seat 12 is assigned to user 9 and asset 5 at once',
      )
    })

    it('should read an asset channel', () => {
      expect(seatTargetOf({ id: 12, assignedToUser: null, assetId: 5 })).toEqual({ kind: 'asset', id: 5 })
    })
  })

  describe('parseAssignmentTarget', () => {
    it('should accept a concrete target', () => {
      expect(parseAssignmentTarget({ kind: 'location', id: 3 })).toEqual({
        ok: true,
        value: { kind: 'location', id: 3 },
      })
    })

    it('should send callers to release instead of assigning to unassigned', () => {
      expect(parseAssignmentTarget({ kind: 'unassigned' })).toEqual({
        ok: false,
        error: {
          code: 'VALIDATION_ERROR',
          field: 'target.kind',
          message: 'A concrete target is required; release the entity to unassign it.',
        },
      })
    })

    it('should reject unknown kinds and bad ids', () => {
      const unknown = parseAssignmentTarget({ kind: 'department', id: 1 })
      expect(unknown.ok).toBe(false)
      if (!unknown.ok) expect(unknown.error.message).toBe('Unknown target kind "department".')

      const badId = parseAssignmentTarget({ kind: 'user', id: 1.5 })
      expect(badId.ok).toBe(false)
      if (!badId.ok) expect(badId.error.field).toBe('target.id')
    })

    it('should reject an id past the int4 range', () => {
      const parsed = parseAssignmentTarget({ kind: 'user', id: 3_000_000_000 })
      expect(parsed).toEqual({
        ok: false,
        error: { code: 'VALIDATION_ERROR', field: 'target.id', message: 'A target id between 1 and 2147483647 is required.' },
      })
    })

    it('should reject a missing target', () => {
      const missing = parseAssignmentTarget(null)
      expect(missing.ok).toBe(false)
      if (!missing.ok) expect(missing.error.message).toBe('A target kind is required.')
    })
  })

  describe('parseSeatTarget', () => {
    it('should not let a seat go to a location', () => {
      const parsed = parseSeatTarget({ kind: 'location', id: 1 })
      expect(parsed).toEqual({
        ok: false,
        error: {
          code: 'VALIDATION_ERROR',
          field: 'target.kind',
          message: 'Target kind "location" is not allowed here (expected user or asset).',
        },
      })
    })
  })

  describe('isRowId', () => {
    it('should accept exactly the positive int4 range', () => {
      expect(isRowId(1)).toBe(true)
      expect(isRowId(2_147_483_647)).toBe(true)
      expect(isRowId(2_147_483_648)).toBe(false)
      expect(isRowId(0)).toBe(false)
      expect(isRowId('7')).toBe(false)
    })
  })
})
