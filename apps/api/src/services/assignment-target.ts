/**
 * "Assigned to whom", as a closed union.
 *
 * The persisted form is the `(assigned_type, assigned_to)` column pair of
 * `assets`; seats use their own two columns (see `seatTargetOf`).
 */

import type { Asset, LicenseSeat } from '@assetdesk/db'
import { MAX_ID } from '@assetdesk/schema'
import { err, ok, type Result, type ValidationError } from './inventory-errors.js'

export type TargetKind = 'user' | 'location' | 'asset'

export type AssignmentTarget =
  | { kind: 'user'; id: number }
  | { kind: 'location'; id: number }
  | { kind: 'asset'; id: number }
  | { kind: 'unassigned' }

export type AssignedTarget = Exclude<AssignmentTarget, { kind: 'unassigned' }>

/** Seats go to a user or an asset, never to a location. */
export type SeatTarget = Extract<AssignmentTarget, { kind: 'user' | 'asset' }>

export const TARGET_KINDS: readonly TargetKind[] = ['user', 'location', 'asset']

export const SEAT_TARGET_KINDS: readonly TargetKind[] = ['user', 'asset']

export const UNASSIGNED: Extract<AssignmentTarget, { kind: 'unassigned' }> = { kind: 'unassigned' }

export const userTarget = (id: number): AssignmentTarget => ({ kind: 'user', id })
export const locationTarget = (id: number): AssignmentTarget => ({ kind: 'location', id })
export const assetTarget = (id: number): AssignmentTarget => ({ kind: 'asset', id })

export function assertNever(value: never): never {
  throw new Error(`Unhandled assignment target: ${JSON.stringify(value)}`)
}

export function isTargetKind(value: unknown): value is TargetKind {
  return value === 'user' || value === 'location' || value === 'asset'
}

export function isAssigned(target: AssignmentTarget): target is AssignedTarget {
  return target.kind !== 'unassigned'
}

/** A value that fits an id column: a positive int4. */
export function isRowId(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 && value <= MAX_ID
}

/**
 * Read the assignment columns of an asset.
 *
 * A half-filled pair (kind without id or the reverse) cannot be written by
 * the workflow and is blocked by a check constraint, so it is reported as
 * corrupt data rather than guessed at.
 */
export function assetTargetOf(asset: Pick<Asset, 'id' | 'assignedType' | 'assignedTo'>): AssignmentTarget {
  const { assignedType, assignedTo } = asset
  if (assignedType === null && assignedTo === null) return UNASSIGNED
  if (assignedType === null || assignedTo === null) {
    throw new Error(`Asset ${asset.id} has a half-written assignment (${assignedType}, ${assignedTo})`)
  }
  switch (assignedType) {
    case 'user':
      return { kind: 'user', id: assignedTo }
    case 'location':
      return { kind: 'location', id: assignedTo }
    case 'asset':
      return { kind: 'asset', id: assignedTo }
    default:
      return assertNever(assignedType)
  }
}

/** Column values for an asset assignment. */
export function assetAssignmentColumns(target: AssignmentTarget): Pick<Asset, 'assignedType' | 'assignedTo'> {
  switch (target.kind) {
    case 'unassigned':
      return { assignedType: null, assignedTo: null }
    case 'user':
    case 'location':
    case 'asset':
      return { assignedType: target.kind, assignedTo: target.id }
    default:
      return assertNever(target)
  }
}

/**
 * Read the channel columns of a seat.
 *
 * Both channels set at once breaks the single-channel rule and is treated
 * like a half-written asset assignment.
 */
export function seatTargetOf(
  seat: Pick<LicenseSeat, 'id' | 'assignedToUser' | 'assetId'>,
): AssignmentTarget {
  const { assignedToUser, assetId } = seat
  if (assignedToUser !== null && assetId !== null) {
    throw new Error(`Seat ${seat.id} is assigned to user ${assignedToUser} and asset ${assetId} at once`)
  }
  if (assignedToUser !== null) return { kind: 'user', id: assignedToUser }
  if (assetId !== null) return { kind: 'asset', id: assetId }
  return UNASSIGNED
}

/** Channel values for a seat assignment; at most one is non-null. */
export function seatAssignmentColumns(target: SeatTarget | { kind: 'unassigned' }): Pick<LicenseSeat, 'assignedToUser' | 'assetId'> {
  switch (target.kind) {
    case 'unassigned':
      return { assignedToUser: null, assetId: null }
    case 'user':
      return { assignedToUser: target.id, assetId: null }
    case 'asset':
      return { assignedToUser: null, assetId: target.id }
    default:
      return assertNever(target)
  }
}

/**
 * Validate a raw `{ kind, id }` pair handed in by a caller.
 *
 * `allowed` restricts the kinds; seat operations pass `['user', 'asset']`.
 */
export function parseAssignmentTarget(
  input: { kind?: unknown; id?: unknown } | null | undefined,
  allowed: readonly TargetKind[] = TARGET_KINDS,
): Result<AssignedTarget, ValidationError> {
  if (!input || input.kind === undefined || input.kind === null) {
    return err({ code: 'VALIDATION_ERROR', field: 'target.kind', message: 'A target kind is required.' })
  }
  if (input.kind === 'unassigned') {
    return err({ code: 'VALIDATION_ERROR', field: 'target.kind', message: 'A concrete target is required; release the entity to unassign it.' })
  }
  if (!isTargetKind(input.kind)) {
    return err({ code: 'VALIDATION_ERROR', field: 'target.kind', message: `Unknown target kind "${String(input.kind)}".` })
  }
  if (!allowed.includes(input.kind)) {
    return err({
      code: 'VALIDATION_ERROR',
      field: 'target.kind',
      message: `Target kind "${input.kind}" is not allowed here (expected ${allowed.join(' or ')}).`,
    })
  }
  const { id } = input
  if (!isRowId(id)) {
    return err({ code: 'VALIDATION_ERROR', field: 'target.id', message: `A target id between 1 and ${MAX_ID} is required.` })
  }
  const target: AssignedTarget = { kind: input.kind, id }
  return ok(target)
}

/** `parseAssignmentTarget` narrowed to the kinds a seat accepts. */
export function parseSeatTarget(
  input: { kind?: unknown; id?: unknown } | null | undefined,
): Result<SeatTarget, ValidationError> {
  const parsed = parseAssignmentTarget(input, SEAT_TARGET_KINDS)
  if (!parsed.ok) return parsed
  const target = parsed.value
  if (target.kind === 'location') {
    return err({ code: 'VALIDATION_ERROR', field: 'target.kind', message: 'Seats cannot be assigned to a location.' })
  }
  return ok(target)
}
