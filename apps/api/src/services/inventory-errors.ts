/**
 * Result and error vocabulary of the inventory engine.
 *
 * Business-rule violations come back as `Result` values and never throw.
 * Anything thrown out of a store is infrastructure trouble and arrives as an
 * `InfrastructureError`.
 */

import type { AssignmentTarget } from './assignment-target.js'

export type Ok<T> = { ok: true; value: T }
export type Err<E> = { ok: false; error: E }
export type Result<T, E> = Ok<T> | Err<E>

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value }
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error }
}

export type InventoryEntity =
  | 'asset'
  | 'license'
  | 'seat'
  | 'accessory'
  | 'accessory-checkout'
  | 'user'
  | 'location'
  | 'status'

export type ValidationError = {
  code: 'VALIDATION_ERROR'
  field: string
  message: string
}

export type NotFoundError = {
  code: 'NOT_FOUND'
  entity: InventoryEntity
  id: number
}

export type AlreadyAssignedError = {
  code: 'ALREADY_ASSIGNED'
  entity: 'asset' | 'seat'
  id: number
  current: AssignmentTarget
}

export type AlreadyUnassignedError = {
  code: 'ALREADY_UNASSIGNED'
  entity: 'asset' | 'seat'
  id: number
}

export type InsufficientAvailableSeatsError = {
  code: 'INSUFFICIENT_AVAILABLE_SEATS'
  licenseId: number
  required: number
  available: number
  currentlyAssigned: number
}

export type NotReassignableError = {
  code: 'NOT_REASSIGNABLE'
  licenseId: number
  seatId: number
}

export type NoAvailableSeatsError = {
  code: 'NO_AVAILABLE_SEATS'
  licenseId: number
}

export type LicenseHasAssignedSeatsError = {
  code: 'LICENSE_HAS_ASSIGNED_SEATS'
  licenseId: number
  assigned: number
}

export type DuplicateTagError = {
  code: 'DUPLICATE_TAG'
  tag: string
  existingAssetId: number
}

export type NoAvailableQuantityError = {
  code: 'NO_AVAILABLE_QUANTITY'
  accessoryId: number
  qty: number
  assigned: number
}

export type AccessoryHasCheckoutsError = {
  code: 'ACCESSORY_HAS_CHECKOUTS'
  accessoryId: number
  assigned: number
}

export type SeatReconcileError = ValidationError | NotFoundError | InsufficientAvailableSeatsError

export type AssignError = ValidationError | NotFoundError | AlreadyAssignedError | NoAvailableSeatsError

export type ReleaseError = ValidationError | NotFoundError | AlreadyUnassignedError | NotReassignableError

export type AccessoryCheckoutError = ValidationError | NotFoundError | NoAvailableQuantityError

export type InventoryError =
  | ValidationError
  | NotFoundError
  | AlreadyAssignedError
  | AlreadyUnassignedError
  | InsufficientAvailableSeatsError
  | NotReassignableError
  | NoAvailableSeatsError
  | LicenseHasAssignedSeatsError
  | DuplicateTagError
  | NoAvailableQuantityError
  | AccessoryHasCheckoutsError

export function validationError(field: string, message: string): Err<ValidationError> {
  return err({ code: 'VALIDATION_ERROR', field, message })
}

export function notFound(entity: InventoryEntity, id: number): Err<NotFoundError> {
  return err({ code: 'NOT_FOUND', entity, id })
}

/**
 * Thrown when the backing store fails (connectivity, constraint violation,
 * driver error). The unit of work it escaped from has been rolled back.
 */
export class InfrastructureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'InfrastructureError'
  }
}

/** Human-readable one-liner for an inventory error. */
export function describeInventoryError(error: InventoryError): string {
  switch (error.code) {
    case 'VALIDATION_ERROR':
      return `${error.field}: ${error.message}`
    case 'NOT_FOUND':
      return `${error.entity} ${error.id} was not found.`
    case 'ALREADY_ASSIGNED':
      return `${error.entity} ${error.id} is already assigned.`
    case 'ALREADY_UNASSIGNED':
      return `${error.entity} ${error.id} is not assigned.`
    case 'INSUFFICIENT_AVAILABLE_SEATS':
      return `Cannot remove ${error.required} seat(s) from license ${error.licenseId}: only ${error.available} available.`
    case 'NOT_REASSIGNABLE':
      return `License ${error.licenseId} does not allow its seats to be released.`
    case 'NO_AVAILABLE_SEATS':
      return `License ${error.licenseId} has no available seat.`
    case 'LICENSE_HAS_ASSIGNED_SEATS':
      return `License ${error.licenseId} still has ${error.assigned} assigned seat(s).`
    case 'DUPLICATE_TAG':
      return `Tag ${error.tag} is already used by asset ${error.existingAssetId}.`
    case 'NO_AVAILABLE_QUANTITY':
      return `Accessory ${error.accessoryId} has no unit left (${error.assigned} of ${error.qty} checked out).`
    case 'ACCESSORY_HAS_CHECKOUTS':
      return `Accessory ${error.accessoryId} still has ${error.assigned} unit(s) checked out.`
  }
}
