/**
 * Field rules for assignment forms.
 *
 * A checkout form has one kind selector and one input per target kind. For
 * the selected kind exactly one input is enabled and required; the others
 * are disabled and cleared. The rules are re-derived from the kind on every
 * change and never stored.
 */

import type { AssignedTarget, TargetKind } from './assignment-target.js'
import { err, ok, type Result, type ValidationError } from './inventory-errors.js'

export type AssignmentField = TargetKind

/** Assets accept every kind; seats cannot go to a location. */
export type AssignmentScope = 'asset' | 'seat'

export type FieldRules = {
  enabled: readonly AssignmentField[]
  required: readonly AssignmentField[]
  /** Fields whose value must be dropped. */
  cleared: readonly AssignmentField[]
}

export type AssignmentFormState = {
  kind: TargetKind | null
  user: number | null
  location: number | null
  asset: number | null
}

const SCOPE_FIELDS: Record<AssignmentScope, readonly AssignmentField[]> = {
  asset: ['user', 'location', 'asset'],
  seat: ['user', 'asset'],
}

export function fieldsForScope(scope: AssignmentScope): readonly AssignmentField[] {
  return SCOPE_FIELDS[scope]
}

export function fieldsFor(kind: TargetKind | null, scope: AssignmentScope = 'asset'): FieldRules {
  const fields = SCOPE_FIELDS[scope]
  const active = kind !== null && fields.includes(kind) ? kind : null
  if (active === null) {
    return { enabled: [], required: [], cleared: fields }
  }
  return {
    enabled: [active],
    required: [active],
    cleared: fields.filter((field) => field !== active),
  }
}

export const EMPTY_FORM: AssignmentFormState = { kind: null, user: null, location: null, asset: null }

/** New form state after the kind selector changed. */
export function applyKindChange(
  state: AssignmentFormState,
  kind: TargetKind | null,
  scope: AssignmentScope = 'asset',
): AssignmentFormState {
  const next: AssignmentFormState = { ...state, kind }
  for (const field of fieldsFor(kind, scope).cleared) {
    next[field] = null
  }
  // Fields outside the scope never carry a value.
  for (const field of SCOPE_FIELDS.asset) {
    if (!SCOPE_FIELDS[scope].includes(field)) next[field] = null
  }
  return next
}

/**
 * Turn a submitted form into a target.
 *
 * Rejects a missing kind, a missing value for the required field and any
 * value left in a disabled field, so two channels can never be submitted
 * together.
 */
export function targetFromForm(
  state: AssignmentFormState,
  scope: AssignmentScope = 'asset',
): Result<AssignedTarget, ValidationError> {
  const { kind } = state
  if (kind === null) {
    return err({ code: 'VALIDATION_ERROR', field: 'kind', message: 'Choose what to assign to.' })
  }
  const rules = fieldsFor(kind, scope)
  if (rules.required.length === 0) {
    return err({ code: 'VALIDATION_ERROR', field: 'kind', message: `"${kind}" is not available here.` })
  }
  for (const field of SCOPE_FIELDS.asset) {
    if (!rules.enabled.includes(field) && state[field] !== null) {
      return err({ code: 'VALIDATION_ERROR', field, message: `${field} must be empty when assigning to a ${kind}.` })
    }
  }
  const id = state[kind]
  if (id === null) {
    return err({ code: 'VALIDATION_ERROR', field: kind, message: `Choose the ${kind} to assign to.` })
  }
  const target: AssignedTarget = { kind, id }
  return ok(target)
}
