import { MAX_ID } from '@assetdesk/schema'
import { isRowId } from './assignment-target.js'
import { validationError, ok, type Result, type ValidationError } from './inventory-errors.js'
import type { InventoryUnitOfWork, ReferenceEntity } from './inventory-store.js'

/** `[field name, entity, id]`; null and undefined ids are skipped. */
export type ReferenceCheck = [field: string, entity: ReferenceEntity, id: number | null | undefined]

/** Ids handed in by a caller must fit an id column before a query sees them. */
export function checkRowIds(ids: Record<string, number | null | undefined>): Result<void, ValidationError> {
  for (const [field, id] of Object.entries(ids)) {
    if (id === null || id === undefined) continue
    if (!isRowId(id)) return validationError(field, `Expected an id between 1 and ${MAX_ID}.`)
  }
  return ok(undefined)
}

/** First dangling foreign key among `checks`, as a validation error. */
export async function checkReferences(
  uow: InventoryUnitOfWork,
  checks: ReferenceCheck[],
): Promise<Result<void, ValidationError>> {
  for (const [field, entity, id] of checks) {
    if (id === null || id === undefined) continue
    const inRange = checkRowIds({ [field]: id })
    if (!inRange.ok) return inRange
    if (!(await uow.references.exists(entity, id))) {
      return validationError(field, `${entity} ${id} does not exist.`)
    }
  }
  return ok(undefined)
}
