/**
 * Audit ledger.
 *
 * Not a service of its own: every mutating repository call spreads one of
 * these stamps into the row it writes.
 */

export type ActorId = string

export type Clock = () => Date

export const systemClock: Clock = () => new Date()

export type CreatedStamp = {
  createdAt: Date
  updatedAt: Date
  createdBy: ActorId
  updatedBy: ActorId
}

export type UpdatedStamp = {
  updatedAt: Date
  updatedBy: ActorId
}

export type DeletedStamp = UpdatedStamp & {
  deletedAt: Date
  deletedBy: ActorId
}

export type AuditLedger = {
  now(): Date
  stampCreated(actor: ActorId): CreatedStamp
  stampUpdated(actor: ActorId): UpdatedStamp
  stampDeleted(actor: ActorId): DeletedStamp
}

export function createAuditLedger(clock: Clock = systemClock): AuditLedger {
  return {
    now: () => clock(),
    stampCreated(actor) {
      const at = clock()
      return { createdAt: at, updatedAt: at, createdBy: actor, updatedBy: actor }
    },
    stampUpdated(actor) {
      return { updatedAt: clock(), updatedBy: actor }
    },
    stampDeleted(actor) {
      const at = clock()
      return { updatedAt: at, updatedBy: actor, deletedAt: at, deletedBy: actor }
    },
  }
}

/** Soft-delete predicate: a row is active while `deletedAt` is null. */
export function isActive(row: { deletedAt: Date | null }): boolean {
  return row.deletedAt === null
}

/** Acting-user ids are opaque, but an empty one is a caller bug. */
export function normalizeActor(actor: string): ActorId | null {
  const trimmed = actor.trim()
  return trimmed.length > 0 && trimmed.length <= 191 ? trimmed : null
}
