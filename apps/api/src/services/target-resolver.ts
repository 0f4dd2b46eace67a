import { assertNever, type AssignmentTarget } from './assignment-target.js'
import type { TargetLookups } from './inventory-store.js'

export type TargetResolver = {
  /**
   * Display label of whatever `target` points at.
   *
   * `null` for Unassigned and for ids that no longer resolve (deleted or
   * missing rows); callers render those blank.
   */
  describe(target: AssignmentTarget): Promise<string | null>
}

export function createTargetResolver(lookups: TargetLookups): TargetResolver {
  return {
    async describe(target) {
      switch (target.kind) {
        case 'unassigned':
          return null
        case 'user':
          return lookups.users.nameOf(target.id)
        case 'location':
          return lookups.locations.nameOf(target.id)
        case 'asset':
          return lookups.assets.describe(target.id)
        default:
          return assertNever(target)
      }
    },
  }
}

/** `TAG - name [model]`, leaving out whatever is missing. */
export function composeAssetDescription(parts: {
  tag: string
  name: string | null
  modelName: string | null
}): string {
  const name = parts.name?.trim()
  const model = parts.modelName?.trim()
  let label = name ? `${parts.tag} - ${name}` : parts.tag
  if (model) label += ` [${model}]`
  return label
}

/** Users without a display name fall back to their username. */
export function userDisplayName(user: { name: string; username: string }): string {
  return user.name.trim() || user.username
}
