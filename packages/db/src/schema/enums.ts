import { pgEnum } from 'drizzle-orm/pg-core'

/**
 * Central enum registry for the inventory schema.
 *
 * Add values only after the services understand them; never rename one in
 * place.
 */

/**
 * What an asset is assigned to.
 *
 * Stored in `assets.assigned_type`. A null column means unassigned, so there
 * is no `unassigned` member here.
 */
export const assignmentTargetKindEnum = pgEnum('assignment_target_kind', [
  'user',
  'location',
  'asset',
])

/** Category families; assets, licenses and accessories draw from separate lists. */
export const categoryTypeEnum = pgEnum('category_type', ['asset', 'license', 'accessory'])
