import { z } from 'zod'

/** Largest value of an int4 column; every id in the inventory is one. */
export const MAX_ID = 2_147_483_647

/** Upper bound on a license's declared seats. */
export const MAX_LICENSE_SEATS = 10_000

/** Upper bound on an accessory's stock quantity. */
export const MAX_ACCESSORY_QUANTITY = 100_000

// Common schemas
export const idSchema = z.coerce.number().int().positive().max(MAX_ID)

export const paginationSchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  perPage: z.coerce.number().int().min(1).max(100).default(20),
})

/** Accepts ISO strings and Date instances; a bare `YYYY-MM-DD` is read as UTC midnight. */
export const dateInputSchema = z.coerce.date()

const optionalRef = idSchema.nullable().optional()

// Assignment
export const assignmentTargetKindSchema = z.enum(['user', 'location', 'asset'])

export const assignmentTargetSchema = z.object({
  kind: assignmentTargetKindSchema,
  id: idSchema,
})

export const checkoutSchema = z.object({
  target: assignmentTargetSchema,
  assignedAt: dateInputSchema.optional(),
  expectedCheckin: dateInputSchema.nullable().optional(),
})

export const seatCheckoutSchema = checkoutSchema.omit({ expectedCheckin: true })

export const assetCheckinSchema = z.object({
  statusId: idSchema.optional(),
  locationId: idSchema.optional(),
  releasedAt: dateInputSchema.optional(),
})

// Asset
export const createAssetSchema = z.object({
  tag: z.string().trim().min(1).max(100),
  serial: z.string().trim().max(100).nullable().optional(),
  name: z.string().trim().max(255).nullable().optional(),
  modelId: optionalRef,
  statusId: optionalRef,
  companyId: optionalRef,
  locationId: optionalRef,
  defaultLocationId: optionalRef,
  supplierId: optionalRef,
  orderNumber: z.string().trim().max(50).nullable().optional(),
  purchaseDate: dateInputSchema.nullable().optional(),
  purchaseCost: z.string().regex(/^\d+(\.\d{1,2})?$/).nullable().optional(),
  warrantyMonths: z.number().int().min(0).max(1200).nullable().optional(),
  notes: z.string().nullable().optional(),
})

export const updateAssetSchema = createAssetSchema.partial()

export const listAssetsQuerySchema = paginationSchema.extend({
  search: z.string().optional(),
  assigned: z.enum(['true', 'false']).optional(),
})

// License
export const createLicenseSchema = z.object({
  name: z.string().trim().min(1).max(120),
  serial: z.string().nullable().optional(),
  licenseName: z.string().max(120).nullable().optional(),
  licenseEmail: z.string().email().max(120).nullable().optional(),
  seats: z.number().int().min(0).max(MAX_LICENSE_SEATS),
  reassignable: z.boolean().default(true),
  categoryId: optionalRef,
  manufacturerId: optionalRef,
  supplierId: optionalRef,
  companyId: optionalRef,
  orderNumber: z.string().max(50).nullable().optional(),
  purchaseCost: z.string().regex(/^\d+(\.\d{1,2})?$/).nullable().optional(),
  purchaseDate: dateInputSchema.nullable().optional(),
  expirationDate: dateInputSchema.nullable().optional(),
  notes: z.string().nullable().optional(),
})

export const updateLicenseSchema = createLicenseSchema.partial()

export const listLicensesQuerySchema = paginationSchema.extend({
  search: z.string().optional(),
})

export type CreateAssetInput = z.infer<typeof createAssetSchema>
export type UpdateAssetInput = z.infer<typeof updateAssetSchema>
export type CreateLicenseInput = z.infer<typeof createLicenseSchema>
export type UpdateLicenseInput = z.infer<typeof updateLicenseSchema>

// Accessory
export const createAccessorySchema = z.object({
  name: z.string().trim().min(1).max(100),
  companyId: optionalRef,
  categoryId: optionalRef,
  supplierId: optionalRef,
  manufacturerId: optionalRef,
  locationId: optionalRef,
  modelNumber: z.string().trim().max(100).nullable().optional(),
  orderNumber: z.string().trim().max(100).nullable().optional(),
  purchaseDate: dateInputSchema.nullable().optional(),
  purchaseCost: z.string().regex(/^\d+(\.\d{1,2})?$/).nullable().optional(),
  qty: z.number().int().min(0).max(MAX_ACCESSORY_QUANTITY),
  minAmt: z.number().int().min(0).max(MAX_ACCESSORY_QUANTITY).nullable().optional(),
  notes: z.string().nullable().optional(),
})

export const updateAccessorySchema = createAccessorySchema.partial()

export const listAccessoriesQuerySchema = paginationSchema.extend({
  search: z.string().optional(),
})

export const accessoryCheckoutSchema = z.object({
  userId: idSchema,
  note: z.string().max(1000).nullable().optional(),
  assignedAt: dateInputSchema.optional(),
})

export type CreateAccessoryInput = z.infer<typeof createAccessorySchema>
export type UpdateAccessoryInput = z.infer<typeof updateAccessorySchema>

// Assignment field controller
export const assignmentScopeSchema = z.enum(['asset', 'seat'])

export const assignmentFieldsQuerySchema = z.object({
  scope: assignmentScopeSchema.default('asset'),
})

// API Response schemas
export const apiResponseSchema = <T>(dataSchema: z.ZodType<T>) =>
  z.object({
    success: z.boolean(),
    data: dataSchema.optional(),
    error: z.object({
      code: z.string(),
      message: z.string(),
      details: z.unknown().optional(),
    }).optional(),
  })

export const listResponseSchema = <T>(itemSchema: z.ZodType<T>) =>
  z.object({
    data: z.array(itemSchema),
    pagination: z.object({
      page: z.number(),
      perPage: z.number(),
      total: z.number(),
      hasMore: z.boolean(),
    }),
  })
