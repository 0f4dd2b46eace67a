/**
 * Splits bulk writes so no single statement runs into PostgreSQL's limit of
 * 65535 bind parameters.
 */

/** Rows per statement; a seat row binds five parameters. */
export const WRITE_BATCH_SIZE = 1000

export function inBatches<T>(items: readonly T[], size: number = WRITE_BATCH_SIZE): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`)
  }
  const batches: T[][] = []
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size))
  }
  return batches
}
