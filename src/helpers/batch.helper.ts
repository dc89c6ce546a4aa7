// PostgreSQL rejects statements with more bind parameters than this.
export const MAX_BIND_PARAMETERS = 65535

/**
 * Largest row count that fits one multi-row INSERT of `columnCount` columns,
 * never more than `requested`.
 */
export function safeBatchSize(requested: number, columnCount: number): number {
  if (!Number.isInteger(requested) || requested < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${requested}`)
  }
  if (!Number.isInteger(columnCount) || columnCount < 1) {
    throw new RangeError(`Column count must be a positive integer, got ${columnCount}`)
  }

  return Math.min(requested, Math.floor(MAX_BIND_PARAMETERS / columnCount))
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`)
  }

  const chunks: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size))
  }
  return chunks
}
