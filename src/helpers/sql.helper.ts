import { PersistenceError } from '../errors/census-metadata.errors.js'

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/

// Table and constraint names cannot be bound as parameters, so they are
// checked before being interpolated into a statement.
export function assertIdentifier(name: string, description: string): string {
  if (!IDENTIFIER.test(name)) {
    throw new PersistenceError(`Invalid ${description} name: '${name}'`)
  }
  return name
}

/**
 * Builds the `($1, $2), ($3, $4)` placeholder list of a multi-row INSERT.
 */
export function valuesPlaceholders(
  rowCount: number,
  columnCount: number,
  offset = 0,
): string {
  return Array.from({ length: rowCount }, (_, i) => {
    const row = Array.from(
      { length: columnCount },
      (_, j) => `$${offset + i * columnCount + j + 1}`,
    )
    return `(${row.join(', ')})`
  }).join(', ')
}

export function rowValues<Row, Column extends keyof Row>(
  rows: readonly Row[],
  columns: readonly Column[],
): Array<Row[Column]> {
  return rows.flatMap((row) => columns.map((column) => row[column]))
}

export function quoteColumns(columns: readonly string[]): string {
  return columns.map((column) => `"${column}"`).join(', ')
}
