import { ClientBase } from 'pg'

import { assertIdentifier } from './sql.helper.js'

// Unique constraint names of `tableName`, as recorded in pg_constraint
// (contype 'u').
export async function getUniqueConstraints(
  client: Pick<ClientBase, 'query'>,
  tableName: string,
): Promise<string[]> {
  assertIdentifier(tableName, 'table')

  const result = await client.query<{ conname: string }>(
    `SELECT conname FROM pg_constraint WHERE conrelid = $1::regclass AND contype = 'u' ORDER BY conname`,
    [tableName],
  )

  return result.rows.map((row) => row.conname)
}
