import { ClientBase, Pool, PoolClient, QueryResultRow } from 'pg'

import {
  CensusMetadataError,
  PersistenceError,
} from '../errors/census-metadata.errors.js'
import {
  chunk,
  MAX_BIND_PARAMETERS,
  safeBatchSize,
} from '../helpers/batch.helper.js'
import {
  assertIdentifier,
  quoteColumns,
  rowValues,
  valuesPlaceholders,
} from '../helpers/sql.helper.js'
import { getUniqueConstraints } from '../helpers/unique-constraints.helper.js'
import type { ApiPathRecord, ApiPathRow } from '../schema/api-path.schema.js'
import type { GeographyRecord } from '../schema/geography.schema.js'
import type { VariableRecord } from '../schema/variable.schema.js'

export const VARIABLE_COLUMNS = [
  'name',
  'label',
  'concept',
  'required',
  'predicate_type',
  'group',
  'limit',
  'predicate_only',
  'attributes',
] as const satisfies ReadonlyArray<keyof VariableRecord>

export const GEOGRAPHY_COLUMNS = [
  'name',
  'geo_level_display',
  'reference_date',
  'requires',
  'wildcard',
  'limit',
  'geo_level_id',
  'optional_with_wildcard_for',
] as const satisfies ReadonlyArray<keyof GeographyRecord>

export const API_PATH_COLUMNS = [
  'c_vintage',
  'c_dataset',
  'c_geography_link',
  'c_variables_link',
  'title',
  'description',
] as const satisfies ReadonlyArray<keyof ApiPathRecord>

/**
 * Writes performed on behalf of one API path. Every call made through one
 * instance belongs to the same database transaction.
 */
export interface CensusStoreTransaction {
  /**
   * Upserts `records` keyed by `uniqueConstraintName` and returns one id per
   * record, whether the row was inserted or already existed.
   */
  insertOrGetVariableIds(
    records: readonly VariableRecord[],
    uniqueConstraintName: string,
  ): Promise<number[]>
  /** Associates variables with the API path; existing links are kept. */
  linkApiPathVariables(
    apiPathId: number,
    variableIds: readonly number[],
  ): Promise<void>
  /**
   * Deletes the API path's geography rows and their associations, then
   * inserts and associates `records`. Returns the new geography ids.
   */
  replaceApiPathGeography(
    apiPathId: number,
    records: readonly GeographyRecord[],
    batchSize: number,
  ): Promise<number[]>
}

export interface CensusStore {
  transaction<T>(
    callback: (tx: CensusStoreTransaction) => Promise<T>,
  ): Promise<T>
  countApiPaths(): Promise<number>
  /** Inserts catalog entries, skipping ones already stored. */
  insertApiPaths(
    records: readonly ApiPathRecord[],
    batchSize: number,
  ): Promise<number>
  /** API paths whose variables link matches a PostgreSQL regex. */
  findApiPathsByVariablesLink(pattern: string): Promise<ApiPathRow[]>
  getUniqueConstraints(tableName: string): Promise<string[]>
  close(): Promise<void>
}

type QueryClient = Pick<ClientBase, 'query'>

type ApiPathQueryRow = Omit<ApiPathRow, 'id'> & { id: number | string }

async function runQuery<R extends QueryResultRow>(
  client: QueryClient,
  description: string,
  text: string,
  values?: unknown[],
) {
  try {
    return await client.query<R>(text, values)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new PersistenceError(`Failed to ${description}: ${reason}`, {
      cause: error,
    })
  }
}

function toId(value: number | string): number {
  const id = Number(value)
  if (!Number.isSafeInteger(id)) {
    throw new PersistenceError(`Database returned an invalid id: ${value}`)
  }
  return id
}

export class PostgresCensusTransaction implements CensusStoreTransaction {
  constructor(private readonly client: QueryClient) {}

  async insertOrGetVariableIds(
    records: readonly VariableRecord[],
    uniqueConstraintName: string,
  ): Promise<number[]> {
    if (!records.length) return []

    const constraint = assertIdentifier(uniqueConstraintName, 'constraint')
    const parameterCount = records.length * VARIABLE_COLUMNS.length
    if (parameterCount > MAX_BIND_PARAMETERS) {
      throw new PersistenceError(
        `Cannot insert ${records.length} variables in one statement (${parameterCount} parameters); split them into smaller batches`,
      )
    }

    // The no-op update lets RETURNING report the id of rows that already
    // exist; DO NOTHING would return no row for them.
    const query = `
      INSERT INTO variables (${quoteColumns(VARIABLE_COLUMNS)})
      VALUES ${valuesPlaceholders(records.length, VARIABLE_COLUMNS.length)}
      ON CONFLICT ON CONSTRAINT ${constraint}
      DO UPDATE SET name = EXCLUDED.name
      RETURNING id
    `

    const result = await runQuery<{ id: number | string }>(
      this.client,
      'upsert variables',
      query,
      rowValues(records, VARIABLE_COLUMNS),
    )

    return result.rows.map((row) => toId(row.id))
  }

  async linkApiPathVariables(
    apiPathId: number,
    variableIds: readonly number[],
  ): Promise<void> {
    if (!variableIds.length) return

    await runQuery(
      this.client,
      'link variables to API path',
      `
        INSERT INTO api_paths_variables_association (api_paths_id, variables_id)
        SELECT $1, unnest($2::int[])
        ON CONFLICT (api_paths_id, variables_id) DO NOTHING
      `,
      [apiPathId, [...variableIds]],
    )
  }

  async replaceApiPathGeography(
    apiPathId: number,
    records: readonly GeographyRecord[],
    batchSize: number,
  ): Promise<number[]> {
    // Geography rows belong to a single API path, so the rows behind the old
    // associations can be removed with them.
    const deleted = await runQuery<{ geography_id: number | string }>(
      this.client,
      'delete geography associations',
      `DELETE FROM api_paths_geography_association WHERE api_paths_id = $1 RETURNING geography_id`,
      [apiPathId],
    )
    const staleIds = deleted.rows.map((row) => toId(row.geography_id))

    if (staleIds.length) {
      await runQuery(
        this.client,
        'delete stale geography',
        `DELETE FROM geography WHERE id = ANY($1::int[])`,
        [staleIds],
      )
    }

    const insertedIds: number[] = []
    const size = safeBatchSize(batchSize, GEOGRAPHY_COLUMNS.length)

    for (const batch of chunk(records, size)) {
      const result = await runQuery<{ id: number | string }>(
        this.client,
        'insert geography',
        `
          INSERT INTO geography (${quoteColumns(GEOGRAPHY_COLUMNS)})
          VALUES ${valuesPlaceholders(batch.length, GEOGRAPHY_COLUMNS.length)}
          RETURNING id
        `,
        rowValues(batch, GEOGRAPHY_COLUMNS),
      )
      insertedIds.push(...result.rows.map((row) => toId(row.id)))
    }

    if (insertedIds.length) {
      await runQuery(
        this.client,
        'link geography to API path',
        `
          INSERT INTO api_paths_geography_association (api_paths_id, geography_id)
          SELECT $1, unnest($2::int[])
        `,
        [apiPathId, insertedIds],
      )
    }

    return insertedIds
  }
}

export class PostgresCensusStore implements CensusStore {
  constructor(private readonly pool: Pick<Pool, 'connect' | 'end'>) {}

  async transaction<T>(
    callback: (tx: CensusStoreTransaction) => Promise<T>,
  ): Promise<T> {
    return this.inTransaction((client) =>
      callback(new PostgresCensusTransaction(client)),
    )
  }

  async countApiPaths(): Promise<number> {
    return this.withClient(async (client) => {
      const result = await runQuery<{ count: number | string }>(
        client,
        'count API paths',
        'SELECT COUNT(*) AS count FROM api_paths',
      )
      return Number(result.rows[0]?.count ?? 0)
    })
  }

  async insertApiPaths(
    records: readonly ApiPathRecord[],
    batchSize: number,
  ): Promise<number> {
    if (!records.length) return 0

    const size = safeBatchSize(batchSize, API_PATH_COLUMNS.length)
    const batches = chunk(records, size)

    return this.inTransaction(async (client) => {
      let inserted = 0

      for (const [index, batch] of batches.entries()) {
        console.log(
          `Inserting API paths batch ${index + 1}/${batches.length} (${batch.length} records)`,
        )
        const result = await runQuery(
          client,
          'insert API paths',
          `
            INSERT INTO api_paths (${quoteColumns(API_PATH_COLUMNS)})
            VALUES ${valuesPlaceholders(batch.length, API_PATH_COLUMNS.length)}
            ON CONFLICT DO NOTHING
          `,
          rowValues(batch, API_PATH_COLUMNS),
        )
        inserted += result.rowCount ?? 0
      }

      return inserted
    })
  }

  async findApiPathsByVariablesLink(pattern: string): Promise<ApiPathRow[]> {
    return this.withClient(async (client) => {
      const result = await runQuery<ApiPathQueryRow>(
        client,
        'select API paths',
        `
          SELECT id, ${quoteColumns(API_PATH_COLUMNS)}
          FROM api_paths
          WHERE c_variables_link ~ $1
          ORDER BY id
        `,
        [pattern],
      )
      return result.rows.map((row) => ({ ...row, id: toId(row.id) }))
    })
  }

  async getUniqueConstraints(tableName: string): Promise<string[]> {
    return this.withClient(async (client) => {
      try {
        return await getUniqueConstraints(client, tableName)
      } catch (error) {
        if (error instanceof CensusMetadataError) throw error

        const reason = error instanceof Error ? error.message : String(error)
        throw new PersistenceError(
          `Failed to read unique constraints of ${tableName}: ${reason}`,
          { cause: error },
        )
      }
    })
  }

  async close(): Promise<void> {
    await this.pool.end()
  }

  private async withClient<T>(
    callback: (
      client: PoolClient,
      discard: (reason: Error | true) => void,
    ) => Promise<T>,
  ): Promise<T> {
    let client: PoolClient
    try {
      client = await this.pool.connect()
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new PersistenceError(`Failed to connect to database: ${reason}`, {
        cause: error,
      })
    }

    // A truthy release argument makes the pool destroy the connection
    // instead of reusing it.
    let discardReason: Error | true | undefined
    try {
      return await callback(client, (reason) => {
        discardReason = reason
      })
    } finally {
      client.release(discardReason)
    }
  }

  private async inTransaction<T>(
    callback: (client: PoolClient) => Promise<T>,
  ): Promise<T> {
    return this.withClient(async (client, discard) => {
      await runQuery(client, 'begin transaction', 'BEGIN')
      try {
        const result = await callback(client)
        await runQuery(client, 'commit transaction', 'COMMIT')
        return result
      } catch (error) {
        try {
          await client.query('ROLLBACK')
        } catch (rollbackError) {
          console.error('Rollback failed:', rollbackError)
          discard(rollbackError instanceof Error ? rollbackError : true)
        }
        throw error
      }
    })
  }
}
