import {
  IngestError,
  type IngestStage,
} from '../errors/census-metadata.errors.js'
import { chunk, safeBatchSize } from '../helpers/batch.helper.js'
import type { ApiPathRow } from '../schema/api-path.schema.js'
import { DEFAULT_BATCH_SIZE } from '../schema/ingest-config.schema.js'
import {
  type GeographyRecord,
  parseGeography,
} from '../schema/geography.schema.js'
import {
  parseVariables,
  type VariableRecord,
} from '../schema/variable.schema.js'
import type { MetadataFetcher } from './cached-client.service.js'
import {
  type CensusStore,
  type CensusStoreTransaction,
  VARIABLE_COLUMNS,
} from './census-store.service.js'

export type IngestTarget = Pick<
  ApiPathRow,
  'id' | 'c_variables_link' | 'c_geography_link'
>

export interface MetadataIngestorOptions {
  /** Unique constraint of `variables` that identifies an existing variable. */
  variablesUniqueConstraint: string
  /** Maximum rows per INSERT statement. */
  batchSize?: number
}

export interface IngestSummary {
  apiPathId: number
  variables: number
  geographies: number
}

/**
 * Loads the variables.json and geography.json of one API path and stores
 * them in a single transaction: either every row of the API path is written
 * or none is.
 */
export class MetadataIngestor {
  private readonly batchSize: number

  constructor(
    private readonly fetcher: MetadataFetcher,
    private readonly store: CensusStore,
    private readonly options: MetadataIngestorOptions,
  ) {
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE
  }

  async ingest(apiPath: IngestTarget): Promise<IngestSummary> {
    const [variables, geographies] = await Promise.all([
      this.loadDocument(
        apiPath,
        apiPath.c_variables_link,
        'fetch-variables',
        'parse-variables',
        parseVariables,
      ),
      this.loadDocument(
        apiPath,
        apiPath.c_geography_link,
        'fetch-geography',
        'parse-geography',
        parseGeography,
      ),
    ])

    console.log(
      `Parsed ${variables.length} variables and ${geographies.length} geographies for API path ${apiPath.id}`,
    )

    try {
      await this.store.transaction(async (tx) => {
        await this.persistVariables(tx, apiPath.id, variables)
        await tx.replaceApiPathGeography(
          apiPath.id,
          geographies,
          this.batchSize,
        )
      })
    } catch (error) {
      console.error(
        `Rolled back API path ${apiPath.id} (${apiPath.c_variables_link})`,
      )
      throw new IngestError(apiPath.id, 'persist', error)
    }

    console.log(`Stored metadata for API path ${apiPath.id}`)

    return {
      apiPathId: apiPath.id,
      variables: variables.length,
      geographies: geographies.length,
    }
  }

  private async persistVariables(
    tx: CensusStoreTransaction,
    apiPathId: number,
    variables: readonly VariableRecord[],
  ): Promise<void> {
    const batches = chunk(
      variables,
      safeBatchSize(this.batchSize, VARIABLE_COLUMNS.length),
    )

    for (const [index, batch] of batches.entries()) {
      if (batches.length > 1) {
        console.log(
          `Processing variables batch ${index + 1}/${batches.length} for API path ${apiPathId}`,
        )
      }

      const ids = await tx.insertOrGetVariableIds(
        batch,
        this.options.variablesUniqueConstraint,
      )
      await tx.linkApiPathVariables(apiPathId, ids)
    }
  }

  private async loadDocument<T extends VariableRecord | GeographyRecord>(
    apiPath: IngestTarget,
    url: string,
    fetchStage: IngestStage,
    parseStage: IngestStage,
    parse: (rawText: string) => T[],
  ): Promise<T[]> {
    let rawText: string
    try {
      rawText = await this.fetcher.fetch(url)
    } catch (error) {
      throw new IngestError(apiPath.id, fetchStage, error)
    }

    try {
      return parse(rawText)
    } catch (error) {
      throw new IngestError(apiPath.id, parseStage, error)
    }
  }
}
