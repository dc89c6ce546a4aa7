import path from 'path'
import { pathToFileURL } from 'url'

import { PersistenceError } from '../errors/census-metadata.errors.js'
import { createPool } from '../helpers/database.helper.js'
import { parseApiCatalog } from '../schema/api-path.schema.js'
import {
  type IngestConfig,
  loadIngestConfig,
} from '../schema/ingest-config.schema.js'
import {
  CachedClient,
  type MetadataFetcher,
} from '../services/cached-client.service.js'
import {
  type CensusStore,
  PostgresCensusStore,
} from '../services/census-store.service.js'
import {
  type IngestSummary,
  MetadataIngestor,
} from '../services/metadata-ingestor.service.js'

export interface IngestionDependencies {
  store: CensusStore
  fetcher: MetadataFetcher
}

export function createDependencies(
  config: IngestConfig,
): IngestionDependencies {
  return {
    store: new PostgresCensusStore(createPool(config.DATABASE_URL)),
    fetcher: new CachedClient(path.resolve(config.CENSUS_CACHE_DIR), {
      timeoutMs: config.FETCH_TIMEOUT_MS,
    }),
  }
}

/**
 * Populates `api_paths` from the dataset catalog when the table is empty.
 * Returns the number of inserted rows.
 */
export async function loadApiCatalog(
  { store, fetcher }: IngestionDependencies,
  config: Pick<IngestConfig, 'CENSUS_CATALOG_URL' | 'INGEST_BATCH_SIZE'>,
): Promise<number> {
  const existing = await store.countApiPaths()
  if (existing > 0) {
    console.warn(`Found ${existing} API paths, skipping catalog load`)
    return 0
  }

  const catalog = parseApiCatalog(await fetcher.fetch(config.CENSUS_CATALOG_URL))
  const inserted = await store.insertApiPaths(catalog, config.INGEST_BATCH_SIZE)

  console.log(`Inserted ${inserted} of ${catalog.length} API paths`)
  return inserted
}

export async function resolveVariablesConstraint(
  store: Pick<CensusStore, 'getUniqueConstraints'>,
): Promise<string> {
  const constraints = await store.getUniqueConstraints('variables')

  if (constraints.length !== 1) {
    throw new PersistenceError(
      `Expected exactly one unique constraint on variables, found ${constraints.length}: [${constraints.join(', ')}]`,
    )
  }

  return constraints[0]
}

export async function runIngestion(
  config: IngestConfig,
  dependencies: IngestionDependencies = createDependencies(config),
): Promise<IngestSummary[]> {
  const { store, fetcher } = dependencies

  try {
    await loadApiCatalog(dependencies, config)

    const variablesUniqueConstraint = await resolveVariablesConstraint(store)
    const apiPaths = await store.findApiPathsByVariablesLink(
      config.VARIABLES_LINK_PATTERN,
    )
    console.log(`Found ${apiPaths.length} API paths to ingest`)

    const ingestor = new MetadataIngestor(fetcher, store, {
      variablesUniqueConstraint,
      batchSize: config.INGEST_BATCH_SIZE,
    })

    const summaries: IngestSummary[] = []
    for (const [index, apiPath] of apiPaths.entries()) {
      console.log(
        `\n--- Ingesting ${apiPath.title} (${index + 1}/${apiPaths.length}) ---`,
      )
      summaries.push(await ingestor.ingest(apiPath))
    }

    return summaries
  } finally {
    await store.close()
  }
}

export async function main(
  runIngestionFunction: (
    config: IngestConfig,
  ) => Promise<IngestSummary[]> = runIngestion,
): Promise<void> {
  console.log('Starting census metadata ingestion...')

  try {
    const summaries = await runIngestionFunction(loadIngestConfig())
    console.log(`Ingestion completed for ${summaries.length} API paths`)
  } catch (error) {
    console.error(
      'Ingestion failed:',
      error instanceof Error ? error.message : String(error),
    )
    process.exit(1)
  }
}

// ES module equivalent of "if (require.main === module)"
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  await main()
}
