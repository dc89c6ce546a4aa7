import { describe, expect, it } from 'vitest'

import { ConfigError } from '../../src/errors/census-metadata.errors.js'
import {
  DEFAULT_DATABASE_URL,
  DEFAULT_VARIABLES_LINK_PATTERN,
  loadIngestConfig,
} from '../../src/schema/ingest-config.schema.js'

describe('Ingest Config Schema', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadIngestConfig({})).toEqual({
      DATABASE_URL: DEFAULT_DATABASE_URL,
      CENSUS_CATALOG_URL: 'https://api.census.gov/data.json',
      CENSUS_CACHE_DIR: '.',
      FETCH_TIMEOUT_MS: 30000,
      INGEST_BATCH_SIZE: 5000,
      VARIABLES_LINK_PATTERN: DEFAULT_VARIABLES_LINK_PATTERN,
    })
  })

  it('coerces numeric strings', () => {
    const config = loadIngestConfig({
      FETCH_TIMEOUT_MS: '1000',
      INGEST_BATCH_SIZE: '250',
    })

    expect(config.FETCH_TIMEOUT_MS).toBe(1000)
    expect(config.INGEST_BATCH_SIZE).toBe(250)
  })

  it('ignores unrelated variables', () => {
    expect(loadIngestConfig({ HOME: '/home/test' })).not.toHaveProperty('HOME')
  })

  it('rejects a non-positive batch size', () => {
    expect(() => loadIngestConfig({ INGEST_BATCH_SIZE: '0' })).toThrow(
      ConfigError,
    )
    expect(() => loadIngestConfig({ INGEST_BATCH_SIZE: '0' })).toThrow(
      /^Invalid ingestion configuration: INGEST_BATCH_SIZE: /,
    )
  })

  it('rejects an invalid catalog URL', () => {
    expect(() => loadIngestConfig({ CENSUS_CATALOG_URL: 'not a url' })).toThrow(
      /^Invalid ingestion configuration: CENSUS_CATALOG_URL: /,
    )
  })

  describe('DEFAULT_VARIABLES_LINK_PATTERN', () => {
    const pattern = new RegExp(DEFAULT_VARIABLES_LINK_PATTERN)

    it('matches ACS variables documents', () => {
      expect(
        pattern.test('http://api.census.gov/data/2020/acs/acs5/variables.json'),
      ).toBe(true)
      expect(
        pattern.test('https://api.census.gov/data/2019/acs/acs1/variables.json'),
      ).toBe(true)
    })

    it('does not match other datasets', () => {
      expect(
        pattern.test(
          'http://api.census.gov/data/2020/dec/pl/variables.json',
        ),
      ).toBe(false)
      expect(
        pattern.test(
          'http://api.census.gov/data/2020/acs/acs5/subject/variables.json',
        ),
      ).toBe(false)
    })
  })
})
