import { describe, expect, it } from 'vitest'

import { DecodeError } from '../../src/errors/census-metadata.errors.js'
import { parseApiCatalog } from '../../src/schema/api-path.schema.js'

const acsDataset = {
  c_vintage: 2020,
  c_dataset: ['acs', 'acs5'],
  c_geographyLink: 'http://api.census.gov/data/2020/acs/acs5/geography.json',
  c_variablesLink: 'http://api.census.gov/data/2020/acs/acs5/variables.json',
  title: 'ACS 5-Year Detailed Tables',
  description: 'American Community Survey 5-year estimates',
  c_isAggregate: true,
}

const timeseriesDataset = {
  c_dataset: ['timeseries', 'eits', 'resconst'],
  c_geographyLink:
    'http://api.census.gov/data/timeseries/eits/resconst/geography.json',
  c_variablesLink:
    'http://api.census.gov/data/timeseries/eits/resconst/variables.json',
  title: 'Time Series Economic Indicators',
  description: 'New residential construction',
}

describe('API Path Schema', () => {
  describe('parseApiCatalog', () => {
    it('maps catalog entries to api_paths rows', () => {
      expect(
        parseApiCatalog(
          JSON.stringify({ dataset: [acsDataset, timeseriesDataset] }),
        ),
      ).toEqual([
        {
          c_vintage: 2020,
          c_dataset: ['acs', 'acs5'],
          c_geography_link:
            'http://api.census.gov/data/2020/acs/acs5/geography.json',
          c_variables_link:
            'http://api.census.gov/data/2020/acs/acs5/variables.json',
          title: 'ACS 5-Year Detailed Tables',
          description: 'American Community Survey 5-year estimates',
        },
        {
          c_vintage: null,
          c_dataset: ['timeseries', 'eits', 'resconst'],
          c_geography_link:
            'http://api.census.gov/data/timeseries/eits/resconst/geography.json',
          c_variables_link:
            'http://api.census.gov/data/timeseries/eits/resconst/variables.json',
          title: 'Time Series Economic Indicators',
          description: 'New residential construction',
        },
      ])
    })

    it('rejects an entry without a variables link', () => {
      const { c_variablesLink: _omitted, ...withoutLink } = acsDataset

      try {
        parseApiCatalog(JSON.stringify({ dataset: [withoutLink] }))
        expect.fail('parseApiCatalog should throw')
      } catch (error) {
        expect(error).toBeInstanceOf(DecodeError)
        if (error instanceof DecodeError) {
          expect(error.path).toEqual(['dataset', 0, 'c_variablesLink'])
        }
      }
    })

    it('rejects invalid JSON', () => {
      expect(() => parseApiCatalog('<html>')).toThrow(
        /^Failed to decode data\.json: invalid JSON/,
      )
    })
  })
})
