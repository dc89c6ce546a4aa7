import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { MigrationBuilder } from 'node-pg-migrate'

import {
  apiPathsGeographyAssociationArgs,
  apiPathsVariablesAssociationArgs,
  down,
  up,
} from '../../migrations/1760918640000_create-association-tables.js'

describe('Migration 1760918640000 - Create Association Tables', () => {
  let mockPgm: MigrationBuilder
  let createTableSpy: ReturnType<typeof vi.fn>
  let addConstraintSpy: ReturnType<typeof vi.fn>
  let createIndexSpy: ReturnType<typeof vi.fn>
  let dropTableSpy: ReturnType<typeof vi.fn>

  beforeEach(() => {
    createTableSpy = vi.fn()
    addConstraintSpy = vi.fn()
    createIndexSpy = vi.fn()
    dropTableSpy = vi.fn()

    mockPgm = {
      createTable: createTableSpy,
      addConstraint: addConstraintSpy,
      createIndex: createIndexSpy,
      dropTable: dropTableSpy,
    } as Partial<MigrationBuilder> as MigrationBuilder
  })

  afterEach(() => {
    vi.clearAllMocks()
  })

  describe('up', () => {
    beforeEach(async () => {
      await up(mockPgm)
    })

    it('creates both association tables', () => {
      expect(createTableSpy).toHaveBeenCalledWith(
        'api_paths_variables_association',
        apiPathsVariablesAssociationArgs,
      )
      expect(createTableSpy).toHaveBeenCalledWith(
        'api_paths_geography_association',
        apiPathsGeographyAssociationArgs,
      )
    })

    it('references the joined tables', () => {
      expect(apiPathsVariablesAssociationArgs.variables_id.references).toBe(
        'variables(id)',
      )
      expect(apiPathsGeographyAssociationArgs.geography_id.references).toBe(
        'geography(id)',
      )
    })

    it('makes each pair unique', () => {
      expect(addConstraintSpy).toHaveBeenCalledWith(
        'api_paths_variables_association',
        'api_paths_variables_association_unique',
        'UNIQUE(api_paths_id, variables_id)',
      )
      expect(addConstraintSpy).toHaveBeenCalledWith(
        'api_paths_geography_association',
        'api_paths_geography_association_unique',
        'UNIQUE(api_paths_id, geography_id)',
      )
    })
  })

  describe('down', () => {
    it('drops the association tables', async () => {
      await down(mockPgm)

      expect(dropTableSpy).toHaveBeenNthCalledWith(
        1,
        'api_paths_geography_association',
      )
      expect(dropTableSpy).toHaveBeenNthCalledWith(
        2,
        'api_paths_variables_association',
      )
    })
  })
})
