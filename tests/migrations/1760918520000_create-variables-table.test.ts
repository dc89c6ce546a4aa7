import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { MigrationBuilder } from 'node-pg-migrate'

import {
  addKeyColumnsSql,
  down,
  up,
  variablesArgs,
} from '../../migrations/1760918520000_create-variables-table.js'
import { normalizeSQL } from '../helpers/normalize-sql.js'

describe('Migration 1760918520000 - Create Variables Table', () => {
  let mockPgm: MigrationBuilder
  let createTableSpy: ReturnType<typeof vi.fn>
  let sqlSpy: ReturnType<typeof vi.fn>
  let addConstraintSpy: ReturnType<typeof vi.fn>
  let dropTableSpy: ReturnType<typeof vi.fn>

  beforeEach(() => {
    createTableSpy = vi.fn()
    sqlSpy = vi.fn()
    addConstraintSpy = vi.fn()
    dropTableSpy = vi.fn()

    mockPgm = {
      createTable: createTableSpy,
      sql: sqlSpy,
      addConstraint: addConstraintSpy,
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

    it('creates the variables table', () => {
      expect(createTableSpy).toHaveBeenCalledWith('variables', variablesArgs)
    })

    it('rejects empty names', () => {
      expect(variablesArgs.name).toEqual({
        type: 'text',
        notNull: true,
        check: "name <> ''",
      })
    })

    it('adds the generated key columns', () => {
      expect(sqlSpy).toHaveBeenCalledWith(addKeyColumnsSql)
      expect(normalizeSQL(addKeyColumnsSql)).toBe(
        'ALTER TABLE variables ' +
          `ADD COLUMN _first_group TEXT GENERATED ALWAYS AS (COALESCE("group"[1], '')) STORED, ` +
          `ADD COLUMN _concept_hash TEXT GENERATED ALWAYS AS (immutable_md5(COALESCE(concept, ''))) STORED, ` +
          `ADD COLUMN _attributes_hash TEXT GENERATED ALWAYS AS ( immutable_md5(immutable_array_to_string(COALESCE(attributes, '{}'), ',')) ) STORED;`,
      )
    })

    it('adds the unique key after the generated columns', () => {
      expect(addConstraintSpy).toHaveBeenCalledWith(
        'variables',
        'variables_unique',
        'UNIQUE(name, _attributes_hash, _concept_hash, _first_group)',
      )
      expect(sqlSpy.mock.invocationCallOrder[0]).toBeLessThan(
        addConstraintSpy.mock.invocationCallOrder[0],
      )
    })
  })

  describe('down', () => {
    it('drops the table', async () => {
      await down(mockPgm)
      expect(dropTableSpy).toHaveBeenCalledWith('variables')
    })
  })
})
