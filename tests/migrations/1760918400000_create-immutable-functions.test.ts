import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { MigrationBuilder } from 'node-pg-migrate'

import {
  down,
  immutableArrayToStringSql,
  immutableMd5Sql,
  up,
} from '../../migrations/1760918400000_create-immutable-functions.js'
import { normalizeSQL } from '../helpers/normalize-sql.js'

describe('Migration 1760918400000 - Create Immutable Functions', () => {
  let mockPgm: MigrationBuilder
  let sqlSpy: ReturnType<typeof vi.fn>

  beforeEach(() => {
    sqlSpy = vi.fn()
    mockPgm = { sql: sqlSpy } as Partial<MigrationBuilder> as MigrationBuilder
  })

  afterEach(() => {
    vi.clearAllMocks()
  })

  describe('up', () => {
    it('creates both functions', async () => {
      await up(mockPgm)

      expect(sqlSpy).toHaveBeenCalledTimes(2)
      expect(sqlSpy).toHaveBeenNthCalledWith(1, immutableMd5Sql)
      expect(sqlSpy).toHaveBeenNthCalledWith(2, immutableArrayToStringSql)
    })

    it('declares the functions IMMUTABLE', () => {
      expect(normalizeSQL(immutableMd5Sql)).toBe(
        'CREATE OR REPLACE FUNCTION immutable_md5(input TEXT) RETURNS TEXT AS $$ BEGIN RETURN md5(input); END; $$ LANGUAGE plpgsql IMMUTABLE;',
      )
      expect(normalizeSQL(immutableArrayToStringSql)).toBe(
        'CREATE OR REPLACE FUNCTION immutable_array_to_string(input TEXT[], delimiter TEXT) RETURNS TEXT AS $$ BEGIN RETURN array_to_string(input, delimiter); END; $$ LANGUAGE plpgsql IMMUTABLE;',
      )
    })
  })

  describe('down', () => {
    it('drops both functions', async () => {
      await down(mockPgm)

      expect(sqlSpy).toHaveBeenCalledWith(
        'DROP FUNCTION IF EXISTS immutable_array_to_string(TEXT[], TEXT);',
      )
      expect(sqlSpy).toHaveBeenCalledWith(
        'DROP FUNCTION IF EXISTS immutable_md5(TEXT);',
      )
    })
  })
})
