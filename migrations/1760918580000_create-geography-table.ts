import { MigrationBuilder } from 'node-pg-migrate'

export const geographyArgs = {
  id: { type: 'serial', primaryKey: true },
  name: { type: 'text', notNull: true, check: "name <> ''" },
  geo_level_display: { type: 'text' },
  reference_date: { type: 'date' },
  requires: { type: 'text[]' },
  wildcard: { type: 'text[]' },
  limit: { type: 'integer' },
  geo_level_id: { type: 'text' },
  optional_with_wildcard_for: { type: 'text' },
} as const

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('geography', geographyArgs)
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('geography')
}
