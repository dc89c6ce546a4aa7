import { MigrationBuilder } from 'node-pg-migrate'

export const variablesArgs = {
  id: { type: 'serial', primaryKey: true },
  name: { type: 'text', notNull: true, check: "name <> ''" },
  label: { type: 'text[]', notNull: true },
  concept: { type: 'text' },
  required: { type: 'text' },
  predicate_type: { type: 'text' },
  group: { type: 'text[]' },
  limit: { type: 'smallint' },
  predicate_only: { type: 'boolean' },
  attributes: { type: 'text[]' },
} as const

// `concept` and `attributes` can exceed the btree index row limit, so the
// unique key compares hashes of them. Only the first group is compared.
export const addKeyColumnsSql = `
  ALTER TABLE variables
    ADD COLUMN _first_group TEXT
      GENERATED ALWAYS AS (COALESCE("group"[1], '')) STORED,
    ADD COLUMN _concept_hash TEXT
      GENERATED ALWAYS AS (immutable_md5(COALESCE(concept, ''))) STORED,
    ADD COLUMN _attributes_hash TEXT
      GENERATED ALWAYS AS (
        immutable_md5(immutable_array_to_string(COALESCE(attributes, '{}'), ','))
      ) STORED;
`

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('variables', variablesArgs)

  pgm.sql(addKeyColumnsSql)

  pgm.addConstraint(
    'variables',
    'variables_unique',
    'UNIQUE(name, _attributes_hash, _concept_hash, _first_group)',
  )
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('variables')
}
