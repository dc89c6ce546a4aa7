import { MigrationBuilder } from 'node-pg-migrate'

export const apiPathsArgs = {
  id: { type: 'serial', primaryKey: true },
  c_vintage: { type: 'integer' },
  c_dataset: { type: 'text[]', notNull: true, default: '{}' },
  c_geography_link: { type: 'text', notNull: true },
  c_variables_link: { type: 'text', notNull: true },
  title: { type: 'text', notNull: true },
  description: { type: 'text', notNull: true },
} as const

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('api_paths', apiPathsArgs)

  pgm.addConstraint(
    'api_paths',
    'api_paths_unique',
    'UNIQUE(c_vintage, c_dataset)',
  )

  pgm.createIndex('api_paths', 'c_variables_link')
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('api_paths')
}
