import { MigrationBuilder } from 'node-pg-migrate'

export const apiPathsVariablesAssociationArgs = {
  id: { type: 'serial', primaryKey: true },
  api_paths_id: { type: 'integer', notNull: true, references: 'api_paths(id)' },
  variables_id: { type: 'integer', notNull: true, references: 'variables(id)' },
} as const

export const apiPathsGeographyAssociationArgs = {
  id: { type: 'serial', primaryKey: true },
  api_paths_id: { type: 'integer', notNull: true, references: 'api_paths(id)' },
  geography_id: { type: 'integer', notNull: true, references: 'geography(id)' },
} as const

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable(
    'api_paths_variables_association',
    apiPathsVariablesAssociationArgs,
  )
  pgm.addConstraint(
    'api_paths_variables_association',
    'api_paths_variables_association_unique',
    'UNIQUE(api_paths_id, variables_id)',
  )

  pgm.createTable(
    'api_paths_geography_association',
    apiPathsGeographyAssociationArgs,
  )
  pgm.addConstraint(
    'api_paths_geography_association',
    'api_paths_geography_association_unique',
    'UNIQUE(api_paths_id, geography_id)',
  )

  pgm.createIndex('api_paths_variables_association', 'variables_id')
  pgm.createIndex('api_paths_geography_association', 'geography_id')
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('api_paths_geography_association')
  pgm.dropTable('api_paths_variables_association')
}
