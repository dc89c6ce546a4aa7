import { MigrationBuilder } from 'node-pg-migrate'

// md5 and array_to_string are not IMMUTABLE, so generated columns and
// unique constraints cannot use them directly.
export const immutableMd5Sql = `
  CREATE OR REPLACE FUNCTION immutable_md5(input TEXT)
  RETURNS TEXT AS $$
  BEGIN
    RETURN md5(input);
  END;
  $$ LANGUAGE plpgsql IMMUTABLE;
`

export const immutableArrayToStringSql = `
  CREATE OR REPLACE FUNCTION immutable_array_to_string(input TEXT[], delimiter TEXT)
  RETURNS TEXT AS $$
  BEGIN
    RETURN array_to_string(input, delimiter);
  END;
  $$ LANGUAGE plpgsql IMMUTABLE;
`

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.sql(immutableMd5Sql)
  pgm.sql(immutableArrayToStringSql)
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.sql('DROP FUNCTION IF EXISTS immutable_array_to_string(TEXT[], TEXT);')
  pgm.sql('DROP FUNCTION IF EXISTS immutable_md5(TEXT);')
}
