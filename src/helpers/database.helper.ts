import 'dotenv/config'
import { Pool } from 'pg'

import { DEFAULT_DATABASE_URL } from '../schema/ingest-config.schema.js'

export const DATABASE_URL: string =
  process.env.DATABASE_URL || DEFAULT_DATABASE_URL

export function maskDatabaseUrl(databaseUrl: string): string {
  return databaseUrl.replace(/:[^:@/]*@/, ':***@')
}

export function createPool(databaseUrl: string = DATABASE_URL): Pool {
  console.log('Connecting to database:', maskDatabaseUrl(databaseUrl))

  return new Pool({
    connectionString: databaseUrl,
    max: 4,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  })
}
