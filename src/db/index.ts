import { drizzle } from 'drizzle-orm/postgres-js'
import postgres from 'postgres'
import * as schema from './schema/index.js'

export function createDb(databaseUrl: string) {
  const client = postgres(databaseUrl, {
    max: 10,
    idle_timeout: 30,
    connect_timeout: 5,
  })

  const db = drizzle(client, { schema })

  return { db, client }
}

export type Database = ReturnType<typeof createDb>['db']
