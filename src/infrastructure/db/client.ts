import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

/**
 * Creates a Drizzle client backed by postgres.js.
 *
 * Returns the raw `sql` connection (pool lifecycle, schema bootstrap) and
 * the typed `db` instance. The relay issues one SELECT per poll, so the
 * pool stays small; relay-cli passes 1.
 */
export function createDbClient(databaseUrl: string, poolSize = 5) {
  const sql = postgres(databaseUrl, {
    max: poolSize,
    idle_timeout: 20,
    connect_timeout: 10,
    connection: { application_name: 'topic-relay' },
  });

  const db = drizzle(sql, { schema });

  return { sql, db };
}

export type Database = ReturnType<typeof createDbClient>['db'];
export type Sql = ReturnType<typeof createDbClient>['sql'];
