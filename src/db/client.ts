/**
 * Database Connection Pool
 *
 * Manages PostgreSQL connections using the `postgres` driver
 * with Drizzle ORM for type-safe queries.
 */

import postgres from 'postgres';
import { drizzle } from 'drizzle-orm/postgres-js';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import * as schema from './schema';
import type { AppConfig } from '@/config';

/**
 * Driver-agnostic drizzle handle. Production uses postgres-js; tests hand in
 * a PGlite-backed instance with the same schema.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

export interface DatabaseHandle {
  db: Database;
  /** Drain and close the pool; used during graceful shutdown */
  close(): Promise<void>;
}

/**
 * TLS is taken from the URL (`?sslmode=require`)
 */
export function createDatabase(config: AppConfig['database']): DatabaseHandle {
  const sql = postgres(config.url, {
    max: config.poolSize,
    idle_timeout: 20, // Close idle connections after 20 seconds
    connect_timeout: 10,
    onnotice: () => {}, // CREATE ... IF NOT EXISTS notices on every start
  });

  const db = drizzle(sql, { schema });

  return {
    db,
    close: () => sql.end(),
  };
}
