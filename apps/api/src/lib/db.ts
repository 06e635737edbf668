import pg from 'pg';
import { drizzle, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import { type PgDatabase } from 'drizzle-orm/pg-core';

/**
 * A Drizzle handle over node-postgres. Both the pooled database and a
 * transaction satisfy this type, so repositories can be bound to either.
 */
export type Database = PgDatabase<NodePgQueryResultHKT>;

export function createDatabase(connectionString: string): {
  db: Database;
  pool: pg.Pool;
} {
  const pool = new pg.Pool({ connectionString });
  return { db: drizzle(pool), pool };
}
