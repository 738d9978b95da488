// Customer database connection
// One node-postgres pool shared by the outbox store and the aggregate reader.
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pkg from 'pg';
const { Pool } = pkg;

// Queries go through the table objects in @shared; no relational query schema is registered.
export type SourceDb = NodePgDatabase;

/** Transaction handle passed to `db.transaction()` callbacks. */
export type SourceTransaction = Parameters<Parameters<SourceDb['transaction']>[0]>[0];

export interface SourceDatabase {
  db: SourceDb;
  close(): Promise<void>;
}

export function createSourceDatabase(connectionString: string): SourceDatabase {
  const pool = new Pool({
    connectionString,
    max: 5,
  });

  pool.on('error', (err) => {
    console.error('[Storage] Idle Postgres client error:', err.message);
  });

  return {
    db: drizzle(pool),
    close: () => pool.end(),
  };
}
