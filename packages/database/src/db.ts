import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import * as schema from './schema';

const { Pool } = pg;

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
  db: Database;
  /** Close the underlying pool (server shutdown, scripts) */
  close(): Promise<void>;
}

/**
 * Open a connection pool and wrap it in a drizzle instance
 *
 * The pool connects lazily on first query. There is no module-level
 * database singleton: the API server creates one handle at startup and
 * passes it to the stores that need it.
 */
export function createDatabase(connectionString: string): DatabaseHandle {
  const pool = new Pool({ connectionString });

  pool.on('error', (err) => {
    // Idle client errors would otherwise crash the process
    console.error('[DB] Idle client error:', err.message);
  });

  return {
    db: drizzle(pool, { schema }),
    close: () => pool.end(),
  };
}
