import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';

export type Database = NodePgDatabase;

let pool: pg.Pool | null = null;

/**
 * Returns the drizzle database for the connection string, creating the
 * pool on first use.
 */
export function getDatabase(connectionString: string): Database {
  if (!pool) {
    pool = new pg.Pool({
      connectionString,
      // Connection pool limits
      max: 5,
      // Timeouts
      idleTimeoutMillis: 30000, // Close idle clients after 30 seconds
      connectionTimeoutMillis: 10000,
    });

    // Log pool errors to prevent unhandled rejections
    pool.on('error', (err) => {
      console.error('[Database] Unexpected pool error:', err);
    });
  }
  return drizzle(pool, { logger: false });
}

/**
 * Gracefully close the database connection pool
 */
export async function closeDatabase(): Promise<void> {
  if (!pool) return;
  console.log('[Database] Closing connection pool...');
  await pool.end();
  pool = null;
  console.log('[Database] Connection pool closed');
}
