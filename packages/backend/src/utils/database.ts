import { Pool } from 'pg';
import { config } from '../config';
import { logger } from './logger';

/**
 * Pool singleton shared by the queue and booking stores. Creating a pool per
 * store would multiply connections against the same database.
 */
export const pool = new Pool({
  connectionString: config.databaseUrl,
  max: config.databasePoolMax,
  connectionTimeoutMillis: 5000,
  idleTimeoutMillis: 30000,
});

// An idle client losing its connection must not crash the process
pool.on('error', (error) => {
  logger.error({ err: error }, 'Idle database client error');
});

export interface DatabaseHealth {
  connected: boolean;
  latencyMs?: number;
  error?: string;
}

/**
 * Health check for database connection
 */
export async function checkDatabaseHealth(): Promise<DatabaseHealth> {
  const startTime = Date.now();
  try {
    await pool.query('SELECT 1');
    return {
      connected: true,
      latencyMs: Date.now() - startTime,
    };
  } catch (error) {
    logger.error({ err: error }, 'Database health check failed');
    return {
      connected: false,
      latencyMs: Date.now() - startTime,
      error: error instanceof Error ? error.message : 'Unknown error',
    };
  }
}

export async function closeDatabase(): Promise<void> {
  await pool.end();
}
