import type { Pool, PoolClient, QueryResultRow } from 'pg';
import { StoreUnavailableError } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Connection-level failures that mean "the database is not reachable right now",
 * as opposed to a bad query. Class 08 is connection exception; 57P0x is shutdown;
 * 53300 is too many connections.
 */
const UNAVAILABLE_SQLSTATES = new Set(['57P01', '57P02', '57P03', '57P04', '53300']);
const UNAVAILABLE_NODE_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EPIPE']);
const UNAVAILABLE_MESSAGES = [
  'timeout exceeded when trying to connect',
  'connection terminated',
  'cannot use a pool after calling end',
  'client has encountered a connection error',
];

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isStoreUnavailable(error: unknown): boolean {
  if (error instanceof StoreUnavailableError) return true;

  const code = errorCode(error);
  if (code && (UNAVAILABLE_SQLSTATES.has(code) || code.startsWith('08') || UNAVAILABLE_NODE_CODES.has(code))) {
    return true;
  }

  const message = error instanceof Error ? error.message.toLowerCase() : '';
  return UNAVAILABLE_MESSAGES.some((fragment) => message.includes(fragment));
}

/**
 * Rethrow connectivity failures as StoreUnavailableError; everything else unchanged
 */
export function translateStoreError(error: unknown, operation: string): unknown {
  if (error instanceof StoreUnavailableError || !isStoreUnavailable(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new StoreUnavailableError(`Database unavailable during ${operation}: ${message}`, {
    operation,
    code: errorCode(error),
  });
}

/**
 * The part of a pooled connection a transaction drives
 */
export interface TransactionConnection {
  query(text: string): Promise<unknown>;
  /** Passing an error makes the pool destroy the connection instead of reusing it */
  release(err?: Error): void;
}

/**
 * Run `fn` inside BEGIN/COMMIT on a dedicated connection. Rolls back on any error.
 * Transaction-scoped advisory locks taken inside `fn` are released at COMMIT/ROLLBACK.
 */
export async function withTransaction<T>(
  pool: Pool,
  operation: string,
  fn: (client: PoolClient) => Promise<T>
): Promise<T> {
  let client: PoolClient;
  try {
    client = await pool.connect();
  } catch (error) {
    throw translateStoreError(error, operation);
  }
  return runTransaction(client, operation, fn);
}

/**
 * BEGIN/COMMIT around `fn` on an already checked-out connection, which is
 * released afterwards. A connection whose ROLLBACK failed is in an unknown
 * state and goes back to the pool only to be destroyed.
 */
export async function runTransaction<C extends TransactionConnection, T>(
  client: C,
  operation: string,
  fn: (client: C) => Promise<T>
): Promise<T> {
  let broken: Error | undefined;
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      logger.warn({ err: rollbackError, operation }, 'Rollback failed, discarding connection');
      broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
    }
    throw translateStoreError(error, operation);
  } finally {
    client.release(broken);
  }
}

/**
 * Plain pooled query with error translation
 */
export async function runQuery<R extends QueryResultRow>(
  pool: Pool,
  operation: string,
  text: string,
  params: unknown[] = []
): Promise<R[]> {
  try {
    const result = await pool.query<R>(text, params);
    return result.rows;
  } catch (error) {
    throw translateStoreError(error, operation);
  }
}
