import pg from 'pg';
import { logger } from '../logger.js';

const { Pool } = pg;

export type DbPool = pg.Pool;

/**
 * Create the connection pool. Nothing connects until the first query.
 */
export function createPool(connectionString: string): DbPool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('connect', () => {
    logger.debug('Database connection established');
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected database error');
  });

  return pool;
}

/**
 * Postgres error code for unique_violation.
 */
export const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION
  );
}

/**
 * Anything a transaction can be rolled back on; `PoolClient` qualifies.
 */
export interface TransactionClient {
  query(sql: string): Promise<unknown>;
}

/**
 * Roll back from inside a `catch`. A failing ROLLBACK is logged, not thrown.
 */
export async function rollbackSafely(client: TransactionClient): Promise<void> {
  try {
    await client.query('ROLLBACK');
  } catch (rollbackError) {
    logger.error({ err: rollbackError }, 'Transaction rollback failed');
  }
}
