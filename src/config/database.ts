/**
 * Database Connection Pool Module
 *
 * Provides a lazily created PostgreSQL connection pool, parameterized
 * queries and transaction support for atomic operations.
 */

import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { loadEnvironmentConfig } from './environment';
import { logDatabase } from '../utils/logger';

let pool: Pool | null = null;

/**
 * Database connection pool configuration
 */
interface PoolConfig {
  min: number;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
}

const DEFAULT_POOL_CONFIG: PoolConfig = {
  min: 2,
  max: 10,
  idleTimeoutMillis: 30000, // 30 seconds
  connectionTimeoutMillis: 5000, // 5 seconds
};

/**
 * Get or create the database connection pool
 */
export function getPool(): Pool {
  if (!pool) {
    const config = loadEnvironmentConfig();

    pool = new Pool({
      host: config.dbHost,
      port: config.dbPort,
      database: config.dbName,
      user: config.dbUser,
      password: config.dbPassword,
      min: DEFAULT_POOL_CONFIG.min,
      max: DEFAULT_POOL_CONFIG.max,
      idleTimeoutMillis: DEFAULT_POOL_CONFIG.idleTimeoutMillis,
      connectionTimeoutMillis: DEFAULT_POOL_CONFIG.connectionTimeoutMillis,
      ssl: config.dbSsl ? { rejectUnauthorized: false } : undefined,
    });

    // Handle pool errors
    pool.on('error', (err) => {
      logDatabase({
        errorMessage: err.message,
        query: 'Pool error',
        operation: 'POOL_ERROR',
      });
    });
  }

  return pool;
}

/**
 * Execute a parameterized query
 * Prevents SQL injection by using parameterized queries
 *
 * @param text - SQL query with $1, $2, etc. placeholders
 * @param params - Array of parameter values
 */
export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  return getPool().query<T>(text, params);
}

/**
 * Transaction helper for atomic operations
 * Automatically handles BEGIN, COMMIT, and ROLLBACK
 */
export async function transaction<T>(
  callback: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await getPool().connect();

  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      logDatabase({
        errorMessage: rollbackError instanceof Error ? rollbackError.message : 'Unknown error',
        query: 'ROLLBACK',
        operation: 'ROLLBACK',
      });
    }
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Reset pool instance (for testing only)
 * @internal
 */
export function resetPool(): void {
  pool = null;
}

/**
 * Check if pool is healthy
 */
export async function isPoolHealthy(): Promise<boolean> {
  try {
    const result = await query<{ health_check: number }>('SELECT 1 as health_check');
    return result.rows.length === 1 && result.rows[0].health_check === 1;
  } catch (error) {
    logDatabase({
      errorMessage: error instanceof Error ? error.message : 'Unknown error',
      query: 'SELECT 1 as health_check',
      operation: 'HEALTH_CHECK',
    });
    return false;
  }
}
