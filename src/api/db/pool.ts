/**
 * Database Pool Management
 *
 * Wraps a PostgreSQL pool in the small query surface the services use, so the
 * same code runs against a real server and against an in-process pool in tests.
 */

import pg from 'pg';
import type { Pool, PoolClient, QueryResultRow } from 'pg';
import type { Logger } from '../../logger.js';

export interface PoolOptions {
  /** Database connection URL */
  connectionString: string;
  /** Maximum pool size (default: 20) */
  maxConnections?: number;
  /** Connection timeout in ms (default: 30000) */
  connectionTimeout?: number;
  /** Idle timeout in ms (default: 10000) */
  idleTimeout?: number;
}

export interface Queryable {
  query<T extends QueryResultRow>(text: string, params?: unknown[]): Promise<T[]>;
}

export interface Database extends Queryable {
  queryOne<T extends QueryResultRow>(text: string, params?: unknown[]): Promise<T | null>;
  /** Runs `work` on one connection inside BEGIN/COMMIT, rolling back if it throws. */
  transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

/**
 * Create a PostgreSQL connection pool
 */
export function createPool(options: PoolOptions, logger: Logger): Pool {
  const pool = new pg.Pool({
    connectionString: options.connectionString,
    max: options.maxConnections ?? 20,
    connectionTimeoutMillis: options.connectionTimeout ?? 30000,
    idleTimeoutMillis: options.idleTimeout ?? 10000,
  });

  pool.on('error', (err) => {
    logger.error('Unexpected database pool error', { error: err });
  });

  return pool;
}

function clientQueryable(client: PoolClient): Queryable {
  return {
    async query<T extends QueryResultRow>(text: string, params?: unknown[]): Promise<T[]> {
      const result = await client.query<T>(text, params);
      return result.rows;
    },
  };
}

export function createDatabase(pool: Pool, logger: Logger): Database {
  async function query<T extends QueryResultRow>(text: string, params?: unknown[]): Promise<T[]> {
    const result = await pool.query<T>(text, params);
    return result.rows;
  }

  return {
    query,

    async queryOne<T extends QueryResultRow>(text: string, params?: unknown[]): Promise<T | null> {
      const rows = await query<T>(text, params);
      return rows[0] ?? null;
    },

    async transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T> {
      const client = await pool.connect();
      try {
        await client.query('BEGIN');
        const result = await work(clientQueryable(client));
        await client.query('COMMIT');
        return result;
      } catch (error) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackError) {
          logger.error('Rollback failed', { error: rollbackError });
        }
        throw error;
      } finally {
        client.release();
      }
    },

    async ping(): Promise<boolean> {
      try {
        await pool.query('SELECT 1');
        return true;
      } catch (error) {
        logger.error('Database connection test failed', { error });
        return false;
      }
    },

    close: () => pool.end(),
  };
}
