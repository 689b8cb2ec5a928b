/**
 * PostgreSQL connection pool and query helper
 */

import pg from 'pg';
import type { Config } from '../config.js';
import { DatabaseError, describeError } from '../errors.js';
import type { Logger } from '../logger.js';

const { Pool } = pg;

export type SqlRow = Record<string, unknown>;

/**
 * Minimal query surface the repositories depend on
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlRow[]>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

export function createPool(config: Config['database'], logger: Logger): pg.Pool {
  const pool = new Pool({
    connectionString: config.connectionString,
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    max: config.maxConnections,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: config.connectionTimeoutMs,
  });

  pool.on('error', (err) => {
    logger.error('Unexpected database error:', err);
  });

  return pool;
}

export function createSqlClient(pool: pg.Pool, logger: Logger): SqlClient {
  return {
    async query(text, values) {
      const start = Date.now();
      try {
        const result = await pool.query(text, values);
        logger.debug(`Executed query in ${Date.now() - start}ms (${result.rowCount ?? 0} rows)`);
        return result.rows;
      } catch (error) {
        throw new DatabaseError(`Database query failed: ${describeError(error)}`, { cause: error });
      }
    },

    async ping() {
      try {
        await pool.query('SELECT 1');
        return true;
      } catch (error) {
        logger.warn('Database connection test failed:', error);
        return false;
      }
    },

    async close() {
      await pool.end();
    },
  };
}
