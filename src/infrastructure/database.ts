/**
 * PostgreSQL pool singleton with connection lifecycle management.
 * Provides a centralized query surface for all repositories.
 */
import pg from 'pg';
import type { QueryResultRow } from 'pg';
import { createLogger } from '@/observability/logger.js';

const logger = createLogger({ name: 'database' });

/** Options for creating the pool. */
export interface DatabaseOptions {
  /** Connection string, usually DATABASE_URL. */
  url: string;
  /** Maximum pooled clients. */
  maxConnections?: number;
  /** Log every query with its duration (recommended only in development). */
  logQueries?: boolean;
}

/** The part of the database repositories depend on. */
export interface Queryable {
  /** Run a parameterised statement and return its rows. */
  query<R extends QueryResultRow>(text: string, params?: readonly unknown[]): Promise<R[]>;
}

/** Wrapper around a pg Pool with lifecycle hooks. */
export interface Database extends Queryable {
  /** The raw pg Pool instance. */
  pool: pg.Pool;
  /** Check out one client to verify connectivity. */
  connect(): Promise<void>;
  /** Drain and close the pool. */
  disconnect(): Promise<void>;
}

let instance: Database | undefined;

/**
 * Create a Database wrapper around a pg Pool.
 * Stores the instance as a singleton; calling twice throws.
 */
export function createDatabase(options: DatabaseOptions): Database {
  if (instance) {
    throw new Error('Database already initialized. Call disconnect() first.');
  }

  const pool = new pg.Pool({
    connectionString: options.url,
    max: options.maxConnections ?? 10,
  });

  pool.on('error', (error) => {
    logger.error('Idle database client error', {
      component: 'database',
      message: error.message,
    });
  });

  const db: Database = {
    pool,

    async query<R extends QueryResultRow>(
      text: string,
      params: readonly unknown[] = [],
    ): Promise<R[]> {
      const startedAt = Date.now();
      const result = await pool.query<R>(text, [...params]);
      if (options.logQueries) {
        logger.debug('SQL query', {
          component: 'database',
          query: text,
          rowCount: result.rowCount,
          durationMs: Date.now() - startedAt,
        });
      }
      return result.rows;
    },

    async connect(): Promise<void> {
      const client = await pool.connect();
      client.release();
      logger.info('Database connected', { component: 'database' });
    },

    async disconnect(): Promise<void> {
      await pool.end();
      instance = undefined;
      logger.info('Database disconnected', { component: 'database' });
    },
  };

  instance = db;
  return db;
}
