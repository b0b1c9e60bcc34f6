/**
 * PostgreSQL pool singleton with connection lifecycle management.
 * Provides the shared query interface for every pg-backed store.
 */
import { readFile } from 'node:fs/promises';
import pg from 'pg';
import type { Pool, QueryResult, QueryResultRow } from 'pg';
import type { Logger } from '@/observability/logger.js';
import { createLogger } from '@/observability/logger.js';

/** The slice of a pg Pool (or client) the stores depend on. */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<QueryResult<R>>;
}

/** Options for creating the pool. */
export interface DatabaseOptions {
  /** Connection string; defaults to DATABASE_URL. */
  url?: string;
  /** Maximum pooled connections. Defaults to 10. */
  maxConnections?: number;
  logger?: Logger;
}

/** Wrapper around a pg Pool with lifecycle hooks. */
export interface Database {
  /** The raw pool. */
  pool: Pool;
  /** Check out and release one connection to verify reachability. */
  connect(): Promise<void>;
  /** Apply `db/schema.sql`. Idempotent. */
  migrate(): Promise<void>;
  /** Drain the pool. */
  disconnect(): Promise<void>;
}

const SCHEMA_PATH = new URL('../../db/schema.sql', import.meta.url);

let instance: Database | undefined;

/**
 * Create the Database singleton. Calling twice without `disconnect()` throws.
 */
export function createDatabase(options?: DatabaseOptions): Database {
  if (instance) {
    throw new Error('Database already initialized. Call disconnect() first.');
  }

  const logger = options?.logger ?? createLogger({ name: 'database' });
  const pool = new pg.Pool({
    connectionString: options?.url ?? process.env['DATABASE_URL'],
    max: options?.maxConnections ?? 10,
  });

  // Idle clients can error when the server drops them; the pool replaces them.
  pool.on('error', (error) => {
    logger.error('Idle database client error', {
      component: 'database',
      error: error.message,
    });
  });

  const db: Database = {
    pool,

    async connect(): Promise<void> {
      const client = await pool.connect();
      client.release();
      logger.info('Database connected', { component: 'database' });
    },

    async migrate(): Promise<void> {
      const sql = await readFile(SCHEMA_PATH, 'utf-8');
      await pool.query(sql);
      logger.info('Database schema applied', { component: 'database' });
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

/**
 * Reset the singleton (for testing only).
 * Does NOT end the pool; the caller is responsible for cleanup.
 */
export function resetDatabaseSingleton(): void {
  instance = undefined;
}
