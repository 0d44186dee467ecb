/**
 * PostgreSQL Database Connection
 */

import pg from 'pg';
import type { QueryResult, QueryResultRow } from 'pg';
import { componentLogger } from '../utils/logger.js';

const log = componentLogger('postgres');

/**
 * Minimal query surface the Postgres store depends on
 */
export interface SqlExecutor {
  execute(text: string, params?: unknown[]): Promise<QueryResult<QueryResultRow>>;
  close(): Promise<void>;
}

export interface PgDatabaseOptions {
  connectionString: string;
  /** Client-side timeout for every query */
  queryTimeoutMs: number;
  max?: number;
}

export class PgDatabase implements SqlExecutor {
  private pool: pg.Pool | null = null;

  constructor(private readonly options: PgDatabaseOptions) {}

  /**
   * Create the pool and verify connectivity
   */
  async connect(): Promise<void> {
    if (this.pool) {
      log.debug('Database pool already initialized');
      return;
    }

    this.pool = new pg.Pool({
      connectionString: this.options.connectionString,
      max: this.options.max ?? 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
      query_timeout: this.options.queryTimeoutMs,
    });

    this.pool.on('error', (error) => {
      log.error({ error }, 'Idle database client error');
    });

    try {
      const client = await this.pool.connect();
      log.info('Database connection established');
      client.release();
    } catch (error) {
      log.fatal({ error }, 'Failed to connect to database');
      await this.close();
      throw error;
    }
  }

  async execute(text: string, params?: unknown[]): Promise<QueryResult<QueryResultRow>> {
    if (!this.pool) {
      throw new Error('Database not initialized. Call connect() first.');
    }
    return this.pool.query(text, params);
  }

  async close(): Promise<void> {
    if (this.pool) {
      const pool = this.pool;
      this.pool = null;
      await pool.end();
      log.info('Database connection pool closed');
    }
  }
}
