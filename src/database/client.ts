/**
 * Read-only access to the pgvector store used by the pgvector retrieval backend.
 *
 * The embedding service owns the tables; codespec never writes to them.
 */
import pg from 'pg';

import {
  DatabaseConnectionError,
  DatabaseNotConnectedError,
  DatabaseQueryError,
  ServiceConnectionError,
  toError,
} from '@utils/errors';
import { logger } from '@utils/logger';
import { type DatabaseConfig } from '@/types/config';

export const VECTOR_STORE_TABLES = ['langchain_pg_collection', 'langchain_pg_embedding'] as const;

const CONNECT_TIMEOUT_MS = 10_000;

/** Accepts a single SELECT or WITH statement. */
export const assertReadOnly = (sql: string): void => {
  const statement = sql.trim().toLowerCase();
  if (!/^(select|with)\b/.test(statement)) {
    throw new Error('Only SELECT statements may run against the vector store');
  }
  if (/;\s*\S/.test(statement)) {
    throw new Error('Multiple statements are not allowed');
  }
};

export class DatabaseClient {
  private pool: pg.Pool | null = null;

  constructor(private readonly config: DatabaseConfig) {}

  get connected(): boolean {
    return this.pool !== null;
  }

  private get target(): string {
    return `${this.config.host}:${String(this.config.port)}/${this.config.database}`;
  }

  async connect(): Promise<void> {
    const { host, port, database, user, password, max_connections, idle_timeout } = this.config;
    logger.debug('Opening vector store pool', { target: this.target, user });

    const pool = new pg.Pool({
      host,
      port,
      database,
      user,
      password,
      max: max_connections,
      idleTimeoutMillis: idle_timeout,
      connectionTimeoutMillis: CONNECT_TIMEOUT_MS,
    });

    try {
      await pool.query('SELECT 1');
    } catch (error) {
      await pool.end();
      throw DatabaseConnectionError.cannotConnect(host, port, database, toError(error));
    }

    this.pool = pool;
    logger.connected('PostgreSQL', { target: this.target });
  }

  /** Requires the `vector` extension; missing store tables only warn. */
  async healthCheck(): Promise<void> {
    const pool = this.requirePool('health check');

    const extension = await pool.query(`SELECT 1 FROM pg_extension WHERE extname = 'vector'`);
    if (extension.rowCount === 0) {
      throw new ServiceConnectionError('pgvector extension', this.target);
    }

    const tables = await this.query<{ table_name: string }>(
      `SELECT table_name FROM information_schema.tables WHERE table_schema = 'public' AND table_name = ANY($1)`,
      [[...VECTOR_STORE_TABLES]]
    );
    const found = tables.rows.map((row) => row.table_name);
    const missing = VECTOR_STORE_TABLES.filter((table) => !found.includes(table));
    if (missing.length > 0) {
      logger.warn('Vector store tables missing', { missing });
    }

    logger.healthCheck('PostgreSQL', 'OK', { target: this.target });
  }

  async query<T extends pg.QueryResultRow = pg.QueryResultRow>(
    sql: string,
    params: unknown[]
  ): Promise<pg.QueryResult<T>> {
    const pool = this.requirePool('query execution');
    assertReadOnly(sql);

    try {
      return await pool.query<T>(sql, params);
    } catch (error) {
      throw new DatabaseQueryError(sql, params, toError(error));
    }
  }

  async close(): Promise<void> {
    if (this.pool === null) {
      return;
    }
    const pool = this.pool;
    this.pool = null;
    await pool.end();
    logger.info('Vector store pool closed');
  }

  private requirePool(operation: string): pg.Pool {
    if (this.pool === null) {
      throw new DatabaseNotConnectedError(operation);
    }
    return this.pool;
  }
}
