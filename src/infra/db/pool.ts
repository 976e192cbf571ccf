import pg from 'pg';
import type { QueryResult, QueryResultRow } from 'pg';
import type { Logger } from 'pino';

const { Pool } = pg;

/**
 * The part of a pg Pool or PoolClient the repositories need.
 */
export interface Queryable {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface TransactionClient extends Queryable {
  release(err?: Error | boolean): void;
}

export interface ConnectionPool extends Queryable {
  connect(): Promise<TransactionClient>;
}

export interface PoolOptions {
  connectionString?: string;
  max: number;
}

// Constructing the pool does not connect; a missing DATABASE_URL fails on first use
export function createPool(options: PoolOptions, logger: Logger): pg.Pool {
  const pool = new Pool({
    connectionString: options.connectionString,
    max: options.max,
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
