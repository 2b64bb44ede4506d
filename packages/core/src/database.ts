/**
 * Database Client Factory
 *
 * A narrow client interface over `pg` so repositories, the tenant helper and
 * tests share one seam. Rows come back as plain records; repositories
 * validate them through their zod schemas.
 */

import pg, { type Pool } from 'pg';

import { createLogger, type Logger } from './logger/index.js';

/** PostgreSQL DATE type oid */
const PG_DATE_OID = 1082;

// Keep calendar dates as 'YYYY-MM-DD' instead of local-midnight Date objects
pg.types.setTypeParser(PG_DATE_OID, (value: string) => value);

/**
 * Database query result
 */
export interface QueryResult {
  rows: Record<string, unknown>[];
  rowCount: number | null;
}

/**
 * Database client interface
 * Compatible with pg.Pool and pg.PoolClient
 */
export interface DatabaseClient {
  query(sql: string, params?: unknown[]): Promise<QueryResult>;
}

/**
 * Pool client interface (acquired connection)
 */
export interface PoolClient extends DatabaseClient {
  release(): void;
}

/**
 * Database pool interface for connection management
 */
export interface DatabasePool extends DatabaseClient {
  connect(): Promise<PoolClient>;
  end(): Promise<void>;
}

export interface DatabaseConfig {
  connectionString: string;
  maxConnections?: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
  /** Use TLS; certificates are verified in production only */
  ssl?: boolean;
}

/**
 * PostgreSQL database pool wrapper
 */
export class PostgresPool implements DatabasePool {
  private readonly pool: Pool;
  private readonly logger: Logger;

  constructor(config: DatabaseConfig) {
    this.logger = createLogger({ name: 'database' });

    const sslConfig = config.ssl
      ? { rejectUnauthorized: process.env.NODE_ENV === 'production' }
      : undefined;

    this.logger.info(
      { ssl: sslConfig !== undefined, rejectUnauthorized: sslConfig?.rejectUnauthorized },
      'Database SSL configuration'
    );

    this.pool = new pg.Pool({
      connectionString: config.connectionString,
      max: config.maxConnections ?? 10,
      idleTimeoutMillis: config.idleTimeoutMs ?? 30000,
      connectionTimeoutMillis: config.connectionTimeoutMs ?? 5000,
      ssl: sslConfig,
    });

    // Idle clients can fail (server restart); the pool discards them
    this.pool.on('error', (error) => {
      this.logger.error({ err: error }, 'Idle database client error');
    });
  }

  async query(sql: string, params?: unknown[]): Promise<QueryResult> {
    const result = await this.pool.query(sql, params);
    return { rows: result.rows, rowCount: result.rowCount };
  }

  async connect(): Promise<PoolClient> {
    const client = await this.pool.connect();

    return {
      query: async (sql: string, params?: unknown[]): Promise<QueryResult> => {
        const result = await client.query(sql, params);
        return { rows: result.rows, rowCount: result.rowCount };
      },
      release: () => client.release(),
    };
  }

  async end(): Promise<void> {
    await this.pool.end();
    this.logger.info('Database pool closed');
  }
}

/**
 * Create a database pool
 *
 * @example
 * ```typescript
 * const db = createDatabaseClient({ connectionString: process.env.DATABASE_URL ?? '' });
 * const result = await db.query('SELECT 1');
 * ```
 */
export function createDatabaseClient(config: DatabaseConfig): DatabasePool {
  return new PostgresPool(config);
}

/**
 * Readiness probe: resolves when the database answers a trivial query
 */
export async function pingDatabase(pool: DatabaseClient): Promise<void> {
  await pool.query('SELECT 1');
}

// =============================================================================
// TRANSACTION MANAGEMENT
// =============================================================================

/**
 * Execute a function within a database transaction
 *
 * BEGIN on a freshly acquired connection, COMMIT when `fn` resolves,
 * ROLLBACK when it throws. The connection is always released. A failed
 * rollback is logged and the original error is rethrown.
 *
 * @example
 * ```typescript
 * await withTransaction(db, async (tx) => {
 *   await tx.query('UPDATE claim SET status = $1 WHERE id = $2', ['active', claimId]);
 *   await tx.query('DELETE FROM claim_item WHERE claim_id = $1', [claimId]);
 * });
 * ```
 */
export async function withTransaction<T>(
  pool: DatabasePool,
  fn: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();

  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error: unknown) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError: unknown) {
      createLogger({ name: 'transaction' }).error(
        { err: rollbackError },
        'Transaction rollback failed'
      );
    }
    throw error;
  } finally {
    client.release();
  }
}
