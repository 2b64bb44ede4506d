/**
 * Storage backend selection
 *
 * PostgreSQL when DATABASE_URL is set. Without it the in-memory store is
 * used, which production refuses.
 */

import {
  createDatabaseClient,
  createInMemoryBackend,
  createLogger,
  createPostgresBackend,
  DatabaseConfigError,
  type RepositoryBackend,
} from '@ehr-backend/core';

import type { AppConfig } from './config.js';

const logger = createLogger({ name: 'backend' });

export function createBackend(config: AppConfig): RepositoryBackend {
  const { url, poolMax, ssl } = config.database;

  if (url !== undefined) {
    const pool = createDatabaseClient({ connectionString: url, maxConnections: poolMax, ssl });
    return createPostgresBackend(pool);
  }

  if (config.isProd) {
    throw new DatabaseConfigError('api', 'DATABASE_URL is required in production');
  }

  logger.warn('DATABASE_URL not configured, using the in-memory store');
  return createInMemoryBackend();
}
