export {
  createLogger,
  createLoggerOptions,
  generateCorrelationId,
  type Logger,
  type LoggerOptions,
  type CreateLoggerOptions,
} from './logger/index.js';

// PHI redaction utilities for safe logging
export {
  redactString,
  REDACTION_PATHS,
  shouldRedactPath,
  createCensor,
} from './logger/redaction.js';

export {
  AppError,
  ValidationError,
  NotFoundError,
  TenantContextError,
  // Repository errors (standardized error handling)
  RepositoryError,
  RecordNotFoundError,
  ReferentialIntegrityError,
  ConflictError,
  DatabaseConfigError,
  isOperationalError,
  toSafeErrorResponse,
  type SafeErrorDetails,
} from './errors.js';

export {
  PostgresPool,
  createDatabaseClient,
  pingDatabase,
  withTransaction,
  type DatabaseClient,
  type DatabaseConfig,
  type DatabasePool,
  type PoolClient,
  type QueryResult,
} from './database.js';

export {
  getTenantId,
  normalizeTenantId,
  requireTenantId,
  runWithTenant,
  tenantSchemaName,
  withTenantConn,
} from './tenant/context.js';

export * from './repositories/index.js';
