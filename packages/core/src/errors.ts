/**
 * Custom error classes for the application
 * These errors provide safe, non-PHI error messages for API responses
 */

export interface SafeErrorDetails {
  code: string;
  message: string;
  statusCode: number;
  details?: unknown;
}

/**
 * Base application error with safe error details
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, code: string, statusCode = 500) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = true;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get safe error details for API response (no sensitive info)
   */
  toSafeError(): SafeErrorDetails {
    return {
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Validation error for invalid input: missing required field, value outside
 * an allow-list, malformed identifier or body
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
    this.details = details;
  }

  override toSafeError(): SafeErrorDetails {
    const safe = super.toSafeError();
    return this.details === undefined ? safe : { ...safe, details: this.details };
  }
}

/**
 * Not found error
 */
export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

/**
 * No tenant could be resolved for the call
 */
export class TenantContextError extends AppError {
  constructor(message = 'Tenant is required') {
    super(message, 'TENANT_REQUIRED', 400);
    this.name = 'TenantContextError';
  }
}

/**
 * Check if an error is an operational error (expected) vs programming error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

/**
 * Convert unknown error to safe error response
 */
export function toSafeErrorResponse(error: unknown): SafeErrorDetails {
  if (isOperationalError(error)) {
    return error.toSafeError();
  }

  // For unexpected errors, return a generic message
  return {
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    statusCode: 500,
  };
}

// ============================================================================
// REPOSITORY ERRORS - Standardized error types for data access layer
// ============================================================================

/**
 * Base repository error
 * Wraps store failures that have no more specific translation
 */
export class RepositoryError extends AppError {
  public readonly repository: string;
  public readonly operation: string;
  public readonly originalError: Error | undefined;

  constructor(repository: string, operation: string, message: string, originalError?: Error) {
    super(message, 'REPOSITORY_ERROR', 500);
    this.name = 'RepositoryError';
    this.repository = repository;
    this.operation = operation;
    this.originalError = originalError;
  }
}

/**
 * Record not found error
 * Thrown when a requested, updated or deleted record does not exist
 */
export class RecordNotFoundError extends AppError {
  public readonly repository: string;
  public readonly recordType: string;
  public readonly recordId: string;

  constructor(repository: string, recordType: string, recordId: string) {
    super(`${recordType} not found: ${recordId}`, 'RECORD_NOT_FOUND', 404);
    this.name = 'RecordNotFoundError';
    this.repository = repository;
    this.recordType = recordType;
    this.recordId = recordId;
  }
}

/**
 * Referential integrity error
 * Thrown when a write references a missing row, or a delete would orphan one
 */
export class ReferentialIntegrityError extends AppError {
  public readonly repository: string;
  public readonly constraint: string | undefined;

  constructor(repository: string, message: string, constraint?: string) {
    super(message, 'REFERENTIAL_INTEGRITY_ERROR', 400);
    this.name = 'ReferentialIntegrityError';
    this.repository = repository;
    this.constraint = constraint;
  }
}

/**
 * Unique constraint conflict (duplicate id or fhirId)
 */
export class ConflictError extends AppError {
  public readonly repository: string;
  public readonly constraint: string | undefined;

  constructor(repository: string, message: string, constraint?: string) {
    super(message, 'CONFLICT', 409);
    this.name = 'ConflictError';
    this.repository = repository;
    this.constraint = constraint;
  }
}

/**
 * Database configuration error
 * Thrown when database is not properly configured
 */
export class DatabaseConfigError extends AppError {
  public readonly repository: string;

  constructor(repository: string, message?: string) {
    super(message ?? 'Database connection not configured', 'DATABASE_CONFIG_ERROR', 503);
    this.name = 'DatabaseConfigError';
    this.repository = repository;
  }
}
