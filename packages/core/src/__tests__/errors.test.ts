import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConflictError,
  DatabaseConfigError,
  NotFoundError,
  RecordNotFoundError,
  ReferentialIntegrityError,
  RepositoryError,
  TenantContextError,
  ValidationError,
  isOperationalError,
  toSafeErrorResponse,
} from '../errors.js';

describe('AppError', () => {
  it('should create error with correct properties', () => {
    const error = new AppError('Test error', 'TEST_CODE', 400);

    expect(error.message).toBe('Test error');
    expect(error.code).toBe('TEST_CODE');
    expect(error.statusCode).toBe(400);
    expect(error.isOperational).toBe(true);
  });

  it('should default to 500 status code', () => {
    const error = new AppError('Test', 'CODE');
    expect(error.statusCode).toBe(500);
  });
});

describe('ValidationError', () => {
  it('should have 400 status code', () => {
    const error = new ValidationError('mrn is required');
    expect(error.statusCode).toBe(400);
    expect(error.code).toBe('VALIDATION_ERROR');
  });

  it('should include details in the safe error only when present', () => {
    expect(new ValidationError('invalid Patient').toSafeError()).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'invalid Patient',
      statusCode: 400,
    });
    expect(
      new ValidationError('invalid Patient', { birthDate: ['Expected YYYY-MM-DD'] }).toSafeError()
    ).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'invalid Patient',
      statusCode: 400,
      details: { birthDate: ['Expected YYYY-MM-DD'] },
    });
  });
});

describe('repository errors', () => {
  it('should describe a missing record', () => {
    const error = new RecordNotFoundError('patient', 'Patient', 'abc');

    expect(error.message).toBe('Patient not found: abc');
    expect(error.statusCode).toBe(404);
    expect(error.code).toBe('RECORD_NOT_FOUND');
  });

  it('should map integrity and conflict failures to 400 and 409', () => {
    expect(new ReferentialIntegrityError('encounter', 'bad reference').statusCode).toBe(400);
    expect(new ConflictError('patient', 'Patient already exists').statusCode).toBe(409);
  });

  it('should keep the wrapped driver error', () => {
    const cause = new Error('socket hang up');
    const error = new RepositoryError('claim', 'add', 'Insert failed', cause);

    expect(error.originalError).toBe(cause);
    expect(error.statusCode).toBe(500);
  });

  it('should default the configuration message', () => {
    expect(new DatabaseConfigError('api').message).toBe('Database connection not configured');
  });
});

describe('TenantContextError', () => {
  it('should use the TENANT_REQUIRED code', () => {
    const error = new TenantContextError();

    expect(error.code).toBe('TENANT_REQUIRED');
    expect(error.statusCode).toBe(400);
    expect(error.message).toBe('Tenant is required');
  });
});

describe('NotFoundError', () => {
  it('should name the resource', () => {
    expect(new NotFoundError('Route').message).toBe('Route not found');
  });
});

describe('isOperationalError', () => {
  it('should accept application errors only', () => {
    expect(isOperationalError(new ValidationError('x'))).toBe(true);
    expect(isOperationalError(new Error('x'))).toBe(false);
    expect(isOperationalError('x')).toBe(false);
  });
});

describe('toSafeErrorResponse', () => {
  it('should pass application errors through', () => {
    expect(toSafeErrorResponse(new ConflictError('patient', 'Patient already exists'))).toEqual({
      code: 'CONFLICT',
      message: 'Patient already exists',
      statusCode: 409,
    });
  });

  it('should hide the message of unexpected errors', () => {
    expect(toSafeErrorResponse(new Error('password=test-secret'))).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
      statusCode: 500,
    });
  });
});
