/**
 * Request parsing helpers shared by the resource routes
 *
 * Every failure becomes a ValidationError so the error handler answers 400.
 */

import { ValidationError } from '@ehr-backend/core';
import {
  FhirIdSchema,
  PaginationQuerySchema,
  UUIDSchema,
  type PaginationQuery,
} from '@ehr-backend/types';
import { type z } from 'zod';

/** Query keys that are not search filters */
export const RESERVED_QUERY_KEYS = ['limit', 'offset', 'patient_id'] as const;

export type QueryParams = Readonly<Record<string, unknown>>;

/**
 * A missing, null or empty value for a field the schema requires
 */
function isMissingValue(issue: z.ZodIssue): boolean {
  if (issue.path.length === 0) return false;
  switch (issue.code) {
    case 'invalid_type':
      return issue.received === 'undefined' || issue.received === 'null';
    case 'too_small':
      return issue.type === 'string' && issue.minimum === 1;
    default:
      return false;
  }
}

/**
 * Parse a request body
 *
 * @throws ValidationError `<field> is required` for a missing required
 * field, otherwise `invalid <resourceType>` with the field errors
 */
export function parseBody<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown,
  resourceType: string
): T {
  const result = schema.safeParse(body ?? {});
  if (result.success) {
    return result.data;
  }

  const missing = result.error.issues.find(isMissingValue);
  if (missing !== undefined) {
    throw new ValidationError(`${missing.path.join('.')} is required`);
  }

  const { fieldErrors, formErrors } = result.error.flatten();
  throw new ValidationError(`invalid ${resourceType}`, { fieldErrors, formErrors });
}

/**
 * @throws ValidationError `invalid <name>: <value>` for a malformed UUID
 */
export function parseId(raw: string, name = 'id'): string {
  const result = UUIDSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(`invalid ${name}: ${raw.slice(0, 64)}`);
  }
  return result.data.toLowerCase();
}

export function parseFhirId(raw: string): string {
  const result = FhirIdSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(`invalid fhirId: ${raw.slice(0, 64)}`);
  }
  return result.data;
}

/**
 * `limit` 1..100 (default 20), `offset` >= 0 (default 0)
 */
export function parsePage(query: QueryParams): PaginationQuery {
  const result = PaginationQuerySchema.safeParse({ limit: query.limit, offset: query.offset });
  if (!result.success) {
    throw new ValidationError('invalid pagination', result.error.flatten().fieldErrors);
  }
  return result.data;
}
