/**
 * Common schemas shared across every resource family
 */
import { z } from 'zod';

/**
 * UUID identifier (internal primary keys and references), lower-cased so
 * every store compares ids the way PostgreSQL does
 */
export const UUIDSchema = z
  .string()
  .uuid('Invalid UUID format')
  .transform((value) => value.toLowerCase())
  .describe('UUID identifier');

/**
 * Externally visible FHIR logical id
 */
export const FhirIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9\-.]{1,64}$/, 'Invalid FHIR id')
  .describe('FHIR logical id');

/**
 * Calendar date (YYYY-MM-DD). Accepts a Date for rows read back from the store.
 */
export const DateSchema = z
  .union([z.date(), z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD')])
  .transform((value) => (value instanceof Date ? value.toISOString().slice(0, 10) : value))
  .describe('Calendar date');

/**
 * ISO 8601 instant, normalised to UTC
 */
export const DateTimeSchema = z
  .union([z.date(), z.string().datetime({ offset: true })])
  .transform((value) => (value instanceof Date ? value : new Date(value)).toISOString())
  .describe('ISO 8601 timestamp');

/**
 * Decimal amount. NUMERIC columns come back from pg as strings.
 */
export const DecimalSchema = z
  .union([
    z.number().finite(),
    z
      .string()
      .regex(/^-?\d+(\.\d+)?$/, 'Expected a decimal number')
      .transform(Number),
  ])
  .describe('Decimal number');

export const IntegerSchema = z.number().int();

/**
 * Present-or-absent value: `null` and a missing key both become `undefined`,
 * which JSON serialization then omits.
 */
export function optional<S extends z.ZodTypeAny>(schema: S) {
  return schema.nullish().transform((value) => value ?? undefined);
}

/**
 * Fields every top-level resource carries
 */
export const ResourceMetaSchema = z.object({
  id: UUIDSchema,
  fhirId: FhirIdSchema,
  createdAt: DateTimeSchema,
  updatedAt: DateTimeSchema,
});

/**
 * Fields every child row carries
 */
export const ChildMetaSchema = z.object({
  id: UUIDSchema,
  createdAt: DateTimeSchema,
});

/** Mask removing store-assigned fields from a resource schema */
export const RESOURCE_META_MASK = {
  id: true,
  fhirId: true,
  createdAt: true,
  updatedAt: true,
} as const;

/** Mask removing store-assigned fields from a child schema */
export const CHILD_META_MASK = {
  id: true,
  createdAt: true,
} as const;

/** Identifiers a client may supply on create */
export const ResourceIdentityInputShape = {
  id: optional(UUIDSchema),
  fhirId: optional(FhirIdSchema),
};

/**
 * Pagination query parameters
 */
export const PaginationQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

export type UUID = z.infer<typeof UUIDSchema>;
export type ResourceMeta = z.infer<typeof ResourceMetaSchema>;
export type ChildMeta = z.infer<typeof ChildMetaSchema>;
export type PaginationQuery = z.infer<typeof PaginationQuerySchema>;

/**
 * Page envelope returned by list and search operations
 */
export interface Page<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
}
