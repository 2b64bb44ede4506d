/**
 * Repository contracts shared by the PostgreSQL and in-memory adapters
 *
 * A resource family is described once by a table definition; both adapters
 * derive their columns, ordering, filters and reference checks from it.
 *
 * @module @ehr-backend/core/repositories/types
 */

import type { z } from 'zod';
import type { ChildMeta, Page, PaginationQuery, ResourceMeta } from '@ehr-backend/types';

import type { FilterMap, SearchFilters } from './filters.js';

/**
 * zod object schema whose output is the record type
 */
export type RecordSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown> & {
  readonly shape: z.ZodRawShape;
};

export interface OrderSpec {
  field: string;
  direction: 'asc' | 'desc';
}

/**
 * Foreign key held by a field. `cascade` removes the referencing rows with
 * the referenced one; `restrict` refuses the delete while they exist.
 */
export interface ReferenceSpec {
  table: string;
  onDelete: 'restrict' | 'cascade';
}

export type ReferenceMap = Readonly<Record<string, ReferenceSpec>>;

/**
 * Fields a caller supplies for a resource (store-assigned metadata removed)
 */
export type ResourceInput<T extends ResourceMeta> = Omit<T, keyof ResourceMeta>;

/**
 * Create input: the caller may also choose the id and the FHIR id
 */
export type NewResource<T extends ResourceMeta> = ResourceInput<T> & {
  id?: string | undefined;
  fhirId?: string | undefined;
};

/**
 * Fields a caller supplies for a child row (metadata and parent removed)
 */
export type ChildInput<C extends ChildMeta, P extends keyof C> = Omit<C, keyof ChildMeta | P>;

export type PageRequest = Pick<PaginationQuery, 'limit' | 'offset'>;

/**
 * Top-level resource table
 */
export interface TableDefinition<T extends ResourceMeta, F extends string> {
  /** Table name inside the tenant schema */
  table: string;
  /** FHIR resource type, used in messages and logs */
  resourceType: string;
  schema: RecordSchema<T>;
  /** Fields kept from create on every update (`id` and `fhirId` always are) */
  immutable?: readonly (keyof ResourceInput<T> & string)[];
  /** Default: newest first */
  orderBy?: readonly OrderSpec[];
  /** Closed set of search keys */
  filters: FilterMap<F>;
  references?: ReferenceMap;
}

/**
 * Child row table, owned by a parent resource
 */
export interface ChildTableDefinition<C extends ChildMeta, P extends keyof C & string> {
  table: string;
  resourceType: string;
  schema: RecordSchema<C>;
  parentField: P;
  parentTable: string;
  /** Default: insertion order */
  orderBy?: readonly OrderSpec[];
  /** References other than the parent */
  references?: ReferenceMap;
}

export interface ResourceRepository<T extends ResourceMeta, F extends string> {
  readonly definition: TableDefinition<T, F>;
  create(input: NewResource<T>): Promise<T>;
  /** @throws RecordNotFoundError */
  getById(id: string): Promise<T>;
  /** @throws RecordNotFoundError */
  getByFhirId(fhirId: string): Promise<T>;
  /** Replaces every mutable field. @throws RecordNotFoundError */
  update(id: string, input: ResourceInput<T>): Promise<T>;
  /** @throws RecordNotFoundError */
  delete(id: string): Promise<void>;
  list(page: PageRequest): Promise<Page<T>>;
  /** Equality on one reference field (list by patient, by encounter, ...) */
  listBy(field: keyof ResourceInput<T> & string, value: string, page: PageRequest): Promise<Page<T>>;
  search(filters: SearchFilters<F>, page: PageRequest): Promise<Page<T>>;
}

export interface ChildRepository<C extends ChildMeta, P extends keyof C & string> {
  readonly definition: ChildTableDefinition<C, P>;
  add(parentId: string, input: ChildInput<C, P>): Promise<C>;
  listByParent(parentId: string): Promise<C[]>;
  /** @throws RecordNotFoundError when the row does not belong to the parent */
  remove(parentId: string, childId: string): Promise<void>;
}

/**
 * Groups several repository calls so they commit or fail together
 */
export interface UnitOfWork {
  run<R>(fn: () => Promise<R>): Promise<R>;
}

/**
 * Storage backend the domain layer is composed over
 */
export interface RepositoryBackend {
  readonly kind: 'postgres' | 'memory';
  readonly unitOfWork: UnitOfWork;
  resources<T extends ResourceMeta, F extends string>(
    definition: TableDefinition<T, F>
  ): ResourceRepository<T, F>;
  children<C extends ChildMeta, P extends keyof C & string>(
    definition: ChildTableDefinition<C, P>
  ): ChildRepository<C, P>;
  /** Readiness check */
  ping(): Promise<void>;
  close(): Promise<void>;
}
