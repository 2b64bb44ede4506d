/**
 * In-Memory Resource Repository
 *
 * Test/development adapter with the same contract as
 * PostgresResourceRepository: ordering, filter semantics, reference checks
 * and errors match the SQL adapter. Every failure is a rejection.
 *
 * @module @ehr-backend/core/repositories/InMemoryResourceRepository
 */

import { v4 as uuidv4 } from 'uuid';
import type { Page, ResourceMeta } from '@ehr-backend/types';

import { ConflictError, RecordNotFoundError } from '../errors.js';
import { readString, RecordCodec, RESOURCE_META_FIELDS } from './codec.js';
import {
  compileFilters,
  matchesConditions,
  type FilterCondition,
  type SearchFilters,
} from './filters.js';
import { sortRecords, type InMemoryDatabase, type StoredRecord } from './InMemoryDatabase.js';
import type {
  NewResource,
  OrderSpec,
  PageRequest,
  ResourceInput,
  ResourceRepository,
  TableDefinition,
} from './types.js';

const DEFAULT_ORDER: readonly OrderSpec[] = [{ field: 'createdAt', direction: 'desc' }];

export class InMemoryResourceRepository<T extends ResourceMeta, F extends string>
  implements ResourceRepository<T, F>
{
  private readonly codec: RecordCodec<T>;
  private readonly dataFields: readonly string[];
  private readonly mutableFields: readonly string[];

  constructor(
    private readonly db: InMemoryDatabase,
    readonly definition: TableDefinition<T, F>
  ) {
    this.codec = new RecordCodec(definition.schema);
    this.dataFields = this.codec.dataFields(RESOURCE_META_FIELDS);
    const immutable: readonly string[] = definition.immutable ?? [];
    this.mutableFields = this.dataFields.filter((field) => !immutable.includes(field));
    db.registerTable(definition.table, definition.references ?? {});
  }

  async create(input: NewResource<T>): Promise<T> {
    const values = new Map<string, unknown>(Object.entries(input));
    const id = readString(values, 'id') ?? uuidv4();
    const fhirId = readString(values, 'fhirId') ?? id;
    const table = this.rows();

    if (table.has(id)) {
      throw new ConflictError(this.definition.table, `${this.definition.resourceType} already exists`);
    }
    for (const record of table.values()) {
      if (record.fields.get('fhirId') === fhirId) {
        throw new ConflictError(this.definition.table, `${this.definition.resourceType} already exists`);
      }
    }
    this.db.assertReferencesExist(this.definition.table, values);

    const now = new Date().toISOString();
    const fields = new Map<string, unknown>([
      ['id', id],
      ['fhirId', fhirId],
      ['createdAt', now],
      ['updatedAt', now],
    ]);
    for (const field of this.dataFields) {
      const value = values.get(field);
      if (value !== undefined) fields.set(field, value);
    }

    return this.store(fields, this.db.nextSequence());
  }

  async getById(id: string): Promise<T> {
    return this.toRecord(this.find(id));
  }

  async getByFhirId(fhirId: string): Promise<T> {
    for (const record of this.rows().values()) {
      if (record.fields.get('fhirId') === fhirId) {
        return this.toRecord(record);
      }
    }
    throw this.notFound(fhirId);
  }

  async update(id: string, input: ResourceInput<T>): Promise<T> {
    const current = this.find(id);
    const values = new Map<string, unknown>(Object.entries(input));
    const fields = new Map(current.fields);

    for (const field of this.mutableFields) {
      const value = values.get(field);
      if (value === undefined || value === null) {
        fields.delete(field);
      } else {
        fields.set(field, value);
      }
    }
    this.db.assertReferencesExist(this.definition.table, fields);
    fields.set('updatedAt', new Date().toISOString());

    return this.store(fields, current.sequence);
  }

  async delete(id: string): Promise<void> {
    if (!this.db.delete(this.definition.table, id)) {
      throw this.notFound(id);
    }
  }

  async list(page: PageRequest): Promise<Page<T>> {
    return this.page([], page);
  }

  async listBy(
    field: keyof ResourceInput<T> & string,
    value: string,
    page: PageRequest
  ): Promise<Page<T>> {
    return this.page([{ kind: 'token', field, value }], page);
  }

  async search(filters: SearchFilters<F>, page: PageRequest): Promise<Page<T>> {
    return this.page(compileFilters(this.definition.filters, filters), page);
  }

  private page(conditions: readonly FilterCondition[], page: PageRequest): Page<T> {
    const matching = [...this.rows().values()].filter((record) =>
      matchesConditions(record.fields, conditions)
    );
    const sorted = sortRecords(matching, this.definition.orderBy ?? DEFAULT_ORDER);

    return {
      items: sorted
        .slice(page.offset, page.offset + page.limit)
        .map((record) => this.toRecord(record)),
      total: matching.length,
      limit: page.limit,
      offset: page.offset,
    };
  }

  private store(fields: Map<string, unknown>, sequence: number): T {
    const record = this.codec.fromFields(fields, this.definition.resourceType);
    this.db.put(this.definition.table, record.id, {
      sequence,
      fields: new Map(Object.entries(record)),
    });
    return record;
  }

  private find(id: string): StoredRecord {
    const record = this.rows().get(id);
    if (record === undefined) {
      throw this.notFound(id);
    }
    return record;
  }

  private toRecord(record: StoredRecord): T {
    return this.codec.fromFields(record.fields, this.definition.resourceType);
  }

  private rows(): Map<string, StoredRecord> {
    return this.db.table(this.definition.table);
  }

  private notFound(key: string): RecordNotFoundError {
    return new RecordNotFoundError(this.definition.table, this.definition.resourceType, key);
  }
}
