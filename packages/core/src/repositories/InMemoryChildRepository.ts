/**
 * In-Memory Child Repository
 *
 * @module @ehr-backend/core/repositories/InMemoryChildRepository
 */

import { v4 as uuidv4 } from 'uuid';
import type { ChildMeta } from '@ehr-backend/types';

import { RecordNotFoundError } from '../errors.js';
import { CHILD_META_FIELDS, RecordCodec } from './codec.js';
import { sortRecords, type InMemoryDatabase, type StoredRecord } from './InMemoryDatabase.js';
import type { ChildInput, ChildRepository, ChildTableDefinition } from './types.js';

export class InMemoryChildRepository<C extends ChildMeta, P extends keyof C & string>
  implements ChildRepository<C, P>
{
  private readonly codec: RecordCodec<C>;
  private readonly dataFields: readonly string[];

  constructor(
    private readonly db: InMemoryDatabase,
    readonly definition: ChildTableDefinition<C, P>
  ) {
    this.codec = new RecordCodec(definition.schema);
    this.dataFields = this.codec
      .dataFields(CHILD_META_FIELDS)
      .filter((field) => field !== definition.parentField);
    db.registerTable(definition.table, {
      ...definition.references,
      [definition.parentField]: { table: definition.parentTable, onDelete: 'cascade' },
    });
  }

  async add(parentId: string, input: ChildInput<C, P>): Promise<C> {
    const values = new Map<string, unknown>(Object.entries(input));
    const fields = new Map<string, unknown>([
      ['id', uuidv4()],
      ['createdAt', new Date().toISOString()],
      [this.definition.parentField, parentId],
    ]);
    for (const field of this.dataFields) {
      const value = values.get(field);
      if (value !== undefined) fields.set(field, value);
    }
    this.db.assertReferencesExist(this.definition.table, fields);

    const record = this.codec.fromFields(fields, this.definition.resourceType);
    this.db.put(this.definition.table, record.id, {
      sequence: this.db.nextSequence(),
      fields: new Map(Object.entries(record)),
    });
    return record;
  }

  async listByParent(parentId: string): Promise<C[]> {
    const owned = [...this.rows().values()].filter(
      (record) => record.fields.get(this.definition.parentField) === parentId
    );
    const ordered = this.definition.orderBy
      ? sortRecords(owned, this.definition.orderBy)
      : owned.sort((left, right) => left.sequence - right.sequence);
    return ordered.map((record) => this.codec.fromFields(record.fields, this.definition.resourceType));
  }

  async remove(parentId: string, childId: string): Promise<void> {
    const record = this.rows().get(childId);
    if (record?.fields.get(this.definition.parentField) !== parentId) {
      throw new RecordNotFoundError(this.definition.table, this.definition.resourceType, childId);
    }
    this.db.delete(this.definition.table, childId);
  }

  private rows(): Map<string, StoredRecord> {
    return this.db.table(this.definition.table);
  }
}
