/**
 * PostgreSQL Child Repository
 *
 * Rows owned by a parent resource (participants, claim lines, status
 * history, ...). Listing is scoped to one parent; removal only succeeds for
 * a row that belongs to the given parent.
 *
 * @module @ehr-backend/core/repositories/PostgresChildRepository
 */

import { v4 as uuidv4 } from 'uuid';
import type { ChildMeta } from '@ehr-backend/types';

import type { DatabaseClient, DatabasePool } from '../database.js';
import { RecordNotFoundError, RepositoryError } from '../errors.js';
import { withTenantConn } from '../tenant/context.js';
import { CHILD_META_FIELDS, RecordCodec } from './codec.js';
import { orderClause } from './PostgresResourceRepository.js';
import { translatePgError } from './postgres-errors.js';
import type { ChildInput, ChildRepository, ChildTableDefinition, OrderSpec } from './types.js';

const INSERTION_ORDER: readonly OrderSpec[] = [{ field: 'createdAt', direction: 'asc' }];

export class PostgresChildRepository<C extends ChildMeta, P extends keyof C & string>
  implements ChildRepository<C, P>
{
  private readonly codec: RecordCodec<C>;
  private readonly dataFields: readonly string[];
  private readonly parentColumn: string;
  private readonly order: string;

  constructor(
    private readonly pool: DatabasePool,
    readonly definition: ChildTableDefinition<C, P>
  ) {
    this.codec = new RecordCodec(definition.schema);
    this.dataFields = this.codec
      .dataFields(CHILD_META_FIELDS)
      .filter((field) => field !== definition.parentField);
    this.parentColumn = this.codec.column(definition.parentField);
    this.order = orderClause(
      (field) => this.codec.column(field),
      definition.orderBy ?? INSERTION_ORDER
    );
  }

  async add(parentId: string, input: ChildInput<C, P>): Promise<C> {
    const values = new Map<string, unknown>(Object.entries(input));
    const id = uuidv4();

    const fields = this.dataFields.filter((field) => values.get(field) !== undefined);
    const columns = ['id', this.parentColumn, ...fields.map((field) => this.codec.column(field))];
    const params = [id, parentId, ...fields.map((field) => values.get(field))];
    const placeholders = params.map((_value, index) => `$${index + 1}`);

    const result = await this.execute((conn) =>
      conn.query(
        `INSERT INTO ${this.definition.table} (${columns.join(', ')}) VALUES (${placeholders.join(', ')}) RETURNING *`,
        params
      )
    );
    const row = result.rows[0];
    if (row === undefined) {
      throw new RepositoryError(this.definition.table, 'add', 'Insert returned no row');
    }
    return this.codec.fromRow(row);
  }

  async listByParent(parentId: string): Promise<C[]> {
    const result = await this.execute((conn) =>
      conn.query(
        `SELECT * FROM ${this.definition.table} WHERE ${this.parentColumn} = $1 ORDER BY ${this.order}`,
        [parentId]
      )
    );
    return result.rows.map((row) => this.codec.fromRow(row));
  }

  async remove(parentId: string, childId: string): Promise<void> {
    const result = await this.execute((conn) =>
      conn.query(
        `DELETE FROM ${this.definition.table} WHERE id = $1 AND ${this.parentColumn} = $2`,
        [childId, parentId]
      )
    );
    if (result.rowCount === 0) {
      throw new RecordNotFoundError(this.definition.table, this.definition.resourceType, childId);
    }
  }

  private async execute<R>(fn: (conn: DatabaseClient) => Promise<R>): Promise<R> {
    try {
      return await withTenantConn(this.pool, fn);
    } catch (error: unknown) {
      throw translatePgError(error, this.definition.table, this.definition.resourceType);
    }
  }
}
