/**
 * PostgreSQL Resource Repository
 *
 * One generic adapter serves every resource family: columns, ordering and
 * search come from the table definition. All statements run through
 * `withTenantConn`, so they see the tenant schema and join an enclosing unit
 * of work when there is one.
 *
 * @module @ehr-backend/core/repositories/PostgresResourceRepository
 */

import { v4 as uuidv4 } from 'uuid';
import type { Page, ResourceMeta } from '@ehr-backend/types';

import type { DatabaseClient, DatabasePool, QueryResult } from '../database.js';
import { RecordNotFoundError } from '../errors.js';
import { withTenantConn } from '../tenant/context.js';
import { readString, RecordCodec, RESOURCE_META_FIELDS } from './codec.js';
import { compileFilters, renderConditions, type SearchFilters } from './filters.js';
import { translatePgError } from './postgres-errors.js';
import type {
  NewResource,
  OrderSpec,
  PageRequest,
  ResourceInput,
  ResourceRepository,
  TableDefinition,
} from './types.js';

const DEFAULT_ORDER: readonly OrderSpec[] = [{ field: 'createdAt', direction: 'desc' }];

/**
 * Render an ORDER BY list; missing values sort last in either direction
 */
export function orderClause(
  column: (field: string) => string,
  orderBy: readonly OrderSpec[]
): string {
  return orderBy
    .map(({ field, direction }) => `${column(field)} ${direction.toUpperCase()} NULLS LAST`)
    .join(', ');
}

export class PostgresResourceRepository<T extends ResourceMeta, F extends string>
  implements ResourceRepository<T, F>
{
  private readonly codec: RecordCodec<T>;
  private readonly dataFields: readonly string[];
  private readonly mutableFields: readonly string[];
  private readonly order: string;

  constructor(
    private readonly pool: DatabasePool,
    readonly definition: TableDefinition<T, F>
  ) {
    this.codec = new RecordCodec(definition.schema);
    this.dataFields = this.codec.dataFields(RESOURCE_META_FIELDS);
    const immutable: readonly string[] = definition.immutable ?? [];
    this.mutableFields = this.dataFields.filter((field) => !immutable.includes(field));
    this.order = orderClause(
      (field) => this.codec.column(field),
      definition.orderBy ?? DEFAULT_ORDER
    );
  }

  async create(input: NewResource<T>): Promise<T> {
    const values = new Map<string, unknown>(Object.entries(input));
    const id = readString(values, 'id') ?? uuidv4();
    const fhirId = readString(values, 'fhirId') ?? id;

    const fields = this.dataFields.filter((field) => values.get(field) !== undefined);
    const columns = ['id', 'fhir_id', ...fields.map((field) => this.codec.column(field))];
    const params = [id, fhirId, ...fields.map((field) => values.get(field))];
    const placeholders = params.map((_value, index) => `$${index + 1}`);

    const result = await this.execute((conn) =>
      conn.query(
        `INSERT INTO ${this.definition.table} (${columns.join(', ')}) VALUES (${placeholders.join(', ')}) RETURNING *`,
        params
      )
    );
    return this.single(result, id);
  }

  async getById(id: string): Promise<T> {
    const result = await this.execute((conn) =>
      conn.query(`SELECT * FROM ${this.definition.table} WHERE id = $1`, [id])
    );
    return this.single(result, id);
  }

  async getByFhirId(fhirId: string): Promise<T> {
    const result = await this.execute((conn) =>
      conn.query(`SELECT * FROM ${this.definition.table} WHERE fhir_id = $1`, [fhirId])
    );
    return this.single(result, fhirId);
  }

  async update(id: string, input: ResourceInput<T>): Promise<T> {
    const values = new Map<string, unknown>(Object.entries(input));
    const assignments = this.mutableFields.map(
      (field, index) => `${this.codec.column(field)} = $${index + 2}`
    );
    const params = [id, ...this.mutableFields.map((field) => values.get(field) ?? null)];

    const result = await this.execute((conn) =>
      conn.query(
        `UPDATE ${this.definition.table} SET ${[...assignments, 'updated_at = now()'].join(', ')} WHERE id = $1 RETURNING *`,
        params
      )
    );
    return this.single(result, id);
  }

  async delete(id: string): Promise<void> {
    const result = await this.execute((conn) =>
      conn.query(`DELETE FROM ${this.definition.table} WHERE id = $1`, [id])
    );
    if (result.rowCount === 0) {
      throw this.notFound(id);
    }
  }

  list(page: PageRequest): Promise<Page<T>> {
    return this.page([], [], page);
  }

  listBy(
    field: keyof ResourceInput<T> & string,
    value: string,
    page: PageRequest
  ): Promise<Page<T>> {
    return this.page([`${this.codec.column(field)} = $1`], [value], page);
  }

  search(filters: SearchFilters<F>, page: PageRequest): Promise<Page<T>> {
    const conditions = compileFilters(this.definition.filters, filters);
    const { clauses, params } = renderConditions(conditions, (field) => this.codec.column(field));
    return this.page(clauses, params, page);
  }

  private async page(clauses: string[], params: unknown[], page: PageRequest): Promise<Page<T>> {
    const where = clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : '';
    const limitIndex = params.length + 1;

    const [countResult, dataResult] = await this.execute(async (conn) => {
      const count = await conn.query(
        `SELECT COUNT(*)::int AS total FROM ${this.definition.table}${where}`,
        params
      );
      const data = await conn.query(
        `SELECT * FROM ${this.definition.table}${where} ORDER BY ${this.order} LIMIT $${limitIndex} OFFSET $${limitIndex + 1}`,
        [...params, page.limit, page.offset]
      );
      return [count, data] as const;
    });

    return {
      items: dataResult.rows.map((row) => this.codec.fromRow(row)),
      total: Number(countResult.rows[0]?.total ?? 0),
      limit: page.limit,
      offset: page.offset,
    };
  }

  private single(result: QueryResult, key: string): T {
    const row = result.rows[0];
    if (row === undefined) {
      throw this.notFound(key);
    }
    return this.codec.fromRow(row);
  }

  private notFound(key: string): RecordNotFoundError {
    return new RecordNotFoundError(this.definition.table, this.definition.resourceType, key);
  }

  private async execute<R>(fn: (conn: DatabaseClient) => Promise<R>): Promise<R> {
    try {
      return await withTenantConn(this.pool, fn);
    } catch (error: unknown) {
      throw translatePgError(error, this.definition.table, this.definition.resourceType);
    }
  }
}
