/**
 * PostgreSQL Repository Tests
 *
 * SQL generation and driver error translation, against a mocked pool.
 */

import { describe, it, expect, vi } from 'vitest';

import type { DatabasePool, PoolClient, QueryResult } from '../database.js';
import {
  ConflictError,
  RecordNotFoundError,
  ReferentialIntegrityError,
  ValidationError,
} from '../errors.js';
import { PostgresChildRepository } from '../repositories/PostgresChildRepository.js';
import { orderClause, PostgresResourceRepository } from '../repositories/PostgresResourceRepository.js';
import { translatePgError } from '../repositories/postgres-errors.js';
import { runWithTenant } from '../tenant/context.js';
import { OWNER_ID, WIDGET_ID, ownerTable, partTable, widgetTable } from './fixtures.js';

type Responder = (sql: string, params: unknown[]) => QueryResult | Error;

interface RecordedQuery {
  sql: string;
  params: unknown[];
}

const EMPTY: QueryResult = { rows: [], rowCount: 0 };

function createMockPool(respond: Responder): DatabasePool & { queries: RecordedQuery[] } {
  const queries: RecordedQuery[] = [];
  const client: PoolClient = {
    query: vi.fn(async (sql: string, params: unknown[] = []) => {
      queries.push({ sql, params });
      if (sql === 'BEGIN' || sql === 'COMMIT' || sql === 'ROLLBACK' || sql.includes('set_config')) {
        return EMPTY;
      }
      const result = respond(sql, params);
      if (result instanceof Error) throw result;
      return result;
    }),
    release: vi.fn(),
  };

  return {
    queries,
    query: vi.fn(async () => EMPTY),
    connect: vi.fn(async () => client),
    end: vi.fn(async () => undefined),
  };
}

/** Statements other than transaction control */
function dataQueries(queries: RecordedQuery[]): RecordedQuery[] {
  return queries.filter(
    ({ sql }) => !['BEGIN', 'COMMIT', 'ROLLBACK'].includes(sql) && !sql.includes('set_config')
  );
}

function pgError(code: string, extra: Record<string, string> = {}): Error {
  return Object.assign(new Error(`pg error ${code}`), { code, ...extra });
}

const widgetRow = {
  id: WIDGET_ID,
  fhir_id: 'w-1',
  created_at: new Date('2024-03-01T10:00:00Z'),
  updated_at: new Date('2024-03-01T10:00:00Z'),
  owner_id: OWNER_ID,
  status: 'active',
  label: null,
  made_on: '2024-02-29',
  seen_at: null,
};

const inTenant = <T>(fn: () => Promise<T>): Promise<T> => runWithTenant('acme', fn);

describe('orderClause', () => {
  it('should render every key with NULLS LAST', () => {
    const clause = orderClause(
      (field) => (field === 'lastName' ? 'last_name' : 'first_name'),
      ownerTable.orderBy ?? []
    );
    expect(clause).toBe('last_name ASC NULLS LAST, first_name ASC NULLS LAST');
  });
});

describe('PostgresResourceRepository', () => {
  describe('create', () => {
    it('should insert present fields and map the returned row', async () => {
      const pool = createMockPool(() => ({ rows: [widgetRow], rowCount: 1 }));
      const repository = new PostgresResourceRepository(pool, widgetTable);

      const widget = await inTenant(() =>
        repository.create({
          id: WIDGET_ID,
          fhirId: 'w-1',
          ownerId: OWNER_ID,
          status: 'active',
          madeOn: '2024-02-29',
        })
      );

      expect(dataQueries(pool.queries)).toEqual([
        {
          sql: 'INSERT INTO widget (id, fhir_id, owner_id, status, made_on) VALUES ($1, $2, $3, $4, $5) RETURNING *',
          params: [WIDGET_ID, 'w-1', OWNER_ID, 'active', '2024-02-29'],
        },
      ]);
      expect(widget).toEqual({
        id: WIDGET_ID,
        fhirId: 'w-1',
        createdAt: '2024-03-01T10:00:00.000Z',
        updatedAt: '2024-03-01T10:00:00.000Z',
        ownerId: OWNER_ID,
        status: 'active',
        madeOn: '2024-02-29',
      });
    });

    it('should default the FHIR id to the generated id', async () => {
      const pool = createMockPool(() => ({ rows: [widgetRow], rowCount: 1 }));
      const repository = new PostgresResourceRepository(pool, widgetTable);

      await inTenant(() => repository.create({ ownerId: OWNER_ID }));

      const [insert] = dataQueries(pool.queries);
      expect(insert?.params[0]).toEqual(expect.any(String));
      expect(insert?.params[1]).toBe(insert?.params[0]);
    });

    it('should run inside the tenant transaction', async () => {
      const pool = createMockPool(() => ({ rows: [widgetRow], rowCount: 1 }));
      const repository = new PostgresResourceRepository(pool, widgetTable);

      await inTenant(() => repository.create({ ownerId: OWNER_ID }));

      expect(pool.queries.map(({ sql }) => sql)).toEqual([
        'BEGIN',
        "SELECT set_config('search_path', $1, true)",
        expect.stringMatching(/^INSERT INTO widget/),
        'COMMIT',
      ]);
    });
  });

  describe('update', () => {
    it('should assign every mutable field and skip immutable ones', async () => {
      const pool = createMockPool(() => ({ rows: [{ ...widgetRow, status: 'inactive' }], rowCount: 1 }));
      const repository = new PostgresResourceRepository(pool, widgetTable);

      const widget = await inTenant(() =>
        repository.update(WIDGET_ID, { ownerId: OWNER_ID, status: 'inactive' })
      );

      expect(dataQueries(pool.queries)).toEqual([
        {
          sql: 'UPDATE widget SET status = $2, label = $3, made_on = $4, seen_at = $5, updated_at = now() WHERE id = $1 RETURNING *',
          params: [WIDGET_ID, 'inactive', null, null, null],
        },
      ]);
      expect(widget.status).toBe('inactive');
    });

    it('should fail with RecordNotFoundError when no row is returned', async () => {
      const pool = createMockPool(() => EMPTY);
      const repository = new PostgresResourceRepository(pool, widgetTable);

      await expect(
        inTenant(() => repository.update(WIDGET_ID, { ownerId: OWNER_ID }))
      ).rejects.toBeInstanceOf(RecordNotFoundError);
    });
  });

  describe('reads', () => {
    it('should look up by FHIR id', async () => {
      const pool = createMockPool(() => ({ rows: [widgetRow], rowCount: 1 }));
      const repository = new PostgresResourceRepository(pool, widgetTable);

      const widget = await inTenant(() => repository.getByFhirId('w-1'));

      expect(dataQueries(pool.queries)).toEqual([
        { sql: 'SELECT * FROM widget WHERE fhir_id = $1', params: ['w-1'] },
      ]);
      expect(widget.id).toBe(WIDGET_ID);
    });

    it('should report a missing id', async () => {
      const pool = createMockPool(() => EMPTY);
      const repository = new PostgresResourceRepository(pool, widgetTable);

      await expect(inTenant(() => repository.getById(WIDGET_ID))).rejects.toThrow(
        `Widget not found: ${WIDGET_ID}`
      );
    });
  });

  describe('delete', () => {
    it('should fail when nothing was deleted', async () => {
      const pool = createMockPool(() => EMPTY);
      const repository = new PostgresResourceRepository(pool, widgetTable);

      await expect(inTenant(() => repository.delete(WIDGET_ID))).rejects.toBeInstanceOf(
        RecordNotFoundError
      );
    });

    it('should resolve when a row was deleted', async () => {
      const pool = createMockPool(() => ({ rows: [], rowCount: 1 }));
      const repository = new PostgresResourceRepository(pool, widgetTable);

      await expect(inTenant(() => repository.delete(WIDGET_ID))).resolves.toBeUndefined();
    });
  });

  describe('paging', () => {
    it('should count and page with the same predicates', async () => {
      const pool = createMockPool((sql) =>
        sql.startsWith('SELECT COUNT')
          ? { rows: [{ total: 42 }], rowCount: 1 }
          : { rows: [widgetRow], rowCount: 1 }
      );
      const repository = new PostgresResourceRepository(pool, widgetTable);

      const page = await inTenant(() =>
        repository.search({ status: 'active', label: '50%_off' }, { limit: 10, offset: 0 })
      );

      expect(dataQueries(pool.queries)).toEqual([
        {
          sql: 'SELECT COUNT(*)::int AS total FROM widget WHERE status = $1 AND label ILIKE $2',
          params: ['active', '50\\%\\_off%'],
        },
        {
          sql: 'SELECT * FROM widget WHERE status = $1 AND label ILIKE $2 ORDER BY created_at DESC NULLS LAST LIMIT $3 OFFSET $4',
          params: ['active', '50\\%\\_off%', 10, 0],
        },
      ]);
      expect(page.total).toBe(42);
      expect(page.limit).toBe(10);
      expect(page.offset).toBe(0);
      expect(page.items).toHaveLength(1);
    });

    it('should compare timestamps by UTC calendar date', async () => {
      const pool = createMockPool((sql) =>
        sql.startsWith('SELECT COUNT') ? { rows: [{ total: 0 }], rowCount: 1 } : EMPTY
      );
      const repository = new PostgresResourceRepository(pool, widgetTable);

      await inTenant(() => repository.search({ seen: 'ge2024-01-01' }, { limit: 20, offset: 0 }));

      expect(dataQueries(pool.queries)[0]).toEqual({
        sql: "SELECT COUNT(*)::int AS total FROM widget WHERE (seen_at AT TIME ZONE 'UTC')::date >= $1::date",
        params: ['2024-01-01'],
      });
    });

    it('should list by a field with the declared ordering', async () => {
      const pool = createMockPool((sql) =>
        sql.startsWith('SELECT COUNT') ? { rows: [{ total: 0 }], rowCount: 1 } : EMPTY
      );
      const repository = new PostgresResourceRepository(pool, ownerTable);

      await inTenant(() => repository.listBy('lastName', 'Hopper', { limit: 5, offset: 5 }));

      expect(dataQueries(pool.queries)[1]).toEqual({
        sql: 'SELECT * FROM owner WHERE last_name = $1 ORDER BY last_name ASC NULLS LAST, first_name ASC NULLS LAST LIMIT $2 OFFSET $3',
        params: ['Hopper', 5, 5],
      });
    });

    it('should reject a malformed reference filter before querying', async () => {
      const pool = createMockPool(() => EMPTY);
      const repository = new PostgresResourceRepository(pool, widgetTable);

      await expect(
        inTenant(() => repository.search({ owner: 'not-a-uuid' }, { limit: 20, offset: 0 }))
      ).rejects.toThrow('invalid owner: not-a-uuid');
      expect(pool.connect).not.toHaveBeenCalled();
    });
  });

  describe('error translation', () => {
    it('should turn a foreign key violation into ReferentialIntegrityError and roll back', async () => {
      const pool = createMockPool(() =>
        pgError('23503', { constraint: 'widget_owner_id_fkey' })
      );
      const repository = new PostgresResourceRepository(pool, widgetTable);

      const failure = inTenant(() => repository.create({ ownerId: OWNER_ID }));

      await expect(failure).rejects.toBeInstanceOf(ReferentialIntegrityError);
      expect(pool.queries.at(-1)?.sql).toBe('ROLLBACK');
    });

    it('should turn a unique violation into ConflictError', async () => {
      const pool = createMockPool(() => pgError('23505'));
      const repository = new PostgresResourceRepository(pool, widgetTable);

      await expect(inTenant(() => repository.create({ ownerId: OWNER_ID }))).rejects.toThrow(
        new ConflictError('widget', 'Widget already exists')
      );
    });
  });
});

describe('translatePgError', () => {
  it('should name the missing field of a not-null violation', () => {
    const error = translatePgError(pgError('23502', { column: 'owner_id' }), 'widget', 'Widget');

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toHaveProperty('message', 'ownerId is required');
  });

  it('should treat malformed input as a validation error', () => {
    expect(translatePgError(pgError('22P02'), 'widget', 'Widget')).toBeInstanceOf(ValidationError);
    expect(translatePgError(pgError('23514'), 'widget', 'Widget')).toBeInstanceOf(ValidationError);
  });

  it('should pass other failures through unchanged', () => {
    const original = pgError('57P01');
    expect(translatePgError(original, 'widget', 'Widget')).toBe(original);

    const plain = new Error('connection reset');
    expect(translatePgError(plain, 'widget', 'Widget')).toBe(plain);
  });
});

describe('PostgresChildRepository', () => {
  const partRow = {
    id: '9f8e7d6c-5b4a-4392-8d1e-0f1e2d3c4b5a',
    widget_id: WIDGET_ID,
    created_at: new Date('2024-03-02T08:00:00Z'),
    name: 'bolt',
    position: 2,
  };

  it('should insert the parent column after the id', async () => {
    const pool = createMockPool(() => ({ rows: [partRow], rowCount: 1 }));
    const repository = new PostgresChildRepository(pool, partTable);

    const part = await inTenant(() => repository.add(WIDGET_ID, { name: 'bolt', position: 2 }));

    expect(dataQueries(pool.queries)).toEqual([
      {
        sql: 'INSERT INTO part (id, widget_id, name, position) VALUES ($1, $2, $3, $4) RETURNING *',
        params: [expect.any(String), WIDGET_ID, 'bolt', 2],
      },
    ]);
    expect(part).toEqual({
      id: partRow.id,
      widgetId: WIDGET_ID,
      createdAt: '2024-03-02T08:00:00.000Z',
      name: 'bolt',
      position: 2,
    });
  });

  it('should list a parent with the declared ordering', async () => {
    const pool = createMockPool(() => ({ rows: [partRow], rowCount: 1 }));
    const repository = new PostgresChildRepository(pool, partTable);

    await inTenant(() => repository.listByParent(WIDGET_ID));

    expect(dataQueries(pool.queries)).toEqual([
      {
        sql: 'SELECT * FROM part WHERE widget_id = $1 ORDER BY position ASC NULLS LAST',
        params: [WIDGET_ID],
      },
    ]);
  });

  it('should only remove a row owned by the parent', async () => {
    const pool = createMockPool(() => EMPTY);
    const repository = new PostgresChildRepository(pool, partTable);

    await expect(inTenant(() => repository.remove(WIDGET_ID, partRow.id))).rejects.toBeInstanceOf(
      RecordNotFoundError
    );
    expect(dataQueries(pool.queries)).toEqual([
      {
        sql: 'DELETE FROM part WHERE id = $1 AND widget_id = $2',
        params: [partRow.id, WIDGET_ID],
      },
    ]);
  });
});
