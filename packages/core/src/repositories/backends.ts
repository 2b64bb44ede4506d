/**
 * Repository backends
 *
 * The domain layer is composed over a backend: PostgreSQL in deployment,
 * the in-memory store in development and tests.
 *
 * @module @ehr-backend/core/repositories/backends
 */

import type { ChildMeta, ResourceMeta } from '@ehr-backend/types';

import { pingDatabase, type DatabasePool } from '../database.js';
import { withTenantConn } from '../tenant/context.js';
import { InMemoryChildRepository } from './InMemoryChildRepository.js';
import { InMemoryDatabase } from './InMemoryDatabase.js';
import { InMemoryResourceRepository } from './InMemoryResourceRepository.js';
import { PostgresChildRepository } from './PostgresChildRepository.js';
import { PostgresResourceRepository } from './PostgresResourceRepository.js';
import type {
  ChildRepository,
  ChildTableDefinition,
  RepositoryBackend,
  ResourceRepository,
  TableDefinition,
  UnitOfWork,
} from './types.js';

/**
 * Unit of work over one tenant transaction: repository calls made inside
 * `run` share its connection
 */
export class PostgresUnitOfWork implements UnitOfWork {
  constructor(private readonly pool: DatabasePool) {}

  run<R>(fn: () => Promise<R>): Promise<R> {
    return withTenantConn(this.pool, () => fn());
  }
}

/**
 * Unit of work over the in-memory store: rows written inside `run` are
 * put back when `fn` fails
 */
export class InMemoryUnitOfWork implements UnitOfWork {
  constructor(private readonly db: InMemoryDatabase) {}

  run<R>(fn: () => Promise<R>): Promise<R> {
    return this.db.transaction(fn);
  }
}

export function createPostgresBackend(pool: DatabasePool): RepositoryBackend {
  return {
    kind: 'postgres',
    unitOfWork: new PostgresUnitOfWork(pool),
    resources<T extends ResourceMeta, F extends string>(
      definition: TableDefinition<T, F>
    ): ResourceRepository<T, F> {
      return new PostgresResourceRepository(pool, definition);
    },
    children<C extends ChildMeta, P extends keyof C & string>(
      definition: ChildTableDefinition<C, P>
    ): ChildRepository<C, P> {
      return new PostgresChildRepository(pool, definition);
    },
    ping: () => pingDatabase(pool),
    close: () => pool.end(),
  };
}

export function createInMemoryBackend(db: InMemoryDatabase = new InMemoryDatabase()): RepositoryBackend {
  return {
    kind: 'memory',
    unitOfWork: new InMemoryUnitOfWork(db),
    resources<T extends ResourceMeta, F extends string>(
      definition: TableDefinition<T, F>
    ): ResourceRepository<T, F> {
      return new InMemoryResourceRepository(db, definition);
    },
    children<C extends ChildMeta, P extends keyof C & string>(
      definition: ChildTableDefinition<C, P>
    ): ChildRepository<C, P> {
      return new InMemoryChildRepository(db, definition);
    },
    ping: () => Promise.resolve(),
    close: async () => {
      db.clear();
    },
  };
}
