/**
 * @fileoverview Repository Implementations (Infrastructure Layer)
 *
 * Generic adapters over a table definition:
 * - PostgresResourceRepository / PostgresChildRepository
 * - InMemoryResourceRepository / InMemoryChildRepository
 *
 * Backends bundle an adapter family with its unit of work.
 *
 * @module @ehr-backend/core/repositories
 */

export type {
  ChildInput,
  ChildRepository,
  ChildTableDefinition,
  NewResource,
  OrderSpec,
  PageRequest,
  RecordSchema,
  ReferenceMap,
  ReferenceSpec,
  RepositoryBackend,
  ResourceInput,
  ResourceRepository,
  TableDefinition,
  UnitOfWork,
} from './types.js';

export {
  compileFilters,
  escapeLikePattern,
  matchesConditions,
  parseDateFilter,
  pickFilters,
  renderConditions,
  type ComparisonOperator,
  type FilterCondition,
  type FilterKind,
  type FilterMap,
  type FilterSpec,
  type PickedFilters,
  type SearchFilters,
} from './filters.js';

export { RecordCodec, toColumnName } from './codec.js';
export { translatePgError } from './postgres-errors.js';

export { PostgresResourceRepository } from './PostgresResourceRepository.js';
export { PostgresChildRepository } from './PostgresChildRepository.js';
export { InMemoryDatabase } from './InMemoryDatabase.js';
export { InMemoryResourceRepository } from './InMemoryResourceRepository.js';
export { InMemoryChildRepository } from './InMemoryChildRepository.js';

export {
  createInMemoryBackend,
  createPostgresBackend,
  InMemoryUnitOfWork,
  PostgresUnitOfWork,
} from './backends.js';
