/**
 * Tenant context
 *
 * Each tenant lives in its own PostgreSQL schema (`tenant_<id>`). The tenant
 * is bound to the async call chain with AsyncLocalStorage; repositories pick
 * it up from there instead of threading it through every signature.
 *
 * @module @ehr-backend/core/tenant/context
 */

import { AsyncLocalStorage } from 'node:async_hooks';

import { withTransaction, type DatabaseClient, type DatabasePool } from '../database.js';
import { TenantContextError } from '../errors.js';
import { createLogger } from '../logger/index.js';

interface TenantStore {
  tenantId: string;
  /** Connection of the enclosing unit of work, when there is one */
  connection?: DatabaseClient;
}

const tenantStorage = new AsyncLocalStorage<TenantStore>();
const logger = createLogger({ name: 'tenant-context' });

const TENANT_ID_PATTERN = /^[A-Za-z0-9_-]{1,48}$/;

/**
 * Normalise a raw tenant id: lower-case, `-` becomes `_`
 *
 * @throws TenantContextError when the id has characters outside `[A-Za-z0-9_-]`
 */
export function normalizeTenantId(raw: string): string {
  const trimmed = raw.trim();
  if (!TENANT_ID_PATTERN.test(trimmed)) {
    throw new TenantContextError(`Invalid tenant id: ${trimmed.slice(0, 64)}`);
  }
  return trimmed.toLowerCase().replace(/-/g, '_');
}

/**
 * Schema holding the tenant's tables
 */
export function tenantSchemaName(tenantId: string): string {
  return `tenant_${normalizeTenantId(tenantId)}`;
}

/**
 * Run `fn` with the tenant bound to its async call chain
 */
export function runWithTenant<T>(tenantId: string, fn: () => T): T {
  return tenantStorage.run({ tenantId: normalizeTenantId(tenantId) }, fn);
}

/**
 * Tenant bound to the current call chain, if any
 */
export function getTenantId(): string | undefined {
  return tenantStorage.getStore()?.tenantId;
}

/**
 * Tenant bound to the current call chain
 *
 * @throws TenantContextError outside `runWithTenant`
 */
export function requireTenantId(): string {
  const tenantId = getTenantId();
  if (tenantId === undefined) {
    throw new TenantContextError();
  }
  return tenantId;
}

/**
 * Run `fn` on a connection scoped to the current tenant
 *
 * Inside an enclosing call the existing connection is reused, so several
 * repository calls share one transaction. Otherwise a connection is
 * acquired, a transaction opened and `search_path` set (transaction-local)
 * to the tenant schema followed by `public`. The transaction commits when
 * `fn` resolves and rolls back when it throws; the connection is always
 * released.
 */
export async function withTenantConn<T>(
  pool: DatabasePool,
  fn: (connection: DatabaseClient) => Promise<T>
): Promise<T> {
  const store = tenantStorage.getStore();
  if (store === undefined) {
    throw new TenantContextError();
  }
  if (store.connection !== undefined) {
    return fn(store.connection);
  }

  const schema = tenantSchemaName(store.tenantId);
  return withTransaction(pool, async (client) => {
    await client.query("SELECT set_config('search_path', $1, true)", [`${schema}, public`]);
    logger.debug({ tenantId: store.tenantId }, 'Tenant connection opened');
    return tenantStorage.run({ tenantId: store.tenantId, connection: client }, () => fn(client));
  });
}
