/**
 * Tenant resolution plugin
 *
 * Every request in the scope the plugin is registered in must name a tenant:
 * the configured header wins, the default tenant is the fallback. Handlers
 * run their service calls through `inTenant` so repositories see the tenant
 * on their async call chain.
 */

import { normalizeTenantId, runWithTenant, TenantContextError } from '@ehr-backend/core';
import { type FastifyPluginAsync, type FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';

declare module 'fastify' {
  interface FastifyRequest {
    tenantId: string;
  }
}

export interface TenantPluginOptions {
  /** Lower-case header name */
  header: string;
  defaultTenantId?: string | undefined;
}

const tenantPlugin: FastifyPluginAsync<TenantPluginOptions> = async (fastify, options) => {
  fastify.decorateRequest('tenantId', '');

  fastify.addHook('onRequest', async (request) => {
    const header = request.headers[options.header];
    const raw = typeof header === 'string' && header.trim() !== '' ? header : options.defaultTenantId;

    if (raw === undefined) {
      throw new TenantContextError(`${options.header} header is required`);
    }

    request.tenantId = normalizeTenantId(raw);
    request.log = request.log.child({ tenantId: request.tenantId });
  });
};

/**
 * Run `fn` bound to the request's tenant
 */
export function inTenant<T>(
  request: Pick<FastifyRequest, 'tenantId'>,
  fn: () => Promise<T>
): Promise<T> {
  if (request.tenantId === '') {
    return Promise.reject(new TenantContextError());
  }
  return runWithTenant(request.tenantId, fn);
}

export default fp(tenantPlugin, {
  name: 'tenant',
  fastify: '5.x',
});
