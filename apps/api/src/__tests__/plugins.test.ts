import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import { getTenantId, isOperationalError } from '@ehr-backend/core';

import correlationPlugin from '../plugins/correlation.js';
import tenantPlugin, { inTenant } from '../plugins/tenant.js';

describe('correlation plugin', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = Fastify({ logger: false });
    await app.register(correlationPlugin);
    app.get('/echo', async (request) => ({ correlationId: request.correlationId }));
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('should keep a well-formed incoming id', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/echo',
      headers: { 'x-correlation-id': 'req-42' },
    });

    expect(response.headers['x-correlation-id']).toBe('req-42');
    expect(response.json()).toEqual({ correlationId: 'req-42' });
  });

  it('should replace a malformed id with a generated one', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/echo',
      headers: { 'x-correlation-id': 'bad id with spaces' },
    });

    const { correlationId } = response.json<{ correlationId: string }>();
    expect(correlationId).toMatch(/^[0-9a-f-]{36}$/);
    expect(response.headers['x-correlation-id']).toBe(correlationId);
  });
});

describe('tenant plugin', () => {
  let app: FastifyInstance;

  async function buildTenantApp(defaultTenantId?: string): Promise<FastifyInstance> {
    const instance = Fastify({ logger: false });
    instance.setErrorHandler<FastifyError>((error, _request, reply) => {
      const statusCode = isOperationalError(error) ? error.statusCode : 500;
      return reply.status(statusCode).send({ message: error.message });
    });
    await instance.register(tenantPlugin, { header: 'x-clinic', defaultTenantId });
    instance.get('/whoami', async (request) =>
      inTenant(request, async () => ({ tenantId: getTenantId() }))
    );
    await instance.ready();
    return instance;
  }

  afterEach(async () => {
    await app.close();
  });

  it('should bind the normalised header tenant to the handler', async () => {
    app = await buildTenantApp();

    const response = await app.inject({
      method: 'GET',
      url: '/whoami',
      headers: { 'x-clinic': 'North-Clinic' },
    });

    expect(response.json()).toEqual({ tenantId: 'north_clinic' });
  });

  it('should prefer the header over the default tenant', async () => {
    app = await buildTenantApp('main');

    const withHeader = await app.inject({
      method: 'GET',
      url: '/whoami',
      headers: { 'x-clinic': 'branch' },
    });
    const withoutHeader = await app.inject({ method: 'GET', url: '/whoami' });

    expect(withHeader.json()).toEqual({ tenantId: 'branch' });
    expect(withoutHeader.json()).toEqual({ tenantId: 'main' });
  });

  it('should answer 400 without any tenant', async () => {
    app = await buildTenantApp();

    const response = await app.inject({ method: 'GET', url: '/whoami' });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ message: 'x-clinic header is required' });
  });
});
