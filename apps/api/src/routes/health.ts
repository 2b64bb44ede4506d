import type { RepositoryBackend } from '@ehr-backend/core';
import type { FastifyPluginAsync } from 'fastify';

interface HealthCheckResult {
  status: 'ok' | 'error';
  message?: string;
  latencyMs?: number;
}

interface HealthResponse {
  status: 'ok' | 'ready' | 'unhealthy';
  timestamp: string;
  version?: string;
  uptime?: number;
  checks?: Record<string, HealthCheckResult>;
}

export interface HealthRoutesOptions {
  backend: RepositoryBackend;
  version: string;
}

/**
 * Check the store answers a trivial query
 */
async function checkStore(backend: RepositoryBackend): Promise<HealthCheckResult> {
  const startTime = Date.now();
  try {
    await backend.ping();
    return {
      status: 'ok',
      latencyMs: Date.now() - startTime,
      ...(backend.kind === 'memory' && { message: 'in-memory store' }),
    };
  } catch (error) {
    return {
      status: 'error',
      message: error instanceof Error ? error.message : 'Unknown database error',
      latencyMs: Date.now() - startTime,
    };
  }
}

/**
 * GET /health - liveness, no dependency checks
 * GET /ready - readiness, 503 while the database is unreachable
 */
export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (
  fastify,
  { backend, version }
) => {
  fastify.get('/health', { schema: { tags: ['Health'] } }, async (): Promise<HealthResponse> => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version,
      uptime: process.uptime(),
    };
  });

  fastify.get('/ready', { schema: { tags: ['Health'] } }, async (request, reply) => {
    const database = await checkStore(backend);
    const ready = database.status === 'ok';

    if (!ready) {
      request.log.warn({ message: database.message }, 'Readiness check failed');
    }

    const response: HealthResponse = {
      status: ready ? 'ready' : 'unhealthy',
      timestamp: new Date().toISOString(),
      checks: { database },
    };
    return reply.code(ready ? 200 : 503).send(response);
  });
};
