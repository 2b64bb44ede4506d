import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import {
  createLogger,
  createLoggerOptions,
  isOperationalError,
  NotFoundError,
  toSafeErrorResponse,
  type RepositoryBackend,
} from '@ehr-backend/core';
import { createEhrServices } from '@ehr-backend/domain';

import type { AppConfig } from './config.js';
import correlationPlugin from './plugins/correlation.js';
import tenantPlugin from './plugins/tenant.js';
import {
  billingRoutes,
  diagnosticsRoutes,
  documentRoutes,
  encounterRoutes,
  healthRoutes,
  identityRoutes,
  inboxRoutes,
  oncologyRoutes,
  qualityRoutes,
  surgeryRoutes,
  visionRoutes,
} from './routes/index.js';

/**
 * EHR API
 *
 * FHIR-aligned clinical resources under /api/v1, one tenant per request.
 */

const logger = createLogger({ name: 'api' });

export const API_PREFIX = '/api/v1';
export const API_VERSION = '1.0.0';

export interface BuildAppOptions {
  config: AppConfig;
  backend: RepositoryBackend;
}

/**
 * SECURITY: Parse and validate CORS origins
 * Only allows specific origins, never wildcard in production
 */
export function parseCorsOrigins(
  corsOrigin: string | undefined,
  isProd: boolean
): string[] | false {
  if (corsOrigin === undefined) return false;

  if (corsOrigin === '*') {
    if (isProd) {
      throw new Error('SECURITY: CORS_ORIGIN cannot be "*" in production');
    }
    logger.warn('CORS_ORIGIN is "*" - using localhost defaults for development');
    return [
      'http://localhost:3000',
      'http://localhost:3001',
      'http://localhost:5173',
      'http://127.0.0.1:3000',
    ];
  }

  const origins = corsOrigin
    .split(',')
    .map((o) => o.trim())
    .filter(Boolean);

  for (const origin of origins) {
    if (!URL.canParse(origin)) {
      throw new Error(`SECURITY: Invalid CORS origin: ${origin}`);
    }
  }

  return origins;
}

export async function buildApp({ config, backend }: BuildAppOptions): Promise<FastifyInstance> {
  const corsOrigins = parseCorsOrigins(config.server.corsOrigin, config.isProd);

  const fastify = Fastify({
    logger: {
      ...createLoggerOptions({ name: 'api', level: config.logger.level }),
      serializers: {
        req(request) {
          return {
            method: request.method,
            url: request.url,
            hostname: request.hostname,
            remoteAddress: request.ip,
          };
        },
        res(reply) {
          return {
            statusCode: reply.statusCode,
          };
        },
      },
      ...(config.isDev && {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
        },
      }),
    },
  });

  await fastify.register(correlationPlugin);

  // Global error handler
  fastify.setErrorHandler<FastifyError>((error, request, reply) => {
    const { correlationId } = request;

    if (isOperationalError(error)) {
      request.log.info({ code: error.code, statusCode: error.statusCode }, error.message);
      return reply.status(error.statusCode).send({ ...error.toSafeError(), correlationId });
    }

    // Body parser and routing errors carry a client status code
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 400 && statusCode < 500) {
      return reply.status(statusCode).send({
        code: 'BAD_REQUEST',
        message: error.message,
        statusCode,
        correlationId,
      });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.status(500).send({ ...toSafeErrorResponse(error), correlationId });
  });

  // Not found handler
  fastify.setNotFoundHandler((request, reply) => {
    const error = new NotFoundError('Route');
    return reply
      .status(error.statusCode)
      .send({ ...error.toSafeError(), correlationId: request.correlationId });
  });

  await fastify.register(helmet, {
    contentSecurityPolicy: false, // JSON API, the docs UI sets its own CSP
    strictTransportSecurity: {
      maxAge: 31536000,
      includeSubDomains: true,
      preload: true,
    },
    frameguard: { action: 'deny' },
    noSniff: true,
    hidePoweredBy: true,
  });

  await fastify.register(swagger, {
    openapi: {
      openapi: '3.1.0',
      info: {
        title: 'EHR API',
        version: API_VERSION,
        description: `
Multi-tenant electronic health record API.

Every request under \`${API_PREFIX}\` names its tenant in the \`${config.tenant.header}\` header.
List endpoints return \`{ items, total, limit, offset }\`.
        `.trim(),
      },
      servers: [
        {
          url: config.server.baseUrl,
          description: config.isProd ? 'Production server' : 'Development server',
        },
      ],
      tags: [
        { name: 'Health', description: 'Liveness and readiness probes' },
        { name: 'Identity', description: 'Patients, practitioners and organizations' },
        { name: 'Encounters', description: 'Encounters, participants and status history' },
        { name: 'Diagnostics', description: 'Orders, specimens, reports and imaging' },
        { name: 'Documents', description: 'Consents, document references and compositions' },
        { name: 'Billing', description: 'Coverage and claims' },
        { name: 'Surgery', description: 'Surgical cases and perioperative records' },
        { name: 'Oncology', description: 'Cancer diagnoses, protocols and chemotherapy' },
        { name: 'Inbox', description: 'Message pools and clinical inbox' },
        { name: 'Quality', description: 'Quality measure reports' },
        { name: 'Vision', description: 'Vision prescriptions' },
      ],
    },
  });

  await fastify.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
      displayRequestDuration: true,
      filter: true,
    },
    staticCSP: true,
  });

  await fastify.register(cors, {
    origin: corsOrigins,
    methods: ['GET', 'POST', 'PUT', 'DELETE'],
    allowedHeaders: ['Content-Type', 'X-Correlation-ID', config.tenant.header],
    exposedHeaders: ['X-Correlation-ID'],
  });

  await fastify.register(healthRoutes, { backend, version: API_VERSION });

  const services = createEhrServices(backend);

  await fastify.register(
    async (api) => {
      await api.register(tenantPlugin, {
        header: config.tenant.header,
        defaultTenantId: config.tenant.defaultTenantId,
      });

      await api.register(identityRoutes, { services });
      await api.register(encounterRoutes, { services });
      await api.register(diagnosticsRoutes, { services });
      await api.register(documentRoutes, { services });
      await api.register(billingRoutes, { services });
      await api.register(surgeryRoutes, { services });
      await api.register(oncologyRoutes, { services });
      await api.register(inboxRoutes, { services });
      await api.register(qualityRoutes, { services });
      await api.register(visionRoutes, { services });
    },
    { prefix: API_PREFIX }
  );

  return fastify;
}
