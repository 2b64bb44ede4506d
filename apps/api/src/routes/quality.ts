import { CreateMeasureReportSchema } from '@ehr-backend/types';
import type { FastifyPluginAsync } from 'fastify';

import { registerResourceRoutes } from './resource-routes.js';
import type { ResourceRoutesOptions } from './types.js';

/**
 * Quality measure report routes
 */
export const qualityRoutes: FastifyPluginAsync<ResourceRoutesOptions> = async (
  fastify,
  { services }
) => {
  registerResourceRoutes(fastify, {
    path: '/measure-reports',
    tag: 'Quality',
    service: services.measureReports,
    body: CreateMeasureReportSchema,
  });
};
