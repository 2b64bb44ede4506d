import { CreateLensSpecSchema, CreateVisionPrescriptionSchema } from '@ehr-backend/types';
import type { FastifyPluginAsync } from 'fastify';

import { registerChildRoutes, registerResourceRoutes } from './resource-routes.js';
import type { ResourceRoutesOptions } from './types.js';

/**
 * Vision prescription routes; lens specifications are child rows
 */
export const visionRoutes: FastifyPluginAsync<ResourceRoutesOptions> = async (
  fastify,
  { services }
) => {
  registerResourceRoutes(fastify, {
    path: '/vision-prescriptions',
    tag: 'Vision',
    service: services.visionPrescriptions,
    body: CreateVisionPrescriptionSchema,
  });

  registerChildRoutes(fastify, {
    parentPath: '/vision-prescriptions',
    segment: 'lens-specs',
    tag: 'Vision',
    service: services.lensSpecs,
    body: CreateLensSpecSchema,
  });
};
