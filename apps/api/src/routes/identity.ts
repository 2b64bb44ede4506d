/**
 * @fileoverview Patient, practitioner and organization routes
 *
 * @module api/routes/identity
 */

import {
  CreateOrganizationSchema,
  CreatePatientSchema,
  CreatePractitionerSchema,
} from '@ehr-backend/types';
import type { FastifyPluginAsync } from 'fastify';

import { registerResourceRoutes } from './resource-routes.js';
import type { ResourceRoutesOptions } from './types.js';

export const identityRoutes: FastifyPluginAsync<ResourceRoutesOptions> = async (
  fastify,
  { services }
) => {
  registerResourceRoutes(fastify, {
    path: '/patients',
    tag: 'Identity',
    service: services.patients,
    body: CreatePatientSchema,
  });

  registerResourceRoutes(fastify, {
    path: '/practitioners',
    tag: 'Identity',
    service: services.practitioners,
    body: CreatePractitionerSchema,
  });

  registerResourceRoutes(fastify, {
    path: '/organizations',
    tag: 'Identity',
    service: services.organizations,
    body: CreateOrganizationSchema,
  });
};
