/**
 * @fileoverview Coverage and claim routes
 *
 * Claim lines (diagnoses, procedures, items) come back ordered by sequence.
 *
 * @module api/routes/billing
 */

import {
  CreateClaimDiagnosisSchema,
  CreateClaimItemSchema,
  CreateClaimProcedureSchema,
  CreateClaimSchema,
  CreateCoverageSchema,
} from '@ehr-backend/types';
import type { FastifyPluginAsync } from 'fastify';

import { registerChildRoutes, registerResourceRoutes } from './resource-routes.js';
import type { ResourceRoutesOptions } from './types.js';

export const billingRoutes: FastifyPluginAsync<ResourceRoutesOptions> = async (
  fastify,
  { services }
) => {
  registerResourceRoutes(fastify, {
    path: '/coverages',
    tag: 'Billing',
    service: services.coverages,
    body: CreateCoverageSchema,
  });

  registerResourceRoutes(fastify, {
    path: '/claims',
    tag: 'Billing',
    service: services.claims,
    body: CreateClaimSchema,
  });

  registerChildRoutes(fastify, {
    parentPath: '/claims',
    segment: 'diagnoses',
    tag: 'Billing',
    service: services.claimDiagnoses,
    body: CreateClaimDiagnosisSchema,
  });

  registerChildRoutes(fastify, {
    parentPath: '/claims',
    segment: 'procedures',
    tag: 'Billing',
    service: services.claimProcedures,
    body: CreateClaimProcedureSchema,
  });

  registerChildRoutes(fastify, {
    parentPath: '/claims',
    segment: 'items',
    tag: 'Billing',
    service: services.claimItems,
    body: CreateClaimItemSchema,
  });
};
