/**
 * @fileoverview Surgical case routes and the case's perioperative records
 *
 * @module api/routes/surgery
 */

import {
  CreateSurgicalCaseSchema,
  CreateSurgicalCountSchema,
  CreateSurgicalProcedureSchema,
  CreateSurgicalSupplySchema,
  CreateSurgicalTeamMemberSchema,
  CreateSurgicalTimeEventSchema,
} from '@ehr-backend/types';
import type { FastifyPluginAsync } from 'fastify';

import { registerChildRoutes, registerResourceRoutes } from './resource-routes.js';
import type { ResourceRoutesOptions } from './types.js';

const PATH = '/surgical-cases';
const TAG = 'Surgery';

export const surgeryRoutes: FastifyPluginAsync<ResourceRoutesOptions> = async (
  fastify,
  { services }
) => {
  registerResourceRoutes(fastify, {
    path: PATH,
    tag: TAG,
    service: services.surgicalCases,
    body: CreateSurgicalCaseSchema,
  });

  registerChildRoutes(fastify, {
    parentPath: PATH,
    segment: 'procedures',
    tag: TAG,
    service: services.surgicalProcedures,
    body: CreateSurgicalProcedureSchema,
  });
  registerChildRoutes(fastify, {
    parentPath: PATH,
    segment: 'team',
    tag: TAG,
    service: services.surgicalTeam,
    body: CreateSurgicalTeamMemberSchema,
  });
  registerChildRoutes(fastify, {
    parentPath: PATH,
    segment: 'time-events',
    tag: TAG,
    service: services.surgicalTimeEvents,
    body: CreateSurgicalTimeEventSchema,
  });
  registerChildRoutes(fastify, {
    parentPath: PATH,
    segment: 'counts',
    tag: TAG,
    service: services.surgicalCounts,
    body: CreateSurgicalCountSchema,
  });
  registerChildRoutes(fastify, {
    parentPath: PATH,
    segment: 'supplies',
    tag: TAG,
    service: services.surgicalSupplies,
    body: CreateSurgicalSupplySchema,
  });
};
