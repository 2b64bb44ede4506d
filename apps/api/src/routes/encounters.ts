/**
 * @fileoverview Encounter routes
 *
 * Participants are managed as a child collection; status history is
 * written by the service and only exposed for reading.
 *
 * @module api/routes/encounters
 */

import { CreateEncounterParticipantSchema, CreateEncounterSchema } from '@ehr-backend/types';
import type { FastifyPluginAsync } from 'fastify';

import { registerChildRoutes, registerResourceRoutes } from './resource-routes.js';
import type { ResourceRoutesOptions } from './types.js';

export const encounterRoutes: FastifyPluginAsync<ResourceRoutesOptions> = async (
  fastify,
  { services }
) => {
  registerResourceRoutes(fastify, {
    path: '/encounters',
    tag: 'Encounters',
    service: services.encounters,
    body: CreateEncounterSchema,
  });

  registerChildRoutes(fastify, {
    parentPath: '/encounters',
    segment: 'participants',
    tag: 'Encounters',
    service: services.encounterParticipants,
    body: CreateEncounterParticipantSchema,
  });

  registerChildRoutes(fastify, {
    parentPath: '/encounters',
    segment: 'status-history',
    tag: 'Encounters',
    service: services.encounterStatusHistory,
  });
};
