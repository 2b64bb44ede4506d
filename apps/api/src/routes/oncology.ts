/**
 * @fileoverview Oncology routes: diagnoses, protocols, chemotherapy cycles
 *
 * @module api/routes/oncology
 */

import {
  CreateCancerDiagnosisSchema,
  CreateChemoCycleSchema,
  CreateProtocolDrugSchema,
  CreateTreatmentProtocolSchema,
} from '@ehr-backend/types';
import type { FastifyPluginAsync } from 'fastify';

import { registerChildRoutes, registerResourceRoutes } from './resource-routes.js';
import type { ResourceRoutesOptions } from './types.js';

export const oncologyRoutes: FastifyPluginAsync<ResourceRoutesOptions> = async (
  fastify,
  { services }
) => {
  registerResourceRoutes(fastify, {
    path: '/cancer-diagnoses',
    tag: 'Oncology',
    service: services.cancerDiagnoses,
    body: CreateCancerDiagnosisSchema,
  });

  registerResourceRoutes(fastify, {
    path: '/treatment-protocols',
    tag: 'Oncology',
    service: services.treatmentProtocols,
    body: CreateTreatmentProtocolSchema,
  });

  registerChildRoutes(fastify, {
    parentPath: '/treatment-protocols',
    segment: 'drugs',
    tag: 'Oncology',
    service: services.protocolDrugs,
    body: CreateProtocolDrugSchema,
  });

  registerResourceRoutes(fastify, {
    path: '/chemo-cycles',
    tag: 'Oncology',
    service: services.chemoCycles,
    body: CreateChemoCycleSchema,
  });
};
