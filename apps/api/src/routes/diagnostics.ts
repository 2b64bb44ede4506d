/**
 * @fileoverview Diagnostics routes: orders, specimens, reports, imaging
 *
 * @module api/routes/diagnostics
 */

import {
  CreateDiagnosticReportSchema,
  CreateImagingStudySchema,
  CreateServiceRequestSchema,
  CreateSpecimenSchema,
} from '@ehr-backend/types';
import type { FastifyPluginAsync } from 'fastify';

import { registerChildRoutes, registerResourceRoutes } from './resource-routes.js';
import type { ResourceRoutesOptions } from './types.js';

export const diagnosticsRoutes: FastifyPluginAsync<ResourceRoutesOptions> = async (
  fastify,
  { services }
) => {
  registerResourceRoutes(fastify, {
    path: '/service-requests',
    tag: 'Diagnostics',
    service: services.serviceRequests,
    body: CreateServiceRequestSchema,
  });

  registerChildRoutes(fastify, {
    parentPath: '/service-requests',
    segment: 'status-history',
    tag: 'Diagnostics',
    service: services.serviceRequestStatusHistory,
  });

  registerResourceRoutes(fastify, {
    path: '/specimens',
    tag: 'Diagnostics',
    service: services.specimens,
    body: CreateSpecimenSchema,
  });

  registerResourceRoutes(fastify, {
    path: '/diagnostic-reports',
    tag: 'Diagnostics',
    service: services.diagnosticReports,
    body: CreateDiagnosticReportSchema,
  });

  registerResourceRoutes(fastify, {
    path: '/imaging-studies',
    tag: 'Diagnostics',
    service: services.imagingStudies,
    body: CreateImagingStudySchema,
  });
};
