/**
 * @fileoverview Consent, document reference and composition routes
 *
 * @module api/routes/documents
 */

import {
  CreateCompositionSchema,
  CreateCompositionSectionSchema,
  CreateConsentSchema,
  CreateDocumentReferenceSchema,
} from '@ehr-backend/types';
import type { FastifyPluginAsync } from 'fastify';

import { registerChildRoutes, registerResourceRoutes } from './resource-routes.js';
import type { ResourceRoutesOptions } from './types.js';

export const documentRoutes: FastifyPluginAsync<ResourceRoutesOptions> = async (
  fastify,
  { services }
) => {
  registerResourceRoutes(fastify, {
    path: '/consents',
    tag: 'Documents',
    service: services.consents,
    body: CreateConsentSchema,
  });

  registerResourceRoutes(fastify, {
    path: '/document-references',
    tag: 'Documents',
    service: services.documentReferences,
    body: CreateDocumentReferenceSchema,
  });

  registerResourceRoutes(fastify, {
    path: '/compositions',
    tag: 'Documents',
    service: services.compositions,
    body: CreateCompositionSchema,
  });

  registerChildRoutes(fastify, {
    parentPath: '/compositions',
    segment: 'sections',
    tag: 'Documents',
    service: services.compositionSections,
    body: CreateCompositionSectionSchema,
  });
};
