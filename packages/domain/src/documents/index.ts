/**
 * @fileoverview Consents, document references and clinical compositions
 *
 * @module domain/documents
 */

import type { RepositoryBackend } from '@ehr-backend/core';
import type { Composition, CompositionSection, Consent, DocumentReference } from '@ehr-backend/types';

import { ChildCollectionService, ResourceService } from '../shared/index.js';
import {
  compositionRules,
  compositionSectionRules,
  compositionSectionTable,
  compositionTable,
  consentRules,
  consentTable,
  documentReferenceRules,
  documentReferenceTable,
  type CompositionFilter,
  type ConsentFilter,
  type DocumentReferenceFilter,
} from './documents-tables.js';

export * from './documents-tables.js';

export interface DocumentsServices {
  consents: ResourceService<Consent, ConsentFilter>;
  documentReferences: ResourceService<DocumentReference, DocumentReferenceFilter>;
  compositions: ResourceService<Composition, CompositionFilter>;
  compositionSections: ChildCollectionService<CompositionSection, 'compositionId'>;
}

export function createDocumentsServices(backend: RepositoryBackend): DocumentsServices {
  const { unitOfWork } = backend;
  const compositions = new ResourceService(
    backend.resources(compositionTable),
    compositionRules,
    unitOfWork
  );

  return {
    consents: new ResourceService(backend.resources(consentTable), consentRules, unitOfWork),
    documentReferences: new ResourceService(
      backend.resources(documentReferenceTable),
      documentReferenceRules,
      unitOfWork
    ),
    compositions,
    compositionSections: new ChildCollectionService(
      compositions,
      backend.children(compositionSectionTable),
      compositionSectionRules
    ),
  };
}
