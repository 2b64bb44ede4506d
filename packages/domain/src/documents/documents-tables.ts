/**
 * Documents tables and rules: consents, document references, compositions
 */

import type { ChildTableDefinition, TableDefinition } from '@ehr-backend/core';
import {
  COMPOSITION_STATUSES,
  CONSENT_STATUSES,
  CompositionSchema,
  CompositionSectionSchema,
  ConsentSchema,
  DOCUMENT_REFERENCE_STATUSES,
  DocumentReferenceSchema,
  type Composition,
  type CompositionSection,
  type Consent,
  type DocumentReference,
} from '@ehr-backend/types';

import type { ChildRules, ResourceRules } from '../shared/index.js';

export type ConsentFilter = 'patient' | 'status' | 'category';

export const consentTable: TableDefinition<Consent, ConsentFilter> = {
  table: 'consent',
  resourceType: 'Consent',
  schema: ConsentSchema,
  immutable: ['patientId'],
  filters: {
    patient: { field: 'patientId', kind: 'reference' },
    status: { field: 'status', kind: 'token' },
    category: { field: 'categoryCode', kind: 'token' },
  },
  references: {
    patientId: { table: 'patient', onDelete: 'restrict' },
    performerId: { table: 'practitioner', onDelete: 'restrict' },
    organizationId: { table: 'organization', onDelete: 'restrict' },
  },
};

export const consentRules: ResourceRules<Consent> = {
  required: ['patientId'],
  allowed: { status: CONSENT_STATUSES },
  statusField: 'status',
  patientField: 'patientId',
  defaults: () => ({ status: 'draft' }),
};

export type DocumentReferenceFilter = 'patient' | 'status' | 'type' | 'category' | 'date';

export const documentReferenceTable: TableDefinition<DocumentReference, DocumentReferenceFilter> = {
  table: 'document_reference',
  resourceType: 'DocumentReference',
  schema: DocumentReferenceSchema,
  immutable: ['patientId'],
  filters: {
    patient: { field: 'patientId', kind: 'reference' },
    status: { field: 'status', kind: 'token' },
    type: { field: 'typeCode', kind: 'token' },
    category: { field: 'categoryCode', kind: 'token' },
    date: { field: 'date', kind: 'datetime' },
  },
  references: {
    patientId: { table: 'patient', onDelete: 'restrict' },
    authorId: { table: 'practitioner', onDelete: 'restrict' },
    custodianId: { table: 'organization', onDelete: 'restrict' },
    encounterId: { table: 'encounter', onDelete: 'restrict' },
  },
};

export const documentReferenceRules: ResourceRules<DocumentReference> = {
  required: ['patientId'],
  allowed: { status: DOCUMENT_REFERENCE_STATUSES },
  statusField: 'status',
  patientField: 'patientId',
  defaults: () => ({ status: 'current' }),
};

export type CompositionFilter = 'patient' | 'status' | 'type';

export const compositionTable: TableDefinition<Composition, CompositionFilter> = {
  table: 'composition',
  resourceType: 'Composition',
  schema: CompositionSchema,
  immutable: ['patientId'],
  filters: {
    patient: { field: 'patientId', kind: 'reference' },
    status: { field: 'status', kind: 'token' },
    type: { field: 'typeCode', kind: 'token' },
  },
  references: {
    patientId: { table: 'patient', onDelete: 'restrict' },
    encounterId: { table: 'encounter', onDelete: 'restrict' },
    authorId: { table: 'practitioner', onDelete: 'restrict' },
    custodianId: { table: 'organization', onDelete: 'restrict' },
  },
};

export const compositionRules: ResourceRules<Composition> = {
  required: ['patientId'],
  allowed: { status: COMPOSITION_STATUSES },
  statusField: 'status',
  patientField: 'patientId',
  defaults: () => ({ status: 'preliminary' }),
};

export const compositionSectionTable: ChildTableDefinition<CompositionSection, 'compositionId'> = {
  table: 'composition_section',
  resourceType: 'CompositionSection',
  schema: CompositionSectionSchema,
  parentField: 'compositionId',
  parentTable: 'composition',
  orderBy: [{ field: 'sortOrder', direction: 'asc' }],
};

export const compositionSectionRules: ChildRules<CompositionSection, 'compositionId'> = {
  required: [],
  defaults: () => ({ sortOrder: 0 }),
};
