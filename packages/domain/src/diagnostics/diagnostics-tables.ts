/**
 * Diagnostics tables and rules: service requests, specimens, diagnostic
 * reports, imaging studies
 */

import type { ChildTableDefinition, TableDefinition } from '@ehr-backend/core';
import {
  DIAGNOSTIC_REPORT_STATUSES,
  DiagnosticReportSchema,
  IMAGING_STUDY_STATUSES,
  ImagingStudySchema,
  SERVICE_REQUEST_INTENTS,
  SERVICE_REQUEST_PRIORITIES,
  SERVICE_REQUEST_STATUSES,
  SPECIMEN_STATUSES,
  ServiceRequestSchema,
  ServiceRequestStatusHistorySchema,
  SpecimenSchema,
  type DiagnosticReport,
  type ImagingStudy,
  type ServiceRequest,
  type ServiceRequestStatusHistory,
  type Specimen,
} from '@ehr-backend/types';

import type { ChildRules, ResourceRules, TransitionTable } from '../shared/index.js';

// =============================================================================
// ServiceRequest
// =============================================================================

export type ServiceRequestFilter = 'patient' | 'status' | 'category' | 'code' | 'intent' | 'authored';

export const serviceRequestTable: TableDefinition<ServiceRequest, ServiceRequestFilter> = {
  table: 'service_request',
  resourceType: 'ServiceRequest',
  schema: ServiceRequestSchema,
  immutable: ['patientId'],
  filters: {
    patient: { field: 'patientId', kind: 'reference' },
    status: { field: 'status', kind: 'token' },
    category: { field: 'categoryCode', kind: 'token' },
    code: { field: 'codeValue', kind: 'token' },
    intent: { field: 'intent', kind: 'token' },
    authored: { field: 'authoredOn', kind: 'datetime' },
  },
  references: {
    patientId: { table: 'patient', onDelete: 'restrict' },
    encounterId: { table: 'encounter', onDelete: 'restrict' },
    requesterId: { table: 'practitioner', onDelete: 'restrict' },
    performerId: { table: 'practitioner', onDelete: 'restrict' },
  },
};

export const serviceRequestRules: ResourceRules<ServiceRequest> = {
  required: ['patientId', 'requesterId', 'codeValue'],
  allowed: {
    status: SERVICE_REQUEST_STATUSES,
    intent: SERVICE_REQUEST_INTENTS,
    priority: SERVICE_REQUEST_PRIORITIES,
  },
  statusField: 'status',
  patientField: 'patientId',
  defaults: () => ({ status: 'draft', intent: 'order' }),
};

export const SERVICE_REQUEST_TRANSITIONS: TransitionTable = {
  draft: ['active', 'on-hold', 'revoked', 'entered-in-error'],
  active: ['on-hold', 'revoked', 'completed', 'entered-in-error'],
  'on-hold': ['active', 'revoked', 'entered-in-error'],
  completed: ['entered-in-error'],
  revoked: ['entered-in-error'],
  unknown: ['draft', 'active', 'entered-in-error'],
  'entered-in-error': [],
};

export const serviceRequestStatusHistoryTable: ChildTableDefinition<
  ServiceRequestStatusHistory,
  'serviceRequestId'
> = {
  table: 'service_request_status_history',
  resourceType: 'ServiceRequestStatusHistory',
  schema: ServiceRequestStatusHistorySchema,
  parentField: 'serviceRequestId',
  parentTable: 'service_request',
  orderBy: [{ field: 'changedAt', direction: 'asc' }],
};

export const serviceRequestStatusHistoryRules: ChildRules<
  ServiceRequestStatusHistory,
  'serviceRequestId'
> = {
  required: ['toStatus', 'changedAt'],
};

// =============================================================================
// Specimen
// =============================================================================

export type SpecimenFilter = 'patient' | 'status' | 'type' | 'accession';

export const specimenTable: TableDefinition<Specimen, SpecimenFilter> = {
  table: 'specimen',
  resourceType: 'Specimen',
  schema: SpecimenSchema,
  immutable: ['patientId'],
  filters: {
    patient: { field: 'patientId', kind: 'reference' },
    status: { field: 'status', kind: 'token' },
    type: { field: 'typeCode', kind: 'token' },
    accession: { field: 'accessionId', kind: 'token' },
  },
  references: {
    patientId: { table: 'patient', onDelete: 'restrict' },
    collectorId: { table: 'practitioner', onDelete: 'restrict' },
  },
};

export const specimenRules: ResourceRules<Specimen> = {
  required: ['patientId'],
  allowed: { status: SPECIMEN_STATUSES },
  statusField: 'status',
  patientField: 'patientId',
  defaults: () => ({ status: 'available' }),
};

// =============================================================================
// DiagnosticReport
// =============================================================================

export type DiagnosticReportFilter = 'patient' | 'status' | 'category' | 'code' | 'date';

export const diagnosticReportTable: TableDefinition<DiagnosticReport, DiagnosticReportFilter> = {
  table: 'diagnostic_report',
  resourceType: 'DiagnosticReport',
  schema: DiagnosticReportSchema,
  immutable: ['patientId'],
  filters: {
    patient: { field: 'patientId', kind: 'reference' },
    status: { field: 'status', kind: 'token' },
    category: { field: 'categoryCode', kind: 'token' },
    code: { field: 'codeValue', kind: 'token' },
    date: { field: 'effectiveDatetime', kind: 'datetime' },
  },
  references: {
    patientId: { table: 'patient', onDelete: 'restrict' },
    encounterId: { table: 'encounter', onDelete: 'restrict' },
    performerId: { table: 'practitioner', onDelete: 'restrict' },
    specimenId: { table: 'specimen', onDelete: 'restrict' },
  },
};

export const diagnosticReportRules: ResourceRules<DiagnosticReport> = {
  required: ['patientId', 'codeValue'],
  allowed: { status: DIAGNOSTIC_REPORT_STATUSES },
  statusField: 'status',
  patientField: 'patientId',
  defaults: () => ({ status: 'registered' }),
};

// =============================================================================
// ImagingStudy
// =============================================================================

export type ImagingStudyFilter = 'patient' | 'status' | 'modality' | 'started';

export const imagingStudyTable: TableDefinition<ImagingStudy, ImagingStudyFilter> = {
  table: 'imaging_study',
  resourceType: 'ImagingStudy',
  schema: ImagingStudySchema,
  immutable: ['patientId'],
  filters: {
    patient: { field: 'patientId', kind: 'reference' },
    status: { field: 'status', kind: 'token' },
    modality: { field: 'modalityCode', kind: 'token' },
    started: { field: 'started', kind: 'datetime' },
  },
  references: {
    patientId: { table: 'patient', onDelete: 'restrict' },
    encounterId: { table: 'encounter', onDelete: 'restrict' },
    referrerId: { table: 'practitioner', onDelete: 'restrict' },
  },
};

export const imagingStudyRules: ResourceRules<ImagingStudy> = {
  required: ['patientId'],
  allowed: { status: IMAGING_STUDY_STATUSES },
  statusField: 'status',
  patientField: 'patientId',
  defaults: () => ({ status: 'registered' }),
};
