/**
 * Diagnostics schemas: orders, specimens, reports and imaging studies
 */
import { z } from 'zod';

import {
  ChildMetaSchema,
  DateTimeSchema,
  DecimalSchema,
  IntegerSchema,
  RESOURCE_META_MASK,
  ResourceIdentityInputShape,
  ResourceMetaSchema,
  UUIDSchema,
  optional,
} from './common.js';

// =============================================================================
// ServiceRequest
// =============================================================================

export const SERVICE_REQUEST_STATUSES = [
  'draft',
  'active',
  'on-hold',
  'revoked',
  'completed',
  'entered-in-error',
  'unknown',
] as const;

export const SERVICE_REQUEST_INTENTS = [
  'proposal',
  'plan',
  'directive',
  'order',
  'original-order',
  'reflex-order',
  'filler-order',
  'instance-order',
  'option',
] as const;

export const SERVICE_REQUEST_PRIORITIES = ['routine', 'urgent', 'asap', 'stat'] as const;

export const ServiceRequestSchema = ResourceMetaSchema.extend({
  patientId: UUIDSchema,
  encounterId: optional(UUIDSchema),
  requesterId: UUIDSchema,
  performerId: optional(UUIDSchema),
  status: optional(z.string().max(30)),
  intent: optional(z.string().max(30)),
  priority: optional(z.string().max(20)),
  categoryCode: optional(z.string().max(50)),
  categoryDisplay: optional(z.string().max(255)),
  codeSystem: optional(z.string().max(255)),
  codeValue: z.string().max(50),
  codeDisplay: optional(z.string().max(255)),
  quantityValue: optional(DecimalSchema),
  quantityUnit: optional(z.string().max(30)),
  occurrenceDatetime: optional(DateTimeSchema),
  authoredOn: optional(DateTimeSchema),
  reasonCode: optional(z.string().max(50)),
  reasonDisplay: optional(z.string().max(255)),
  bodySiteCode: optional(z.string().max(50)),
  bodySiteDisplay: optional(z.string().max(255)),
  note: optional(z.string()),
  patientInstruction: optional(z.string()),
});

export const CreateServiceRequestSchema = ServiceRequestSchema.omit(RESOURCE_META_MASK).extend(
  ResourceIdentityInputShape
);

export const ServiceRequestStatusHistorySchema = ChildMetaSchema.extend({
  serviceRequestId: UUIDSchema,
  fromStatus: optional(z.string().max(30)),
  toStatus: z.string().max(30),
  changedAt: DateTimeSchema,
});

export type ServiceRequest = z.infer<typeof ServiceRequestSchema>;
export type CreateServiceRequest = z.infer<typeof CreateServiceRequestSchema>;
export type ServiceRequestStatusHistory = z.infer<typeof ServiceRequestStatusHistorySchema>;

// =============================================================================
// Specimen
// =============================================================================

export const SPECIMEN_STATUSES = [
  'available',
  'unavailable',
  'unsatisfactory',
  'entered-in-error',
] as const;

export const SpecimenSchema = ResourceMetaSchema.extend({
  patientId: UUIDSchema,
  accessionId: optional(z.string().max(100)),
  status: optional(z.string().max(30)),
  typeCode: optional(z.string().max(50)),
  typeDisplay: optional(z.string().max(255)),
  receivedTime: optional(DateTimeSchema),
  collectorId: optional(UUIDSchema),
  collectedAt: optional(DateTimeSchema),
  collectionQuantity: optional(DecimalSchema),
  collectionUnit: optional(z.string().max(30)),
  collectionMethod: optional(z.string().max(100)),
  collectionBodySite: optional(z.string().max(100)),
  containerType: optional(z.string().max(100)),
  conditionCode: optional(z.string().max(50)),
  note: optional(z.string()),
});

export const CreateSpecimenSchema = SpecimenSchema.omit(RESOURCE_META_MASK).extend(
  ResourceIdentityInputShape
);

export type Specimen = z.infer<typeof SpecimenSchema>;
export type CreateSpecimen = z.infer<typeof CreateSpecimenSchema>;

// =============================================================================
// DiagnosticReport
// =============================================================================

export const DIAGNOSTIC_REPORT_STATUSES = [
  'registered',
  'partial',
  'preliminary',
  'final',
  'amended',
  'corrected',
  'appended',
  'cancelled',
  'entered-in-error',
  'unknown',
] as const;

export const DiagnosticReportSchema = ResourceMetaSchema.extend({
  patientId: UUIDSchema,
  encounterId: optional(UUIDSchema),
  performerId: optional(UUIDSchema),
  specimenId: optional(UUIDSchema),
  status: optional(z.string().max(30)),
  categoryCode: optional(z.string().max(50)),
  categoryDisplay: optional(z.string().max(255)),
  codeSystem: optional(z.string().max(255)),
  codeValue: z.string().max(50),
  codeDisplay: optional(z.string().max(255)),
  effectiveDatetime: optional(DateTimeSchema),
  issued: optional(DateTimeSchema),
  conclusion: optional(z.string()),
  conclusionCode: optional(z.string().max(50)),
  presentedFormUrl: optional(z.string().max(2048)),
  presentedFormType: optional(z.string().max(100)),
  note: optional(z.string()),
});

export const CreateDiagnosticReportSchema = DiagnosticReportSchema.omit(RESOURCE_META_MASK).extend(
  ResourceIdentityInputShape
);

export type DiagnosticReport = z.infer<typeof DiagnosticReportSchema>;
export type CreateDiagnosticReport = z.infer<typeof CreateDiagnosticReportSchema>;

// =============================================================================
// ImagingStudy
// =============================================================================

export const IMAGING_STUDY_STATUSES = [
  'registered',
  'available',
  'cancelled',
  'entered-in-error',
  'unknown',
] as const;

export const ImagingStudySchema = ResourceMetaSchema.extend({
  patientId: UUIDSchema,
  encounterId: optional(UUIDSchema),
  referrerId: optional(UUIDSchema),
  status: optional(z.string().max(30)),
  modalityCode: optional(z.string().max(20)),
  modalityDisplay: optional(z.string().max(100)),
  studyUid: optional(z.string().max(128)),
  numberOfSeries: optional(IntegerSchema.min(0)),
  numberOfInstances: optional(IntegerSchema.min(0)),
  description: optional(z.string()),
  started: optional(DateTimeSchema),
  reasonCode: optional(z.string().max(50)),
  reasonDisplay: optional(z.string().max(255)),
  note: optional(z.string()),
});

export const CreateImagingStudySchema = ImagingStudySchema.omit(RESOURCE_META_MASK).extend(
  ResourceIdentityInputShape
);

export type ImagingStudy = z.infer<typeof ImagingStudySchema>;
export type CreateImagingStudy = z.infer<typeof CreateImagingStudySchema>;
