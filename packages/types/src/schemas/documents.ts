/**
 * Document schemas: consents, document references and compositions
 */
import { z } from 'zod';

import {
  CHILD_META_MASK,
  ChildMetaSchema,
  DateTimeSchema,
  IntegerSchema,
  RESOURCE_META_MASK,
  ResourceIdentityInputShape,
  ResourceMetaSchema,
  UUIDSchema,
  optional,
} from './common.js';

// =============================================================================
// Consent
// =============================================================================

export const CONSENT_STATUSES = [
  'draft',
  'proposed',
  'active',
  'rejected',
  'inactive',
  'entered-in-error',
] as const;

export const ConsentSchema = ResourceMetaSchema.extend({
  patientId: UUIDSchema,
  status: optional(z.string().max(30)),
  scope: optional(z.string().max(50)),
  categoryCode: optional(z.string().max(50)),
  categoryDisplay: optional(z.string().max(255)),
  performerId: optional(UUIDSchema),
  organizationId: optional(UUIDSchema),
  policyUri: optional(z.string().max(2048)),
  provisionType: optional(z.string().max(20)),
  provisionStart: optional(DateTimeSchema),
  provisionEnd: optional(DateTimeSchema),
  dateTime: optional(DateTimeSchema),
  note: optional(z.string()),
});

export const CreateConsentSchema = ConsentSchema.omit(RESOURCE_META_MASK).extend(
  ResourceIdentityInputShape
);

export type Consent = z.infer<typeof ConsentSchema>;
export type CreateConsent = z.infer<typeof CreateConsentSchema>;

// =============================================================================
// DocumentReference
// =============================================================================

export const DOCUMENT_REFERENCE_STATUSES = ['current', 'superseded', 'entered-in-error'] as const;

export const DocumentReferenceSchema = ResourceMetaSchema.extend({
  patientId: UUIDSchema,
  status: optional(z.string().max(30)),
  docStatus: optional(z.string().max(30)),
  typeCode: optional(z.string().max(50)),
  typeDisplay: optional(z.string().max(255)),
  categoryCode: optional(z.string().max(50)),
  authorId: optional(UUIDSchema),
  custodianId: optional(UUIDSchema),
  encounterId: optional(UUIDSchema),
  date: optional(DateTimeSchema),
  description: optional(z.string()),
  contentType: optional(z.string().max(100)),
  contentUrl: optional(z.string().max(2048)),
  contentSize: optional(IntegerSchema.min(0)),
  contentTitle: optional(z.string().max(255)),
  formatCode: optional(z.string().max(100)),
});

export const CreateDocumentReferenceSchema = DocumentReferenceSchema.omit(
  RESOURCE_META_MASK
).extend(ResourceIdentityInputShape);

export type DocumentReference = z.infer<typeof DocumentReferenceSchema>;
export type CreateDocumentReference = z.infer<typeof CreateDocumentReferenceSchema>;

// =============================================================================
// Composition
// =============================================================================

export const COMPOSITION_STATUSES = ['preliminary', 'final', 'amended', 'entered-in-error'] as const;

export const CompositionSchema = ResourceMetaSchema.extend({
  patientId: UUIDSchema,
  status: optional(z.string().max(30)),
  typeCode: optional(z.string().max(50)),
  typeDisplay: optional(z.string().max(255)),
  categoryCode: optional(z.string().max(50)),
  encounterId: optional(UUIDSchema),
  date: optional(DateTimeSchema),
  authorId: optional(UUIDSchema),
  title: optional(z.string().max(255)),
  confidentiality: optional(z.string().max(10)),
  custodianId: optional(UUIDSchema),
});

export const CreateCompositionSchema = CompositionSchema.omit(RESOURCE_META_MASK).extend(
  ResourceIdentityInputShape
);

export const CompositionSectionSchema = ChildMetaSchema.extend({
  compositionId: UUIDSchema,
  title: optional(z.string().max(255)),
  codeValue: optional(z.string().max(50)),
  codeDisplay: optional(z.string().max(255)),
  textStatus: optional(z.string().max(20)),
  textDiv: optional(z.string()),
  mode: optional(z.string().max(20)),
  sortOrder: optional(IntegerSchema),
});

export const CreateCompositionSectionSchema = CompositionSectionSchema.omit({
  ...CHILD_META_MASK,
  compositionId: true,
});

export type Composition = z.infer<typeof CompositionSchema>;
export type CreateComposition = z.infer<typeof CreateCompositionSchema>;
export type CompositionSection = z.infer<typeof CompositionSectionSchema>;
export type CreateCompositionSection = z.infer<typeof CreateCompositionSectionSchema>;
