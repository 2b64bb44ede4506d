/**
 * Billing schemas: coverages, claims and claim line children
 */
import { z } from 'zod';

import {
  CHILD_META_MASK,
  ChildMetaSchema,
  DateSchema,
  DecimalSchema,
  IntegerSchema,
  RESOURCE_META_MASK,
  ResourceIdentityInputShape,
  ResourceMetaSchema,
  UUIDSchema,
  optional,
} from './common.js';

/** Financial resource status, shared by coverages and claims */
export const FINANCIAL_STATUSES = ['active', 'cancelled', 'draft', 'entered-in-error'] as const;

export const CurrencySchema = z.string().length(3);

// =============================================================================
// Coverage
// =============================================================================

export const CoverageSchema = ResourceMetaSchema.extend({
  patientId: UUIDSchema,
  payorOrgId: optional(UUIDSchema),
  payorName: optional(z.string().max(255)),
  status: optional(z.string().max(30)),
  typeCode: optional(z.string().max(50)),
  subscriberId: optional(z.string().max(100)),
  subscriberName: optional(z.string().max(255)),
  relationship: optional(z.string().max(30)),
  policyNumber: optional(z.string().max(100)),
  groupNumber: optional(z.string().max(100)),
  planName: optional(z.string().max(255)),
  memberId: optional(z.string().max(100)),
  periodStart: optional(DateSchema),
  periodEnd: optional(DateSchema),
  network: optional(z.string().max(100)),
  copayAmount: optional(DecimalSchema),
  deductibleAmount: optional(DecimalSchema),
  currency: optional(CurrencySchema),
  coverageOrder: optional(IntegerSchema.min(1)),
  note: optional(z.string()),
});

export const CreateCoverageSchema = CoverageSchema.omit(RESOURCE_META_MASK).extend(
  ResourceIdentityInputShape
);

export type Coverage = z.infer<typeof CoverageSchema>;
export type CreateCoverage = z.infer<typeof CreateCoverageSchema>;

// =============================================================================
// Claim
// =============================================================================

export const ClaimSchema = ResourceMetaSchema.extend({
  patientId: UUIDSchema,
  status: optional(z.string().max(30)),
  typeCode: optional(z.string().max(50)),
  subTypeCode: optional(z.string().max(50)),
  useCode: optional(z.string().max(30)),
  encounterId: optional(UUIDSchema),
  insurerOrgId: optional(UUIDSchema),
  providerId: optional(UUIDSchema),
  providerOrgId: optional(UUIDSchema),
  coverageId: optional(UUIDSchema),
  priorityCode: optional(z.string().max(20)),
  billablePeriodStart: optional(DateSchema),
  billablePeriodEnd: optional(DateSchema),
  totalAmount: optional(DecimalSchema),
  currency: optional(CurrencySchema),
  placeOfService: optional(z.string().max(50)),
});

export const CreateClaimSchema = ClaimSchema.omit(RESOURCE_META_MASK).extend(
  ResourceIdentityInputShape
);

export const ClaimDiagnosisSchema = ChildMetaSchema.extend({
  claimId: UUIDSchema,
  sequence: IntegerSchema.min(1),
  diagnosisCode: z.string().max(50),
  diagnosisCodeSystem: optional(z.string().max(255)),
  diagnosisDisplay: optional(z.string().max(255)),
  typeCode: optional(z.string().max(50)),
  onAdmission: optional(z.string().max(10)),
});

export const CreateClaimDiagnosisSchema = ClaimDiagnosisSchema.omit({
  ...CHILD_META_MASK,
  claimId: true,
});

export const ClaimProcedureSchema = ChildMetaSchema.extend({
  claimId: UUIDSchema,
  sequence: IntegerSchema.min(1),
  procedureCode: z.string().max(50),
  procedureCodeSystem: optional(z.string().max(255)),
  procedureDisplay: optional(z.string().max(255)),
  typeCode: optional(z.string().max(50)),
  date: optional(DateSchema),
});

export const CreateClaimProcedureSchema = ClaimProcedureSchema.omit({
  ...CHILD_META_MASK,
  claimId: true,
});

export const ClaimItemSchema = ChildMetaSchema.extend({
  claimId: UUIDSchema,
  sequence: IntegerSchema.min(1),
  productOrServiceCode: z.string().max(50),
  productOrServiceSystem: optional(z.string().max(255)),
  productOrServiceDisplay: optional(z.string().max(255)),
  servicedDate: optional(DateSchema),
  quantityValue: optional(DecimalSchema),
  unitPrice: optional(DecimalSchema),
  netAmount: optional(DecimalSchema),
  currency: optional(CurrencySchema),
  note: optional(z.string()),
});

export const CreateClaimItemSchema = ClaimItemSchema.omit({
  ...CHILD_META_MASK,
  claimId: true,
});

export type Claim = z.infer<typeof ClaimSchema>;
export type CreateClaim = z.infer<typeof CreateClaimSchema>;
export type ClaimDiagnosis = z.infer<typeof ClaimDiagnosisSchema>;
export type CreateClaimDiagnosis = z.infer<typeof CreateClaimDiagnosisSchema>;
export type ClaimProcedure = z.infer<typeof ClaimProcedureSchema>;
export type CreateClaimProcedure = z.infer<typeof CreateClaimProcedureSchema>;
export type ClaimItem = z.infer<typeof ClaimItemSchema>;
export type CreateClaimItem = z.infer<typeof CreateClaimItemSchema>;
