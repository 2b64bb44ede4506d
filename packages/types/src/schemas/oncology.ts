/**
 * Oncology schemas: cancer diagnoses, treatment protocols and chemotherapy cycles
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

// =============================================================================
// CancerDiagnosis
// =============================================================================

export const CANCER_DIAGNOSIS_STATUSES = [
  'active-treatment',
  'remission',
  'recurrence',
  'progression',
  'palliative',
  'surveillance',
  'deceased',
] as const;

export const CancerDiagnosisSchema = ResourceMetaSchema.extend({
  patientId: UUIDSchema,
  diagnosisDate: DateSchema,
  currentStatus: optional(z.string().max(30)),
  cancerType: optional(z.string().max(100)),
  cancerSite: optional(z.string().max(100)),
  histologyCode: optional(z.string().max(50)),
  histologyDisplay: optional(z.string().max(255)),
  stagingSystem: optional(z.string().max(50)),
  stageGroup: optional(z.string().max(20)),
  tStage: optional(z.string().max(10)),
  nStage: optional(z.string().max(10)),
  mStage: optional(z.string().max(10)),
  grade: optional(z.string().max(20)),
  laterality: optional(z.string().max(20)),
  diagnosingProviderId: optional(UUIDSchema),
  managingProviderId: optional(UUIDSchema),
  icd10Code: optional(z.string().max(10)),
  icd10Display: optional(z.string().max(255)),
  note: optional(z.string()),
});

export const CreateCancerDiagnosisSchema = CancerDiagnosisSchema.omit(RESOURCE_META_MASK).extend(
  ResourceIdentityInputShape
);

export type CancerDiagnosis = z.infer<typeof CancerDiagnosisSchema>;
export type CreateCancerDiagnosis = z.infer<typeof CreateCancerDiagnosisSchema>;

// =============================================================================
// TreatmentProtocol
// =============================================================================

export const TREATMENT_PROTOCOL_STATUSES = [
  'planned',
  'active',
  'completed',
  'discontinued',
  'on-hold',
] as const;

export const TreatmentProtocolSchema = ResourceMetaSchema.extend({
  cancerDiagnosisId: UUIDSchema,
  protocolName: z.string().max(255),
  status: optional(z.string().max(30)),
  protocolCode: optional(z.string().max(50)),
  protocolType: optional(z.string().max(50)),
  intent: optional(z.string().max(30)),
  numberOfCycles: optional(IntegerSchema.min(1)),
  cycleLengthDays: optional(IntegerSchema.min(1)),
  startDate: optional(DateSchema),
  endDate: optional(DateSchema),
  prescribingProviderId: optional(UUIDSchema),
  note: optional(z.string()),
});

export const CreateTreatmentProtocolSchema = TreatmentProtocolSchema.omit(
  RESOURCE_META_MASK
).extend(ResourceIdentityInputShape);

export const ProtocolDrugSchema = ChildMetaSchema.extend({
  protocolId: UUIDSchema,
  drugName: z.string().max(255),
  drugCode: optional(z.string().max(50)),
  route: optional(z.string().max(50)),
  doseValue: optional(DecimalSchema),
  doseUnit: optional(z.string().max(30)),
  frequency: optional(z.string().max(50)),
  administrationDay: optional(z.string().max(50)),
  sequenceOrder: optional(IntegerSchema.min(0)),
});

export const CreateProtocolDrugSchema = ProtocolDrugSchema.omit({
  ...CHILD_META_MASK,
  protocolId: true,
});

export type TreatmentProtocol = z.infer<typeof TreatmentProtocolSchema>;
export type CreateTreatmentProtocol = z.infer<typeof CreateTreatmentProtocolSchema>;
export type ProtocolDrug = z.infer<typeof ProtocolDrugSchema>;
export type CreateProtocolDrug = z.infer<typeof CreateProtocolDrugSchema>;

// =============================================================================
// ChemoCycle
// =============================================================================

export const CHEMO_CYCLE_STATUSES = [
  'planned',
  'in-progress',
  'completed',
  'delayed',
  'cancelled',
] as const;

export const ChemoCycleSchema = ResourceMetaSchema.extend({
  protocolId: UUIDSchema,
  cycleNumber: IntegerSchema,
  status: optional(z.string().max(30)),
  plannedStartDate: optional(DateSchema),
  actualStartDate: optional(DateSchema),
  actualEndDate: optional(DateSchema),
  doseReductionPct: optional(DecimalSchema),
  delayDays: optional(IntegerSchema.min(0)),
  bsaM2: optional(DecimalSchema),
  weightKg: optional(DecimalSchema),
  providerId: optional(UUIDSchema),
  note: optional(z.string()),
});

export const CreateChemoCycleSchema = ChemoCycleSchema.omit(RESOURCE_META_MASK).extend(
  ResourceIdentityInputShape
);

export type ChemoCycle = z.infer<typeof ChemoCycleSchema>;
export type CreateChemoCycle = z.infer<typeof CreateChemoCycleSchema>;
