/**
 * Surgery schemas: surgical cases and their intra-operative records
 */
import { z } from 'zod';

import {
  CHILD_META_MASK,
  ChildMetaSchema,
  DateSchema,
  DateTimeSchema,
  DecimalSchema,
  IntegerSchema,
  RESOURCE_META_MASK,
  ResourceIdentityInputShape,
  ResourceMetaSchema,
  UUIDSchema,
  optional,
} from './common.js';

export const SURGICAL_CASE_STATUSES = [
  'scheduled',
  'pre-op',
  'in-progress',
  'completed',
  'cancelled',
  'postponed',
] as const;

export const SurgicalCaseSchema = ResourceMetaSchema.extend({
  patientId: UUIDSchema,
  primarySurgeonId: UUIDSchema,
  scheduledDate: DateSchema,
  status: optional(z.string().max(30)),
  encounterId: optional(UUIDSchema),
  anesthesiologistId: optional(UUIDSchema),
  caseClass: optional(z.string().max(30)),
  asaClass: optional(z.string().max(10)),
  woundClass: optional(z.string().max(30)),
  scheduledStart: optional(DateTimeSchema),
  scheduledEnd: optional(DateTimeSchema),
  anesthesiaType: optional(z.string().max(50)),
  laterality: optional(z.string().max(20)),
  preOpDiagnosis: optional(z.string()),
  note: optional(z.string()),
});

export const CreateSurgicalCaseSchema = SurgicalCaseSchema.omit(RESOURCE_META_MASK).extend(
  ResourceIdentityInputShape
);

export type SurgicalCase = z.infer<typeof SurgicalCaseSchema>;
export type CreateSurgicalCase = z.infer<typeof CreateSurgicalCaseSchema>;

// =============================================================================
// Children
// =============================================================================

export const SurgicalProcedureSchema = ChildMetaSchema.extend({
  surgicalCaseId: UUIDSchema,
  procedureCode: z.string().max(50),
  procedureDisplay: optional(z.string().max(255)),
  codeSystem: optional(z.string().max(255)),
  cptCode: optional(z.string().max(10)),
  isPrimary: optional(z.boolean()),
  bodySiteCode: optional(z.string().max(50)),
  bodySiteDisplay: optional(z.string().max(255)),
  sequence: optional(IntegerSchema.min(1)),
});

export const CreateSurgicalProcedureSchema = SurgicalProcedureSchema.omit({
  ...CHILD_META_MASK,
  surgicalCaseId: true,
});

export const SurgicalTeamMemberSchema = ChildMetaSchema.extend({
  surgicalCaseId: UUIDSchema,
  practitionerId: UUIDSchema,
  role: z.string().max(50),
  roleDisplay: optional(z.string().max(100)),
  startTime: optional(DateTimeSchema),
  endTime: optional(DateTimeSchema),
});

export const CreateSurgicalTeamMemberSchema = SurgicalTeamMemberSchema.omit({
  ...CHILD_META_MASK,
  surgicalCaseId: true,
});

export const SurgicalTimeEventSchema = ChildMetaSchema.extend({
  surgicalCaseId: UUIDSchema,
  eventType: z.string().max(50),
  eventTime: DateTimeSchema,
  recordedById: optional(UUIDSchema),
  note: optional(z.string()),
});

export const CreateSurgicalTimeEventSchema = SurgicalTimeEventSchema.omit({
  ...CHILD_META_MASK,
  surgicalCaseId: true,
});

export const SurgicalCountSchema = ChildMetaSchema.extend({
  surgicalCaseId: UUIDSchema,
  countType: z.string().max(30),
  itemName: z.string().max(100),
  expectedCount: optional(IntegerSchema.min(0)),
  actualCount: optional(IntegerSchema.min(0)),
  isCorrect: optional(z.boolean()),
  countedById: optional(UUIDSchema),
  verifiedById: optional(UUIDSchema),
  countTime: optional(DateTimeSchema),
  note: optional(z.string()),
});

export const CreateSurgicalCountSchema = SurgicalCountSchema.omit({
  ...CHILD_META_MASK,
  surgicalCaseId: true,
});

export const SurgicalSupplySchema = ChildMetaSchema.extend({
  surgicalCaseId: UUIDSchema,
  supplyName: z.string().max(255),
  supplyCode: optional(z.string().max(50)),
  quantity: optional(DecimalSchema),
  unitOfMeasure: optional(z.string().max(30)),
  lotNumber: optional(z.string().max(100)),
  note: optional(z.string()),
});

export const CreateSurgicalSupplySchema = SurgicalSupplySchema.omit({
  ...CHILD_META_MASK,
  surgicalCaseId: true,
});

export type SurgicalProcedure = z.infer<typeof SurgicalProcedureSchema>;
export type CreateSurgicalProcedure = z.infer<typeof CreateSurgicalProcedureSchema>;
export type SurgicalTeamMember = z.infer<typeof SurgicalTeamMemberSchema>;
export type CreateSurgicalTeamMember = z.infer<typeof CreateSurgicalTeamMemberSchema>;
export type SurgicalTimeEvent = z.infer<typeof SurgicalTimeEventSchema>;
export type CreateSurgicalTimeEvent = z.infer<typeof CreateSurgicalTimeEventSchema>;
export type SurgicalCount = z.infer<typeof SurgicalCountSchema>;
export type CreateSurgicalCount = z.infer<typeof CreateSurgicalCountSchema>;
export type SurgicalSupply = z.infer<typeof SurgicalSupplySchema>;
export type CreateSurgicalSupply = z.infer<typeof CreateSurgicalSupplySchema>;
