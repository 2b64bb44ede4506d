/**
 * Encounter schemas
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

export const ENCOUNTER_STATUSES = [
  'planned',
  'arrived',
  'triaged',
  'in-progress',
  'onleave',
  'finished',
  'cancelled',
  'entered-in-error',
] as const;

export const EncounterSchema = ResourceMetaSchema.extend({
  patientId: UUIDSchema,
  status: optional(z.string().max(30)),
  classCode: z.string().max(30),
  classDisplay: optional(z.string().max(100)),
  typeCode: optional(z.string().max(50)),
  typeDisplay: optional(z.string().max(255)),
  priorityCode: optional(z.string().max(20)),
  primaryPractitionerId: optional(UUIDSchema),
  serviceProviderId: optional(UUIDSchema),
  periodStart: optional(DateTimeSchema),
  periodEnd: optional(DateTimeSchema),
  lengthMinutes: optional(IntegerSchema.min(0)),
  isTelehealth: optional(z.boolean()),
  reasonText: optional(z.string()),
});

export const CreateEncounterSchema = EncounterSchema.omit(RESOURCE_META_MASK).extend(
  ResourceIdentityInputShape
);

export const EncounterParticipantSchema = ChildMetaSchema.extend({
  encounterId: UUIDSchema,
  practitionerId: UUIDSchema,
  typeCode: optional(z.string().max(30)),
  typeDisplay: optional(z.string().max(100)),
  periodStart: optional(DateTimeSchema),
  periodEnd: optional(DateTimeSchema),
});

export const CreateEncounterParticipantSchema = EncounterParticipantSchema.omit({
  ...CHILD_META_MASK,
  encounterId: true,
});

export const EncounterStatusHistorySchema = ChildMetaSchema.extend({
  encounterId: UUIDSchema,
  fromStatus: optional(z.string().max(30)),
  toStatus: z.string().max(30),
  changedAt: DateTimeSchema,
});

export type Encounter = z.infer<typeof EncounterSchema>;
export type CreateEncounter = z.infer<typeof CreateEncounterSchema>;
export type EncounterParticipant = z.infer<typeof EncounterParticipantSchema>;
export type CreateEncounterParticipant = z.infer<typeof CreateEncounterParticipantSchema>;
export type EncounterStatusHistory = z.infer<typeof EncounterStatusHistorySchema>;
