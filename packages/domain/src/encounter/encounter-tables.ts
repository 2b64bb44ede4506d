/**
 * Encounter tables and rules
 */

import type { ChildTableDefinition, TableDefinition } from '@ehr-backend/core';
import {
  ENCOUNTER_STATUSES,
  EncounterParticipantSchema,
  EncounterSchema,
  EncounterStatusHistorySchema,
  type Encounter,
  type EncounterParticipant,
  type EncounterStatusHistory,
} from '@ehr-backend/types';

import type { ChildRules, ResourceRules } from '../shared/index.js';

export type EncounterFilter = 'patient' | 'status' | 'class' | 'date';

export const encounterTable: TableDefinition<Encounter, EncounterFilter> = {
  table: 'encounter',
  resourceType: 'Encounter',
  schema: EncounterSchema,
  immutable: ['patientId'],
  orderBy: [{ field: 'periodStart', direction: 'desc' }],
  filters: {
    patient: { field: 'patientId', kind: 'reference' },
    status: { field: 'status', kind: 'token' },
    class: { field: 'classCode', kind: 'token' },
    date: { field: 'periodStart', kind: 'datetime' },
  },
  references: {
    patientId: { table: 'patient', onDelete: 'restrict' },
    primaryPractitionerId: { table: 'practitioner', onDelete: 'restrict' },
    serviceProviderId: { table: 'organization', onDelete: 'restrict' },
  },
};

export const encounterRules: ResourceRules<Encounter> = {
  required: ['patientId', 'classCode'],
  allowed: { status: ENCOUNTER_STATUSES },
  statusField: 'status',
  patientField: 'patientId',
  defaults: () => ({ status: 'planned', periodStart: new Date().toISOString() }),
};

export const encounterParticipantTable: ChildTableDefinition<EncounterParticipant, 'encounterId'> = {
  table: 'encounter_participant',
  resourceType: 'EncounterParticipant',
  schema: EncounterParticipantSchema,
  parentField: 'encounterId',
  parentTable: 'encounter',
  references: {
    practitionerId: { table: 'practitioner', onDelete: 'restrict' },
  },
};

export const encounterParticipantRules: ChildRules<EncounterParticipant, 'encounterId'> = {
  required: ['practitionerId'],
};

export const encounterStatusHistoryTable: ChildTableDefinition<
  EncounterStatusHistory,
  'encounterId'
> = {
  table: 'encounter_status_history',
  resourceType: 'EncounterStatusHistory',
  schema: EncounterStatusHistorySchema,
  parentField: 'encounterId',
  parentTable: 'encounter',
  orderBy: [{ field: 'changedAt', direction: 'asc' }],
};

export const encounterStatusHistoryRules: ChildRules<EncounterStatusHistory, 'encounterId'> = {
  required: ['toStatus', 'changedAt'],
};
