/**
 * Surgery tables and rules: surgical cases and their intra-operative records
 */

import type { ChildTableDefinition, TableDefinition } from '@ehr-backend/core';
import {
  SURGICAL_CASE_STATUSES,
  SurgicalCaseSchema,
  SurgicalCountSchema,
  SurgicalProcedureSchema,
  SurgicalSupplySchema,
  SurgicalTeamMemberSchema,
  SurgicalTimeEventSchema,
  type ChildMeta,
  type SurgicalCase,
  type SurgicalCount,
  type SurgicalProcedure,
  type SurgicalSupply,
  type SurgicalTeamMember,
  type SurgicalTimeEvent,
} from '@ehr-backend/types';

import type { ChildRules, ResourceRules } from '../shared/index.js';

export type SurgicalCaseFilter = 'patient' | 'status' | 'surgeon' | 'date';

export const surgicalCaseTable: TableDefinition<SurgicalCase, SurgicalCaseFilter> = {
  table: 'surgical_case',
  resourceType: 'SurgicalCase',
  schema: SurgicalCaseSchema,
  immutable: ['patientId'],
  orderBy: [{ field: 'scheduledDate', direction: 'desc' }],
  filters: {
    patient: { field: 'patientId', kind: 'reference' },
    status: { field: 'status', kind: 'token' },
    surgeon: { field: 'primarySurgeonId', kind: 'reference' },
    date: { field: 'scheduledDate', kind: 'date' },
  },
  references: {
    patientId: { table: 'patient', onDelete: 'restrict' },
    primarySurgeonId: { table: 'practitioner', onDelete: 'restrict' },
    anesthesiologistId: { table: 'practitioner', onDelete: 'restrict' },
    encounterId: { table: 'encounter', onDelete: 'restrict' },
  },
};

export const surgicalCaseRules: ResourceRules<SurgicalCase> = {
  required: ['patientId', 'primarySurgeonId', 'scheduledDate'],
  allowed: { status: SURGICAL_CASE_STATUSES },
  statusField: 'status',
  patientField: 'patientId',
  defaults: () => ({ status: 'scheduled' }),
};

type CaseChild<C extends ChildMeta & { surgicalCaseId: string }> = ChildTableDefinition<
  C,
  'surgicalCaseId'
>;

export const surgicalProcedureTable: CaseChild<SurgicalProcedure> = {
  table: 'surgical_procedure',
  resourceType: 'SurgicalProcedure',
  schema: SurgicalProcedureSchema,
  parentField: 'surgicalCaseId',
  parentTable: 'surgical_case',
  orderBy: [{ field: 'sequence', direction: 'asc' }],
};

export const surgicalProcedureRules: ChildRules<SurgicalProcedure, 'surgicalCaseId'> = {
  required: ['procedureCode'],
};

export const surgicalTeamMemberTable: CaseChild<SurgicalTeamMember> = {
  table: 'surgical_team_member',
  resourceType: 'SurgicalTeamMember',
  schema: SurgicalTeamMemberSchema,
  parentField: 'surgicalCaseId',
  parentTable: 'surgical_case',
  references: {
    practitionerId: { table: 'practitioner', onDelete: 'restrict' },
  },
};

export const surgicalTeamMemberRules: ChildRules<SurgicalTeamMember, 'surgicalCaseId'> = {
  required: ['practitionerId', 'role'],
};

export const surgicalTimeEventTable: CaseChild<SurgicalTimeEvent> = {
  table: 'surgical_time_event',
  resourceType: 'SurgicalTimeEvent',
  schema: SurgicalTimeEventSchema,
  parentField: 'surgicalCaseId',
  parentTable: 'surgical_case',
  orderBy: [{ field: 'eventTime', direction: 'asc' }],
  references: {
    recordedById: { table: 'practitioner', onDelete: 'restrict' },
  },
};

export const surgicalTimeEventRules: ChildRules<SurgicalTimeEvent, 'surgicalCaseId'> = {
  required: ['eventType', 'eventTime'],
};

export const surgicalCountTable: CaseChild<SurgicalCount> = {
  table: 'surgical_count',
  resourceType: 'SurgicalCount',
  schema: SurgicalCountSchema,
  parentField: 'surgicalCaseId',
  parentTable: 'surgical_case',
};

export const surgicalCountRules: ChildRules<SurgicalCount, 'surgicalCaseId'> = {
  required: ['countType', 'itemName'],
};

export const surgicalSupplyTable: CaseChild<SurgicalSupply> = {
  table: 'surgical_supply',
  resourceType: 'SurgicalSupply',
  schema: SurgicalSupplySchema,
  parentField: 'surgicalCaseId',
  parentTable: 'surgical_case',
};

export const surgicalSupplyRules: ChildRules<SurgicalSupply, 'surgicalCaseId'> = {
  required: ['supplyName'],
};
