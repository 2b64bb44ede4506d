/**
 * Oncology tables and rules: cancer diagnoses, treatment protocols and
 * chemotherapy cycles
 */

import { ValidationError, type ChildTableDefinition, type TableDefinition } from '@ehr-backend/core';
import {
  CANCER_DIAGNOSIS_STATUSES,
  CHEMO_CYCLE_STATUSES,
  CancerDiagnosisSchema,
  ChemoCycleSchema,
  ProtocolDrugSchema,
  TREATMENT_PROTOCOL_STATUSES,
  TreatmentProtocolSchema,
  type CancerDiagnosis,
  type ChemoCycle,
  type ProtocolDrug,
  type TreatmentProtocol,
} from '@ehr-backend/types';

import type { ChildRules, ResourceRules } from '../shared/index.js';

export type CancerDiagnosisFilter = 'patient' | 'status' | 'type';

export const cancerDiagnosisTable: TableDefinition<CancerDiagnosis, CancerDiagnosisFilter> = {
  table: 'cancer_diagnosis',
  resourceType: 'CancerDiagnosis',
  schema: CancerDiagnosisSchema,
  immutable: ['patientId'],
  filters: {
    patient: { field: 'patientId', kind: 'reference' },
    status: { field: 'currentStatus', kind: 'token' },
    type: { field: 'cancerType', kind: 'token' },
  },
  references: {
    patientId: { table: 'patient', onDelete: 'restrict' },
    diagnosingProviderId: { table: 'practitioner', onDelete: 'restrict' },
    managingProviderId: { table: 'practitioner', onDelete: 'restrict' },
  },
};

export const cancerDiagnosisRules: ResourceRules<CancerDiagnosis> = {
  required: ['patientId', 'diagnosisDate'],
  allowed: { currentStatus: CANCER_DIAGNOSIS_STATUSES },
  statusField: 'currentStatus',
  patientField: 'patientId',
  defaults: () => ({ currentStatus: 'active-treatment' }),
};

export type TreatmentProtocolFilter = 'diagnosis' | 'status';

export const treatmentProtocolTable: TableDefinition<TreatmentProtocol, TreatmentProtocolFilter> = {
  table: 'treatment_protocol',
  resourceType: 'TreatmentProtocol',
  schema: TreatmentProtocolSchema,
  filters: {
    diagnosis: { field: 'cancerDiagnosisId', kind: 'reference' },
    status: { field: 'status', kind: 'token' },
  },
  references: {
    cancerDiagnosisId: { table: 'cancer_diagnosis', onDelete: 'restrict' },
    prescribingProviderId: { table: 'practitioner', onDelete: 'restrict' },
  },
};

export const treatmentProtocolRules: ResourceRules<TreatmentProtocol> = {
  required: ['cancerDiagnosisId', 'protocolName'],
  allowed: { status: TREATMENT_PROTOCOL_STATUSES },
  statusField: 'status',
  defaults: () => ({ status: 'planned' }),
};

export const protocolDrugTable: ChildTableDefinition<ProtocolDrug, 'protocolId'> = {
  table: 'protocol_drug',
  resourceType: 'ProtocolDrug',
  schema: ProtocolDrugSchema,
  parentField: 'protocolId',
  parentTable: 'treatment_protocol',
  orderBy: [{ field: 'sequenceOrder', direction: 'asc' }],
};

export const protocolDrugRules: ChildRules<ProtocolDrug, 'protocolId'> = {
  required: ['drugName'],
};

export type ChemoCycleFilter = 'protocol' | 'status';

export const chemoCycleTable: TableDefinition<ChemoCycle, ChemoCycleFilter> = {
  table: 'chemotherapy_cycle',
  resourceType: 'ChemoCycle',
  schema: ChemoCycleSchema,
  orderBy: [{ field: 'cycleNumber', direction: 'asc' }],
  filters: {
    protocol: { field: 'protocolId', kind: 'reference' },
    status: { field: 'status', kind: 'token' },
  },
  references: {
    protocolId: { table: 'treatment_protocol', onDelete: 'restrict' },
    providerId: { table: 'practitioner', onDelete: 'restrict' },
  },
};

export const chemoCycleRules: ResourceRules<ChemoCycle> = {
  required: ['protocolId', 'cycleNumber'],
  allowed: { status: CHEMO_CYCLE_STATUSES },
  statusField: 'status',
  defaults: () => ({ status: 'planned' }),
  validate: (input) => {
    if (input.cycleNumber <= 0) {
      throw new ValidationError('cycleNumber must be greater than 0');
    }
  },
};
