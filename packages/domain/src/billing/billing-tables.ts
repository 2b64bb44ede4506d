/**
 * Billing tables and rules: coverages, claims and their line collections
 */

import { ValidationError, type ChildTableDefinition, type TableDefinition } from '@ehr-backend/core';
import {
  ClaimDiagnosisSchema,
  ClaimItemSchema,
  ClaimProcedureSchema,
  ClaimSchema,
  CoverageSchema,
  FINANCIAL_STATUSES,
  type Claim,
  type ClaimDiagnosis,
  type ClaimItem,
  type ClaimProcedure,
  type Coverage,
} from '@ehr-backend/types';

import type { ChildRules, ResourceRules } from '../shared/index.js';

// =============================================================================
// Coverage
// =============================================================================

export type CoverageFilter = 'patient' | 'status' | 'type' | 'payor';

export const coverageTable: TableDefinition<Coverage, CoverageFilter> = {
  table: 'coverage',
  resourceType: 'Coverage',
  schema: CoverageSchema,
  immutable: ['patientId'],
  filters: {
    patient: { field: 'patientId', kind: 'reference' },
    status: { field: 'status', kind: 'token' },
    type: { field: 'typeCode', kind: 'token' },
    payor: { field: 'payorOrgId', kind: 'reference' },
  },
  references: {
    patientId: { table: 'patient', onDelete: 'restrict' },
    payorOrgId: { table: 'organization', onDelete: 'restrict' },
  },
};

export const coverageRules: ResourceRules<Coverage> = {
  required: ['patientId'],
  allowed: { status: FINANCIAL_STATUSES },
  statusField: 'status',
  patientField: 'patientId',
  defaults: () => ({ status: 'active' }),
  validate: (input) => {
    if (input.payorOrgId === undefined && (input.payorName ?? '').trim() === '') {
      throw new ValidationError('payorOrgId or payorName is required');
    }
  },
};

// =============================================================================
// Claim
// =============================================================================

export type ClaimFilter = 'patient' | 'status' | 'use' | 'type';

export const claimTable: TableDefinition<Claim, ClaimFilter> = {
  table: 'claim',
  resourceType: 'Claim',
  schema: ClaimSchema,
  immutable: ['patientId'],
  filters: {
    patient: { field: 'patientId', kind: 'reference' },
    status: { field: 'status', kind: 'token' },
    use: { field: 'useCode', kind: 'token' },
    type: { field: 'typeCode', kind: 'token' },
  },
  references: {
    patientId: { table: 'patient', onDelete: 'restrict' },
    encounterId: { table: 'encounter', onDelete: 'restrict' },
    insurerOrgId: { table: 'organization', onDelete: 'restrict' },
    providerId: { table: 'practitioner', onDelete: 'restrict' },
    providerOrgId: { table: 'organization', onDelete: 'restrict' },
    coverageId: { table: 'coverage', onDelete: 'restrict' },
  },
};

export const claimRules: ResourceRules<Claim> = {
  required: ['patientId'],
  allowed: { status: FINANCIAL_STATUSES },
  statusField: 'status',
  patientField: 'patientId',
  defaults: () => ({ status: 'draft' }),
};

const BY_SEQUENCE = [{ field: 'sequence', direction: 'asc' }] as const;

export const claimDiagnosisTable: ChildTableDefinition<ClaimDiagnosis, 'claimId'> = {
  table: 'claim_diagnosis',
  resourceType: 'ClaimDiagnosis',
  schema: ClaimDiagnosisSchema,
  parentField: 'claimId',
  parentTable: 'claim',
  orderBy: BY_SEQUENCE,
};

export const claimDiagnosisRules: ChildRules<ClaimDiagnosis, 'claimId'> = {
  required: ['sequence', 'diagnosisCode'],
};

export const claimProcedureTable: ChildTableDefinition<ClaimProcedure, 'claimId'> = {
  table: 'claim_procedure',
  resourceType: 'ClaimProcedure',
  schema: ClaimProcedureSchema,
  parentField: 'claimId',
  parentTable: 'claim',
  orderBy: BY_SEQUENCE,
};

export const claimProcedureRules: ChildRules<ClaimProcedure, 'claimId'> = {
  required: ['sequence', 'procedureCode'],
};

export const claimItemTable: ChildTableDefinition<ClaimItem, 'claimId'> = {
  table: 'claim_item',
  resourceType: 'ClaimItem',
  schema: ClaimItemSchema,
  parentField: 'claimId',
  parentTable: 'claim',
  orderBy: BY_SEQUENCE,
};

export const claimItemRules: ChildRules<ClaimItem, 'claimId'> = {
  required: ['sequence', 'productOrServiceCode'],
};
