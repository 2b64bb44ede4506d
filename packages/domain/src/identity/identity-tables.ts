/**
 * Identity tables and rules: patients, practitioners, organizations
 *
 * None of the three carries a status, so there is no allow-list to apply.
 */

import type { TableDefinition } from '@ehr-backend/core';
import {
  OrganizationSchema,
  PatientSchema,
  PractitionerSchema,
  type Organization,
  type Patient,
  type Practitioner,
} from '@ehr-backend/types';

import type { ResourceRules } from '../shared/index.js';

export type PatientFilter = 'family' | 'given' | 'mrn' | 'gender' | 'birthdate';

export const patientTable: TableDefinition<Patient, PatientFilter> = {
  table: 'patient',
  resourceType: 'Patient',
  schema: PatientSchema,
  orderBy: [
    { field: 'lastName', direction: 'asc' },
    { field: 'firstName', direction: 'asc' },
  ],
  filters: {
    family: { field: 'lastName', kind: 'string' },
    given: { field: 'firstName', kind: 'string' },
    mrn: { field: 'mrn', kind: 'token' },
    gender: { field: 'gender', kind: 'token' },
    birthdate: { field: 'birthDate', kind: 'date' },
  },
};

export const patientRules: ResourceRules<Patient> = {
  required: ['mrn', 'firstName', 'lastName'],
  defaults: () => ({ active: true }),
};

export type PractitionerFilter = 'family' | 'given' | 'npi';

export const practitionerTable: TableDefinition<Practitioner, PractitionerFilter> = {
  table: 'practitioner',
  resourceType: 'Practitioner',
  schema: PractitionerSchema,
  orderBy: [
    { field: 'lastName', direction: 'asc' },
    { field: 'firstName', direction: 'asc' },
  ],
  filters: {
    family: { field: 'lastName', kind: 'string' },
    given: { field: 'firstName', kind: 'string' },
    npi: { field: 'npiNumber', kind: 'token' },
  },
};

export const practitionerRules: ResourceRules<Practitioner> = {
  required: ['firstName', 'lastName'],
  defaults: () => ({ active: true }),
};

export type OrganizationFilter = 'name' | 'type';

export const organizationTable: TableDefinition<Organization, OrganizationFilter> = {
  table: 'organization',
  resourceType: 'Organization',
  schema: OrganizationSchema,
  orderBy: [{ field: 'name', direction: 'asc' }],
  filters: {
    name: { field: 'name', kind: 'string' },
    type: { field: 'typeCode', kind: 'token' },
  },
  references: {
    parentOrgId: { table: 'organization', onDelete: 'restrict' },
  },
};

export const organizationRules: ResourceRules<Organization> = {
  required: ['name'],
  defaults: () => ({ typeCode: 'prov', active: true }),
};
