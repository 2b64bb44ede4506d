/**
 * @fileoverview Identity resources
 *
 * @module domain/identity
 */

import type { RepositoryBackend } from '@ehr-backend/core';
import type { Organization, Patient, Practitioner } from '@ehr-backend/types';

import { ResourceService } from '../shared/index.js';
import {
  organizationRules,
  organizationTable,
  patientRules,
  patientTable,
  practitionerRules,
  practitionerTable,
  type OrganizationFilter,
  type PatientFilter,
  type PractitionerFilter,
} from './identity-tables.js';

export * from './identity-tables.js';

export interface IdentityServices {
  patients: ResourceService<Patient, PatientFilter>;
  practitioners: ResourceService<Practitioner, PractitionerFilter>;
  organizations: ResourceService<Organization, OrganizationFilter>;
}

export function createIdentityServices(backend: RepositoryBackend): IdentityServices {
  const { unitOfWork } = backend;
  return {
    patients: new ResourceService(backend.resources(patientTable), patientRules, unitOfWork),
    practitioners: new ResourceService(
      backend.resources(practitionerTable),
      practitionerRules,
      unitOfWork
    ),
    organizations: new ResourceService(
      backend.resources(organizationTable),
      organizationRules,
      unitOfWork
    ),
  };
}
