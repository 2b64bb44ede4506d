/**
 * @fileoverview Insurance coverage and claims
 *
 * @module domain/billing
 */

import type { RepositoryBackend } from '@ehr-backend/core';
import type { Claim, ClaimDiagnosis, ClaimItem, ClaimProcedure, Coverage } from '@ehr-backend/types';

import { ChildCollectionService, ResourceService } from '../shared/index.js';
import {
  claimDiagnosisRules,
  claimDiagnosisTable,
  claimItemRules,
  claimItemTable,
  claimProcedureRules,
  claimProcedureTable,
  claimRules,
  claimTable,
  coverageRules,
  coverageTable,
  type ClaimFilter,
  type CoverageFilter,
} from './billing-tables.js';

export * from './billing-tables.js';

export interface BillingServices {
  coverages: ResourceService<Coverage, CoverageFilter>;
  claims: ResourceService<Claim, ClaimFilter>;
  claimDiagnoses: ChildCollectionService<ClaimDiagnosis, 'claimId'>;
  claimProcedures: ChildCollectionService<ClaimProcedure, 'claimId'>;
  claimItems: ChildCollectionService<ClaimItem, 'claimId'>;
}

export function createBillingServices(backend: RepositoryBackend): BillingServices {
  const { unitOfWork } = backend;
  const claims = new ResourceService(backend.resources(claimTable), claimRules, unitOfWork);

  return {
    coverages: new ResourceService(backend.resources(coverageTable), coverageRules, unitOfWork),
    claims,
    claimDiagnoses: new ChildCollectionService(
      claims,
      backend.children(claimDiagnosisTable),
      claimDiagnosisRules
    ),
    claimProcedures: new ChildCollectionService(
      claims,
      backend.children(claimProcedureTable),
      claimProcedureRules
    ),
    claimItems: new ChildCollectionService(claims, backend.children(claimItemTable), claimItemRules),
  };
}
