/**
 * @fileoverview Surgical cases with procedures, team, timings, counts and supplies
 *
 * @module domain/surgery
 */

import type { RepositoryBackend } from '@ehr-backend/core';
import type {
  SurgicalCase,
  SurgicalCount,
  SurgicalProcedure,
  SurgicalSupply,
  SurgicalTeamMember,
  SurgicalTimeEvent,
} from '@ehr-backend/types';

import { ChildCollectionService, ResourceService } from '../shared/index.js';
import {
  surgicalCaseRules,
  surgicalCaseTable,
  surgicalCountRules,
  surgicalCountTable,
  surgicalProcedureRules,
  surgicalProcedureTable,
  surgicalSupplyRules,
  surgicalSupplyTable,
  surgicalTeamMemberRules,
  surgicalTeamMemberTable,
  surgicalTimeEventRules,
  surgicalTimeEventTable,
  type SurgicalCaseFilter,
} from './surgery-tables.js';

export * from './surgery-tables.js';

export interface SurgeryServices {
  surgicalCases: ResourceService<SurgicalCase, SurgicalCaseFilter>;
  surgicalProcedures: ChildCollectionService<SurgicalProcedure, 'surgicalCaseId'>;
  surgicalTeam: ChildCollectionService<SurgicalTeamMember, 'surgicalCaseId'>;
  surgicalTimeEvents: ChildCollectionService<SurgicalTimeEvent, 'surgicalCaseId'>;
  surgicalCounts: ChildCollectionService<SurgicalCount, 'surgicalCaseId'>;
  surgicalSupplies: ChildCollectionService<SurgicalSupply, 'surgicalCaseId'>;
}

export function createSurgeryServices(backend: RepositoryBackend): SurgeryServices {
  const surgicalCases = new ResourceService(
    backend.resources(surgicalCaseTable),
    surgicalCaseRules,
    backend.unitOfWork
  );

  return {
    surgicalCases,
    surgicalProcedures: new ChildCollectionService(
      surgicalCases,
      backend.children(surgicalProcedureTable),
      surgicalProcedureRules
    ),
    surgicalTeam: new ChildCollectionService(
      surgicalCases,
      backend.children(surgicalTeamMemberTable),
      surgicalTeamMemberRules
    ),
    surgicalTimeEvents: new ChildCollectionService(
      surgicalCases,
      backend.children(surgicalTimeEventTable),
      surgicalTimeEventRules
    ),
    surgicalCounts: new ChildCollectionService(
      surgicalCases,
      backend.children(surgicalCountTable),
      surgicalCountRules
    ),
    surgicalSupplies: new ChildCollectionService(
      surgicalCases,
      backend.children(surgicalSupplyTable),
      surgicalSupplyRules
    ),
  };
}
