/**
 * @fileoverview Encounters, their participants and status history
 *
 * @module domain/encounter
 */

import type { RepositoryBackend } from '@ehr-backend/core';
import type { Encounter, EncounterParticipant, EncounterStatusHistory } from '@ehr-backend/types';

import {
  ChildCollectionService,
  StatusTrackingService,
  type StatusHistoryWriter,
} from '../shared/index.js';
import {
  encounterParticipantRules,
  encounterParticipantTable,
  encounterRules,
  encounterStatusHistoryRules,
  encounterStatusHistoryTable,
  encounterTable,
  type EncounterFilter,
} from './encounter-tables.js';

export * from './encounter-tables.js';

export interface EncounterServices {
  encounters: StatusTrackingService<Encounter, EncounterFilter>;
  encounterParticipants: ChildCollectionService<EncounterParticipant, 'encounterId'>;
  encounterStatusHistory: ChildCollectionService<EncounterStatusHistory, 'encounterId'>;
}

export function createEncounterServices(backend: RepositoryBackend): EncounterServices {
  const { unitOfWork } = backend;
  const historyRepository = backend.children(encounterStatusHistoryTable);
  const history: StatusHistoryWriter = {
    async record(encounterId, fromStatus, toStatus) {
      await historyRepository.add(encounterId, {
        fromStatus,
        toStatus,
        changedAt: new Date().toISOString(),
      });
    },
  };

  const encounters = new StatusTrackingService(
    backend.resources(encounterTable),
    encounterRules,
    unitOfWork,
    history
  );

  return {
    encounters,
    encounterParticipants: new ChildCollectionService(
      encounters,
      backend.children(encounterParticipantTable),
      encounterParticipantRules
    ),
    encounterStatusHistory: new ChildCollectionService(
      encounters,
      historyRepository,
      encounterStatusHistoryRules
    ),
  };
}
