/**
 * @fileoverview Cancer diagnoses, treatment protocols and chemotherapy cycles
 *
 * @module domain/oncology
 */

import type { RepositoryBackend } from '@ehr-backend/core';
import type { CancerDiagnosis, ChemoCycle, ProtocolDrug, TreatmentProtocol } from '@ehr-backend/types';

import { ChildCollectionService, ResourceService } from '../shared/index.js';
import {
  cancerDiagnosisRules,
  cancerDiagnosisTable,
  chemoCycleRules,
  chemoCycleTable,
  protocolDrugRules,
  protocolDrugTable,
  treatmentProtocolRules,
  treatmentProtocolTable,
  type CancerDiagnosisFilter,
  type ChemoCycleFilter,
  type TreatmentProtocolFilter,
} from './oncology-tables.js';

export * from './oncology-tables.js';

export interface OncologyServices {
  cancerDiagnoses: ResourceService<CancerDiagnosis, CancerDiagnosisFilter>;
  treatmentProtocols: ResourceService<TreatmentProtocol, TreatmentProtocolFilter>;
  protocolDrugs: ChildCollectionService<ProtocolDrug, 'protocolId'>;
  chemoCycles: ResourceService<ChemoCycle, ChemoCycleFilter>;
}

export function createOncologyServices(backend: RepositoryBackend): OncologyServices {
  const { unitOfWork } = backend;
  const treatmentProtocols = new ResourceService(
    backend.resources(treatmentProtocolTable),
    treatmentProtocolRules,
    unitOfWork
  );

  return {
    cancerDiagnoses: new ResourceService(
      backend.resources(cancerDiagnosisTable),
      cancerDiagnosisRules,
      unitOfWork
    ),
    treatmentProtocols,
    protocolDrugs: new ChildCollectionService(
      treatmentProtocols,
      backend.children(protocolDrugTable),
      protocolDrugRules
    ),
    chemoCycles: new ResourceService(backend.resources(chemoCycleTable), chemoCycleRules, unitOfWork),
  };
}
