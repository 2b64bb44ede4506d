/**
 * @fileoverview Vision prescriptions
 *
 * @module domain/vision
 */

import type { RepositoryBackend } from '@ehr-backend/core';
import type { LensSpec, VisionPrescription } from '@ehr-backend/types';

import { ChildCollectionService, ResourceService } from '../shared/index.js';
import {
  lensSpecRules,
  lensSpecTable,
  visionPrescriptionRules,
  visionPrescriptionTable,
  type VisionPrescriptionFilter,
} from './vision-tables.js';

export * from './vision-tables.js';

export interface VisionServices {
  visionPrescriptions: ResourceService<VisionPrescription, VisionPrescriptionFilter>;
  lensSpecs: ChildCollectionService<LensSpec, 'prescriptionId'>;
}

export function createVisionServices(backend: RepositoryBackend): VisionServices {
  const visionPrescriptions = new ResourceService(
    backend.resources(visionPrescriptionTable),
    visionPrescriptionRules,
    backend.unitOfWork
  );

  return {
    visionPrescriptions,
    lensSpecs: new ChildCollectionService(
      visionPrescriptions,
      backend.children(lensSpecTable),
      lensSpecRules
    ),
  };
}
