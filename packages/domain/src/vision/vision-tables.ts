/**
 * Vision prescriptions and their lens specifications
 */

import type { ChildTableDefinition, TableDefinition } from '@ehr-backend/core';
import {
  LENS_EYES,
  LensSpecSchema,
  VISION_PRESCRIPTION_STATUSES,
  VisionPrescriptionSchema,
  type LensSpec,
  type VisionPrescription,
} from '@ehr-backend/types';

import type { ChildRules, ResourceRules } from '../shared/index.js';

export type VisionPrescriptionFilter = 'patient' | 'status' | 'prescriber';

export const visionPrescriptionTable: TableDefinition<VisionPrescription, VisionPrescriptionFilter> = {
  table: 'vision_prescription',
  resourceType: 'VisionPrescription',
  schema: VisionPrescriptionSchema,
  immutable: ['patientId'],
  filters: {
    patient: { field: 'patientId', kind: 'reference' },
    status: { field: 'status', kind: 'token' },
    prescriber: { field: 'prescriberId', kind: 'reference' },
  },
  references: {
    patientId: { table: 'patient', onDelete: 'restrict' },
    encounterId: { table: 'encounter', onDelete: 'restrict' },
    prescriberId: { table: 'practitioner', onDelete: 'restrict' },
  },
};

export const visionPrescriptionRules: ResourceRules<VisionPrescription> = {
  required: ['patientId'],
  allowed: { status: VISION_PRESCRIPTION_STATUSES },
  statusField: 'status',
  patientField: 'patientId',
  defaults: () => ({ status: 'active' }),
};

export const lensSpecTable: ChildTableDefinition<LensSpec, 'prescriptionId'> = {
  table: 'lens_spec',
  resourceType: 'LensSpec',
  schema: LensSpecSchema,
  parentField: 'prescriptionId',
  parentTable: 'vision_prescription',
};

export const lensSpecRules: ChildRules<LensSpec, 'prescriptionId'> = {
  required: ['productCode', 'eye'],
  allowed: { eye: LENS_EYES },
};
