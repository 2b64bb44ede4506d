/**
 * Vision prescriptions and their per-eye lens specifications
 */
import { z } from 'zod';

import {
  CHILD_META_MASK,
  ChildMetaSchema,
  DateSchema,
  DecimalSchema,
  IntegerSchema,
  RESOURCE_META_MASK,
  ResourceIdentityInputShape,
  ResourceMetaSchema,
  UUIDSchema,
  optional,
} from './common.js';

export const VISION_PRESCRIPTION_STATUSES = [
  'active',
  'cancelled',
  'draft',
  'entered-in-error',
] as const;

export const LENS_EYES = ['right', 'left'] as const;

export const VisionPrescriptionSchema = ResourceMetaSchema.extend({
  patientId: UUIDSchema,
  status: optional(z.string().max(30)),
  encounterId: optional(UUIDSchema),
  prescriberId: optional(UUIDSchema),
  dateWritten: optional(DateSchema),
  note: optional(z.string()),
});

export const CreateVisionPrescriptionSchema = VisionPrescriptionSchema.omit(
  RESOURCE_META_MASK
).extend(ResourceIdentityInputShape);

export const LensSpecSchema = ChildMetaSchema.extend({
  prescriptionId: UUIDSchema,
  productCode: z.string().max(50),
  eye: z.string().max(10),
  sphere: optional(DecimalSchema),
  cylinder: optional(DecimalSchema),
  axis: optional(IntegerSchema.min(0).max(180)),
  prismAmount: optional(DecimalSchema),
  prismBase: optional(z.string().max(10)),
  addPower: optional(DecimalSchema),
  power: optional(DecimalSchema),
  backCurve: optional(DecimalSchema),
  diameter: optional(DecimalSchema),
  duration: optional(z.string().max(50)),
  color: optional(z.string().max(50)),
  brand: optional(z.string().max(100)),
  note: optional(z.string()),
});

export const CreateLensSpecSchema = LensSpecSchema.omit({
  ...CHILD_META_MASK,
  prescriptionId: true,
});

export type VisionPrescription = z.infer<typeof VisionPrescriptionSchema>;
export type CreateVisionPrescription = z.infer<typeof CreateVisionPrescriptionSchema>;
export type LensSpec = z.infer<typeof LensSpecSchema>;
export type CreateLensSpec = z.infer<typeof CreateLensSpecSchema>;
