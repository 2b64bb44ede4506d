/**
 * Identity schemas: patients, practitioners and organizations
 */
import { z } from 'zod';

import {
  DateSchema,
  RESOURCE_META_MASK,
  ResourceIdentityInputShape,
  ResourceMetaSchema,
  UUIDSchema,
  optional,
} from './common.js';

export const AdministrativeGenderSchema = z.enum(['male', 'female', 'other', 'unknown']);

// =============================================================================
// Patient
// =============================================================================

export const PatientSchema = ResourceMetaSchema.extend({
  mrn: z.string().min(1).max(50),
  firstName: z.string().max(100),
  lastName: z.string().max(100),
  middleName: optional(z.string().max(100)),
  prefix: optional(z.string().max(20)),
  suffix: optional(z.string().max(20)),
  birthDate: optional(DateSchema),
  gender: optional(AdministrativeGenderSchema),
  active: optional(z.boolean()),
  phoneMobile: optional(z.string().max(30)),
  email: optional(z.string().email().max(255)),
  addressLine1: optional(z.string().max(255)),
  city: optional(z.string().max(100)),
  state: optional(z.string().max(100)),
  postalCode: optional(z.string().max(20)),
  country: optional(z.string().max(3)),
});

export const CreatePatientSchema = PatientSchema.omit(RESOURCE_META_MASK).extend(
  ResourceIdentityInputShape
);

export type Patient = z.infer<typeof PatientSchema>;
export type CreatePatient = z.infer<typeof CreatePatientSchema>;

// =============================================================================
// Practitioner
// =============================================================================

export const PractitionerSchema = ResourceMetaSchema.extend({
  firstName: z.string().max(100),
  lastName: z.string().max(100),
  prefix: optional(z.string().max(20)),
  suffix: optional(z.string().max(20)),
  gender: optional(AdministrativeGenderSchema),
  npiNumber: optional(z.string().max(20)),
  phone: optional(z.string().max(30)),
  email: optional(z.string().email().max(255)),
  qualificationSummary: optional(z.string()),
  active: optional(z.boolean()),
});

export const CreatePractitionerSchema = PractitionerSchema.omit(RESOURCE_META_MASK).extend(
  ResourceIdentityInputShape
);

export type Practitioner = z.infer<typeof PractitionerSchema>;
export type CreatePractitioner = z.infer<typeof CreatePractitionerSchema>;

// =============================================================================
// Organization
// =============================================================================

export const OrganizationSchema = ResourceMetaSchema.extend({
  name: z.string().max(255),
  typeCode: optional(z.string().max(50)),
  typeDisplay: optional(z.string().max(100)),
  active: optional(z.boolean()),
  parentOrgId: optional(UUIDSchema),
  npiNumber: optional(z.string().max(20)),
  phone: optional(z.string().max(30)),
  email: optional(z.string().email().max(255)),
  website: optional(z.string().max(255)),
  city: optional(z.string().max(100)),
  state: optional(z.string().max(100)),
  country: optional(z.string().max(3)),
});

export const CreateOrganizationSchema = OrganizationSchema.omit(RESOURCE_META_MASK).extend(
  ResourceIdentityInputShape
);

export type Organization = z.infer<typeof OrganizationSchema>;
export type CreateOrganization = z.infer<typeof CreateOrganizationSchema>;
