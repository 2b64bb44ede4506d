import { describe, it, expect } from 'vitest';

import {
  ClaimDiagnosisSchema,
  CreatePatientSchema,
  CreateServiceRequestSchema,
  DateSchema,
  DateTimeSchema,
  DecimalSchema,
  PaginationQuerySchema,
  PatientSchema,
  UUIDSchema,
} from '../index.js';

const PATIENT_ID = '3f2b1c4d-5e6f-4a7b-8c9d-0e1f2a3b4c5d';

describe('common schemas', () => {
  it('should normalise timestamps to UTC', () => {
    expect(DateTimeSchema.parse('2024-06-01T12:30:00+02:00')).toBe('2024-06-01T10:30:00.000Z');
    expect(DateTimeSchema.parse(new Date('2024-06-01T10:30:00Z'))).toBe('2024-06-01T10:30:00.000Z');
  });

  it('should accept calendar dates only in YYYY-MM-DD form', () => {
    expect(DateSchema.parse('2024-02-29')).toBe('2024-02-29');
    expect(DateSchema.safeParse('29/02/2024').success).toBe(false);
  });

  it('should read NUMERIC strings back as numbers', () => {
    expect(DecimalSchema.parse('12.50')).toBe(12.5);
    expect(DecimalSchema.parse(3)).toBe(3);
    expect(DecimalSchema.safeParse('twelve').success).toBe(false);
  });

  it('should lower-case UUIDs', () => {
    expect(UUIDSchema.parse(PATIENT_ID.toUpperCase())).toBe(PATIENT_ID);
    expect(UUIDSchema.safeParse('not-a-uuid').success).toBe(false);
  });

  it('should default and bound pagination', () => {
    expect(PaginationQuerySchema.parse({})).toEqual({ limit: 20, offset: 0 });
    expect(PaginationQuerySchema.parse({ limit: '5', offset: '10' })).toEqual({ limit: 5, offset: 10 });
    expect(PaginationQuerySchema.safeParse({ limit: '101' }).success).toBe(false);
    expect(PaginationQuerySchema.safeParse({ offset: '-1' }).success).toBe(false);
  });
});

describe('resource schemas', () => {
  it('should treat null and missing optional fields alike', () => {
    const parsed = CreatePatientSchema.parse({
      mrn: 'MRN-1',
      firstName: 'Ada',
      lastName: 'Lovelace',
      middleName: null,
    });

    expect(parsed.middleName).toBeUndefined();
    expect(JSON.parse(JSON.stringify(parsed))).toEqual({
      mrn: 'MRN-1',
      firstName: 'Ada',
      lastName: 'Lovelace',
    });
  });

  it('should let a client choose the FHIR id on create', () => {
    const parsed = CreatePatientSchema.parse({
      fhirId: 'patient-1',
      mrn: 'MRN-1',
      firstName: 'Ada',
      lastName: 'Lovelace',
    });

    expect(parsed.fhirId).toBe('patient-1');
  });

  it('should reject a malformed FHIR id', () => {
    const result = CreatePatientSchema.safeParse({
      fhirId: 'has spaces',
      mrn: 'MRN-1',
      firstName: 'Ada',
      lastName: 'Lovelace',
    });

    expect(result.success).toBe(false);
  });

  it('should require store metadata on stored records', () => {
    expect(
      PatientSchema.safeParse({ mrn: 'MRN-1', firstName: 'Ada', lastName: 'Lovelace' }).success
    ).toBe(false);
  });

  it('should reject references that are not UUIDs', () => {
    const result = CreateServiceRequestSchema.safeParse({
      patientId: 'patient-1',
      requesterId: PATIENT_ID,
      codeValue: '2951-2',
    });

    expect(result.success).toBe(false);
  });

  it('should lower-case references and client-chosen ids', () => {
    const parsed = CreateServiceRequestSchema.parse({
      id: PATIENT_ID.toUpperCase(),
      patientId: PATIENT_ID.toUpperCase(),
      requesterId: PATIENT_ID,
      codeValue: '2951-2',
    });

    expect(parsed.id).toBe(PATIENT_ID);
    expect(parsed.patientId).toBe(PATIENT_ID);
  });

  it('should require claim line sequences to start at 1', () => {
    const line = {
      id: PATIENT_ID,
      claimId: PATIENT_ID,
      createdAt: '2024-01-01T00:00:00Z',
      diagnosisCode: 'E11.9',
    };

    expect(ClaimDiagnosisSchema.safeParse({ ...line, sequence: 0 }).success).toBe(false);
    expect(ClaimDiagnosisSchema.safeParse({ ...line, sequence: 1 }).success).toBe(true);
  });
});
