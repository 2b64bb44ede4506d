/**
 * EHR Service Tests
 *
 * Service behaviour over the in-memory backend: required fields,
 * allow-lists, defaults, references, paging and child collections. The
 * update path is also run over a mocked PostgreSQL pool to check the bound
 * parameters.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  RecordNotFoundError,
  ReferentialIntegrityError,
  ValidationError,
  createInMemoryBackend,
  createPostgresBackend,
  runWithTenant,
  type DatabasePool,
  type PoolClient,
  type QueryResult,
} from '@ehr-backend/core';
import type { Patient, Practitioner } from '@ehr-backend/types';

import { createEhrServices, type EhrServices } from '../index.js';

const MISSING_ID = '00000000-0000-4000-8000-000000000000';
const FIRST_PAGE = { limit: 20, offset: 0 };

function inTenant<T>(fn: () => Promise<T>): Promise<T> {
  return runWithTenant('test_clinic', fn);
}

describe('EHR services', () => {
  let services: EhrServices;
  let patient: Patient;
  let practitioner: Practitioner;

  beforeEach(async () => {
    services = createEhrServices(createInMemoryBackend());
    patient = await inTenant(() =>
      services.patients.create({ mrn: 'MRN-001', firstName: 'Ada', lastName: 'Lovelace' })
    );
    practitioner = await inTenant(() =>
      services.practitioners.create({ firstName: 'Grace', lastName: 'Hopper' })
    );
  });

  describe('identity', () => {
    it('should assign ids and read the patient back unchanged', async () => {
      expect(patient.fhirId).toBe(patient.id);
      expect(patient.active).toBe(true);

      await expect(inTenant(() => services.patients.getById(patient.id))).resolves.toEqual(patient);
    });

    it('should reject a blank required field', async () => {
      await expect(
        inTenant(() => services.patients.create({ mrn: '  ', firstName: 'Ada', lastName: 'Byron' }))
      ).rejects.toThrow(new ValidationError('mrn is required'));
    });

    it('should keep an explicit false over the default', async () => {
      const inactive = await inTenant(() =>
        services.practitioners.create({ firstName: 'Alan', lastName: 'Turing', active: false })
      );

      expect(inactive.active).toBe(false);
    });

    it('should default the organization type', async () => {
      const organization = await inTenant(() => services.organizations.create({ name: 'North Clinic' }));

      expect(organization.typeCode).toBe('prov');
    });

    it('should return the same values when an update repeats the stored fields', async () => {
      const input = { mrn: 'MRN-001', firstName: 'Ada', lastName: 'Lovelace', active: true };

      const first = await inTenant(() => services.patients.update(patient.id, input));
      const second = await inTenant(() => services.patients.update(patient.id, input));

      const { updatedAt: _first, ...firstValues } = first;
      const { updatedAt: _second, ...secondValues } = second;
      expect(secondValues).toEqual(firstValues);
    });

    it('should keep defaulted fields when an update omits them', async () => {
      const inactive = await inTenant(() =>
        services.practitioners.create({ firstName: 'Alan', lastName: 'Turing', active: false })
      );

      const renamed = await inTenant(() =>
        services.practitioners.update(inactive.id, { firstName: 'Alan', lastName: 'Mathison' })
      );
      const patientUpdate = await inTenant(() =>
        services.patients.update(patient.id, { mrn: 'MRN-001', firstName: 'Ada', lastName: 'King' })
      );

      expect(renamed.active).toBe(false);
      expect(renamed.lastName).toBe('Mathison');
      expect(patientUpdate.active).toBe(true);
    });

    it('should fail to update a missing patient', async () => {
      await expect(
        inTenant(() =>
          services.patients.update(MISSING_ID, { mrn: 'MRN-9', firstName: 'A', lastName: 'B' })
        )
      ).rejects.toBeInstanceOf(RecordNotFoundError);
    });

    it('should report not found for get and second delete after a delete', async () => {
      await inTenant(() => services.practitioners.delete(practitioner.id));

      await expect(
        inTenant(() => services.practitioners.getById(practitioner.id))
      ).rejects.toBeInstanceOf(RecordNotFoundError);
      await expect(
        inTenant(() => services.practitioners.delete(practitioner.id))
      ).rejects.toBeInstanceOf(RecordNotFoundError);
    });

    it('should search by family name prefix and gender together', async () => {
      await inTenant(async () => {
        await services.patients.create({
          mrn: 'MRN-002',
          firstName: 'Augusta',
          lastName: 'Lovell',
          gender: 'female',
        });
        await services.patients.create({
          mrn: 'MRN-003',
          firstName: 'Charles',
          lastName: 'Lovett',
          gender: 'male',
        });
      });

      const page = await inTenant(() =>
        services.patients.search({ family: 'lov', gender: 'female' }, FIRST_PAGE)
      );

      expect(page.items.map((item) => item.mrn)).toEqual(['MRN-002']);
      expect(page.total).toBe(1);
    });

    it('should report the total independently of the page size', async () => {
      await inTenant(async () => {
        for (const mrn of ['MRN-002', 'MRN-003', 'MRN-004']) {
          await services.patients.create({ mrn, firstName: 'Test', lastName: mrn });
        }
      });

      const page = await inTenant(() => services.patients.list({ limit: 2, offset: 0 }));
      const past = await inTenant(() => services.patients.list({ limit: 2, offset: 10 }));

      expect(page.items).toHaveLength(2);
      expect(page.total).toBe(4);
      expect(past.items).toEqual([]);
      expect(past.total).toBe(4);
    });
  });

  describe('encounters', () => {
    it('should apply defaults and record the initial status', async () => {
      const encounter = await inTenant(() =>
        services.encounters.create({ patientId: patient.id, classCode: 'AMB' })
      );

      expect(encounter.status).toBe('planned');
      expect(encounter.periodStart).toEqual(expect.any(String));

      const history = await inTenant(() => services.encounterStatusHistory.list(encounter.id));
      expect(history.map(({ fromStatus, toStatus }) => [fromStatus, toStatus])).toEqual([
        [undefined, 'planned'],
      ]);
    });

    it('should keep the stored status when an update omits it', async () => {
      const encounter = await inTenant(() =>
        services.encounters.create({ patientId: patient.id, classCode: 'AMB', status: 'arrived' })
      );

      const updated = await inTenant(() =>
        services.encounters.update(encounter.id, { patientId: patient.id, classCode: 'IMP' })
      );

      expect(updated.status).toBe('arrived');
      expect(updated.classCode).toBe('IMP');
      const history = await inTenant(() => services.encounterStatusHistory.list(encounter.id));
      expect(history).toHaveLength(1);
    });

    it('should reject a status outside the allow-list', async () => {
      await expect(
        inTenant(() =>
          services.encounters.create({ patientId: patient.id, classCode: 'AMB', status: 'lost' })
        )
      ).rejects.toThrow('invalid status: lost');
    });

    it('should persist nothing when a reference is dangling', async () => {
      await expect(
        inTenant(() => services.encounters.create({ patientId: MISSING_ID, classCode: 'AMB' }))
      ).rejects.toBeInstanceOf(ReferentialIntegrityError);

      const page = await inTenant(() => services.encounters.list(FIRST_PAGE));
      expect(page.total).toBe(0);
    });

    it('should list the newest period first', async () => {
      await inTenant(async () => {
        await services.encounters.create({
          patientId: patient.id,
          classCode: 'AMB',
          periodStart: '2024-01-01T09:00:00Z',
        });
        await services.encounters.create({
          patientId: patient.id,
          classCode: 'AMB',
          periodStart: '2024-03-01T09:00:00Z',
        });
      });

      const page = await inTenant(() => services.encounters.listByPatient(patient.id, FIRST_PAGE));

      expect(page.items.map((item) => item.periodStart)).toEqual([
        '2024-03-01T09:00:00.000Z',
        '2024-01-01T09:00:00.000Z',
      ]);
    });

    it('should refuse to delete a patient with encounters', async () => {
      await inTenant(() => services.encounters.create({ patientId: patient.id, classCode: 'AMB' }));

      await expect(inTenant(() => services.patients.delete(patient.id))).rejects.toBeInstanceOf(
        ReferentialIntegrityError
      );
    });

    it('should add participants only to an existing encounter', async () => {
      await expect(
        inTenant(() =>
          services.encounterParticipants.add(MISSING_ID, { practitionerId: practitioner.id })
        )
      ).rejects.toBeInstanceOf(RecordNotFoundError);
    });
  });

  describe('service requests', () => {
    it('should move from active to completed and record both statuses', async () => {
      const request = await inTenant(() =>
        services.serviceRequests.create({
          patientId: patient.id,
          requesterId: practitioner.id,
          codeValue: '2951-2',
          status: 'active',
        })
      );
      expect(request.intent).toBe('order');

      const completed = await inTenant(() =>
        services.serviceRequests.update(request.id, {
          patientId: patient.id,
          requesterId: practitioner.id,
          codeValue: '2951-2',
          status: 'completed',
          note: 'Sodium within range',
        })
      );

      expect(completed.status).toBe('completed');
      expect(completed.note).toBe('Sodium within range');
      expect(completed.intent).toBe('order');
      const history = await inTenant(() =>
        services.serviceRequestStatusHistory.list(request.id)
      );
      expect(history.map(({ fromStatus, toStatus }) => [fromStatus, toStatus])).toEqual([
        [undefined, 'active'],
        ['active', 'completed'],
      ]);
    });

    it('should reject a transition the table does not allow', async () => {
      const request = await inTenant(() =>
        services.serviceRequests.create({
          patientId: patient.id,
          requesterId: practitioner.id,
          codeValue: '2951-2',
          status: 'completed',
        })
      );

      await expect(
        inTenant(() =>
          services.serviceRequests.update(request.id, {
            patientId: patient.id,
            requesterId: practitioner.id,
            codeValue: '2951-2',
            status: 'active',
          })
        )
      ).rejects.toThrow('invalid status transition: completed -> active');
    });

    it('should default to draft and reject an unknown intent', async () => {
      const request = await inTenant(() =>
        services.serviceRequests.create({
          patientId: patient.id,
          requesterId: practitioner.id,
          codeValue: '2951-2',
        })
      );
      expect(request.status).toBe('draft');

      await expect(
        inTenant(() =>
          services.serviceRequests.create({
            patientId: patient.id,
            requesterId: practitioner.id,
            codeValue: '2951-2',
            intent: 'wish',
          })
        )
      ).rejects.toThrow('invalid intent: wish');
    });
  });

  describe('billing', () => {
    it('should require a payor organization or name on coverage', async () => {
      await expect(
        inTenant(() => services.coverages.create({ patientId: patient.id }))
      ).rejects.toThrow('payorOrgId or payorName is required');

      const coverage = await inTenant(() =>
        services.coverages.create({ patientId: patient.id, payorName: 'Acme Health' })
      );
      expect(coverage.status).toBe('active');
    });

    it('should return claim diagnoses in sequence order', async () => {
      const claim = await inTenant(() => services.claims.create({ patientId: patient.id }));
      expect(claim.status).toBe('draft');

      await inTenant(async () => {
        await services.claimDiagnoses.add(claim.id, { sequence: 2, diagnosisCode: 'I10' });
        await services.claimDiagnoses.add(claim.id, { sequence: 1, diagnosisCode: 'E11.9' });
      });

      const diagnoses = await inTenant(() => services.claimDiagnoses.list(claim.id));
      expect(diagnoses.map(({ sequence, diagnosisCode }) => [sequence, diagnosisCode])).toEqual([
        [1, 'E11.9'],
        [2, 'I10'],
      ]);
    });

    it('should delete a claim together with its lines', async () => {
      const claim = await inTenant(() => services.claims.create({ patientId: patient.id }));
      await inTenant(() =>
        services.claimItems.add(claim.id, { sequence: 1, productOrServiceCode: '99213' })
      );

      await inTenant(() => services.claims.delete(claim.id));

      await expect(inTenant(() => services.claimItems.list(claim.id))).rejects.toBeInstanceOf(
        RecordNotFoundError
      );
    });
  });

  describe('other families', () => {
    it('should reject a non-positive chemotherapy cycle number', async () => {
      const diagnosis = await inTenant(() =>
        services.cancerDiagnoses.create({ patientId: patient.id, diagnosisDate: '2024-01-15' })
      );
      const protocol = await inTenant(() =>
        services.treatmentProtocols.create({
          cancerDiagnosisId: diagnosis.id,
          protocolName: 'FOLFOX',
        })
      );

      expect(diagnosis.currentStatus).toBe('active-treatment');
      await expect(
        inTenant(() => services.chemoCycles.create({ protocolId: protocol.id, cycleNumber: 0 }))
      ).rejects.toThrow('cycleNumber must be greater than 0');
    });

    it('should not list protocols by patient', async () => {
      expect(services.treatmentProtocols.listsByPatient).toBe(false);
      await expect(
        inTenant(() => services.treatmentProtocols.listByPatient(patient.id, FIRST_PAGE))
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('should reject a measure period that ends before it starts', async () => {
      await expect(
        inTenant(() =>
          services.measureReports.create({
            measureUrl: 'http://example.org/Measure/bp',
            periodStart: '2024-12-31',
            periodEnd: '2024-01-01',
          })
        )
      ).rejects.toThrow('periodEnd must not be before periodStart');
    });

    it('should only accept right or left lenses', async () => {
      const prescription = await inTenant(() =>
        services.visionPrescriptions.create({ patientId: patient.id })
      );

      await expect(
        inTenant(() => services.lensSpecs.add(prescription.id, { productCode: 'SV', eye: 'both' }))
      ).rejects.toThrow('invalid eye: both');
    });

    it('should accept any inbox status and default the rest', async () => {
      const message = await inTenant(() =>
        services.inboxMessages.create({ messageType: 'result', subject: 'Lab result ready' })
      );
      const archived = await inTenant(() =>
        services.inboxMessages.update(message.id, {
          messageType: 'result',
          subject: 'Lab result ready',
          status: 'archived-by-user',
        })
      );

      expect(message).toMatchObject({ status: 'unread', priority: 'normal', isUrgent: false });
      expect(archived.status).toBe('archived-by-user');
    });

    it('should order composition sections and default their position', async () => {
      const composition = await inTenant(() =>
        services.compositions.create({ patientId: patient.id })
      );

      await inTenant(async () => {
        await services.compositionSections.add(composition.id, { title: 'Plan', sortOrder: 2 });
        await services.compositionSections.add(composition.id, { title: 'History' });
      });

      const sections = await inTenant(() => services.compositionSections.list(composition.id));
      expect(sections.map(({ title, sortOrder }) => [title, sortOrder])).toEqual([
        ['History', 0],
        ['Plan', 2],
      ]);
    });
  });
});

describe('EHR services over PostgreSQL', () => {
  const PATIENT_ID = '3f2b8c1e-4d5a-4b6c-8d7e-9f0a1b2c3d4e';
  const PRACTITIONER_ID = '5a6b7c8d-9e0f-4a1b-8c2d-3e4f5a6b7c8d';
  const REQUEST_ID = '7c8d9e0f-1a2b-4c3d-8e4f-5a6b7c8d9e0f';
  const HISTORY_ID = '9e0f1a2b-3c4d-4e5f-8a6b-7c8d9e0f1a2b';
  const CREATED = new Date('2024-05-01T08:00:00Z');

  interface RecordedQuery {
    sql: string;
    params: unknown[];
  }

  function createMockPool(
    rows: Record<string, Record<string, unknown>>
  ): DatabasePool & { queries: RecordedQuery[] } {
    const queries: RecordedQuery[] = [];
    const respond = (sql: string): QueryResult => {
      const table = /^(?:SELECT \* FROM|UPDATE|INSERT INTO) (\w+)/.exec(sql)?.[1];
      const row = table === undefined ? undefined : rows[table];
      return row === undefined ? { rows: [], rowCount: 0 } : { rows: [row], rowCount: 1 };
    };
    const client: PoolClient = {
      query: vi.fn(async (sql: string, params: unknown[] = []) => {
        queries.push({ sql, params });
        return respond(sql);
      }),
      release: vi.fn(),
    };
    return {
      queries,
      query: vi.fn(async () => ({ rows: [], rowCount: 0 })),
      connect: vi.fn(async () => client),
      end: vi.fn(async () => undefined),
    };
  }

  /** Parameter bound to `column` in an UPDATE statement */
  function assigned(queries: RecordedQuery[], table: string, column: string): unknown {
    const update = queries.find(({ sql }) => sql.startsWith(`UPDATE ${table} `));
    const index = update === undefined ? null : new RegExp(`[ ,]${column} = \\$(\\d+)`).exec(update.sql);
    return update === undefined || index === null ? undefined : update.params[Number(index[1]) - 1];
  }

  it('should bind the stored active flag when a patient update omits it', async () => {
    const pool = createMockPool({
      patient: {
        id: PATIENT_ID,
        fhir_id: PATIENT_ID,
        created_at: CREATED,
        updated_at: CREATED,
        mrn: 'MRN-001',
        first_name: 'Ada',
        last_name: 'King',
        active: false,
      },
    });
    const services = createEhrServices(createPostgresBackend(pool));

    await inTenant(() =>
      services.patients.update(PATIENT_ID, { mrn: 'MRN-001', firstName: 'Ada', lastName: 'King' })
    );

    expect(assigned(pool.queries, 'patient', 'active')).toBe(false);
    expect(assigned(pool.queries, 'patient', 'last_name')).toBe('King');
  });

  it('should bind the stored intent when a status change omits it', async () => {
    const request = {
      id: REQUEST_ID,
      fhir_id: REQUEST_ID,
      created_at: CREATED,
      updated_at: CREATED,
      patient_id: PATIENT_ID,
      requester_id: PRACTITIONER_ID,
      status: 'active',
      intent: 'order',
      code_value: '2951-2',
    };
    const pool = createMockPool({
      service_request: request,
      service_request_status_history: {
        id: HISTORY_ID,
        service_request_id: REQUEST_ID,
        from_status: 'active',
        to_status: 'completed',
        changed_at: CREATED,
        created_at: CREATED,
      },
    });
    const services = createEhrServices(createPostgresBackend(pool));

    await inTenant(() =>
      services.serviceRequests.update(REQUEST_ID, {
        patientId: PATIENT_ID,
        requesterId: PRACTITIONER_ID,
        codeValue: '2951-2',
        status: 'completed',
        note: 'Sodium within range',
      })
    );

    expect(assigned(pool.queries, 'service_request', 'intent')).toBe('order');
    expect(assigned(pool.queries, 'service_request', 'status')).toBe('completed');
    expect(assigned(pool.queries, 'service_request', 'note')).toBe('Sodium within range');
  });
});
