/**
 * Quality measure reports
 */

import { ValidationError, type TableDefinition } from '@ehr-backend/core';
import {
  MEASURE_REPORT_STATUSES,
  MEASURE_REPORT_TYPES,
  MeasureReportSchema,
  type MeasureReport,
} from '@ehr-backend/types';

import type { ResourceRules } from '../shared/index.js';

export type MeasureReportFilter = 'patient' | 'status' | 'measure' | 'period';

export const measureReportTable: TableDefinition<MeasureReport, MeasureReportFilter> = {
  table: 'measure_report',
  resourceType: 'MeasureReport',
  schema: MeasureReportSchema,
  filters: {
    patient: { field: 'subjectPatientId', kind: 'reference' },
    status: { field: 'status', kind: 'token' },
    measure: { field: 'measureUrl', kind: 'token' },
    period: { field: 'periodStart', kind: 'date' },
  },
  references: {
    subjectPatientId: { table: 'patient', onDelete: 'restrict' },
    reporterOrgId: { table: 'organization', onDelete: 'restrict' },
  },
};

export const measureReportRules: ResourceRules<MeasureReport> = {
  required: ['measureUrl', 'periodStart', 'periodEnd'],
  allowed: { status: MEASURE_REPORT_STATUSES, type: MEASURE_REPORT_TYPES },
  statusField: 'status',
  patientField: 'subjectPatientId',
  defaults: () => ({ status: 'complete', type: 'individual' }),
  // YYYY-MM-DD compares correctly as text
  validate: (input) => {
    if (input.periodEnd < input.periodStart) {
      throw new ValidationError('periodEnd must not be before periodStart');
    }
  },
};
