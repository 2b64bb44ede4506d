/**
 * @fileoverview Quality measure reporting
 *
 * @module domain/quality
 */

import type { RepositoryBackend } from '@ehr-backend/core';
import type { MeasureReport } from '@ehr-backend/types';

import { ResourceService } from '../shared/index.js';
import { measureReportRules, measureReportTable, type MeasureReportFilter } from './quality-tables.js';

export * from './quality-tables.js';

export interface QualityServices {
  measureReports: ResourceService<MeasureReport, MeasureReportFilter>;
}

export function createQualityServices(backend: RepositoryBackend): QualityServices {
  return {
    measureReports: new ResourceService(
      backend.resources(measureReportTable),
      measureReportRules,
      backend.unitOfWork
    ),
  };
}
