/**
 * @fileoverview Diagnostics: orders, specimens, reports and imaging
 *
 * @module domain/diagnostics
 */

import type { RepositoryBackend } from '@ehr-backend/core';
import type {
  DiagnosticReport,
  ImagingStudy,
  ServiceRequest,
  ServiceRequestStatusHistory,
  Specimen,
} from '@ehr-backend/types';

import {
  ChildCollectionService,
  ResourceService,
  StatusTrackingService,
  type StatusHistoryWriter,
} from '../shared/index.js';
import {
  SERVICE_REQUEST_TRANSITIONS,
  diagnosticReportRules,
  diagnosticReportTable,
  imagingStudyRules,
  imagingStudyTable,
  serviceRequestRules,
  serviceRequestStatusHistoryRules,
  serviceRequestStatusHistoryTable,
  serviceRequestTable,
  specimenRules,
  specimenTable,
  type DiagnosticReportFilter,
  type ImagingStudyFilter,
  type ServiceRequestFilter,
  type SpecimenFilter,
} from './diagnostics-tables.js';

export * from './diagnostics-tables.js';

export interface DiagnosticsServices {
  serviceRequests: StatusTrackingService<ServiceRequest, ServiceRequestFilter>;
  serviceRequestStatusHistory: ChildCollectionService<ServiceRequestStatusHistory, 'serviceRequestId'>;
  specimens: ResourceService<Specimen, SpecimenFilter>;
  diagnosticReports: ResourceService<DiagnosticReport, DiagnosticReportFilter>;
  imagingStudies: ResourceService<ImagingStudy, ImagingStudyFilter>;
}

export function createDiagnosticsServices(backend: RepositoryBackend): DiagnosticsServices {
  const { unitOfWork } = backend;
  const historyRepository = backend.children(serviceRequestStatusHistoryTable);
  const history: StatusHistoryWriter = {
    async record(serviceRequestId, fromStatus, toStatus) {
      await historyRepository.add(serviceRequestId, {
        fromStatus,
        toStatus,
        changedAt: new Date().toISOString(),
      });
    },
  };

  const serviceRequests = new StatusTrackingService(
    backend.resources(serviceRequestTable),
    serviceRequestRules,
    unitOfWork,
    history,
    SERVICE_REQUEST_TRANSITIONS
  );

  return {
    serviceRequests,
    serviceRequestStatusHistory: new ChildCollectionService(
      serviceRequests,
      historyRepository,
      serviceRequestStatusHistoryRules
    ),
    specimens: new ResourceService(backend.resources(specimenTable), specimenRules, unitOfWork),
    diagnosticReports: new ResourceService(
      backend.resources(diagnosticReportTable),
      diagnosticReportRules,
      unitOfWork
    ),
    imagingStudies: new ResourceService(
      backend.resources(imagingStudyTable),
      imagingStudyRules,
      unitOfWork
    ),
  };
}
