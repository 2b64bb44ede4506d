/**
 * @fileoverview Domain Package Exports
 *
 * Validating services for every resource family, composed over a storage
 * backend from `@ehr-backend/core`.
 *
 * @module @ehr-backend/domain
 *
 * @example
 * ```typescript
 * import { createInMemoryBackend, runWithTenant } from '@ehr-backend/core';
 * import { createEhrServices } from '@ehr-backend/domain';
 *
 * const services = createEhrServices(createInMemoryBackend());
 * const patient = await runWithTenant('clinic_a', () =>
 *   services.patients.create({ mrn: 'MRN-1', firstName: 'Ada', lastName: 'Lovelace' })
 * );
 * ```
 */

import type { RepositoryBackend } from '@ehr-backend/core';

import { createBillingServices, type BillingServices } from './billing/index.js';
import { createDiagnosticsServices, type DiagnosticsServices } from './diagnostics/index.js';
import { createDocumentsServices, type DocumentsServices } from './documents/index.js';
import { createEncounterServices, type EncounterServices } from './encounter/index.js';
import { createIdentityServices, type IdentityServices } from './identity/index.js';
import { createInboxServices, type InboxServices } from './inbox/index.js';
import { createOncologyServices, type OncologyServices } from './oncology/index.js';
import { createQualityServices, type QualityServices } from './quality/index.js';
import { createSurgeryServices, type SurgeryServices } from './surgery/index.js';
import { createVisionServices, type VisionServices } from './vision/index.js';

// ============================================================================
// SHARED SERVICES
// ============================================================================

export * from './shared/index.js';

// ============================================================================
// RESOURCE FAMILIES
// ============================================================================

export * from './identity/index.js';
export * from './encounter/index.js';
export * from './diagnostics/index.js';
export * from './documents/index.js';
export * from './billing/index.js';
export * from './surgery/index.js';
export * from './oncology/index.js';
export * from './inbox/index.js';
export * from './quality/index.js';
export * from './vision/index.js';

export type EhrServices = IdentityServices &
  EncounterServices &
  DiagnosticsServices &
  DocumentsServices &
  BillingServices &
  SurgeryServices &
  OncologyServices &
  InboxServices &
  QualityServices &
  VisionServices;

/**
 * Build every resource family's services over one backend
 */
export function createEhrServices(backend: RepositoryBackend): EhrServices {
  return {
    ...createIdentityServices(backend),
    ...createEncounterServices(backend),
    ...createDiagnosticsServices(backend),
    ...createDocumentsServices(backend),
    ...createBillingServices(backend),
    ...createSurgeryServices(backend),
    ...createOncologyServices(backend),
    ...createInboxServices(backend),
    ...createQualityServices(backend),
    ...createVisionServices(backend),
  };
}
