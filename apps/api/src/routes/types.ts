import type { EhrServices } from '@ehr-backend/domain';

/**
 * Options every resource family's route plugin is registered with
 */
export interface ResourceRoutesOptions {
  services: EhrServices;
}
