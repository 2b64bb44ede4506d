export { healthRoutes, type HealthRoutesOptions } from './health.js';
export { identityRoutes } from './identity.js';
export { encounterRoutes } from './encounters.js';
export { diagnosticsRoutes } from './diagnostics.js';
export { documentRoutes } from './documents.js';
export { billingRoutes } from './billing.js';
export { surgeryRoutes } from './surgery.js';
export { oncologyRoutes } from './oncology.js';
export { inboxRoutes } from './inbox.js';
export { qualityRoutes } from './quality.js';
export { visionRoutes } from './vision.js';
export { registerChildRoutes, registerResourceRoutes } from './resource-routes.js';
export type { ResourceRoutesOptions } from './types.js';
