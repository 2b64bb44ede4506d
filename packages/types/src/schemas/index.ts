/**
 * Central export point for all resource schemas
 */

// =============================================================================
// Common/Validation Schemas
// =============================================================================
export * from './common.js';

// =============================================================================
// Clinical Resource Families
// =============================================================================
export * from './identity.js';
export * from './encounter.js';
export * from './diagnostics.js';
export * from './documents.js';
export * from './billing.js';
export * from './surgery.js';
export * from './oncology.js';
export * from './inbox.js';
export * from './quality.js';
export * from './vision.js';
