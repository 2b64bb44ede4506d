/**
 * EHR Types Package
 *
 * Zod schemas and inferred types for every clinical resource family, their
 * create bodies and child rows. Schemas validate both directions: request
 * bodies at the HTTP boundary and rows read back from the store.
 *
 * @module @ehr-backend/types
 */
export * from './schemas/index.js';
