/**
 * @fileoverview Shared Domain Services
 *
 * Generic services every resource family is composed from.
 *
 * @module domain/shared
 */

export * from './validation.js';
export * from './resource-service.js';
export * from './status-tracking-service.js';
export * from './child-collection-service.js';
