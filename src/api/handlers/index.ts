/**
 * Handler exports for the API layer.
 */

export * from './errors.js';
export * from './DocumentHandlers.js';
export * from './CacheHandlers.js';
