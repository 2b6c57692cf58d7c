/**
 * Full-text search index.
 */

export * from './types.js';
export * from './MiniSearchIndex.js';
