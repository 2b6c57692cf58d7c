/**
 * Document cache module.
 *
 * Parses the index file, keeps downloaded documents and the search
 * index in step with it, and answers lookups and searches.
 */

export * from './types.js';
export * from './CacheError.js';
export * from './defaults.js';
export * from './RecordParser.js';
export * from './RegistryEntry.js';
export * from './RegistryStore.js';
export * from './CacheUpdater.js';
