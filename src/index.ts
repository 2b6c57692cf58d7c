/**
 * rfc-mirror: Local mirror and full-text search for the RFC series.
 *
 * This is the main entry point for the library.
 */

// Registry parsing, local cache and updates
export * from './cache/index.js';

// Full-text search index
export * from './search/index.js';

// Document transport
export * from './fetch/HttpFetcher.js';

// Configuration
export * from './config/types.js';
export { loadConfig, validateConfig, applyDefaults, ConfigValidationError } from './config/loader.js';
export type { LoadConfigOptions, PartialAppConfig } from './config/loader.js';

// Logging
export * from './logging/Logger.js';

// HTTP API
export * from './api/index.js';

// Server
export { initializeApp, createServer, startServer } from './server.js';
export type { AppContext, InitializeOptions } from './server.js';
