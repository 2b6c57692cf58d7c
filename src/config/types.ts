/**
 * Configuration types for the rfc-mirror server.
 *
 * These types define the structure of config.yaml and provide
 * type-safe access to server configuration.
 */

import {
  DEFAULT_CACHE_DIR,
  DEFAULT_COMMIT_INTERVAL,
  DEFAULT_EXCLUDED_NUMBERS,
  DEFAULT_SOURCE,
} from '../cache/defaults.js';
import type { SourceConfig } from '../cache/types.js';
import type { LogLevel } from '../logging/Logger.js';

/**
 * Top-level configuration.
 */
export interface AppConfig {
  server: ServerConfig;
  cache: CacheConfig;
  source: SourceConfig;
}

/**
 * Server settings.
 */
export interface ServerConfig {
  /** Port to listen on (default: 3001) */
  port: number;
  /** Host to bind to (default: '0.0.0.0') */
  host: string;
  /** Log level (default: 'info') */
  logLevel: LogLevel;
  /** CORS configuration */
  cors: CorsConfig;
}

/**
 * CORS configuration.
 */
export interface CorsConfig {
  /** Whether CORS is enabled (default: true) */
  enabled: boolean;
  /** Allowed origins (default: ['*']) */
  origins: string[];
}

/**
 * Cache settings.
 */
export interface CacheConfig {
  /** Cache root; `~` and `$VAR` are expanded (default: '~/.cache/rfc-mirror') */
  directory: string;
  /** Numbers never loaded from the index */
  excludedNumbers: number[];
  /** Documents indexed between search-index commits (default: 50) */
  commitInterval: number;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  server: {
    port: 3001,
    host: '0.0.0.0',
    logLevel: 'info',
    cors: {
      enabled: true,
      origins: ['*'],
    },
  },
  cache: {
    directory: DEFAULT_CACHE_DIR,
    excludedNumbers: [...DEFAULT_EXCLUDED_NUMBERS],
    commitInterval: DEFAULT_COMMIT_INTERVAL,
  },
  source: { ...DEFAULT_SOURCE },
};
