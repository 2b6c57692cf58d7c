/**
 * Configuration loader for the rfc-mirror server.
 *
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { silentLogger, type LogLevel, type Logger } from '../logging/Logger.js';
import type { SourceConfig } from '../cache/types.js';
import type { AppConfig, CacheConfig, CorsConfig, ServerConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './config.yaml') */
  configPath?: string;
  /** Where warnings go (default: silent) */
  logger?: Logger;
}

/**
 * Config file contents before defaults are applied.
 */
export interface PartialAppConfig {
  server?: Partial<Omit<ServerConfig, 'cors'>> & { cors?: Partial<CorsConfig> };
  cache?: Partial<CacheConfig>;
  source?: Partial<SourceConfig>;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Substitute environment variables in a string.
 *
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
function substituteEnvVars(value: string, logger: Logger): string {
  return value.replace(ENV_VAR_PATTERN, (_match: string, varName: string, defaultValue?: string) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    logger.warn(`Environment variable ${varName} is not set and has no default`);
    return '';
  });
}

/**
 * Recursively substitute environment variables in an object.
 */
export function substituteEnvVarsRecursive(obj: unknown, logger: Logger = silentLogger): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj, logger);
  }
  if (Array.isArray(obj)) {
    return obj.map(item => substituteEnvVarsRecursive(item, logger));
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value, logger);
    }
    return result;
  }
  return obj;
}

/**
 * Read a number that may have come through env substitution as a string.
 */
function coerceNumber(value: unknown): unknown {
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return Number.parseInt(value, 10);
  }
  return value;
}

/**
 * Validate server configuration.
 */
function validateServerConfig(c: Record<string, unknown>, path = 'server'): void {
  if (c.port !== undefined && (typeof c.port !== 'number' || c.port < 1 || c.port > 65535)) {
    throw new ConfigValidationError('port must be a number between 1 and 65535', `${path}.port`, c.port);
  }

  if (c.host !== undefined && typeof c.host !== 'string') {
    throw new ConfigValidationError('host must be a string', `${path}.host`, c.host);
  }

  if (c.logLevel !== undefined && !LOG_LEVELS.some(level => level === c.logLevel)) {
    throw new ConfigValidationError(
      `logLevel must be one of: ${LOG_LEVELS.join(', ')}`,
      `${path}.logLevel`,
      c.logLevel
    );
  }

  const cors = c.cors;
  if (cors !== undefined) {
    if (!isRecord(cors)) {
      throw new ConfigValidationError('must be an object', `${path}.cors`, cors);
    }
    if (cors.enabled !== undefined && typeof cors.enabled !== 'boolean') {
      throw new ConfigValidationError('enabled must be a boolean', `${path}.cors.enabled`, cors.enabled);
    }
    const origins = cors.origins;
    if (origins !== undefined && (!Array.isArray(origins) || !origins.every(o => typeof o === 'string'))) {
      throw new ConfigValidationError('origins must be a list of strings', `${path}.cors.origins`, origins);
    }
  }
}

/**
 * Validate cache configuration.
 */
function validateCacheConfig(c: Record<string, unknown>, path = 'cache'): void {
  if (c.directory !== undefined && (typeof c.directory !== 'string' || c.directory === '')) {
    throw new ConfigValidationError('directory must be a non-empty string', `${path}.directory`, c.directory);
  }

  const excluded = c.excludedNumbers;
  if (
    excluded !== undefined &&
    (!Array.isArray(excluded) || !excluded.every(n => typeof n === 'number' && Number.isInteger(n) && n > 0))
  ) {
    throw new ConfigValidationError(
      'excludedNumbers must be a list of positive integers',
      `${path}.excludedNumbers`,
      excluded
    );
  }

  if (
    c.commitInterval !== undefined &&
    (typeof c.commitInterval !== 'number' || !Number.isInteger(c.commitInterval) || c.commitInterval < 1)
  ) {
    throw new ConfigValidationError(
      'commitInterval must be a positive integer',
      `${path}.commitInterval`,
      c.commitInterval
    );
  }
}

/**
 * Validate source configuration.
 */
function validateSourceConfig(c: Record<string, unknown>, path = 'source'): void {
  for (const key of ['indexUrl', 'documentBaseUrl']) {
    const value = c[key];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== 'string' || !/^https?:\/\//.test(value)) {
      throw new ConfigValidationError('must be an http(s) URL', `${path}.${key}`, value);
    }
  }
}

/**
 * Validate the entire configuration.
 */
export function validateConfig(config: unknown): asserts config is PartialAppConfig {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', '', config);
  }

  for (const [section, validate] of [
    ['server', validateServerConfig],
    ['cache', validateCacheConfig],
    ['source', validateSourceConfig],
  ] as const) {
    const value = config[section];
    if (value === undefined) {
      continue;
    }
    if (!isRecord(value)) {
      throw new ConfigValidationError('must be an object', section, value);
    }
    validate(value);
  }
}

/**
 * Turn numeric strings produced by env substitution back into numbers.
 */
function normalizeNumbers(config: unknown): unknown {
  if (!isRecord(config)) {
    return config;
  }
  const result: Record<string, unknown> = { ...config };
  const { server, cache } = config;
  if (isRecord(server) && server.port !== undefined) {
    result.server = { ...server, port: coerceNumber(server.port) };
  }
  if (isRecord(cache) && cache.commitInterval !== undefined) {
    result.cache = { ...cache, commitInterval: coerceNumber(cache.commitInterval) };
  }
  return result;
}

/**
 * Apply defaults to a validated partial config.
 */
export function applyDefaults(partial: PartialAppConfig): AppConfig {
  const serverPartial: NonNullable<PartialAppConfig['server']> = partial.server ?? {};
  const { cors, ...server } = serverPartial;
  return {
    server: {
      ...DEFAULT_CONFIG.server,
      ...server,
      cors: { ...DEFAULT_CONFIG.server.cors, ...cors },
    },
    cache: { ...DEFAULT_CONFIG.cache, ...partial.cache },
    source: { ...DEFAULT_CONFIG.source, ...partial.source },
  };
}

/**
 * Load configuration from a YAML file.
 *
 * @param options - Loading options
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const logger = options.logger ?? silentLogger;
  const configPath = options.configPath
    ?? process.env.CONFIG_PATH
    ?? './config.yaml';

  const absolutePath = resolve(configPath);

  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    logger.warn(`Config file not found at ${absolutePath}, using defaults`);
    return applyDefaults({});
  }

  // Read and parse YAML
  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  // An empty file parses to null
  const substituted = normalizeNumbers(substituteEnvVarsRecursive(parsed ?? {}, logger));

  validateConfig(substituted);
  return applyDefaults(substituted);
}
