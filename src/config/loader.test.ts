/**
 * Tests for the configuration loader.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import {
  ConfigValidationError,
  applyDefaults,
  loadConfig,
  substituteEnvVarsRecursive,
  validateConfig,
} from './loader.js';
import { DEFAULT_CONFIG } from './types.js';

describe('config loader', () => {
  let dir: string;
  const savedEnv = { ...process.env };

  beforeEach(async () => {
    dir = join(tmpdir(), `rfc-config-test-${randomUUID()}`);
    await mkdir(dir, { recursive: true });
  });

  afterEach(async () => {
    process.env = { ...savedEnv };
    await rm(dir, { recursive: true, force: true });
  });

  const writeConfig = async (content: string): Promise<string> => {
    const path = join(dir, 'config.yaml');
    await writeFile(path, content);
    return path;
  };

  describe('loadConfig', () => {
    it('returns defaults when the file does not exist', async () => {
      const config = await loadConfig({ configPath: join(dir, 'missing.yaml') });

      expect(config).toEqual(DEFAULT_CONFIG);
    });

    it('returns defaults for an empty file', async () => {
      const config = await loadConfig({ configPath: await writeConfig('') });

      expect(config).toEqual(DEFAULT_CONFIG);
    });

    it('merges file values over defaults', async () => {
      const configPath = await writeConfig([
        'server:',
        '  port: 8080',
        '  cors:',
        '    origins: ["https://app.example.test"]',
        'cache:',
        '  directory: /srv/mirror',
        '  excludedNumbers: [8, 9]',
      ].join('\n'));

      const config = await loadConfig({ configPath });

      expect(config.server).toEqual({
        port: 8080,
        host: '0.0.0.0',
        logLevel: 'info',
        cors: { enabled: true, origins: ['https://app.example.test'] },
      });
      expect(config.cache).toEqual({
        directory: '/srv/mirror',
        excludedNumbers: [8, 9],
        commitInterval: 50,
      });
      expect(config.source).toEqual(DEFAULT_CONFIG.source);
    });

    it('substitutes environment variables and coerces numbers', async () => {
      process.env.RFC_TEST_PORT = '9090';
      process.env.RFC_TEST_DIR = '/data/rfc';
      delete process.env.RFC_TEST_INTERVAL;
      const configPath = await writeConfig([
        'server:',
        '  port: ${RFC_TEST_PORT}',
        'cache:',
        '  directory: ${RFC_TEST_DIR}',
        '  commitInterval: ${RFC_TEST_INTERVAL:-25}',
      ].join('\n'));

      const config = await loadConfig({ configPath });

      expect(config.server.port).toBe(9090);
      expect(config.cache.directory).toBe('/data/rfc');
      expect(config.cache.commitInterval).toBe(25);
    });

    it('rejects invalid YAML', async () => {
      const configPath = await writeConfig('server: [unclosed');

      await expect(loadConfig({ configPath })).rejects.toThrow('Failed to parse config file');
    });

    it('rejects invalid values', async () => {
      const configPath = await writeConfig('server:\n  port: 70000\n');

      await expect(loadConfig({ configPath })).rejects.toThrow(
        "Config validation error at 'server.port': port must be a number between 1 and 65535"
      );
    });
  });

  describe('validateConfig', () => {
    it('accepts an empty object', () => {
      expect(() => validateConfig({})).not.toThrow();
    });

    it('rejects a non-object section', () => {
      expect(() => validateConfig({ cache: 'nope' })).toThrow(ConfigValidationError);
    });

    it('rejects unknown log levels', () => {
      expect(() => validateConfig({ server: { logLevel: 'verbose' } })).toThrow(
        "Config validation error at 'server.logLevel': logLevel must be one of: debug, info, warn, error, silent"
      );
    });

    it('rejects non-positive excluded numbers', () => {
      try {
        validateConfig({ cache: { excludedNumbers: [8, 0] } });
        expect.fail('expected a validation error');
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigValidationError);
        if (err instanceof ConfigValidationError) {
          expect(err.path).toBe('cache.excludedNumbers');
          expect(err.value).toEqual([8, 0]);
        }
      }
    });

    it('rejects a zero commit interval', () => {
      expect(() => validateConfig({ cache: { commitInterval: 0 } })).toThrow(
        "Config validation error at 'cache.commitInterval': commitInterval must be a positive integer"
      );
    });

    it('rejects source URLs that are not http(s)', () => {
      expect(() => validateConfig({ source: { indexUrl: 'ftp://example.test/index.txt' } })).toThrow(
        "Config validation error at 'source.indexUrl': must be an http(s) URL"
      );
    });

    it('rejects a non-boolean cors flag', () => {
      expect(() => validateConfig({ server: { cors: { enabled: 'yes' } } })).toThrow(
        "Config validation error at 'server.cors.enabled': enabled must be a boolean"
      );
    });
  });

  describe('substituteEnvVarsRecursive', () => {
    it('replaces variables in nested values and leaves other types alone', () => {
      process.env.RFC_TEST_HOST = 'mirror.example.test';

      expect(substituteEnvVarsRecursive({
        hosts: ['${RFC_TEST_HOST}', 'static'],
        port: 3001,
        enabled: true,
      })).toEqual({
        hosts: ['mirror.example.test', 'static'],
        port: 3001,
        enabled: true,
      });
    });

    it('replaces an unset variable without a default with an empty string', () => {
      delete process.env.RFC_TEST_UNSET;

      expect(substituteEnvVarsRecursive('a${RFC_TEST_UNSET}b')).toBe('ab');
    });
  });

  describe('applyDefaults', () => {
    it('keeps default cors settings that are not overridden', () => {
      const config = applyDefaults({ server: { cors: { enabled: false } } });

      expect(config.server.cors).toEqual({ enabled: false, origins: ['*'] });
    });
  });
});
