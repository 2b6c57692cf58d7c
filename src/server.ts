/**
 * Server entry point for the rfc-mirror API.
 *
 * This module:
 * - Loads configuration and opens the local cache
 * - Creates Fastify server with routes and the MCP endpoint
 * - Provides both programmatic API and CLI usage
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';

import { loadConfig } from './config/loader.js';
import type { AppConfig } from './config/types.js';
import { createRegistryStore, type RegistryStore } from './cache/RegistryStore.js';
import { createCacheUpdater, type CacheUpdater } from './cache/CacheUpdater.js';
import type { DocumentFetcher } from './cache/types.js';
import type { SearchIndex } from './search/types.js';
import { createConsoleLogger, type Logger } from './logging/Logger.js';
import { createDocumentHandlers, createCacheHandlers } from './api/handlers/index.js';
import { registerRoutes, type RouteOptions } from './api/routes.js';
import type { ServerOptions } from './api/types.js';
import { createMcpServer, mcpPlugin } from './mcp/index.js';

/**
 * Application context holding all initialized components.
 */
export interface AppContext {
  config: AppConfig;
  store: RegistryStore;
  updater: CacheUpdater;
  logger: Logger;
  configPath?: string | undefined;
}

/**
 * Options for initializeApp.
 */
export interface InitializeOptions {
  /** Path to config.yaml (default: CONFIG_PATH or ./config.yaml) */
  configPath?: string;
  /** Use this configuration instead of reading a file */
  config?: AppConfig;
  fetcher?: DocumentFetcher;
  searchIndex?: SearchIndex;
  logger?: Logger;
}

/**
 * Initialize all application components.
 */
export async function initializeApp(options: InitializeOptions = {}): Promise<AppContext> {
  const configPath = options.configPath ?? process.env.CONFIG_PATH;
  const config = options.config ?? await loadConfig({
    ...(configPath !== undefined ? { configPath } : {}),
    logger: options.logger ?? createConsoleLogger(),
  });
  const logger = options.logger ?? createConsoleLogger(config.server.logLevel);

  logger.info(`Opening cache at ${config.cache.directory}`);

  const store = await createRegistryStore({
    cacheDir: config.cache.directory,
    source: config.source,
    excludedNumbers: config.cache.excludedNumbers,
    commitInterval: config.cache.commitInterval,
    logger,
    ...(options.fetcher !== undefined ? { fetcher: options.fetcher } : {}),
    ...(options.searchIndex !== undefined ? { searchIndex: options.searchIndex } : {}),
  });

  if (store.isLoaded) {
    logger.info(`Loaded ${store.size} entries (latest ${store.latestNumber})`);
  } else {
    logger.info('No index loaded yet; run an update to download it');
  }

  const updater = createCacheUpdater(store);

  logger.info('App initialized');

  return { config, store, updater, logger, configPath };
}

/**
 * Create and configure a Fastify server.
 */
export async function createServer(
  ctx: AppContext,
  options: ServerOptions = {}
): Promise<ReturnType<typeof Fastify>> {
  const serverConfig = ctx.config.server;

  const fastify = Fastify({
    logger: {
      level: options.logLevel ?? serverConfig.logLevel,
    },
  });

  if (options.cors ?? serverConfig.cors.enabled) {
    const origins = serverConfig.cors.origins;
    await fastify.register(cors, {
      origin: origins.includes('*') ? true : origins,
      methods: ['GET', 'POST', 'OPTIONS'],
    });
  }

  const documentHandlers = createDocumentHandlers(ctx.store);
  const cacheHandlers = createCacheHandlers(ctx.store, ctx.updater);

  // Register API routes with /api prefix
  await fastify.register(async (instance) => {
    const routeOpts: RouteOptions = {
      documentHandlers,
      cacheHandlers,
      entryCount: () => ctx.store.size,
      latestNumber: () => ctx.store.latestNumber,
      indexedCount: () => ctx.store.searchIndex.size,
    };
    registerRoutes(instance, routeOpts);
  }, { prefix: '/api' });

  if (options.mcp ?? true) {
    await fastify.register(mcpPlugin, {
      prefix: '/mcp',
      createMcpServer: () => createMcpServer(ctx),
    });
  }

  return fastify;
}

/**
 * Start the server.
 */
export async function startServer(
  initOptions: InitializeOptions = {},
  options: ServerOptions = {}
): Promise<void> {
  try {
    const ctx = await initializeApp(initOptions);
    const fastify = await createServer(ctx, options);

    const port = options.port ?? ctx.config.server.port;
    const host = options.host ?? ctx.config.server.host;

    await fastify.listen({ port, host });

    ctx.logger.info(`Server listening on http://${host}:${port}`);
    ctx.logger.info(`MCP endpoint: http://${host}:${port}/mcp`);

    const shutdown = async () => {
      ctx.logger.info('Shutting down...');
      await fastify.close();
      process.exit(0);
    };

    const onSignal = () => {
      shutdown().catch((err: unknown) => {
        console.error('Shutdown failed:', err);
        process.exit(1);
      });
    };

    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  } catch (err) {
    console.error('Failed to start server:', err);
    process.exit(1);
  }
}

/**
 * CLI entry point.
 */
async function main() {
  const options: ServerOptions = {};
  if (process.env.PORT) options.port = parseInt(process.env.PORT, 10);
  if (process.env.HOST) options.host = process.env.HOST;

  await startServer({}, options);
}

// Run if executed directly
// Note: ESM doesn't have require.main, use import.meta instead
const isMain = process.argv[1]?.endsWith('server.js') ||
               process.argv[1]?.endsWith('server.ts');

if (isMain) {
  main().catch(console.error);
}
