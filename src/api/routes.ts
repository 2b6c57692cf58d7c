/**
 * Route configuration for the API.
 *
 * This module registers all API routes on a Fastify instance.
 * Route handlers are thin wrappers around the cache.
 */

import type { FastifyInstance } from 'fastify';
import type { DocumentHandlers } from './handlers/DocumentHandlers.js';
import type { CacheHandlers } from './handlers/CacheHandlers.js';
import type { HealthResponse } from './types.js';

/**
 * Options for registering routes.
 */
export interface RouteOptions {
  documentHandlers: DocumentHandlers;
  cacheHandlers: CacheHandlers;
  entryCount: () => number;
  latestNumber: () => number | null;
  indexedCount: () => number;
}

/**
 * Register all API routes on a Fastify instance.
 */
export function registerRoutes(
  fastify: FastifyInstance,
  options: RouteOptions
): void {
  const { documentHandlers, cacheHandlers } = options;

  // ============================================================================
  // Health Check
  // ============================================================================

  fastify.get('/health', async (): Promise<HealthResponse> => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      components: {
        registry: { loaded: options.entryCount(), latest: options.latestNumber() },
        searchIndex: { indexed: options.indexedCount() },
      },
    };
  });

  // ============================================================================
  // Document Routes
  // ============================================================================

  fastify.get('/documents/:number', documentHandlers.getDocument);
  fastify.get('/documents/:number/text', documentHandlers.getDocumentText);
  fastify.get('/search', documentHandlers.search);

  // ============================================================================
  // Cache Routes
  // ============================================================================

  fastify.get('/status', cacheHandlers.getStatus);
  fastify.post('/update', cacheHandlers.postUpdate);
}
