/**
 * CacheHandlers: HTTP handlers for cache status and updates.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { CacheUpdater } from '../../cache/CacheUpdater.js';
import type { RegistryStore } from '../../cache/RegistryStore.js';
import type { UpdateOptions } from '../../cache/types.js';
import { cacheErrorResponse } from './errors.js';
import type { ApiError, StatusResponse, UpdateResponse } from '../types.js';

const UPDATE_FLAGS = ['refreshIndex', 'fetchDocuments', 'indexDocuments'] as const;

/**
 * Validate a POST /update body. Returns an error message when invalid.
 */
export function parseUpdateRequest(body: unknown): UpdateOptions | string {
  if (body === undefined || body === null) {
    return {};
  }
  if (typeof body !== 'object' || Array.isArray(body)) {
    return 'request body must be an object';
  }

  const options: UpdateOptions = {};
  for (const flag of UPDATE_FLAGS) {
    const value: unknown = Reflect.get(body, flag);
    if (value === undefined) {
      continue;
    }
    if (typeof value !== 'boolean') {
      return `${flag} must be a boolean`;
    }
    options[flag] = value;
  }

  const limit: unknown = Reflect.get(body, 'limit');
  if (limit !== undefined) {
    if (typeof limit !== 'number' || !Number.isInteger(limit) || limit < 0) {
      return 'limit must be a non-negative integer';
    }
    options.limit = limit;
  }

  return options;
}

/**
 * Create cache handlers bound to a RegistryStore and its updater.
 */
export function createCacheHandlers(store: RegistryStore, updater: CacheUpdater) {
  return {
    /**
     * GET /status
     * Report how far each store has progressed.
     */
    async getStatus(
      _request: FastifyRequest,
      _reply: FastifyReply
    ): Promise<StatusResponse> {
      return store.status();
    },

    /**
     * POST /update
     * Refresh the index, download missing documents and index them.
     */
    async postUpdate(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply
    ): Promise<UpdateResponse | ApiError> {
      const options = parseUpdateRequest(request.body);
      if (typeof options === 'string') {
        reply.status(400);
        return { error: 'BAD_REQUEST', message: options };
      }

      try {
        const summary = await updater.run(options);
        return { success: true, ...summary };
      } catch (err) {
        return cacheErrorResponse(reply, err);
      }
    },
  };
}

export type CacheHandlers = ReturnType<typeof createCacheHandlers>;
