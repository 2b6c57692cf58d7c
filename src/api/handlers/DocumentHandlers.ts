/**
 * DocumentHandlers: HTTP handlers for document lookup and search.
 *
 * These handlers provide endpoints for:
 * - Getting a registry entry by number
 * - Getting the cached text of a document
 * - Searching titles and, optionally, bodies
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { RegistryStore } from '../../cache/RegistryStore.js';
import type { EntrySummary } from '../../cache/types.js';
import { cacheErrorResponse } from './errors.js';
import type { ApiError, DocumentParams, SearchQuery, SearchResponse } from '../types.js';

/**
 * Split a query string into search terms.
 */
export function splitTerms(query: string): string[] {
  return query.split(/\s+/).filter(term => term.length > 0);
}

function isTruthy(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

/**
 * Create document handlers bound to a RegistryStore.
 */
export function createDocumentHandlers(store: RegistryStore) {
  return {
    /**
     * GET /documents/:number
     * Get a registry entry.
     */
    async getDocument(
      request: FastifyRequest<{ Params: DocumentParams }>,
      reply: FastifyReply
    ): Promise<EntrySummary | ApiError> {
      try {
        return store.getByNumber(request.params.number).toJSON();
      } catch (err) {
        return cacheErrorResponse(reply, err);
      }
    },

    /**
     * GET /documents/:number/text
     * Get the cached document text.
     */
    async getDocumentText(
      request: FastifyRequest<{ Params: DocumentParams }>,
      reply: FastifyReply
    ): Promise<string | ApiError> {
      try {
        const entry = store.getByNumber(request.params.number);
        if (!(await entry.exists())) {
          reply.status(404);
          return {
            error: 'NOT_DOWNLOADED',
            message: `Document ${entry.number} has not been downloaded`,
          };
        }
        const text = await entry.read();
        reply.type('text/plain; charset=utf-8');
        return text;
      } catch (err) {
        return cacheErrorResponse(reply, err);
      }
    },

    /**
     * GET /search?q=terms&body=true
     * Search titles, and bodies when body=true.
     */
    async search(
      request: FastifyRequest<{ Querystring: SearchQuery }>,
      reply: FastifyReply
    ): Promise<SearchResponse | ApiError> {
      const { q, body } = request.query;
      const terms = splitTerms(q ?? '');

      if (terms.length === 0) {
        reply.status(400);
        return {
          error: 'BAD_REQUEST',
          message: 'q query parameter is required',
        };
      }

      const bodySearch = isTruthy(body);
      try {
        const results = store.search(terms, bodySearch).map(entry => entry.toJSON());
        return {
          query: terms.join(' '),
          bodySearch,
          results,
          total: results.length,
        };
      } catch (err) {
        return cacheErrorResponse(reply, err);
      }
    },
  };
}

export type DocumentHandlers = ReturnType<typeof createDocumentHandlers>;
