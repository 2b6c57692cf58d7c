/**
 * Map cache errors onto HTTP responses.
 */

import type { FastifyReply } from 'fastify';
import { isCacheError, type CacheErrorCode } from '../../cache/CacheError.js';
import type { ApiError } from '../types.js';

const STATUS_BY_CODE: Record<CacheErrorCode, number> = {
  INVALID_NUMBER: 400,
  NOT_FOUND: 404,
  NOT_CACHED: 404,
  NOT_AVAILABLE: 404,
  NOT_LOADED: 503,
  FORMAT: 500,
  DECODE: 500,
  CHARSET: 500,
  IO: 500,
  FETCH: 502,
};

/**
 * Set the reply status for an error and build the response body.
 * Errors that are not CacheErrors are rethrown for Fastify to handle.
 */
export function cacheErrorResponse(reply: FastifyReply, err: unknown): ApiError {
  if (!isCacheError(err)) {
    throw err;
  }
  reply.status(STATUS_BY_CODE[err.code]);
  return { error: err.code, message: err.message };
}
