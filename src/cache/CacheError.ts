/**
 * CacheError: the single error kind raised by the cache layer.
 *
 * `code` tells callers which situation occurred so the HTTP and MCP
 * layers can map it to a response; the message is meant for humans.
 */

export type CacheErrorCode =
  | 'NOT_LOADED'
  | 'INVALID_NUMBER'
  | 'NOT_AVAILABLE'
  | 'NOT_CACHED'
  | 'NOT_FOUND'
  | 'FORMAT'
  | 'DECODE'
  | 'CHARSET'
  | 'IO'
  | 'FETCH';

export class CacheError extends Error {
  constructor(
    message: string,
    public readonly code: CacheErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CacheError';
  }
}

/**
 * Check whether a value is a CacheError.
 */
export function isCacheError(err: unknown): err is CacheError {
  return err instanceof CacheError;
}

/**
 * Render an unknown thrown value for inclusion in a message.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Zero-pad a document number to four digits, as used in messages and URLs.
 */
export function formatNumber(value: number): string {
  return String(value).padStart(4, '0');
}
