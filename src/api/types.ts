/**
 * Types for the HTTP API layer.
 *
 * These types define request/response structures for the REST API.
 */

import type { EntrySummary, FetchFailure, StoreStatus } from '../cache/types.js';

// ============================================================================
// Error Response
// ============================================================================

/**
 * Standard error response.
 */
export interface ApiError {
  /** Error type/code */
  error: string;
  /** Human-readable message */
  message: string;
}

// ============================================================================
// Document Endpoints
// ============================================================================

/**
 * Route parameters naming a document.
 */
export interface DocumentParams {
  number: string;
}

/**
 * Query parameters for searching.
 */
export interface SearchQuery {
  /** Space-separated search terms */
  q?: string;
  /** Also search document bodies ("true" / "1") */
  body?: string;
}

/**
 * Response for a search.
 */
export interface SearchResponse {
  query: string;
  bodySearch: boolean;
  results: EntrySummary[];
  total: number;
}

// ============================================================================
// Cache Endpoints
// ============================================================================

/**
 * Response for POST /update.
 */
export interface UpdateResponse {
  success: true;
  refreshed: boolean;
  entries: number;
  fetched: number[];
  failed: FetchFailure[];
  indexed: number[];
  durationMs: number;
}

/**
 * Response for GET /status.
 */
export type StatusResponse = StoreStatus;

/**
 * Health check response.
 */
export interface HealthResponse {
  status: 'ok';
  timestamp: string;
  components: {
    registry: { loaded: number; latest: number | null };
    searchIndex: { indexed: number };
  };
}

// ============================================================================
// Server Options
// ============================================================================

/**
 * Options accepted by createServer / startServer.
 */
export interface ServerOptions {
  port?: number;
  host?: string;
  logLevel?: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  cors?: boolean;
  /** Mount the MCP endpoint at /mcp (default: true) */
  mcp?: boolean;
}
