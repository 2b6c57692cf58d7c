/**
 * Types for the document cache.
 *
 * The cache keeps three stores in step:
 * - the parsed registry (in memory)
 * - the downloaded document files (on disk)
 * - the full-text search index (on disk)
 */

import type { Logger } from '../logging/Logger.js';
import type { SearchIndex } from '../search/types.js';

/**
 * Calendar month and year of publication.
 */
export interface MonthYear {
  year: number;
  /** 1 = January */
  month: number;
}

/**
 * Transport boundary for retrieving remote files.
 */
export interface DocumentFetcher {
  /**
   * Fetch a URL and resolve with the response body.
   * Rejects with a CacheError (code FETCH) on a non-200 status or transport failure.
   */
  fetchBytes(url: string): Promise<Uint8Array>;
}

/**
 * Remote locations the cache mirrors.
 */
export interface SourceConfig {
  /** URL of the full index text file */
  indexUrl: string;
  /** Base URL that document file names are appended to (trailing slash included) */
  documentBaseUrl: string;
}

/**
 * What an entry needs from the cache that owns it.
 */
export interface EntryHost {
  readonly cacheDir: string;
  readonly source: SourceConfig;
  readonly fetcher: DocumentFetcher;
  readonly logger: Logger;
}

/**
 * Options for opening a registry store.
 */
export interface RegistryStoreOptions {
  /** Cache root (default: ~/.cache/rfc-mirror). `~` and `$VAR` are expanded. */
  cacheDir?: string;
  /** Remote locations (default: ietf.org) */
  source?: Partial<SourceConfig>;
  /** Numbers that are never loaded (default: DEFAULT_EXCLUDED_NUMBERS) */
  excludedNumbers?: Iterable<number>;
  /** Documents indexed between search-index commits (default: 50) */
  commitInterval?: number;
  /** Transport (default: HttpFetcher) */
  fetcher?: DocumentFetcher;
  /** Search index (default: MiniSearchIndex under `<cacheDir>/index`) */
  searchIndex?: SearchIndex;
  /** Diagnostic sink (default: silent) */
  logger?: Logger;
}

/**
 * Plain summary of an entry, used by the API and MCP layers.
 */
export interface EntrySummary {
  number: number;
  title: string;
  date?: MonthYear;
  flags: Record<string, string>;
  description: string;
  path: string;
  url: string;
}

/**
 * Snapshot of how far each store has progressed.
 */
export interface StoreStatus {
  loaded: boolean;
  entries: number;
  latestNumber: number | null;
  cached: number;
  indexed: number;
  cacheDir: string;
}

/**
 * A document download that did not succeed.
 */
export interface FetchFailure {
  number: number;
  error: string;
}

/**
 * Result of a fetch-missing-documents pass.
 */
export interface FetchResult {
  fetched: number[];
  failed: FetchFailure[];
}

/**
 * Steps of an update run.
 */
export interface UpdateOptions {
  /** Download the index file and reload (default: true) */
  refreshIndex?: boolean;
  /** Download documents missing from the cache (default: true) */
  fetchDocuments?: boolean;
  /** Add cached documents to the search index (default: true) */
  indexDocuments?: boolean;
  /** Maximum number of documents to download in this run */
  limit?: number;
}

/**
 * Outcome of an update run.
 */
export interface UpdateSummary {
  refreshed: boolean;
  entries: number;
  fetched: number[];
  failed: FetchFailure[];
  indexed: number[];
  durationMs: number;
}
