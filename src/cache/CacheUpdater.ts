/**
 * CacheUpdater: bring downloaded documents and the search index up to
 * date with the registry.
 *
 * Steps run one after another: refresh the index file, download missing
 * documents, index downloaded documents. Any step can be skipped, so an
 * interrupted run can be resumed with whatever is still outstanding.
 */

import { describeError } from './CacheError.js';
import type { RegistryStore } from './RegistryStore.js';
import type { FetchResult, UpdateOptions, UpdateSummary } from './types.js';

export interface FetchMissingOptions {
  /** Stop after this many downloads */
  limit?: number;
}

export class CacheUpdater {
  constructor(private readonly store: RegistryStore) {}

  /**
   * Download the index file and reload the registry.
   */
  async refreshIndex(): Promise<number> {
    this.store.logger.info(`Refreshing index from ${this.store.source.indexUrl}`);
    await this.store.update();
    this.store.logger.info(`Index loaded: ${this.store.size} entries`);
    return this.store.size;
  }

  /**
   * Download every document that has no local copy.
   *
   * A failed download is recorded and the pass moves on to the next document.
   */
  async fetchMissingDocuments(options: FetchMissingOptions = {}): Promise<FetchResult> {
    const missing = await this.store.getMissingDocuments();
    const pending = options.limit !== undefined ? missing.slice(0, Math.max(0, options.limit)) : missing;
    const result: FetchResult = { fetched: [], failed: [] };

    for (const entry of pending) {
      try {
        await entry.update();
        result.fetched.push(entry.number);
      } catch (err) {
        this.store.logger.warn(`Document ${entry.number} not downloaded: ${describeError(err)}`);
        result.failed.push({ number: entry.number, error: describeError(err) });
      }
    }

    this.store.logger.info(
      `Downloaded ${result.fetched.length}/${pending.length} documents (${result.failed.length} failed)`
    );
    return result;
  }

  /**
   * Add downloaded documents missing from the search index.
   */
  async indexMissingDocuments(): Promise<number[]> {
    const indexed = await this.store.updateMissingIndexes();
    this.store.logger.info(`Indexed ${indexed.length} documents`);
    return indexed;
  }

  /**
   * Run the selected steps in order.
   */
  async run(options: UpdateOptions = {}): Promise<UpdateSummary> {
    const startTime = Date.now();
    const {
      refreshIndex = true,
      fetchDocuments = true,
      indexDocuments = true,
    } = options;

    if (refreshIndex) {
      await this.refreshIndex();
    }

    const fetchResult: FetchResult = fetchDocuments
      ? await this.fetchMissingDocuments(options.limit !== undefined ? { limit: options.limit } : {})
      : { fetched: [], failed: [] };

    const indexed = indexDocuments ? await this.indexMissingDocuments() : [];

    return {
      refreshed: refreshIndex,
      entries: this.store.size,
      fetched: fetchResult.fetched,
      failed: fetchResult.failed,
      indexed,
      durationMs: Date.now() - startTime,
    };
  }
}

/**
 * Create a new CacheUpdater instance.
 */
export function createCacheUpdater(store: RegistryStore): CacheUpdater {
  return new CacheUpdater(store);
}
