/**
 * RegistryStore: the parsed index, the cached documents and the search
 * index under one cache root.
 *
 * Layout of the cache root:
 *   rfc-index.txt          index file as downloaded
 *   files/rfc<N>.txt       downloaded documents
 *   index/                 search index
 *
 * The three stores can be at different stages at any time; the store
 * never assumes a parsed entry has a file or an index document.
 */

import { createReadStream } from 'node:fs';
import { mkdir, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { HttpFetcher } from '../fetch/HttpFetcher.js';
import { silentLogger, type Logger } from '../logging/Logger.js';
import { openSearchIndex } from '../search/MiniSearchIndex.js';
import { SearchIndexConflictError, type SearchIndex } from '../search/types.js';
import { CacheError, describeError, formatNumber } from './CacheError.js';
import {
  DEFAULT_CACHE_DIR,
  DEFAULT_COMMIT_INTERVAL,
  DEFAULT_EXCLUDED_NUMBERS,
  DEFAULT_SOURCE,
  INDEX_FILENAME,
  SEARCH_INDEX_DIRNAME,
  expandPath,
} from './defaults.js';
import { parseRecord } from './RecordParser.js';
import { RegistryEntry } from './RegistryEntry.js';
import type {
  DocumentFetcher,
  EntryHost,
  RegistryStoreOptions,
  SourceConfig,
  StoreStatus,
} from './types.js';

const RECORD_LINE = /^(\d+)\s*(.+)$/;
const HEADER_MARKER = '~~~';
const STATIC_LINES = new Set(['RFC INDEX', '---------']);
const NOT_ISSUED = 'Not Issued.';

/**
 * Yield the lines of a file. Bytes are mapped one-to-one onto
 * characters (latin1) so each record can be decoded on its own.
 */
async function* readLines(path: string): AsyncGenerator<string> {
  let pending = '';
  for await (const chunk of createReadStream(path, { encoding: 'latin1' })) {
    pending += String(chunk);
    const lines = pending.split('\n');
    pending = lines.pop() ?? '';
    yield* lines;
  }
  if (pending !== '') {
    yield pending;
  }
}

/**
 * Parse a positive integer from a number or a decimal string.
 */
function toPositiveInteger(value: number | string): number | null {
  let number: number;
  if (typeof value === 'number') {
    number = value;
  } else {
    const text = value.trim();
    if (!/^[+-]?\d+$/.test(text)) {
      return null;
    }
    number = Number.parseInt(text, 10);
  }
  return Number.isSafeInteger(number) && number >= 1 ? number : null;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw new CacheError(`Error checking ${path}: ${describeError(err)}`, 'IO', { cause: err });
  }
}

async function ensureDirectory(path: string): Promise<void> {
  try {
    await mkdir(path, { recursive: true });
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== 'EEXIST') {
      throw new CacheError(`Error creating directory ${path}: ${describeError(err)}`, 'IO', { cause: err });
    }
  }
}

export class RegistryStore implements EntryHost, Iterable<RegistryEntry> {
  readonly cacheDir: string;
  readonly source: SourceConfig;
  readonly fetcher: DocumentFetcher;
  readonly logger: Logger;
  readonly searchIndex: SearchIndex;
  readonly excludedNumbers: ReadonlySet<number>;
  readonly commitInterval: number;

  private entries: RegistryEntry[] = [];
  private latest: number | null = null;

  private constructor(
    cacheDir: string,
    searchIndex: SearchIndex,
    options: RegistryStoreOptions,
    logger: Logger
  ) {
    this.cacheDir = cacheDir;
    this.searchIndex = searchIndex;
    this.logger = logger;
    this.source = { ...DEFAULT_SOURCE, ...options.source };
    this.fetcher = options.fetcher ?? new HttpFetcher({ logger });
    this.excludedNumbers = new Set(options.excludedNumbers ?? DEFAULT_EXCLUDED_NUMBERS);
    this.commitInterval = Math.max(1, options.commitInterval ?? DEFAULT_COMMIT_INTERVAL);
  }

  /**
   * Open the cache at `options.cacheDir`.
   *
   * Creates the cache root and search index directory if missing, opens
   * or initialises the search index and loads an existing index file.
   */
  static async open(options: RegistryStoreOptions = {}): Promise<RegistryStore> {
    const logger = options.logger ?? silentLogger;
    const cacheDir = expandPath(options.cacheDir ?? DEFAULT_CACHE_DIR);
    const searchDir = join(cacheDir, SEARCH_INDEX_DIRNAME);

    await ensureDirectory(cacheDir);
    await ensureDirectory(searchDir);

    let searchIndex = options.searchIndex;
    if (searchIndex === undefined) {
      try {
        searchIndex = await openSearchIndex(searchDir, { logger });
      } catch (err) {
        throw new CacheError(`Error opening search index in ${searchDir}: ${describeError(err)}`, 'IO', {
          cause: err,
        });
      }
    }

    const store = new RegistryStore(cacheDir, searchIndex, options, logger);
    if (await isFile(store.path)) {
      await store.load();
    }
    return store;
  }

  /**
   * Path of the local index file.
   */
  get path(): string {
    return join(this.cacheDir, INDEX_FILENAME);
  }

  get size(): number {
    return this.entries.length;
  }

  get isLoaded(): boolean {
    return this.entries.length > 0;
  }

  /**
   * Highest loaded document number, or null before a load.
   */
  get latestNumber(): number | null {
    return this.latest;
  }

  [Symbol.iterator](): Iterator<RegistryEntry> {
    return this.entries[Symbol.iterator]();
  }

  /**
   * All entries in index order.
   */
  all(): readonly RegistryEntry[] {
    return this.entries;
  }

  /**
   * Load the local index file.
   *
   * The store is emptied first. If the load fails the store stays empty
   * and the error is rethrown.
   *
   * @throws CacheError (IO) if the file is missing or unreadable
   * @throws CacheError (FORMAT) if a continuation line appears before any record
   */
  async load(): Promise<void> {
    this.entries = [];
    this.latest = null;

    if (!(await isFile(this.path))) {
      throw new CacheError(`Error loading ${this.path}: no such file`, 'IO');
    }

    const loaded: RegistryEntry[] = [];
    let header = false;
    let started = false;
    let number: number | null = null;
    let text = '';

    const finish = (): void => {
      if (number === null || this.excludedNumbers.has(number)) {
        return;
      }
      try {
        loaded.push(new RegistryEntry(this, parseRecord(number, Buffer.from(text, 'latin1'))));
      } catch (err) {
        if (!(err instanceof CacheError)) {
          throw err;
        }
        this.logger.warn(`Skipping document ${number}: ${err.message}`);
      }
    };

    try {
      for await (const raw of readLines(this.path)) {
        const line = raw.trimEnd();
        if (line === '') {
          continue;
        }

        if (line.startsWith(HEADER_MARKER)) {
          header = !header;
          continue;
        }
        if (header || STATIC_LINES.has(line.trim())) {
          continue;
        }

        const match = RECORD_LINE.exec(line);
        if (match) {
          finish();
          started = true;
          number = Number.parseInt(match[1] ?? '', 10);
          text = match[2] ?? '';
          if (text === NOT_ISSUED) {
            number = null;
            text = '';
          }
          continue;
        }

        if (!started) {
          throw new CacheError(`Error loading ${this.path}: unsupported file format`, 'FORMAT');
        }
        if (number !== null) {
          text = `${text} ${line.trim()}`;
        }
      }
      finish();
    } catch (err) {
      if (err instanceof CacheError) {
        throw err;
      }
      throw new CacheError(`Error loading index ${this.path}: ${describeError(err)}`, 'IO', { cause: err });
    }

    this.entries = loaded;
    this.latest = loaded.reduce<number | null>(
      (max, entry) => (max === null || entry.number > max ? entry.number : max),
      null
    );
    this.logger.debug(`Loaded ${loaded.length} entries from ${this.path}`);
  }

  /**
   * Download the index file, overwrite the local copy and reload.
   * Fetch and write failures leave the loaded entries untouched.
   */
  async update(): Promise<void> {
    const body = await this.fetcher.fetchBytes(this.source.indexUrl);

    try {
      await writeFile(this.path, body);
    } catch (err) {
      throw new CacheError(`Error writing ${this.path}: ${describeError(err)}`, 'IO', { cause: err });
    }

    await this.load();
  }

  /**
   * Find an entry by number.
   *
   * @throws CacheError NOT_LOADED, INVALID_NUMBER, NOT_AVAILABLE, NOT_CACHED or NOT_FOUND
   */
  getByNumber(value: number | string): RegistryEntry {
    if (this.entries.length === 0 || this.latest === null) {
      throw new CacheError('No documents loaded to index', 'NOT_LOADED');
    }

    const number = toPositiveInteger(value);
    if (number === null) {
      throw new CacheError(`Invalid document number: ${String(value)}`, 'INVALID_NUMBER');
    }

    if (this.excludedNumbers.has(number)) {
      throw new CacheError(`Document ${formatNumber(number)} not available from source (obsolete?)`, 'NOT_AVAILABLE');
    }

    if (number > this.latest) {
      throw new CacheError(
        `Requested ${formatNumber(number)}, latest cached document ${formatNumber(this.latest)}`,
        'NOT_CACHED'
      );
    }

    const entry = this.entries.find(e => e.number === number);
    if (!entry) {
      throw new CacheError(`Document ${formatNumber(number)} not found from local cache`, 'NOT_FOUND');
    }
    return entry;
  }

  /**
   * Numbers present in the search index, ascending.
   */
  async getIndexed(): Promise<number[]> {
    const numbers = await this.searchIndex.allStoredNumbers();
    return numbers.sort((a, b) => a - b);
  }

  /**
   * Entries whose document has not been downloaded.
   */
  async getMissingDocuments(): Promise<RegistryEntry[]> {
    const missing: RegistryEntry[] = [];
    for (const entry of this.entries) {
      if (!(await entry.exists())) {
        missing.push(entry);
      }
    }
    return missing;
  }

  /**
   * Add downloaded documents that are not yet in the search index.
   *
   * Entries without a local file are left for a later run; only a file
   * that exists but cannot be read is an `IO` error. The index is
   * committed every `commitInterval` documents and once at the end. A
   * commit conflict drops that batch from the index, and the next run
   * picks those documents up again.
   *
   * @returns numbers indexed in this pass
   */
  async updateMissingIndexes(): Promise<number[]> {
    const indexed = new Set(await this.getIndexed());
    const added: number[] = [];
    let sinceCommit = 0;

    for (const entry of this.entries) {
      if (indexed.has(entry.number)) {
        continue;
      }
      if (!(await entry.exists())) {
        this.logger.debug(`Not indexing document ${entry.number}: not downloaded`);
        continue;
      }

      this.logger.debug(`Create index: document ${entry.number}`);
      const body = await entry.read();
      this.searchIndex.upsert({
        number: entry.number,
        title: entry.description,
        body,
      });
      added.push(entry.number);

      sinceCommit += 1;
      if (sinceCommit >= this.commitInterval) {
        await this.commitSearchIndex();
        sinceCommit = 0;
      }
    }

    await this.commitSearchIndex();
    return added;
  }

  private async commitSearchIndex(): Promise<void> {
    try {
      await this.searchIndex.commit();
    } catch (err) {
      if (err instanceof SearchIndexConflictError) {
        this.logger.warn(`Search index commit skipped: ${err.message}`);
        return;
      }
      const searchDir = join(this.cacheDir, SEARCH_INDEX_DIRNAME);
      throw new CacheError(`Error writing search index in ${searchDir}: ${describeError(err)}`, 'IO', {
        cause: err,
      });
    }
  }

  /**
   * Search titles, and bodies when `bodySearch` is set.
   *
   * Terms are lower-cased and joined into one query; every term must
   * match. Results are unique and ordered by number.
   */
  search(terms: readonly string[], bodySearch = false): RegistryEntry[] {
    const query = terms.map(term => term.toLowerCase()).join(' ');
    const seen = new Set<number>();
    const results: RegistryEntry[] = [];

    const collect = (numbers: number[]): void => {
      for (const number of numbers) {
        if (seen.has(number)) {
          continue;
        }
        seen.add(number);
        results.push(this.getByNumber(number));
      }
    };

    collect(this.searchIndex.query('title', query));
    if (bodySearch) {
      collect(this.searchIndex.query('body', query));
    }

    return results.sort((a, b) => a.number - b.number);
  }

  /**
   * Progress of each store.
   */
  async status(): Promise<StoreStatus> {
    let cached = 0;
    for (const entry of this.entries) {
      if (await entry.exists()) {
        cached += 1;
      }
    }
    return {
      loaded: this.isLoaded,
      entries: this.entries.length,
      latestNumber: this.latest,
      cached,
      indexed: this.searchIndex.size,
      cacheDir: this.cacheDir,
    };
  }
}

/**
 * Open a RegistryStore.
 */
export function createRegistryStore(options?: RegistryStoreOptions): Promise<RegistryStore> {
  return RegistryStore.open(options);
}
