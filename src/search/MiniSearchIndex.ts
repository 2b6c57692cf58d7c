/**
 * MiniSearchIndex: SearchIndex backed by MiniSearch, persisted as JSON.
 *
 * The on-disk file is an envelope holding the stored document numbers
 * and the serialised MiniSearch index. Changes are held in memory until
 * commit() writes the envelope back. A commit that finds the file changed
 * drops the staged changes and reloads what is on disk.
 */

import MiniSearch, { type Options } from 'minisearch';
import { z } from 'zod';
import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { silentLogger, type Logger } from '../logging/Logger.js';
import {
  SearchIndexConflictError,
  type SearchDocument,
  type SearchField,
  type SearchIndex,
} from './types.js';

export const SEARCH_INDEX_FILENAME = 'search-index.json';
const FORMAT_VERSION = 1;

const MINISEARCH_OPTIONS: Options<SearchDocument> = {
  idField: 'number',
  fields: ['title', 'body'],
  storeFields: ['number'],
};

const PersistedIndexSchema = z.object({
  version: z.literal(FORMAT_VERSION),
  numbers: z.array(z.number().int().positive()),
  index: z.string(),
});

type PersistedIndex = z.infer<typeof PersistedIndexSchema>;

export interface MiniSearchIndexOptions {
  logger?: Logger;
}

/**
 * Return the file's mtime, or null if it does not exist.
 */
async function modifiedAt(path: string): Promise<number | null> {
  try {
    return (await stat(path)).mtimeMs;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw err;
  }
}

export class MiniSearchIndex implements SearchIndex {
  private readonly numbers: Set<number>;
  private knownModifiedAt: number | null = null;
  private dirty = false;

  private constructor(
    readonly path: string,
    private engine: MiniSearch<SearchDocument>,
    numbers: Iterable<number>,
    private readonly logger: Logger
  ) {
    this.numbers = new Set(numbers);
  }

  /**
   * Open the index stored in `directory`, creating an empty one if none exists.
   */
  static async openOrCreate(
    directory: string,
    options: MiniSearchIndexOptions = {}
  ): Promise<MiniSearchIndex> {
    const logger = options.logger ?? silentLogger;
    const path = join(directory, SEARCH_INDEX_FILENAME);
    await mkdir(directory, { recursive: true });

    const index = new MiniSearchIndex(
      path,
      new MiniSearch<SearchDocument>(MINISEARCH_OPTIONS),
      [],
      logger
    );

    if ((await modifiedAt(path)) === null) {
      logger.debug(`Create new search index in ${path}`);
      index.dirty = true;
      await index.commit();
      return index;
    }

    await index.reload();
    logger.debug(`Opened search index ${path} (${index.size} documents)`);
    return index;
  }

  /**
   * Replace the in-memory state with the persisted envelope, or with an
   * empty index if the file is gone. Staged changes are lost.
   */
  private async reload(): Promise<void> {
    const mtime = await modifiedAt(this.path);
    this.numbers.clear();
    this.dirty = false;

    if (mtime === null) {
      this.engine = new MiniSearch<SearchDocument>(MINISEARCH_OPTIONS);
      this.knownModifiedAt = null;
      return;
    }

    const persisted = MiniSearchIndex.parse(await readFile(this.path, 'utf-8'), this.path);
    this.engine = MiniSearch.loadJSON<SearchDocument>(persisted.index, MINISEARCH_OPTIONS);
    for (const number of persisted.numbers) {
      this.numbers.add(number);
    }
    this.knownModifiedAt = mtime;
  }

  private static parse(content: string, path: string): PersistedIndex {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new Error(`Search index ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    const result = PersistedIndexSchema.safeParse(raw);
    if (!result.success) {
      throw new Error(`Search index ${path} has an unsupported format: ${result.error.message}`);
    }
    return result.data;
  }

  get size(): number {
    return this.numbers.size;
  }

  async allStoredNumbers(): Promise<number[]> {
    return Array.from(this.numbers);
  }

  upsert(document: SearchDocument): void {
    if (this.engine.has(document.number)) {
      this.engine.discard(document.number);
    }
    this.engine.add({
      number: document.number,
      title: document.title,
      body: document.body,
    });
    this.numbers.add(document.number);
    this.dirty = true;
  }

  async commit(): Promise<void> {
    if (!this.dirty) {
      return;
    }

    const current = await modifiedAt(this.path);
    if (current !== this.knownModifiedAt) {
      this.logger.debug(`Search index ${this.path} changed on disk; discarding staged documents`);
      await this.reload();
      throw new SearchIndexConflictError(
        `Search index ${this.path} was modified by another writer`,
        this.path
      );
    }

    const persisted: PersistedIndex = {
      version: FORMAT_VERSION,
      numbers: Array.from(this.numbers).sort((a, b) => a - b),
      index: JSON.stringify(this.engine),
    };
    await writeFile(this.path, JSON.stringify(persisted), 'utf-8');

    this.knownModifiedAt = await modifiedAt(this.path);
    this.dirty = false;
    this.logger.debug(`Committed search index (${this.numbers.size} documents)`);
  }

  query(field: SearchField, text: string): number[] {
    if (text.trim() === '') {
      return [];
    }

    const numbers: number[] = [];
    for (const result of this.engine.search(text, { fields: [field], combineWith: 'AND' })) {
      const id: unknown = result.id;
      if (typeof id === 'number') {
        numbers.push(id);
      }
    }
    return numbers;
  }
}

/**
 * Open or create the search index in a directory.
 */
export function openSearchIndex(
  directory: string,
  options?: MiniSearchIndexOptions
): Promise<MiniSearchIndex> {
  return MiniSearchIndex.openOrCreate(directory, options);
}
