/**
 * RegistryEntry: a RegistryRecord tied to the cache that owns it.
 *
 * Paths and URLs are derived from the number on every access; nothing
 * about the local file is remembered between calls.
 */

import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { CacheError, describeError, formatNumber } from './CacheError.js';
import type { RegistryRecord } from './RecordParser.js';
import type { EntryHost, EntrySummary, MonthYear } from './types.js';

export const FILES_DIRNAME = 'files';

const utf8 = new TextDecoder('utf-8', { fatal: true });
const latin1 = new TextDecoder('latin1', { fatal: true });

/**
 * Decode a cached document, trying UTF-8 first and Latin-1 second.
 *
 * @throws CacheError (CHARSET) if neither decoding applies
 */
export function decodeDocument(number: number, bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch {
    // not UTF-8, try Latin-1
  }
  try {
    return latin1.decode(bytes);
  } catch (err) {
    throw new CacheError(`Document ${number}: unknown file charset`, 'CHARSET', { cause: err });
  }
}

export class RegistryEntry {
  constructor(
    private readonly host: EntryHost,
    readonly record: RegistryRecord
  ) {}

  get number(): number {
    return this.record.number;
  }

  get title(): string {
    return this.record.title;
  }

  get description(): string {
    return this.record.description;
  }

  get date(): MonthYear | undefined {
    return this.record.date;
  }

  get flags(): Readonly<Record<string, string>> {
    return this.record.flags;
  }

  /**
   * File name of the cached document, e.g. "rfc791.txt".
   */
  get filename(): string {
    return `rfc${this.number}.txt`;
  }

  /**
   * Full path of the cached document.
   */
  get path(): string {
    return join(this.host.cacheDir, FILES_DIRNAME, this.filename);
  }

  /**
   * Remote URL of the document (number zero-padded to four digits).
   */
  get url(): string {
    return `${this.host.source.documentBaseUrl}rfc${formatNumber(this.number)}.txt`;
  }

  /**
   * Check whether the document has been downloaded.
   */
  async exists(): Promise<boolean> {
    try {
      return (await stat(this.path)).isFile();
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        return false;
      }
      throw new CacheError(`Error checking ${this.path}: ${describeError(err)}`, 'IO', { cause: err });
    }
  }

  /**
   * Download the document and overwrite the cached copy.
   */
  async update(): Promise<void> {
    const directory = dirname(this.path);
    try {
      await mkdir(directory, { recursive: true });
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== 'EEXIST') {
        throw new CacheError(`Error creating directory ${directory}: ${describeError(err)}`, 'IO', {
          cause: err,
        });
      }
    }

    this.host.logger.debug(`Downloading document ${this.number}: ${this.url}`);
    const body = await this.host.fetcher.fetchBytes(this.url);

    try {
      await writeFile(this.path, body);
    } catch (err) {
      throw new CacheError(`Error writing ${this.path}: ${describeError(err)}`, 'IO', { cause: err });
    }
  }

  /**
   * Read the cached document.
   */
  async read(): Promise<string> {
    let bytes: Uint8Array;
    try {
      bytes = await readFile(this.path);
    } catch (err) {
      throw new CacheError(`Error reading ${this.path}: ${describeError(err)}`, 'IO', { cause: err });
    }
    return decodeDocument(this.number, bytes);
  }

  equals(other: RegistryEntry): boolean {
    return this.record.equals(other.record);
  }

  toJSON(): EntrySummary {
    return {
      number: this.number,
      title: this.title,
      ...(this.date !== undefined ? { date: { ...this.date } } : {}),
      flags: { ...this.flags },
      description: this.description,
      path: this.path,
      url: this.url,
    };
  }
}
