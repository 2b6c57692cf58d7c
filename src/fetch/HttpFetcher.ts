/**
 * HttpFetcher: DocumentFetcher over the global fetch API.
 */

import { CacheError, describeError } from '../cache/CacheError.js';
import type { DocumentFetcher } from '../cache/types.js';
import { silentLogger, type Logger } from '../logging/Logger.js';

export interface HttpFetcherOptions {
  /** Extra request headers */
  headers?: Record<string, string>;
  logger?: Logger;
}

export class HttpFetcher implements DocumentFetcher {
  private readonly headers: Record<string, string>;
  private readonly logger: Logger;

  constructor(options: HttpFetcherOptions = {}) {
    this.headers = { 'User-Agent': 'rfc-mirror', ...options.headers };
    this.logger = options.logger ?? silentLogger;
  }

  async fetchBytes(url: string): Promise<Uint8Array> {
    this.logger.debug(`Downloading ${url}`);

    let response: Response;
    try {
      response = await fetch(url, { headers: this.headers });
    } catch (err) {
      throw new CacheError(`Error downloading ${url}: ${describeError(err)}`, 'FETCH', { cause: err });
    }

    if (response.status !== 200) {
      throw new CacheError(`Error downloading ${url}: status code ${response.status}`, 'FETCH');
    }

    try {
      return new Uint8Array(await response.arrayBuffer());
    } catch (err) {
      throw new CacheError(`Error downloading ${url}: ${describeError(err)}`, 'FETCH', { cause: err });
    }
  }
}

/**
 * Create a new HttpFetcher instance.
 */
export function createHttpFetcher(options?: HttpFetcherOptions): HttpFetcher {
  return new HttpFetcher(options);
}
