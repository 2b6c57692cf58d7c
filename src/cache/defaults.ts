/**
 * Default cache layout and source locations.
 */

import { homedir } from 'node:os';
import type { SourceConfig } from './types.js';

export const DEFAULT_CACHE_DIR = '~/.cache/rfc-mirror';
export const INDEX_FILENAME = 'rfc-index.txt';
export const SEARCH_INDEX_DIRNAME = 'index';

/** Documents indexed between search-index commits. */
export const DEFAULT_COMMIT_INTERVAL = 50;

export const DEFAULT_SOURCE: SourceConfig = {
  indexUrl: 'https://www.ietf.org/download/rfc-index.txt',
  documentBaseUrl: 'https://www.ietf.org/rfc/',
};

/**
 * Numbers the source refuses to serve (HTTP 403). They are dropped at
 * load time whatever the index file says. Override with the
 * `cache.excludedNumbers` config setting.
 */
export const DEFAULT_EXCLUDED_NUMBERS: readonly number[] = [8, 9, 51, 418, 530, 598];

const VAR_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g;

/**
 * Expand a leading `~` and `$VAR` / `${VAR}` references in a path.
 * Unset variables are left as written.
 */
export function expandPath(path: string): string {
  const withVars = path.replace(VAR_PATTERN, (match: string, braced?: string, bare?: string) => {
    const name = braced ?? bare;
    const value = name !== undefined ? process.env[name] : undefined;
    return value ?? match;
  });

  if (withVars === '~') {
    return homedir();
  }
  if (withVars.startsWith('~/')) {
    return homedir() + withVars.slice(1);
  }
  return withVars;
}
