/**
 * Types for the full-text search index.
 *
 * The cache talks to the search engine only through SearchIndex, so the
 * engine behind it can be swapped without touching reconciliation logic.
 */

/**
 * Queryable text fields.
 */
export type SearchField = 'title' | 'body';

/**
 * One indexed document, keyed by number.
 */
export interface SearchDocument {
  number: number;
  title: string;
  body: string;
}

/**
 * SearchIndex interface.
 */
export interface SearchIndex {
  /** Number of documents currently held */
  readonly size: number;

  /**
   * Every document number present in the stored fields, in no particular order.
   */
  allStoredNumbers(): Promise<number[]>;

  /**
   * Add or replace a document. Staged until the next commit.
   */
  upsert(document: SearchDocument): void;

  /**
   * Persist staged changes.
   *
   * On a conflict the staged changes are dropped and the persisted index is
   * reloaded, so `size` and `allStoredNumbers()` again describe what is on
   * disk and the next commit can succeed.
   * @throws SearchIndexConflictError if the persisted index changed underneath us
   */
  commit(): Promise<void>;

  /**
   * Numbers of documents whose `field` matches every term in `text`.
   */
  query(field: SearchField, text: string): number[];
}

/**
 * Raised by commit() when the persisted index was modified by someone else.
 * Re-running the indexing pass resolves it.
 */
export class SearchIndexConflictError extends Error {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message);
    this.name = 'SearchIndexConflictError';
  }
}
