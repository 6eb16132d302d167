import type { JsonValue } from '../types/index.js';
import type { RequestKey } from './request-key.js';

export type CacheLookup =
  | { status: 'hit'; value: JsonValue }
  | { status: 'miss' }
  | { status: 'error'; error: Error };

export type CacheWriteResult =
  | { status: 'stored' }
  | { status: 'error'; error: Error };

/**
 * Interface for response caches keyed by request identity.
 *
 * `load` and `save` report failures through their result instead of
 * throwing; the caller decides whether a failed read counts as a miss.
 */
export interface CacheStore {
  /**
   * Look up a stored response body
   * @param key The request identity
   */
  load(key: RequestKey): Promise<CacheLookup>;

  /**
   * Store a response body, replacing any existing entry
   * @param key The request identity
   * @param value The decoded JSON body
   */
  save(key: RequestKey, value: JsonValue): Promise<CacheWriteResult>;

  /**
   * Remove a single entry. Missing entries are ignored.
   */
  delete(key: RequestKey): Promise<void>;

  /**
   * Remove every stored entry
   */
  clear(): Promise<void>;
}
