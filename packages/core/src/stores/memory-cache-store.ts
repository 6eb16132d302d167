import { toError } from '../errors/index.js';
import type { JsonValue } from '../types/index.js';
import type {
  CacheLookup,
  CacheStore,
  CacheWriteResult,
} from './cache-store.js';
import type { RequestKey } from './request-key.js';

/**
 * Process-local cache. Values are stored as serialized JSON so callers
 * never share mutable references with the store.
 */
export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, string>();

  private static id(key: RequestKey): string {
    return `${key.family}/${key.hash}`;
  }

  get size(): number {
    return this.entries.size;
  }

  async load(key: RequestKey): Promise<CacheLookup> {
    const raw = this.entries.get(MemoryCacheStore.id(key));
    if (raw === undefined) {
      return { status: 'miss' };
    }

    try {
      const value: JsonValue = JSON.parse(raw);
      return { status: 'hit', value };
    } catch (error) {
      return { status: 'error', error: toError(error) };
    }
  }

  async save(key: RequestKey, value: JsonValue): Promise<CacheWriteResult> {
    try {
      this.entries.set(MemoryCacheStore.id(key), JSON.stringify(value));
      return { status: 'stored' };
    } catch (error) {
      return { status: 'error', error: toError(error) };
    }
  }

  async delete(key: RequestKey): Promise<void> {
    this.entries.delete(MemoryCacheStore.id(key));
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }
}
