export { FileSystemCacheStore } from './filesystem-cache-store.js';

export type { FileSystemCacheStoreOptions } from './filesystem-cache-store.js';

export type {
  CacheStore,
  CacheLookup,
  CacheWriteResult,
  RequestKey,
} from '@dota-stats/core';
