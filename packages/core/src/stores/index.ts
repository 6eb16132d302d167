export type {
  CacheStore,
  CacheLookup,
  CacheWriteResult,
} from './cache-store.js';
export { MemoryCacheStore } from './memory-cache-store.js';
export {
  type RequestKey,
  keyFor,
  hashRequest,
  endpointFamily,
  joinUrl,
  normalizeParams,
} from './request-key.js';
