export {
  OpenDota,
  createOpenDota,
  withOpenDota,
  type MatchPageQuery,
  type PlayerMatchesQuery,
  type PublicMatchesQuery,
} from './opendota.js';
export {
  RAW_DECODERS,
  TYPED_DECODERS,
  type RawRecord,
  type RawRecords,
  type ResourceDecoders,
  type ResourceRecords,
  type TypedRecords,
} from './decoders.js';
export * from './config/index.js';
export * from './models/index.js';

export {
  OpenDotaApiError,
  OpenDotaConfigError,
  OpenDotaNotFoundError,
  OpenDotaRateLimitError,
  OpenDotaTransportError,
  MemoryCacheStore,
  createLogger,
} from '@dota-stats/core';
export type {
  CacheStore,
  JsonValue,
  QueryParams,
  RequestOptions,
} from '@dota-stats/core';
export { FileSystemCacheStore } from '@dota-stats/store-filesystem';
