export { HttpClient } from './http-client/http-client.js';
export {
  DEFAULT_MIN_INTERVAL_MS,
  DEFAULT_TIMEOUT_MS,
  type HttpClientOptions,
} from './http-client/http-client.js';

export * from './errors/index.js';
export * from './logging/index.js';
export * from './rate-limit/index.js';
export * from './stores/index.js';
export type * from './types/index.js';
