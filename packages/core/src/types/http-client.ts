import type { JsonValue, QueryParams } from './json.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type AuthMethod = 'header' | 'query';

export interface RequestOptions {
  /**
   * Read and write the cache store. Only `GET` requests are ever cached.
   * Default: `true`
   */
  useCache?: boolean;
  /**
   * Skip the cache lookup and always reach the network; a successful
   * response overwrites the stored entry. Default: `false`
   */
  force?: boolean;
}

export interface HttpClientContract {
  /**
   * Perform a request against the configured base URL.
   *
   * @param path    Endpoint relative to the base URL, e.g. `matches/123`
   * @param params  Query parameters
   */
  request(
    method: HttpMethod,
    path: string,
    params?: QueryParams,
    options?: RequestOptions,
  ): Promise<JsonValue>;

  get(
    path: string,
    params?: QueryParams,
    options?: RequestOptions,
  ): Promise<JsonValue>;

  /**
   * Abort in-flight calls and release the transport session.
   */
  close(): Promise<void>;
}
