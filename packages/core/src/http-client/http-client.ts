import {
  OpenDotaApiError,
  OpenDotaNotFoundError,
  OpenDotaRateLimitError,
  OpenDotaTransportError,
  toError,
} from '../errors/index.js';
import { createLogger, type Logger } from '../logging/index.js';
import { IntervalRateLimiter, type Clock } from '../rate-limit/index.js';
import {
  keyFor,
  joinUrl,
  normalizeParams,
  type CacheStore,
  type RequestKey,
} from '../stores/index.js';
import type {
  AuthMethod,
  HttpClientContract,
  HttpMethod,
  JsonValue,
  QueryParams,
  RequestOptions,
} from '../types/index.js';

export const DEFAULT_MIN_INTERVAL_MS = 3000;
export const DEFAULT_TIMEOUT_MS = 30000;

export interface HttpClientOptions {
  /**
   * Base URL every request path is resolved against
   */
  baseUrl: string;
  /**
   * Elevated-access credential. When present, local pacing is skipped.
   */
  apiKey?: string;
  /**
   * Where the credential goes: an `Authorization: Bearer` header or an
   * `api_key` query parameter. Default: `'header'`
   */
  authMethod?: AuthMethod;
  /**
   * Minimum spacing between network calls in milliseconds when no API key
   * is configured. Default: 3000
   */
  minIntervalMs?: number;
  /**
   * Deadline for one network call, body included, in milliseconds.
   * Default: 30000
   */
  timeoutMs?: number;
  /**
   * Response cache. Without one every call reaches the network.
   */
  cache?: CacheStore;
  logger?: Logger;
  /**
   * Clock used for pacing; injectable for tests
   */
  clock?: Clock;
  /**
   * Transport implementation. Default: the global `fetch`
   */
  fetch?: typeof fetch;
}

interface RawResponse {
  status: number;
  headers: Headers;
  text: string;
}

function abortError(message: string): Error {
  const err = new Error(message);
  err.name = 'AbortError';
  return err;
}

/**
 * Parse a `Retry-After` value given either in seconds or as an HTTP date.
 */
function parseRetryAfterMs(value: string | null): number | undefined {
  if (!value) {
    return undefined;
  }

  const numeric = Number.parseInt(value.trim(), 10);
  if (Number.isFinite(numeric) && numeric >= 0) {
    return numeric * 1000;
  }

  const dateMs = Date.parse(value);
  if (!Number.isFinite(dateMs)) {
    return undefined;
  }

  return Math.max(0, dateMs - Date.now());
}

export class HttpClient implements HttpClientContract {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly authMethod: AuthMethod;
  private readonly timeoutMs: number;
  private readonly cache: CacheStore | undefined;
  private readonly logger: Logger;
  private readonly rateLimiter: IntervalRateLimiter;
  private readonly transport: typeof fetch;
  private session: AbortController | undefined;

  constructor(options: HttpClientOptions) {
    this.baseUrl = options.baseUrl;
    this.apiKey = options.apiKey || undefined;
    this.authMethod = options.authMethod ?? 'header';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.cache = options.cache;
    this.logger = options.logger ?? createLogger();
    this.transport = options.fetch ?? fetch;
    this.rateLimiter = new IntervalRateLimiter({
      minIntervalMs: options.minIntervalMs ?? DEFAULT_MIN_INTERVAL_MS,
      clock: options.clock,
    });
  }

  /**
   * Whether calls are paced: only when no API key is set and the interval is
   * positive.
   */
  get isRateLimited(): boolean {
    return !this.apiKey && this.rateLimiter.minIntervalMs > 0;
  }

  /**
   * Open the transport session if none is active. Called lazily by every
   * request; calling it up front is optional.
   */
  open(): AbortSignal {
    if (!this.session) {
      this.session = new AbortController();
    }
    return this.session.signal;
  }

  async close(): Promise<void> {
    if (this.session) {
      this.session.abort(abortError('Client closed'));
      this.session = undefined;
    }
  }

  async get(
    path: string,
    params?: QueryParams,
    options?: RequestOptions,
  ): Promise<JsonValue> {
    return this.request('GET', path, params, options);
  }

  async request(
    method: HttpMethod,
    path: string,
    params: QueryParams = {},
    { useCache = true, force = false }: RequestOptions = {},
  ): Promise<JsonValue> {
    const url = joinUrl(this.baseUrl, path);

    // 1. Cache — only GET responses are ever read or written
    let cacheKey: RequestKey | undefined;
    if (this.cache && useCache && method === 'GET') {
      cacheKey = keyFor(this.baseUrl, path, params);

      if (!force) {
        const cached = await this.lookup(cacheKey);
        if (cached !== undefined) {
          this.logger.debug({ url, hash: cacheKey.hash }, 'cache hit');
          return cached;
        }
        this.logger.debug({ url, hash: cacheKey.hash }, 'cache miss');
      }
    }

    // 2. Rate limiting — the marker moves only around real network calls
    if (this.isRateLimited) {
      const waitedMs = await this.rateLimiter.gate();
      if (waitedMs > 0) {
        this.logger.debug({ url, waitedMs }, 'rate limit wait');
      }
    }

    // 3. Credential and query string
    const requestUrl = new URL(url);
    for (const [key, value] of normalizeParams(params)) {
      const values = Array.isArray(value) ? value : [value];
      for (const item of values) {
        requestUrl.searchParams.append(key, String(item));
      }
    }

    const headers = new Headers({ Accept: 'application/json' });
    if (this.apiKey) {
      if (this.authMethod === 'header') {
        headers.set('Authorization', `Bearer ${this.apiKey}`);
      } else {
        requestUrl.searchParams.append('api_key', this.apiKey);
      }
    }

    // 4. Execute the actual HTTP request
    this.logger.debug({ method, url }, 'request');
    const response = await this.send(method, requestUrl, headers);

    // 5. Classify the status
    const data = this.classify(response);

    // 6. Cache the result
    if (cacheKey) {
      await this.store(cacheKey, data);
    }

    return data;
  }

  private async lookup(key: RequestKey): Promise<JsonValue | undefined> {
    if (!this.cache) {
      return undefined;
    }

    const result = await this.cache.load(key);
    switch (result.status) {
      case 'hit':
        return result.value;
      case 'miss':
        return undefined;
      case 'error':
        this.logger.warn(
          { err: result.error, family: key.family, hash: key.hash },
          'unreadable cache entry, refetching',
        );
        return undefined;
    }
  }

  private async store(key: RequestKey, value: JsonValue): Promise<void> {
    if (!this.cache) {
      return;
    }

    const result = await this.cache.save(key, value);
    if (result.status === 'error') {
      this.logger.warn(
        { err: result.error, family: key.family, hash: key.hash },
        'failed to write cache entry',
      );
    }
  }

  private async send(
    method: HttpMethod,
    url: URL,
    headers: Headers,
  ): Promise<RawResponse> {
    const session = this.open();
    const transport = this.transport;
    const target = `${url.origin}${url.pathname}`;
    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onSessionAbort = () => controller.abort(session.reason);
    session.addEventListener('abort', onSessionAbort, { once: true });

    try {
      const response = await transport(url, {
        method,
        headers,
        signal: controller.signal,
      });
      const text = await response.text();
      return { status: response.status, headers: response.headers, text };
    } catch (error) {
      if (timedOut) {
        throw new OpenDotaTransportError(
          `Request to ${target} timed out after ${this.timeoutMs}ms`,
          target,
          true,
          { cause: error },
        );
      }

      // Allow callers to detect aborts distinctly – do not wrap AbortError.
      if (error instanceof Error && error.name === 'AbortError') {
        throw error;
      }

      throw new OpenDotaTransportError(
        `Request to ${target} failed: ${toError(error).message}`,
        target,
        false,
        { cause: error },
      );
    } finally {
      clearTimeout(timer);
      session.removeEventListener('abort', onSessionAbort);
    }
  }

  private classify(response: RawResponse): JsonValue {
    const { status, headers, text } = response;

    switch (status) {
      case 200:
        try {
          const data: JsonValue = JSON.parse(text);
          return data;
        } catch (error) {
          throw new OpenDotaApiError(
            `Invalid JSON in response: ${toError(error).message}`,
            status,
            text,
          );
        }
      case 404:
        throw new OpenDotaNotFoundError('Resource not found', text);
      case 429:
        throw new OpenDotaRateLimitError(
          'Rate limit exceeded',
          text,
          parseRetryAfterMs(headers.get('retry-after')),
        );
      default:
        throw new OpenDotaApiError(`API request failed: ${text}`, status, text);
    }
  }
}
