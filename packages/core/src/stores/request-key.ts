import { createHash } from 'crypto';
import type { QueryParams, QueryScalar } from '../types/index.js';

export interface RequestKey {
  /** SHA-256 hex digest of the URL and its sorted parameters */
  hash: string;
  /** Endpoint family used to group entries, e.g. `players_42` */
  family: string;
}

type ParamEntry = [string, QueryScalar | ReadonlyArray<QueryScalar>];

/**
 * Drop undefined values and sort the remaining pairs by key. Array values
 * keep their order: `[1, 2]` and `[2, 1]` are different requests.
 */
export function normalizeParams(params: QueryParams = {}): Array<ParamEntry> {
  const entries: Array<ParamEntry> = [];

  for (const key of Object.keys(params).sort()) {
    const value = params[key];
    if (value === undefined) {
      continue;
    }
    entries.push([key, Array.isArray(value) ? [...value] : value]);
  }

  return entries;
}

export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

export function hashRequest(url: string, params: QueryParams = {}): string {
  const entries = normalizeParams(params);
  const identity =
    entries.length > 0 ? `${url}${JSON.stringify(entries)}` : url;

  return createHash('sha256').update(identity).digest('hex');
}

/**
 * Directory name grouping cached calls by the first two path segments:
 * `players/42/matches` becomes `players_42`, `heroes` stays `heroes`.
 * Dot segments become underscores so the name never leaves the cache root.
 */
export function endpointFamily(path: string): string {
  const segments = path.split('/').filter(Boolean);
  if (segments.length === 0) {
    return 'root';
  }
  return segments
    .slice(0, 2)
    .map((segment) =>
      segment === '.' || segment === '..'
        ? '_'.repeat(segment.length)
        : segment,
    )
    .join('_');
}

export function keyFor(
  baseUrl: string,
  path: string,
  params: QueryParams = {},
): RequestKey {
  return {
    hash: hashRequest(joinUrl(baseUrl, path), params),
    family: endpointFamily(path),
  };
}
