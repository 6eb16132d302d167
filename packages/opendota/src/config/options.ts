import { homedir } from 'os';
import { join } from 'path';
import {
  OpenDotaConfigError,
  type CacheStore,
  type Clock,
  type Logger,
} from '@dota-stats/core';
import { z } from 'zod';
import { resolveFantasy, type FantasyWeights } from './fantasy.js';

export const OPENDOTA_API_URL = 'https://api.opendota.com/api';

export const API_KEY_ENV = 'OPENDOTA_API_KEY';

/** Largest delay Node timers honour, in whole seconds */
export const MAX_TIMER_SECONDS = 2_147_483;

export const OpenDotaSettingsSchema = z.object({
  /** Directory for stored responses. Default: `~/dota2` */
  dataDir: z.string().min(1).optional(),
  /** API key; falls back to the `OPENDOTA_API_KEY` environment variable */
  apiKey: z.string().optional(),
  /** Seconds between two network calls; ignored when an API key is set */
  delay: z
    .number()
    .nonnegative()
    .finite()
    .max(MAX_TIMER_SECONDS)
    .default(3),
  /** Overrides for the fantasy weight table */
  fantasy: z.record(z.number()).optional(),
  apiUrl: z.string().url().default(OPENDOTA_API_URL),
  /** Request timeout in seconds */
  timeout: z
    .number()
    .positive()
    .finite()
    .max(MAX_TIMER_SECONDS)
    .default(30),
  format: z.enum(['typed', 'raw']).default('typed'),
  authMethod: z.enum(['header', 'query']).default('header'),
});

export type OpenDotaSettings = z.input<typeof OpenDotaSettingsSchema>;

export type ResponseFormat = z.output<
  typeof OpenDotaSettingsSchema
>['format'];

export interface OpenDotaOptions extends OpenDotaSettings {
  /**
   * Response cache. Default: a file system store under `<dataDir>/cache`;
   * `false` disables caching.
   */
  cache?: CacheStore | false;
  logger?: Logger;
  /** Transport implementation. Default: the global `fetch` */
  fetch?: typeof fetch;
  /** Clock used for pacing */
  clock?: Clock;
}

export interface OpenDotaConfig {
  readonly dataDir: string;
  readonly cacheDir: string;
  readonly apiKey: string | undefined;
  readonly delay: number;
  readonly fantasy: FantasyWeights;
  readonly apiUrl: string;
  readonly timeout: number;
  readonly format: ResponseFormat;
  readonly authMethod: 'header' | 'query';
}

/**
 * Validate constructor options and fill in defaults.
 *
 * @throws {OpenDotaConfigError} naming the first invalid option
 */
export function resolveConfig(
  settings: OpenDotaSettings = {},
): OpenDotaConfig {
  const parsed = OpenDotaSettingsSchema.safeParse(settings);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const path = issue?.path.join('.') || 'options';
    throw new OpenDotaConfigError(
      `Invalid option "${path}": ${issue?.message ?? 'invalid value'}`,
    );
  }

  const { dataDir, apiKey, fantasy, ...rest } = parsed.data;
  const resolvedDataDir = dataDir ?? join(homedir(), 'dota2');

  return Object.freeze({
    ...rest,
    dataDir: resolvedDataDir,
    cacheDir: join(resolvedDataDir, 'cache'),
    apiKey: apiKey || process.env[API_KEY_ENV] || undefined,
    fantasy: resolveFantasy(fantasy),
  });
}
