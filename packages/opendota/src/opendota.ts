import {
  HttpClient,
  createLogger,
  type JsonValue,
  type QueryParams,
  type RequestOptions,
} from '@dota-stats/core';
import { FileSystemCacheStore } from '@dota-stats/store-filesystem';
import { z } from 'zod';
import {
  resolveConfig,
  type FantasyWeights,
  type OpenDotaConfig,
  type OpenDotaOptions,
  type ResponseFormat,
} from './config/index.js';
import {
  RAW_DECODERS,
  TYPED_DECODERS,
  type RawRecords,
  type ResourceDecoders,
  type ResourceRecords,
  type TypedRecords,
} from './decoders.js';
import { ParsedMatchSchema, type ParsedMatch } from './models/index.js';

export interface PublicMatchesQuery {
  /** Matches with average MMR ascending from this value */
  mmrAscending?: number;
  /** Matches with average MMR descending from this value */
  mmrDescending?: number;
  /** Matches with an id lower than this value */
  lessThanMatchId?: number;
}

export interface MatchPageQuery {
  /** Matches with an id lower than this value */
  lessThanMatchId?: number;
}

export interface PlayerMatchesQuery {
  /** Number of matches to return. The API defaults to 20. */
  limit?: number;
  offset?: number;
  /** 0 for losses, 1 for wins */
  win?: number;
  patch?: number;
  gameMode?: number;
  lobbyType?: number;
  region?: number;
  /** Days before now */
  date?: number;
  laneRole?: number;
  heroId?: number;
  /** 0 for Dire, 1 for Radiant */
  isRadiant?: number;
  includedAccountId?: ReadonlyArray<number>;
  excludedAccountId?: ReadonlyArray<number>;
  /** Heroes on the player's team */
  withHeroId?: ReadonlyArray<number>;
  /** Heroes on the opposing team */
  againstHeroId?: ReadonlyArray<number>;
  /** 0 to include non-standard matches */
  significant?: number;
  having?: number;
  sort?: string;
}

/**
 * Client for the OpenDota API.
 *
 * The record type parameter fixes, at compile time, whether accessors return
 * typed records or plain objects; see {@link createOpenDota}.
 */
export class OpenDota<Records extends ResourceRecords = TypedRecords> {
  readonly config: OpenDotaConfig;
  private readonly http: HttpClient;
  private readonly decoders: ResourceDecoders<Records>;

  constructor(
    decoders: ResourceDecoders<Records>,
    options: OpenDotaOptions = {},
  ) {
    const config = resolveConfig({ ...options, format: decoders.format });
    const cache =
      options.cache === false
        ? undefined
        : (options.cache ??
          new FileSystemCacheStore({ directory: config.cacheDir }));

    this.config = config;
    this.decoders = decoders;
    this.http = new HttpClient({
      baseUrl: config.apiUrl,
      apiKey: config.apiKey,
      authMethod: config.authMethod,
      minIntervalMs: config.delay * 1000,
      timeoutMs: config.timeout * 1000,
      cache,
      logger: options.logger ?? createLogger({ name: 'opendota' }),
      clock: options.clock,
      fetch: options.fetch,
    });
  }

  get format(): ResponseFormat {
    return this.decoders.format;
  }

  /**
   * Fantasy weights in effect: the defaults with any overrides applied.
   */
  get fantasy(): FantasyWeights {
    return this.config.fantasy;
  }

  /**
   * Release the underlying transport session, aborting in-flight calls.
   */
  async close(): Promise<void> {
    await this.http.close();
  }

  /**
   * Make a GET request to any endpoint and return the decoded JSON body.
   */
  async get(
    endpoint: string,
    params?: QueryParams,
    options?: RequestOptions,
  ): Promise<JsonValue> {
    return this.http.get(endpoint, params, options);
  }

  // Match methods

  async getMatch(matchId: number): Promise<Records['match']> {
    return this.decoders.match(await this.get(`matches/${matchId}`));
  }

  async getPublicMatches(
    query: PublicMatchesQuery = {},
  ): Promise<Records['publicMatches']> {
    const data = await this.get('publicMatches', {
      mmr_ascending: query.mmrAscending,
      mmr_descending: query.mmrDescending,
      less_than_match_id: query.lessThanMatchId,
    });
    return this.decoders.publicMatches(data);
  }

  async getProMatches(
    query: MatchPageQuery = {},
  ): Promise<Records['proMatches']> {
    const data = await this.get('proMatches', {
      less_than_match_id: query.lessThanMatchId,
    });
    return this.decoders.proMatches(data);
  }

  /**
   * Parsed-match listings have no declared record shape beyond the id, so
   * they come back untyped in either format.
   */
  async getParsedMatches(
    query: MatchPageQuery = {},
  ): Promise<Array<ParsedMatch>> {
    const data = await this.get('parsedMatches', {
      less_than_match_id: query.lessThanMatchId,
    });
    return z.array(ParsedMatchSchema).parse(data);
  }

  // Player methods

  async getPlayer(accountId: number): Promise<Records['player']> {
    return this.decoders.player(await this.get(`players/${accountId}`));
  }

  async getPlayerMatches(
    accountId: number,
    query: PlayerMatchesQuery = {},
  ): Promise<Records['playerMatches']> {
    const data = await this.get(`players/${accountId}/matches`, {
      limit: query.limit,
      offset: query.offset,
      win: query.win,
      patch: query.patch,
      game_mode: query.gameMode,
      lobby_type: query.lobbyType,
      region: query.region,
      date: query.date,
      lane_role: query.laneRole,
      hero_id: query.heroId,
      is_radiant: query.isRadiant,
      included_account_id: query.includedAccountId,
      excluded_account_id: query.excludedAccountId,
      with_hero_id: query.withHeroId,
      against_hero_id: query.againstHeroId,
      significant: query.significant,
      having: query.having,
      sort: query.sort,
    });
    return this.decoders.playerMatches(data);
  }

  // Hero methods

  async getHeroes(): Promise<Records['heroes']> {
    return this.decoders.heroes(await this.get('heroes'));
  }

  async getHeroStats(): Promise<Records['heroStats']> {
    return this.decoders.heroStats(await this.get('heroStats'));
  }
}

/**
 * Create a client. `format: 'raw'` yields plain records instead of typed
 * ones; both pass through the same validation.
 */
export function createOpenDota(
  options: OpenDotaOptions & { format: 'raw' },
): OpenDota<RawRecords>;
export function createOpenDota(
  options?: OpenDotaOptions & { format?: 'typed' },
): OpenDota<TypedRecords>;
export function createOpenDota(
  options: OpenDotaOptions & { format: ResponseFormat },
): OpenDota<TypedRecords> | OpenDota<RawRecords>;
export function createOpenDota(
  options: OpenDotaOptions = {},
): OpenDota<TypedRecords> | OpenDota<RawRecords> {
  return options.format === 'raw'
    ? new OpenDota(RAW_DECODERS, options)
    : new OpenDota(TYPED_DECODERS, options);
}

/**
 * Run `fn` with `client` and close the client afterwards, whether `fn`
 * resolves or throws.
 */
export async function withOpenDota<Records extends ResourceRecords, Result>(
  client: OpenDota<Records>,
  fn: (client: OpenDota<Records>) => Promise<Result>,
): Promise<Result> {
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
