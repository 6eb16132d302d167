import type { JsonValue } from '@dota-stats/core';
import { z } from 'zod';
import type { ResponseFormat } from './config/index.js';
import {
  HeroSchema,
  HeroStatsSchema,
  MatchSchema,
  PlayerMatchSchema,
  PlayerProfileSchema,
  ProMatchSchema,
  PublicMatchSchema,
  type Hero,
  type HeroStats,
  type Match,
  type PlayerMatch,
  type PlayerProfile,
  type ProMatch,
  type PublicMatch,
} from './models/index.js';

export type RawRecord = Record<string, unknown>;

/**
 * Result type of each accessor, keyed by resource.
 */
export interface ResourceRecords {
  match: unknown;
  publicMatches: unknown;
  proMatches: unknown;
  player: unknown;
  playerMatches: unknown;
  heroes: unknown;
  heroStats: unknown;
}

export interface TypedRecords extends ResourceRecords {
  match: Match;
  publicMatches: Array<PublicMatch>;
  proMatches: Array<ProMatch>;
  player: PlayerProfile;
  playerMatches: Array<PlayerMatch>;
  heroes: Array<Hero>;
  heroStats: Array<HeroStats>;
}

export interface RawRecords extends ResourceRecords {
  match: RawRecord;
  publicMatches: Array<RawRecord>;
  proMatches: Array<RawRecord>;
  player: RawRecord;
  playerMatches: Array<RawRecord>;
  heroes: Array<RawRecord>;
  heroStats: Array<RawRecord>;
}

export type ResourceDecoders<Records extends ResourceRecords> = {
  readonly format: ResponseFormat;
} & {
  readonly [Resource in keyof ResourceRecords]: (
    data: JsonValue,
  ) => Records[Resource];
};

export const TYPED_DECODERS: ResourceDecoders<TypedRecords> = {
  format: 'typed',
  match: (data) => MatchSchema.parse(data),
  publicMatches: (data) => z.array(PublicMatchSchema).parse(data),
  proMatches: (data) => z.array(ProMatchSchema).parse(data),
  player: (data) => PlayerProfileSchema.parse(data),
  playerMatches: (data) => z.array(PlayerMatchSchema).parse(data),
  heroes: (data) => z.array(HeroSchema).parse(data),
  heroStats: (data) => z.array(HeroStatsSchema).parse(data),
};

function toRaw<T extends RawRecord>(record: T): RawRecord {
  return { ...record };
}

/**
 * Same validation as {@link TYPED_DECODERS}, returned as plain records
 * limited to the declared fields.
 */
export const RAW_DECODERS: ResourceDecoders<RawRecords> = {
  format: 'raw',
  match: (data) => toRaw(TYPED_DECODERS.match(data)),
  publicMatches: (data) => TYPED_DECODERS.publicMatches(data).map(toRaw),
  proMatches: (data) => TYPED_DECODERS.proMatches(data).map(toRaw),
  player: (data) => toRaw(TYPED_DECODERS.player(data)),
  playerMatches: (data) => TYPED_DECODERS.playerMatches(data).map(toRaw),
  heroes: (data) => TYPED_DECODERS.heroes(data).map(toRaw),
  heroStats: (data) => TYPED_DECODERS.heroStats(data).map(toRaw),
};
