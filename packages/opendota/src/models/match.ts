import { z } from 'zod';

const count = z.number().nullish();

/**
 * One player's line in a match. Most fields are absent for unparsed
 * matches, so only identity and the basic scoreboard are required.
 */
export const MatchPlayerSchema = z.object({
  match_id: z.number().nullish(),
  player_slot: z.number(),
  account_id: z.number().nullish(),
  personaname: z.string().nullish(),
  hero_id: z.number(),
  isRadiant: z.boolean().nullish(),
  win: z.number().nullish(),
  kills: z.number(),
  deaths: z.number(),
  assists: z.number(),
  last_hits: count,
  denies: count,
  gold_per_min: count,
  xp_per_min: count,
  level: count,
  net_worth: count,
  hero_damage: count,
  tower_damage: count,
  hero_healing: count,
  lane_role: count,
  item_0: count,
  item_1: count,
  item_2: count,
  item_3: count,
  item_4: count,
  item_5: count,
  teamfight_participation: count,
  towers_killed: count,
  roshans_killed: count,
  observers_placed: count,
  camps_stacked: count,
  rune_pickups: count,
  firstblood_claimed: count,
  stuns: count,
});

export type MatchPlayer = z.infer<typeof MatchPlayerSchema>;

export const MatchSchema = z.object({
  match_id: z.number(),
  match_seq_num: z.number().nullish(),
  start_time: z.number(),
  duration: z.number(),
  radiant_win: z.boolean(),
  radiant_score: count,
  dire_score: count,
  game_mode: z.number(),
  lobby_type: z.number(),
  patch: count,
  region: count,
  leagueid: count,
  radiant_team_id: count,
  dire_team_id: count,
  replay_url: z.string().nullish(),
  players: z.array(MatchPlayerSchema).default([]),
});

export type Match = z.infer<typeof MatchSchema>;

export const PublicMatchSchema = z.object({
  match_id: z.number(),
  match_seq_num: count,
  radiant_win: z.boolean(),
  start_time: z.number(),
  duration: z.number(),
  lobby_type: count,
  game_mode: count,
  avg_rank_tier: count,
  num_rank_tier: count,
  cluster: count,
  radiant_team: z.array(z.number()).nullish(),
  dire_team: z.array(z.number()).nullish(),
});

export type PublicMatch = z.infer<typeof PublicMatchSchema>;

export const ProMatchSchema = z.object({
  match_id: z.number(),
  duration: z.number(),
  start_time: z.number(),
  radiant_team_id: count,
  radiant_name: z.string().nullish(),
  dire_team_id: count,
  dire_name: z.string().nullish(),
  leagueid: z.number(),
  league_name: z.string().nullish(),
  series_id: count,
  series_type: count,
  radiant_score: count,
  dire_score: count,
  radiant_win: z.boolean().nullish(),
});

export type ProMatch = z.infer<typeof ProMatchSchema>;

/**
 * Parsed-match listings are passed through untouched beyond the id.
 */
export const ParsedMatchSchema = z
  .object({
    match_id: z.number(),
  })
  .passthrough();

export type ParsedMatch = z.infer<typeof ParsedMatchSchema>;
