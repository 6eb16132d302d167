import { z } from 'zod';

export const PlayerProfileSchema = z.object({
  profile: z
    .object({
      account_id: z.number(),
      personaname: z.string().nullish(),
      name: z.string().nullish(),
      plus: z.boolean().nullish(),
      cheese: z.number().nullish(),
      steamid: z.string().nullish(),
      avatar: z.string().nullish(),
      avatarmedium: z.string().nullish(),
      avatarfull: z.string().nullish(),
      profileurl: z.string().nullish(),
      last_login: z.string().nullish(),
      loccountrycode: z.string().nullish(),
    })
    .nullish(),
  rank_tier: z.number().nullish(),
  leaderboard_rank: z.number().nullish(),
});

export type PlayerProfile = z.infer<typeof PlayerProfileSchema>;

export const PlayerMatchSchema = z.object({
  match_id: z.number(),
  player_slot: z.number().nullish(),
  radiant_win: z.boolean().nullish(),
  duration: z.number(),
  game_mode: z.number(),
  lobby_type: z.number(),
  hero_id: z.number(),
  start_time: z.number(),
  version: z.number().nullish(),
  kills: z.number(),
  deaths: z.number(),
  assists: z.number(),
  average_rank: z.number().nullish(),
  leaver_status: z.number().nullish(),
  party_size: z.number().nullish(),
});

export type PlayerMatch = z.infer<typeof PlayerMatchSchema>;
