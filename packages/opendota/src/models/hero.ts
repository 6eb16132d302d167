import { z } from 'zod';

export const HeroSchema = z.object({
  id: z.number(),
  name: z.string(),
  localized_name: z.string(),
  primary_attr: z.string(),
  attack_type: z.string(),
  roles: z.array(z.string()),
  legs: z.number().nullish(),
});

export type Hero = z.infer<typeof HeroSchema>;

const stat = z.number().nullish();

export const HeroStatsSchema = HeroSchema.extend({
  img: z.string().nullish(),
  icon: z.string().nullish(),
  base_health: stat,
  base_mana: stat,
  base_armor: stat,
  base_attack_min: stat,
  base_attack_max: stat,
  base_str: stat,
  base_agi: stat,
  base_int: stat,
  str_gain: stat,
  agi_gain: stat,
  int_gain: stat,
  attack_range: stat,
  move_speed: stat,
  pro_pick: stat,
  pro_win: stat,
  pro_ban: stat,
  pub_pick: stat,
  pub_win: stat,
  turbo_picks: stat,
  turbo_wins: stat,
});

export type HeroStats = z.infer<typeof HeroStatsSchema>;
