export {
  MatchSchema,
  MatchPlayerSchema,
  PublicMatchSchema,
  ProMatchSchema,
  ParsedMatchSchema,
  type Match,
  type MatchPlayer,
  type PublicMatch,
  type ProMatch,
  type ParsedMatch,
} from './match.js';
export {
  PlayerProfileSchema,
  PlayerMatchSchema,
  type PlayerProfile,
  type PlayerMatch,
} from './player.js';
export {
  HeroSchema,
  HeroStatsSchema,
  type Hero,
  type HeroStats,
} from './hero.js';
