import { OpenDotaConfigError } from '@dota-stats/core';

/**
 * Standard fantasy scoring. Keys ending in `_base` are flat values added to
 * the matching multiplier's score; every other key multiplies a player stat.
 */
export const FANTASY = {
  kills: 0.3,
  deaths: -0.3,
  deaths_base: 3,
  last_hits: 0.003,
  denies: 0.003,
  gold_per_min: 0.002,
  towers_killed: 1,
  roshans_killed: 1,
  teamfight_participation: 3,
  observers_placed: 0.5,
  camps_stacked: 0.5,
  rune_pickups: 0.25,
  firstblood_claimed: 4,
  stuns: 0.05,
} as const satisfies Record<string, number>;

export type FantasyKey = keyof typeof FANTASY;

export type FantasyWeights = Readonly<Record<FantasyKey, number>>;

const FANTASY_KEYS = Object.keys(FANTASY).filter(isFantasyKey);

export function isFantasyKey(key: string): key is FantasyKey {
  return Object.prototype.hasOwnProperty.call(FANTASY, key);
}

/**
 * Apply overrides on top of {@link FANTASY}.
 *
 * @throws {OpenDotaConfigError} when an override names a key outside the table
 */
export function resolveFantasy(
  overrides: Record<string, number> = {},
): FantasyWeights {
  const weights: Record<FantasyKey, number> = { ...FANTASY };

  for (const [key, value] of Object.entries(overrides)) {
    if (!isFantasyKey(key)) {
      throw new OpenDotaConfigError(
        `Invalid fantasy key: ${key}. Must be one of [${FANTASY_KEYS.join(', ')}]`,
      );
    }
    weights[key] = value;
  }

  return Object.freeze(weights);
}

export type FantasyStats = Partial<Record<string, number | null | undefined>>;

/**
 * Score one match player. Stats the record does not carry contribute
 * nothing, base values included.
 */
export function fantasyPoints(
  stats: FantasyStats,
  weights: FantasyWeights = FANTASY,
): number {
  let total = 0;

  for (const key of FANTASY_KEYS) {
    if (key.endsWith('_base')) {
      continue;
    }

    const value = stats[key];
    if (typeof value !== 'number') {
      continue;
    }

    const baseKey = `${key}_base`;
    const base = isFantasyKey(baseKey) ? weights[baseKey] : 0;
    total += base + weights[key] * value;
  }

  return total;
}
