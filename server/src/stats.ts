import type { BaseStats } from './types.js';
import { clamp } from './utils.js';

export const RATING_DEFENSE_MULTIPLIER = 2;
export const RATING_MIN_HIT_CHANCE = 0.1;
export const RATING_MAX_HIT_CHANCE = 0.9;
export const RATING_CRIT_SHARE = 0.15;

/** Source of a participant's base combat stats for one pairing. */
export interface StatsProvider {
  baseStats(participantId: string, opponentId: string): BaseStats;
}

export class FixedStatsProvider implements StatsProvider {
  private readonly overrides = new Map<string, Partial<BaseStats>>();

  constructor(private readonly defaults: BaseStats) {}

  set(participantId: string, stats: Partial<BaseStats>): this {
    this.overrides.set(participantId, { ...this.overrides.get(participantId), ...stats });
    return this;
  }

  baseStats(participantId: string, _opponentId: string): BaseStats {
    return { ...this.defaults, ...this.overrides.get(participantId) };
  }
}

export interface CombatRating {
  attack: number;
  defense: number;
}

export function statsFromRatings(self: CombatRating, opponent: CombatRating, rollCap: number): BaseStats {
  // +1 keeps a zero rating off the divisor.
  const raw = (self.attack + 1) / ((opponent.defense + 1) * RATING_DEFENSE_MULTIPLIER);
  const hitChance = clamp(raw, RATING_MIN_HIT_CHANCE, RATING_MAX_HIT_CHANCE);
  return { hitChance, critRate: hitChance * RATING_CRIT_SHARE, rollCap };
}

export class RatingStatsProvider implements StatsProvider {
  constructor(
    private readonly ratings: ReadonlyMap<string, CombatRating>,
    private readonly rollCap: number
  ) {}

  baseStats(participantId: string, opponentId: string): BaseStats {
    const unrated: CombatRating = { attack: 0, defense: 0 };
    return statsFromRatings(
      this.ratings.get(participantId) ?? unrated,
      this.ratings.get(opponentId) ?? unrated,
      this.rollCap
    );
  }
}
