import type { BaseStats, EffectiveParams, Side, StyleEffect } from './types.js';
import { clamp } from './utils.js';

export function foldMultipliers(base: number, multipliers: readonly number[]): number {
  return multipliers.reduce((value, mult) => value * mult, base);
}

export function effectiveParamsFor(self: StyleEffect, opponent: StyleEffect, stats: BaseStats): EffectiveParams {
  const hitChance = foldMultipliers(stats.hitChance, [self.selfHitMult, opponent.opponentHitMult]);
  const critRate = foldMultipliers(stats.critRate, [self.selfCritMult]);
  return {
    hitChance: clamp(hitChance, 0, 1),
    critRate: clamp(critRate, 0, 1),
    swingCap: Math.max(1, stats.rollCap + self.selfRollCapDelta)
  };
}

/**
 * Effective roll parameters for both sides of a round. Style effects
 * multiply the base stats; they never add to them.
 */
export function resolveModifiers(
  styles: Record<Side, StyleEffect>,
  stats: Record<Side, BaseStats>
): Record<Side, EffectiveParams> {
  return {
    A: effectiveParamsFor(styles.A, styles.B, stats.A),
    B: effectiveParamsFor(styles.B, styles.A, stats.B)
  };
}
