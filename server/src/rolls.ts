import { RandomSourceError } from './errors.js';
import type { RandomSource } from './fair.js';
import type { EffectiveParams, Tier } from './types.js';

// Crit band first, then the rest of the hit chance, then miss.
export function rollOutcome(params: EffectiveParams, u: number): Tier {
  const critBand = params.critRate;
  const hitBand = Math.max(0, params.hitChance - params.critRate);
  if (u < critBand) return 'critical';
  if (u < critBand + hitBand) return 'hit';
  return 'miss';
}

export function drawUniform(random: RandomSource, label: string): number {
  let value: number;
  try {
    value = random.draw(label);
  } catch (err) {
    throw new RandomSourceError(`Random source failed for draw ${label}`, { cause: err });
  }
  if (!Number.isFinite(value) || value < 0 || value >= 1) {
    throw new RandomSourceError(`Random source returned ${value} for draw ${label}`);
  }
  return value;
}

export function swingOnce(params: EffectiveParams, random: RandomSource, label: string): Tier {
  return rollOutcome(params, drawUniform(random, label));
}
