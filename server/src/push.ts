import { Decimal } from 'decimal.js';

import type { Side, Tier } from './types.js';

const PushDecimal = Decimal.clone({ precision: 40, rounding: Decimal.ROUND_HALF_UP });

export const PUSH_DECIMALS = 2;
export const PUSH_BASE = 10;
export const CRITICAL_PUSH_BONUS = 1.5;
export const MARGIN_PUSH_BONUS = 0.25;

export const BAR_START = 50;
export const BAR_MIN = 0;
export const BAR_MAX = 100;

/** Base push before style multipliers. Must grow with the tier margin. */
export type PushCurve = (margin: number, winnerTier: Tier) => number;

const TIER_PUSH: Record<Tier, number> = {
  miss: 0,
  hit: PUSH_BASE,
  critical: PUSH_BASE * CRITICAL_PUSH_BONUS
};

export const defaultPushCurve: PushCurve = (margin, winnerTier) => {
  const extra = Math.max(0, margin - 1) * MARGIN_PUSH_BONUS;
  return new PushDecimal(TIER_PUSH[winnerTier]).mul(1 + extra).toNumber();
};

export function roundPush(value: Decimal.Value): number {
  return new PushDecimal(value).toDecimalPlaces(PUSH_DECIMALS, Decimal.ROUND_HALF_UP).toNumber();
}

export function multiplyPush(base: number, multipliers: readonly number[]): number {
  if (!Number.isFinite(base) || base <= 0) {
    return 0;
  }
  const product = multipliers.reduce((acc, mult) => acc.mul(mult), new PushDecimal(base));
  return roundPush(product);
}

/** Side A pushes the bar toward BAR_MIN, side B toward BAR_MAX. */
export function applyPushToBar(bar: number, side: Side, push: number): number {
  const delta = side === 'A' ? new PushDecimal(push).neg() : new PushDecimal(push);
  const next = Decimal.min(BAR_MAX, Decimal.max(BAR_MIN, new PushDecimal(bar).add(delta)));
  return roundPush(next);
}

export function barWinner(bar: number): Side | null {
  if (bar <= BAR_MIN) return 'A';
  if (bar >= BAR_MAX) return 'B';
  return null;
}

export function barLeader(bar: number): Side | null {
  if (bar < BAR_START) return 'A';
  if (bar > BAR_START) return 'B';
  return null;
}
