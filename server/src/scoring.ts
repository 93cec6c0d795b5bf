import { defaultPushCurve, multiplyPush, type PushCurve } from './push.js';
import { TIER_RANK, type Side, type StyleEffect, type Tier } from './types.js';
import { opponentOf } from './utils.js';

export interface ScoreInput {
  tiers: Record<Side, Tier>;
  styles: Record<Side, StyleEffect>;
}

export interface ScoreResult {
  winner: Side | null;
  push: number;
  tieBreakUsed: boolean;
}

export function compareTiers(a: Tier, b: Tier): number {
  return TIER_RANK[a] - TIER_RANK[b];
}

/** The side that wins a tied comparison, when exactly one side fights with a tiebreak style. */
export function feintTiebreak(styles: Record<Side, StyleEffect>): Side | null {
  if (styles.A.feintTiebreak === styles.B.feintTiebreak) return null;
  return styles.A.feintTiebreak ? 'A' : 'B';
}

export function scoreRound(input: ScoreInput, curve: PushCurve = defaultPushCurve): ScoreResult {
  const { tiers, styles } = input;
  const diff = compareTiers(tiers.A, tiers.B);

  let winner: Side | null;
  let tieBreakUsed = false;
  if (diff > 0) {
    winner = 'A';
  } else if (diff < 0) {
    winner = 'B';
  } else {
    winner = feintTiebreak(styles);
    tieBreakUsed = winner !== null;
  }

  if (!winner) {
    return { winner: null, push: 0, tieBreakUsed: false };
  }

  const loser = opponentOf(winner);
  const basePush = curve(Math.abs(diff), tiers[winner]);
  // Winner's own multiplier and the loser's amplifier both apply.
  const push = multiplyPush(basePush, [styles[winner].winPushMult, styles[loser].loseOpponentPushMult]);
  return { winner, push, tieBreakUsed };
}
