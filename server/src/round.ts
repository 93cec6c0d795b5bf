import { InvariantViolation } from './errors.js';
import { swingLabel, type RandomSource } from './fair.js';
import { resolveModifiers } from './modifiers.js';
import { defaultPushCurve, type PushCurve } from './push.js';
import { swingOnce } from './rolls.js';
import { scoreRound } from './scoring.js';
import type { StyleCatalog } from './styles.js';
import {
  SIDES,
  type ActionResult,
  type BaseStats,
  type EffectiveParams,
  type LockStyleResponse,
  type ParticipantView,
  type RejectCode,
  type RoundOutcome,
  type RoundPhase,
  type RoundStateView,
  type Side,
  type StopResponse,
  type StyleEffect,
  type StyleId,
  type SwingResponse,
  type Tier
} from './types.js';
import { opponentOf } from './utils.js';

export interface RoundInit {
  matchId: string;
  roundNo: number;
  participants: Record<Side, string>;
  stats: Record<Side, BaseStats>;
  catalog: StyleCatalog;
  random: RandomSource;
  startedAt: number;
  styleLockMs: number;
  swingPhaseMs: number;
  pushCurve?: PushCurve;
}

interface SideState {
  style?: StyleEffect;
  styleForced: boolean;
  params?: EffectiveParams;
  swingsUsed: number;
  currentRoll?: Tier;
  bestOutcome?: Tier;
  submitted: boolean;
  submitForced: boolean;
}

export type RoundTransition =
  | { kind: 'swing_started'; at: number; forcedStyles: Side[] }
  | { kind: 'resolved'; at: number; forcedSubmits: Side[]; outcome: RoundOutcome }
  | { kind: 'aborted'; reason: string };

function reject(error: RejectCode): { ok: false; error: RejectCode } {
  return { ok: false, error };
}

/**
 * One round of a duel: style_select -> swing -> resolved.
 *
 * Every mutating call takes the time the action was received. Deadlines
 * that fall due at or before that time are applied first, so the outcome
 * depends only on timestamps and arrival order. Callers must serialize
 * access; the match owning the round does that through its queue.
 */
export class DuelRound {
  readonly matchId: string;
  readonly roundNo: number;
  readonly participants: Record<Side, string>;
  readonly startedAt: number;
  readonly styleDeadline: number;

  private phaseValue: RoundPhase = 'style_select';
  private swingDeadlineValue?: number;
  private outcomeValue?: RoundOutcome;
  private pending: RoundTransition[] = [];
  private readonly sides: Record<Side, SideState>;
  private readonly stats: Record<Side, BaseStats>;
  private readonly catalog: StyleCatalog;
  private readonly random: RandomSource;
  private readonly swingPhaseMs: number;
  private readonly pushCurve: PushCurve;

  constructor(init: RoundInit) {
    this.matchId = init.matchId;
    this.roundNo = init.roundNo;
    this.participants = { ...init.participants };
    this.stats = { A: { ...init.stats.A }, B: { ...init.stats.B } };
    this.catalog = init.catalog;
    this.random = init.random;
    this.startedAt = init.startedAt;
    this.styleDeadline = init.startedAt + init.styleLockMs;
    this.swingPhaseMs = init.swingPhaseMs;
    this.pushCurve = init.pushCurve ?? defaultPushCurve;
    this.sides = { A: this.freshSide(), B: this.freshSide() };
  }

  get phase(): RoundPhase {
    return this.phaseValue;
  }

  get swingDeadline(): number | undefined {
    return this.swingDeadlineValue;
  }

  get outcome(): RoundOutcome | undefined {
    return this.outcomeValue;
  }

  isTerminal(): boolean {
    return this.phaseValue === 'resolved' || this.phaseValue === 'aborted';
  }

  nextDeadline(): number | undefined {
    if (this.phaseValue === 'style_select') return this.styleDeadline;
    if (this.phaseValue === 'swing') return this.swingDeadlineValue;
    return undefined;
  }

  /** Transitions since the last call, oldest first. */
  drainTransitions(): RoundTransition[] {
    const drained = this.pending;
    this.pending = [];
    return drained;
  }

  /**
   * Applies every deadline due at `at`. Safe to call repeatedly.
   * With `passedOnly`, a deadline equal to `at` is left for its own message.
   */
  advance(at: number, passedOnly = false): void {
    const due = (deadline: number): boolean => (passedOnly ? at > deadline : at >= deadline);
    if (this.phaseValue === 'style_select' && due(this.styleDeadline)) {
      const forcedStyles: Side[] = [];
      for (const side of SIDES) {
        const state = this.sides[side];
        if (!state.style) {
          state.style = this.catalog.defaultStyle;
          state.styleForced = true;
          forcedStyles.push(side);
        }
      }
      this.enterSwing(this.styleDeadline, forcedStyles);
    }

    const swingDeadline = this.swingDeadlineValue;
    if (this.phaseValue === 'swing' && swingDeadline !== undefined && due(swingDeadline)) {
      const forcedSubmits: Side[] = [];
      for (const side of SIDES) {
        const state = this.sides[side];
        if (!state.submitted) {
          state.bestOutcome = state.currentRoll ?? 'miss';
          state.submitted = true;
          state.submitForced = true;
          forcedSubmits.push(side);
        }
      }
      this.resolve(swingDeadline, forcedSubmits);
    }
  }

  lockStyle(side: Side, styleId: StyleId, at: number): ActionResult<LockStyleResponse> {
    const closed = this.gate(at, 'style_select');
    if (closed) return reject(closed);

    const state = this.sides[side];
    if (state.style) return reject('already_locked');
    const style = this.catalog.lookup(styleId);
    if (!style) return reject('unknown_style');

    state.style = style;
    const opponentLocked = this.sides[opponentOf(side)].style !== undefined;
    if (opponentLocked) {
      this.enterSwing(at, []);
    }
    return { ok: true, lockedStyle: style.id, opponentLocked };
  }

  swing(side: Side, at: number): ActionResult<SwingResponse> {
    const closed = this.gate(at, 'swing');
    if (closed) return reject(closed);

    const state = this.sides[side];
    const params = this.paramsOf(side);
    if (state.submitted) return reject('already_submitted');
    if (state.swingsUsed >= params.swingCap) return reject('swing_cap_reached');

    const swingNo = state.swingsUsed + 1;
    // Draw before touching state.
    const outcome = swingOnce(params, this.random, swingLabel(this.roundNo, side, swingNo));
    state.swingsUsed = swingNo;
    state.currentRoll = outcome;

    return {
      ok: true,
      outcome,
      swingsUsed: swingNo,
      swingsRemaining: params.swingCap - swingNo,
      bestOutcomeSoFar: outcome
    };
  }

  stop(side: Side, at: number): ActionResult<StopResponse> {
    const closed = this.gate(at, 'swing');
    if (closed) return reject(closed);

    const state = this.sides[side];
    if (state.submitted) return reject('already_submitted');
    if (state.swingsUsed === 0 || state.currentRoll === undefined) return reject('no_swings_taken');

    state.bestOutcome = state.currentRoll;
    state.submitted = true;

    if (!this.sides[opponentOf(side)].submitted) {
      return { ok: true, bestOutcome: state.bestOutcome, roundResolved: false };
    }
    const outcome = this.resolve(at, []);
    return { ok: true, bestOutcome: state.bestOutcome, roundResolved: true, outcome };
  }

  /** Moves an unresolved round to the terminal aborted phase. */
  abort(reason: string): void {
    if (this.isTerminal()) return;
    this.phaseValue = 'aborted';
    this.swingDeadlineValue = undefined;
    this.pending.push({ kind: 'aborted', reason });
  }

  effectiveParams(side: Side): EffectiveParams | undefined {
    const params = this.sides[side].params;
    return params ? { ...params } : undefined;
  }

  view(): RoundStateView {
    const revealed = this.phaseValue === 'resolved';
    const participantView = (side: Side): ParticipantView => {
      const state = this.sides[side];
      const view: ParticipantView = {
        participantId: this.participants[side],
        styleLocked: state.style !== undefined,
        swingsUsed: state.swingsUsed,
        submitted: state.submitted,
        forced: state.styleForced || state.submitForced
      };
      if (revealed) {
        view.style = state.style?.id;
        view.swingCap = state.params?.swingCap;
        view.bestOutcome = state.bestOutcome;
      }
      return view;
    };

    const view: RoundStateView = {
      matchId: this.matchId,
      roundNo: this.roundNo,
      phase: this.phaseValue,
      deadlines: { styleLock: this.styleDeadline, swing: this.swingDeadlineValue },
      participants: { A: participantView('A'), B: participantView('B') }
    };
    if (this.outcomeValue) {
      view.outcome = this.outcomeValue;
    }
    return view;
  }

  private freshSide(): SideState {
    return { styleForced: false, swingsUsed: 0, submitted: false, submitForced: false };
  }

  private gate(at: number, expected: RoundPhase): RejectCode | null {
    this.advance(at, true);
    if (this.phaseValue === 'resolved') return 'round_resolved';
    if (this.phaseValue === 'aborted') return 'round_aborted';
    if (this.phaseValue !== expected) return 'wrong_phase';
    return null;
  }

  private lockedStyles(): Record<Side, StyleEffect> {
    const { A, B } = this.sides;
    if (!A.style || !B.style) {
      throw new InvariantViolation(`Round ${this.matchId}#${this.roundNo} left style_select without both styles`);
    }
    return { A: A.style, B: B.style };
  }

  private paramsOf(side: Side): EffectiveParams {
    const params = this.sides[side].params;
    if (!params) {
      throw new InvariantViolation(`Round ${this.matchId}#${this.roundNo} has no effective params for ${side}`);
    }
    return params;
  }

  private enterSwing(at: number, forcedStyles: Side[]): void {
    const params = resolveModifiers(this.lockedStyles(), this.stats);
    this.sides.A.params = params.A;
    this.sides.B.params = params.B;
    this.phaseValue = 'swing';
    this.swingDeadlineValue = at + this.swingPhaseMs;
    this.pending.push({ kind: 'swing_started', at, forcedStyles });
  }

  private resolve(at: number, forcedSubmits: Side[]): RoundOutcome {
    if (this.outcomeValue) {
      throw new InvariantViolation(`Round ${this.matchId}#${this.roundNo} resolved twice`);
    }
    const { A, B } = this.sides;
    if (!A.submitted || !B.submitted) {
      throw new InvariantViolation(`Round ${this.matchId}#${this.roundNo} resolved before both sides submitted`);
    }

    const styles = this.lockedStyles();
    const tiers: Record<Side, Tier> = { A: A.bestOutcome ?? 'miss', B: B.bestOutcome ?? 'miss' };
    const score = scoreRound({ tiers, styles }, this.pushCurve);

    const outcome: RoundOutcome = Object.freeze({
      matchId: this.matchId,
      roundNo: this.roundNo,
      winner: score.winner,
      winnerId: score.winner ? this.participants[score.winner] : null,
      tierA: tiers.A,
      tierB: tiers.B,
      styleA: styles.A.id,
      styleB: styles.B.id,
      push: score.push,
      tieBreakUsed: score.tieBreakUsed
    });

    this.outcomeValue = outcome;
    this.phaseValue = 'resolved';
    this.pending.push({ kind: 'resolved', at, forcedSubmits, outcome });
    return outcome;
  }
}
