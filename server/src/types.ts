export type Side = 'A' | 'B';
export const SIDES: readonly Side[] = ['A', 'B'];

export type Tier = 'miss' | 'hit' | 'critical';
export const TIER_RANK: Record<Tier, number> = { miss: 0, hit: 1, critical: 2 };

export type RoundPhase = 'style_select' | 'swing' | 'resolved' | 'aborted';
export type MatchStatus = 'active' | 'finished' | 'faulted';

export type StyleId = string;

export interface StyleEffect {
  id: StyleId;
  label: string;
  selfHitMult: number;
  selfCritMult: number;
  selfRollCapDelta: number;
  opponentHitMult: number;
  winPushMult: number;
  loseOpponentPushMult: number;
  feintTiebreak: boolean;
}

export interface BaseStats {
  hitChance: number;
  critRate: number;
  rollCap: number;
}

export interface EffectiveParams {
  hitChance: number;
  critRate: number;
  swingCap: number;
}

export interface RoundOutcome {
  matchId: string;
  roundNo: number;
  winner: Side | null;
  winnerId: string | null;
  tierA: Tier;
  tierB: Tier;
  styleA: StyleId;
  styleB: StyleId;
  push: number;
  tieBreakUsed: boolean;
}

export type RejectCode =
  | 'unknown_match'
  | 'unknown_round'
  | 'unknown_participant'
  | 'unknown_style'
  | 'already_locked'
  | 'wrong_phase'
  | 'already_submitted'
  | 'swing_cap_reached'
  | 'no_swings_taken'
  | 'round_resolved'
  | 'round_aborted'
  | 'match_finished'
  | 'internal_error';

export type ActionOk<T> = { ok: true } & T;
export type ActionErr = { ok: false; error: RejectCode };
export type ActionResult<T> = ActionOk<T> | ActionErr;

export interface LockStyleResponse {
  lockedStyle: StyleId;
  opponentLocked: boolean;
}

export interface SwingResponse {
  outcome: Tier;
  swingsUsed: number;
  swingsRemaining: number;
  bestOutcomeSoFar: Tier;
}

export interface StopResponse {
  bestOutcome: Tier;
  roundResolved: boolean;
  outcome?: RoundOutcome;
}

export interface ParticipantView {
  participantId: string;
  styleLocked: boolean;
  style?: StyleId;
  swingsUsed: number;
  swingCap?: number;
  submitted: boolean;
  forced: boolean;
  bestOutcome?: Tier;
}

export interface RoundStateView {
  matchId: string;
  roundNo: number;
  phase: RoundPhase;
  deadlines: { styleLock: number; swing?: number };
  participants: Record<Side, ParticipantView>;
  outcome?: RoundOutcome;
}

export interface MatchFairInfo {
  serverSeedHash: string;
  clientSeed: string;
  serverSeed?: string;
}

export interface MatchView {
  id: string;
  participants: Record<Side, string>;
  status: MatchStatus;
  currentRound: number;
  roundsResolved: number;
  bar: number;
  winner?: Side | null;
  fair: MatchFairInfo;
}

export type ClientMsg =
  | { t: 'auth'; uid: string }
  | { t: 'challenge'; opponent: string; clientSeed?: string }
  | { t: 'lock_style'; reqId: string; matchId: string; roundNo: number; style: string }
  | { t: 'swing'; reqId: string; matchId: string; roundNo: number }
  | { t: 'stop'; reqId: string; matchId: string; roundNo: number }
  | { t: 'state'; reqId: string; matchId: string; roundNo: number }
  | { t: 'matches'; reqId: string }
  | { t: 'ping' };

export type ReplyMsg =
  | { t: 'reply'; reqId: string; action: 'lock_style'; result: ActionResult<LockStyleResponse> }
  | { t: 'reply'; reqId: string; action: 'swing'; result: ActionResult<SwingResponse> }
  | { t: 'reply'; reqId: string; action: 'stop'; result: ActionResult<StopResponse> }
  | { t: 'reply'; reqId: string; action: 'state'; result: ActionResult<{ state: RoundStateView }> }
  | { t: 'reply'; reqId: string; action: 'matches'; result: ActionResult<{ matches: MatchView[] }> };

export type EventMsg =
  | { t: 'match_started'; match: MatchView }
  | { t: 'round_resolved'; outcome: RoundOutcome }
  | { t: 'round_aborted'; matchId: string; roundNo: number }
  | { t: 'match_finished'; match: MatchView };

export type ServerMsg =
  | { t: 'hello'; uid: string }
  | ReplyMsg
  | EventMsg
  | { t: 'error'; message: string }
  | { t: 'pong' };
