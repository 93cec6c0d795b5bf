import type { EngineConfig } from './config.js';
import type { NotificationDispatcher } from './dispatcher.js';
import { InvariantViolation } from './errors.js';
import { sha256, type MatchSeeds, type RandomSource } from './fair.js';
import { componentLogger, type Logger } from './log.js';
import {
  activeMatchesGauge,
  forcedTransitionsCounter,
  pushHistogram,
  roundFaultsCounter,
  roundsResolvedCounter,
  swingsCounter
} from './metrics.js';
import { BAR_START, applyPushToBar, barLeader, barWinner, type PushCurve } from './push.js';
import { SerialQueue } from './queue.js';
import { DuelRound, type RoundTransition } from './round.js';
import type { CancelTimer, Scheduler } from './scheduler.js';
import type { RoundStore } from './store.js';
import type { StyleCatalog } from './styles.js';
import {
  SIDES,
  type ActionResult,
  type BaseStats,
  type LockStyleResponse,
  type MatchStatus,
  type MatchView,
  type RejectCode,
  type RoundOutcome,
  type RoundStateView,
  type Side,
  type StopResponse,
  type StyleId,
  type SwingResponse
} from './types.js';
import type { Clock } from './utils.js';

export interface MatchInit {
  id: string;
  participants: Record<Side, string>;
  stats: Record<Side, BaseStats>;
  seeds: MatchSeeds;
  random: RandomSource;
  catalog: StyleCatalog;
  config: EngineConfig;
  clock: Clock;
  scheduler: Scheduler;
  dispatcher: NotificationDispatcher;
  store: RoundStore;
  pushCurve?: PushCurve;
  onClosed?: (match: DuelMatch) => void;
}

type RoundOp<T> = (round: DuelRound, side: Side, at: number) => ActionResult<T>;

function reject(error: RejectCode): { ok: false; error: RejectCode } {
  return { ok: false, error };
}

/**
 * A duel between two participants over a control bar. Owns its rounds by
 * index. Every action and every deadline runs through one serial queue.
 */
export class DuelMatch {
  readonly id: string;
  readonly participants: Record<Side, string>;

  private statusValue: MatchStatus = 'active';
  private winnerValue?: Side | null;
  private bar = BAR_START;
  private roundsResolved = 0;
  private closed = false;
  private readonly rounds: DuelRound[] = [];
  private readonly queue = new SerialQueue();
  private timer?: { at: number; cancel: CancelTimer };
  private readonly serverSeedHash: string;
  private readonly log: Logger;

  constructor(private readonly init: MatchInit) {
    this.id = init.id;
    this.participants = { ...init.participants };
    this.serverSeedHash = sha256(init.seeds.serverSeed);
    this.log = componentLogger('match', { matchId: init.id });
  }

  get status(): MatchStatus {
    return this.statusValue;
  }

  get currentRoundNo(): number {
    return this.rounds.length;
  }

  /** Opens round 1 and announces the match. */
  start(): void {
    if (this.rounds.length > 0) {
      throw new InvariantViolation(`Match ${this.id} started twice`);
    }
    activeMatchesGauge.inc();
    this.openRound(this.init.clock());
    this.log.info({ participants: this.participants }, 'Match started');
    this.init.dispatcher.matchStarted(this.view());
    this.arm();
  }

  sideOf(participantId: string): Side | undefined {
    return SIDES.find((side) => this.participants[side] === participantId);
  }

  lockStyle(participantId: string, roundNo: number, styleId: StyleId): Promise<ActionResult<LockStyleResponse>> {
    return this.act(participantId, roundNo, (round, side, at) => round.lockStyle(side, styleId, at));
  }

  swing(participantId: string, roundNo: number): Promise<ActionResult<SwingResponse>> {
    return this.act(participantId, roundNo, (round, side, at) => {
      const result = round.swing(side, at);
      if (result.ok) {
        swingsCounter.inc({ tier: result.outcome });
      }
      return result;
    });
  }

  stop(participantId: string, roundNo: number): Promise<ActionResult<StopResponse>> {
    return this.act(participantId, roundNo, (round, side, at) => round.stop(side, at));
  }

  /** Side-effect free; never waits on the queue. */
  roundState(roundNo: number): ActionResult<{ state: RoundStateView }> {
    const round = this.rounds[roundNo - 1];
    if (!round) return reject('unknown_round');
    return { ok: true, state: round.view() };
  }

  round(roundNo: number): DuelRound | undefined {
    return this.rounds[roundNo - 1];
  }

  view(): MatchView {
    const closed = this.statusValue !== 'active';
    const view: MatchView = {
      id: this.id,
      participants: { ...this.participants },
      status: this.statusValue,
      currentRound: this.rounds.length,
      roundsResolved: this.roundsResolved,
      bar: this.bar,
      fair: {
        serverSeedHash: this.serverSeedHash,
        clientSeed: this.init.seeds.clientSeed,
        serverSeed: closed ? this.init.seeds.serverSeed : undefined
      }
    };
    if (this.winnerValue !== undefined) {
      view.winner = this.winnerValue;
    }
    return view;
  }

  /** Resolves once every queued action and deadline has been processed. */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  /** Cancels the pending deadline timer without changing match state. */
  dispose(): void {
    this.disarm();
  }

  private act<T>(participantId: string, roundNo: number, op: RoundOp<T>): Promise<ActionResult<T>> {
    const at = this.init.clock();
    return this.queue.run(() =>
      this.process<T>(at, () => {
        const side = this.sideOf(participantId);
        if (!side) return reject('unknown_participant');
        if (this.statusValue === 'finished') return reject('match_finished');
        if (this.statusValue === 'faulted') return reject('round_aborted');

        const round = this.rounds[roundNo - 1];
        if (!round) return reject('unknown_round');
        if (round !== this.current()) {
          return reject(round.phase === 'aborted' ? 'round_aborted' : 'round_resolved');
        }
        return op(round, side, at);
      })
    );
  }

  /**
   * Actions leave a deadline equal to their receive time for the deadline
   * message; only that message applies it, so a tie goes to whichever was
   * queued first.
   */
  private process<T>(at: number, op: () => ActionResult<T>, passedOnly = true): ActionResult<T> {
    try {
      this.catchUp(at, passedOnly);
      const result = op();
      this.catchUp(at, passedOnly);
      if (!result.ok) {
        this.log.debug({ error: result.error, roundNo: this.currentRoundNo }, 'Action rejected');
      }
      return result;
    } catch (err) {
      this.fault(err);
      return reject('internal_error');
    } finally {
      this.arm();
    }
  }

  private current(): DuelRound {
    const round = this.rounds[this.rounds.length - 1];
    if (!round) {
      throw new InvariantViolation(`Match ${this.id} has no rounds`);
    }
    return round;
  }

  /** Applies due deadlines, following into freshly opened rounds. */
  private catchUp(at: number, passedOnly: boolean): void {
    while (this.statusValue === 'active') {
      const round = this.current();
      round.advance(at, passedOnly);
      for (const transition of round.drainTransitions()) {
        this.onTransition(round, transition);
      }
      if (this.current() === round) return;
    }
  }

  private onTransition(round: DuelRound, transition: RoundTransition): void {
    switch (transition.kind) {
      case 'swing_started':
        for (const side of transition.forcedStyles) {
          forcedTransitionsCounter.inc({ kind: 'style_default' });
          this.log.info({ roundNo: round.roundNo, side }, 'Style deadline passed; default style assigned');
        }
        this.log.debug({ roundNo: round.roundNo, swingDeadline: round.swingDeadline }, 'Swing phase started');
        return;
      case 'resolved':
        for (const side of transition.forcedSubmits) {
          forcedTransitionsCounter.inc({ kind: 'swing_submit' });
          this.log.info({ roundNo: round.roundNo, side }, 'Swing deadline passed; current roll submitted');
        }
        this.onResolved(transition.outcome, transition.at);
        return;
      case 'aborted':
        return;
    }
  }

  private onResolved(outcome: RoundOutcome, at: number): void {
    this.init.store.save(outcome);
    this.init.dispatcher.roundResolved(this.participants, outcome);

    roundsResolvedCounter.inc({ result: outcome.winner ? 'win' : 'draw', tie_break: String(outcome.tieBreakUsed) });
    pushHistogram.observe(outcome.push);
    this.log.info(
      { roundNo: outcome.roundNo, winner: outcome.winner, tierA: outcome.tierA, tierB: outcome.tierB, push: outcome.push },
      'Round resolved'
    );

    if (outcome.winner && outcome.push > 0) {
      this.bar = applyPushToBar(this.bar, outcome.winner, outcome.push);
    }
    this.roundsResolved += 1;

    const edge = barWinner(this.bar);
    if (edge) {
      this.finish(edge);
    } else if (this.roundsResolved >= this.init.config.maxRounds) {
      this.finish(barLeader(this.bar));
    } else {
      this.openRound(at);
    }
  }

  private openRound(at: number): void {
    const { config } = this.init;
    const round = new DuelRound({
      matchId: this.id,
      roundNo: this.rounds.length + 1,
      participants: this.participants,
      stats: this.init.stats,
      catalog: this.init.catalog,
      random: this.init.random,
      startedAt: at,
      styleLockMs: config.styleLockMs,
      swingPhaseMs: config.swingPhaseMs,
      pushCurve: this.init.pushCurve
    });
    this.rounds.push(round);
  }

  private finish(winner: Side | null): void {
    this.statusValue = 'finished';
    this.winnerValue = winner;
    this.log.info({ winner, bar: this.bar, rounds: this.roundsResolved }, 'Match finished');
    this.init.dispatcher.matchFinished(this.view());
    this.close();
  }

  private fault(err: unknown): void {
    const round = this.rounds[this.rounds.length - 1];
    const reason = err instanceof Error ? err.message : String(err);
    roundFaultsCounter.inc();
    this.log.error({ err, roundNo: round?.roundNo }, 'Round could not be resolved; match halted');

    this.statusValue = 'faulted';
    if (round && !round.isTerminal()) {
      round.abort(reason);
      round.drainTransitions();
      this.init.dispatcher.roundAborted(this.participants, this.id, round.roundNo);
    }
    this.close();
  }

  private close(): void {
    this.disarm();
    if (this.closed) return;
    this.closed = true;
    activeMatchesGauge.dec();
    this.init.onClosed?.(this);
  }

  private arm(): void {
    const at = this.statusValue === 'active' ? this.current().nextDeadline() : undefined;
    if (this.timer?.at === at) return;
    this.disarm();
    if (at === undefined) return;
    const cancel = this.init.scheduler.schedule(at, () => this.onDeadline(at));
    this.timer = { at, cancel };
  }

  private disarm(): void {
    this.timer?.cancel();
    this.timer = undefined;
  }

  private onDeadline(deadline: number): void {
    if (this.timer?.at === deadline) {
      this.timer = undefined;
    }
    const at = Math.max(deadline, this.init.clock());
    this.queue
      .run(() => this.process<object>(at, () => ({ ok: true }), false))
      .catch((err: unknown) => {
        this.log.error({ err, deadline }, 'Deadline processing failed');
      });
  }
}
