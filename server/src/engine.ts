import { v4 as uuid } from 'uuid';

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './config.js';
import { NotificationDispatcher, type EventChannel } from './dispatcher.js';
import { createHmacRandomSource, randomSeed, type MatchSeeds, type RandomSource } from './fair.js';
import { componentLogger } from './log.js';
import { DuelMatch } from './match.js';
import type { PushCurve } from './push.js';
import { TimerScheduler, type Scheduler } from './scheduler.js';
import { FixedStatsProvider, type StatsProvider } from './stats.js';
import { MemoryRoundStore, type RoundStore } from './store.js';
import type { StyleCatalog } from './styles.js';
import type {
  ActionResult,
  LockStyleResponse,
  MatchView,
  RoundStateView,
  StopResponse,
  StyleId,
  SwingResponse
} from './types.js';
import { now, type Clock } from './utils.js';

export interface DuelEngineOptions {
  catalog: StyleCatalog;
  channel: EventChannel;
  config?: Partial<EngineConfig>;
  stats?: StatsProvider;
  store?: RoundStore;
  clock?: Clock;
  scheduler?: Scheduler;
  randomFor?: (seeds: MatchSeeds) => RandomSource;
  pushCurve?: PushCurve;
}

export interface CreateMatchInput {
  participants: readonly [string, string];
  matchId?: string;
  clientSeed?: string;
}

const log = componentLogger('engine');

export class DuelEngine {
  readonly config: EngineConfig;
  readonly catalog: StyleCatalog;
  readonly store: RoundStore;

  private readonly matches = new Map<string, DuelMatch>();
  private readonly dispatcher: NotificationDispatcher;
  private readonly stats: StatsProvider;
  private readonly clock: Clock;
  private readonly scheduler: Scheduler;
  private readonly randomFor: (seeds: MatchSeeds) => RandomSource;

  constructor(private readonly options: DuelEngineOptions) {
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...options.config };
    this.catalog = options.catalog;
    this.store = options.store ?? new MemoryRoundStore();
    this.dispatcher = new NotificationDispatcher(options.channel);
    this.clock = options.clock ?? now;
    this.scheduler = options.scheduler ?? new TimerScheduler(this.clock);
    this.randomFor = options.randomFor ?? createHmacRandomSource;
    this.stats =
      options.stats ??
      new FixedStatsProvider({
        hitChance: this.config.defaultHitChance,
        critRate: this.config.defaultCritRate,
        rollCap: this.config.baseSwingCap
      });
  }

  createMatch(input: CreateMatchInput): MatchView {
    const [a, b] = input.participants;
    if (!a || !b || a === b) {
      throw new Error('A match needs two distinct participants');
    }
    const id = input.matchId ?? uuid();
    if (this.matches.has(id)) {
      throw new Error(`Match ${id} already exists`);
    }

    const seeds: MatchSeeds = { serverSeed: randomSeed(), clientSeed: input.clientSeed ?? randomSeed(8) };
    const match = new DuelMatch({
      id,
      participants: { A: a, B: b },
      stats: { A: this.stats.baseStats(a, b), B: this.stats.baseStats(b, a) },
      seeds,
      random: this.randomFor(seeds),
      catalog: this.catalog,
      config: this.config,
      clock: this.clock,
      scheduler: this.scheduler,
      dispatcher: this.dispatcher,
      store: this.store,
      pushCurve: this.options.pushCurve,
      onClosed: (closed) => {
        this.dispatcher.forgetMatch(closed.id);
        log.debug({ matchId: closed.id, status: closed.status }, 'Match closed');
      }
    });
    this.matches.set(id, match);
    match.start();
    return match.view();
  }

  lockStyle(matchId: string, roundNo: number, participantId: string, styleId: StyleId): Promise<ActionResult<LockStyleResponse>> {
    const match = this.matches.get(matchId);
    if (!match) return Promise.resolve({ ok: false, error: 'unknown_match' });
    return match.lockStyle(participantId, roundNo, styleId);
  }

  swing(matchId: string, roundNo: number, participantId: string): Promise<ActionResult<SwingResponse>> {
    const match = this.matches.get(matchId);
    if (!match) return Promise.resolve({ ok: false, error: 'unknown_match' });
    return match.swing(participantId, roundNo);
  }

  stop(matchId: string, roundNo: number, participantId: string): Promise<ActionResult<StopResponse>> {
    const match = this.matches.get(matchId);
    if (!match) return Promise.resolve({ ok: false, error: 'unknown_match' });
    return match.stop(participantId, roundNo);
  }

  getRoundState(matchId: string, roundNo: number): ActionResult<{ state: RoundStateView }> {
    const match = this.matches.get(matchId);
    if (!match) return { ok: false, error: 'unknown_match' };
    return match.roundState(roundNo);
  }

  getMatch(matchId: string): MatchView | undefined {
    return this.matches.get(matchId)?.view();
  }

  match(matchId: string): DuelMatch | undefined {
    return this.matches.get(matchId);
  }

  matchesOf(participantId: string): MatchView[] {
    return [...this.matches.values()].filter((match) => match.sideOf(participantId) !== undefined).map((match) => match.view());
  }

  async idle(): Promise<void> {
    await Promise.all([...this.matches.values()].map((match) => match.idle()));
  }

  shutdown(): void {
    for (const match of this.matches.values()) {
      match.dispose();
    }
  }
}
