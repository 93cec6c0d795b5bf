import { test } from 'node:test';
import assert from 'node:assert/strict';

import type { EngineConfig } from '../src/config.js';
import { DuelEngine } from '../src/engine.js';
import { sha256, type RandomSource } from '../src/fair.js';
import { MemoryRoundStore } from '../src/store.js';
import { FakeTime, RecordingChannel, catalog, constantRandom, scriptedRandom } from './helpers.js';

const T0 = 1_000_000;

function setup(options: { random?: RandomSource; config?: Partial<EngineConfig> } = {}) {
  const time = new FakeTime(T0);
  const channel = new RecordingChannel();
  const store = new MemoryRoundStore();
  const random = options.random ?? constantRandom(0.5);
  const engine = new DuelEngine({
    catalog,
    channel,
    store,
    clock: time.clock,
    scheduler: time,
    randomFor: () => random,
    config: options.config
  });
  const view = engine.createMatch({ participants: ['alice', 'bob'], matchId: 'm1', clientSeed: 'test-client' });
  const idle = () => engine.idle();
  return { time, channel, store, engine, view, idle };
}

async function lockAndSwing(engine: DuelEngine, roundNo: number, styles: [string, string] = ['balanced', 'balanced']): Promise<void> {
  assert.equal((await engine.lockStyle('m1', roundNo, 'alice', styles[0])).ok, true);
  assert.equal((await engine.lockStyle('m1', roundNo, 'bob', styles[1])).ok, true);
  assert.equal((await engine.swing('m1', roundNo, 'alice')).ok, true);
  assert.equal((await engine.swing('m1', roundNo, 'bob')).ok, true);
}

test('a new match opens round one and tells both participants', () => {
  const { view, channel, time } = setup();

  assert.equal(view.status, 'active');
  assert.equal(view.currentRound, 1);
  assert.equal(view.bar, 50);
  assert.equal(view.fair.clientSeed, 'test-client');
  assert.match(view.fair.serverSeedHash, /^[0-9a-f]{64}$/);
  assert.equal(view.fair.serverSeed, undefined);

  const started = channel.ofType('match_started');
  assert.deepEqual(
    channel.deliveries.map((d) => d.to),
    ['alice', 'bob']
  );
  assert.equal(started.length, 2);
  assert.deepEqual(started[0].match, view);
  assert.equal(time.pending, 1);
});

test('the resolving stop and the broadcast carry the same outcome', async () => {
  const { engine, channel, store } = setup({ random: scriptedRandom([0.05, 0.3]) });
  await lockAndSwing(engine, 1);

  assert.deepEqual(await engine.stop('m1', 1, 'alice'), { ok: true, bestOutcome: 'critical', roundResolved: false });
  const stop = await engine.stop('m1', 1, 'bob');
  assert.equal(stop.ok, true);
  if (!stop.ok) return;
  assert.equal(stop.roundResolved, true);
  assert.ok(stop.outcome);

  const broadcasts = channel.ofType('round_resolved');
  assert.equal(broadcasts.length, 2);
  assert.deepEqual(channel.ofType('round_resolved', 'alice').length, 1);
  assert.deepEqual(channel.ofType('round_resolved', 'bob').length, 1);
  for (const event of broadcasts) {
    assert.equal(event.outcome, stop.outcome);
    assert.equal(JSON.stringify(event.outcome), JSON.stringify(stop.outcome));
  }

  assert.deepEqual(stop.outcome, {
    matchId: 'm1',
    roundNo: 1,
    winner: 'A',
    winnerId: 'alice',
    tierA: 'critical',
    tierB: 'hit',
    styleA: 'balanced',
    styleB: 'balanced',
    push: 15,
    tieBreakUsed: false
  });
  assert.deepEqual(store.forMatch('m1'), [stop.outcome]);

  const match = engine.getMatch('m1');
  assert.equal(match?.bar, 35);
  assert.equal(match?.roundsResolved, 1);
  assert.equal(match?.currentRound, 2);

  const next = engine.getRoundState('m1', 2);
  assert.equal(next.ok && next.state.phase, 'style_select');
  assert.equal(next.ok && next.state.deadlines.styleLock, T0 + 10_000);
});

test('simultaneous stops resolve the round exactly once', async () => {
  const { engine, channel, store } = setup();
  await lockAndSwing(engine, 1);

  const results = await Promise.all([engine.stop('m1', 1, 'alice'), engine.stop('m1', 1, 'bob')]);
  assert.equal(results.filter((r) => r.ok && r.roundResolved).length, 1);
  assert.equal(channel.ofType('round_resolved', 'alice').length, 1);
  assert.equal(channel.ofType('round_resolved', 'bob').length, 1);
  assert.equal(store.forMatch('m1').length, 1);

  const [outcome] = store.forMatch('m1');
  assert.equal(outcome.winner, null);
  assert.equal(outcome.push, 0);
  assert.equal(engine.getMatch('m1')?.bar, 50);
});

test('a stop received just before the swing deadline wins the race', async () => {
  const { engine, channel, time, idle } = setup();
  await lockAndSwing(engine, 1);
  await engine.stop('m1', 1, 'alice');

  time.advance(29_999);
  const stop = engine.stop('m1', 1, 'bob');
  time.advance(1);

  const result = await stop;
  assert.equal(result.ok && result.roundResolved, true);
  await idle();

  assert.equal(channel.ofType('round_resolved').length, 2);
  const state = engine.getRoundState('m1', 1);
  assert.equal(state.ok && state.state.participants.B.forced, false);
});

test('a stop tied with the swing deadline wins while the deadline timer has not fired', async () => {
  const { engine, channel, time, idle } = setup();
  await lockAndSwing(engine, 1);
  await engine.stop('m1', 1, 'alice');

  time.jump(30_000);
  const result = await engine.stop('m1', 1, 'bob');
  assert.ok(result.ok);
  assert.equal(result.roundResolved, true);
  assert.equal(result.outcome?.tierB, 'hit');

  time.advance(0);
  await idle();
  assert.equal(channel.ofType('round_resolved').length, 2);
  const state = engine.getRoundState('m1', 1);
  assert.ok(state.ok);
  assert.equal(state.state.participants.A.forced, false);
  assert.equal(state.state.participants.B.forced, false);
  assert.equal(engine.getMatch('m1')?.currentRound, 2);
});

test('a stop queued behind the swing deadline message finds the round already resolved', async () => {
  const { engine, channel, time, idle } = setup();
  await lockAndSwing(engine, 1);

  time.advance(30_000);
  assert.deepEqual(await engine.stop('m1', 1, 'bob'), { ok: false, error: 'round_resolved' });
  await idle();

  assert.equal(channel.ofType('round_resolved').length, 2);
  const state = engine.getRoundState('m1', 1);
  assert.ok(state.ok);
  assert.equal(state.state.participants.A.forced, true);
  assert.equal(state.state.participants.B.forced, true);
  assert.equal(state.state.outcome?.tierA, 'hit');
});

test('reading round state is side-effect free', async () => {
  const { engine, channel } = setup({ random: scriptedRandom([0.3, 0.9]) });
  await lockAndSwing(engine, 1, ['aggressive', 'guard']);
  await engine.stop('m1', 1, 'alice');
  await engine.stop('m1', 1, 'bob');
  const deliveries = channel.deliveries.length;

  const first = engine.getRoundState('m1', 1);
  const second = engine.getRoundState('m1', 1);
  assert.ok(first.ok && second.ok);
  assert.deepEqual(first, second);
  assert.equal(first.state.outcome, second.state.outcome);
  assert.equal(first.state.outcome, channel.ofType('round_resolved', 'alice')[0].outcome);
  assert.equal(first.state.participants.A.style, 'aggressive');
  assert.equal(first.state.participants.B.style, 'guard');
  assert.equal(channel.deliveries.length, deliveries);
});

test('an offline participant reads the outcome back instead of a late delivery', async () => {
  const { engine, channel, idle } = setup();
  await lockAndSwing(engine, 1);
  channel.offline.add('bob');

  await engine.stop('m1', 1, 'alice');
  await engine.stop('m1', 1, 'bob');
  assert.equal(channel.ofType('round_resolved', 'alice').length, 1);
  assert.equal(channel.ofType('round_resolved', 'bob').length, 0);

  channel.offline.delete('bob');
  await idle();
  assert.equal(channel.ofType('round_resolved', 'bob').length, 0);

  const state = engine.getRoundState('m1', 1);
  assert.equal(state.ok && state.state.outcome, channel.ofType('round_resolved', 'alice')[0].outcome);
});

test('deadlines carry an idle match through a round', async () => {
  const { engine, channel, time, idle } = setup();

  await time.run(10_000, idle);
  const swinging = engine.getRoundState('m1', 1);
  assert.ok(swinging.ok);
  assert.equal(swinging.state.phase, 'swing');
  assert.equal(swinging.state.deadlines.swing, T0 + 40_000);
  assert.equal(swinging.state.participants.A.forced, true);
  assert.equal(swinging.state.participants.B.forced, true);
  assert.equal(channel.ofType('round_resolved').length, 0);

  await time.run(30_000, idle);
  const resolved = engine.getRoundState('m1', 1);
  assert.ok(resolved.ok);
  assert.equal(resolved.state.phase, 'resolved');
  assert.deepEqual(resolved.state.outcome, {
    matchId: 'm1',
    roundNo: 1,
    winner: null,
    winnerId: null,
    tierA: 'miss',
    tierB: 'miss',
    styleA: 'balanced',
    styleB: 'balanced',
    push: 0,
    tieBreakUsed: false
  });
  assert.equal(channel.ofType('round_resolved').length, 2);

  const next = engine.getRoundState('m1', 2);
  assert.equal(next.ok && next.state.deadlines.styleLock, T0 + 50_000);
  assert.equal(time.pending, 1);
});

test('a lock received before the style deadline is kept even if processed after it fires', async () => {
  const { engine, time, idle } = setup();

  time.advance(9_999);
  const lock = engine.lockStyle('m1', 1, 'alice', 'power');
  time.advance(1);

  assert.deepEqual(await lock, { ok: true, lockedStyle: 'power', opponentLocked: false });
  await idle();

  const state = engine.getRoundState('m1', 1);
  assert.ok(state.ok);
  assert.equal(state.state.phase, 'swing');
  assert.equal(state.state.participants.A.forced, false);
  assert.equal(state.state.participants.B.forced, true);
  assert.deepEqual(await engine.lockStyle('m1', 1, 'bob', 'guard'), { ok: false, error: 'wrong_phase' });
});

test('a random source failure aborts the round and halts the match', async () => {
  const { engine, channel, store, time } = setup({ random: scriptedRandom([]) });
  await engine.lockStyle('m1', 1, 'alice', 'balanced');
  await engine.lockStyle('m1', 1, 'bob', 'balanced');

  assert.deepEqual(await engine.swing('m1', 1, 'alice'), { ok: false, error: 'internal_error' });

  const state = engine.getRoundState('m1', 1);
  assert.equal(state.ok && state.state.phase, 'aborted');
  assert.equal(state.ok && state.state.outcome, undefined);

  const match = engine.getMatch('m1');
  assert.ok(match);
  assert.equal(match.status, 'faulted');
  const { serverSeed, serverSeedHash } = match.fair;
  assert.ok(serverSeed);
  assert.equal(sha256(serverSeed), serverSeedHash);

  assert.deepEqual(
    channel.ofType('round_aborted').map((event) => [event.matchId, event.roundNo]),
    [
      ['m1', 1],
      ['m1', 1]
    ]
  );
  assert.equal(channel.ofType('round_resolved').length, 0);
  assert.equal(store.forMatch('m1').length, 0);
  assert.equal(time.pending, 0);

  assert.deepEqual(await engine.stop('m1', 1, 'bob'), { ok: false, error: 'round_aborted' });
});

test('the match ends when the bar reaches an edge', async () => {
  const { engine, channel, time } = setup({ random: scriptedRandom([0.05, 0.9, 0.05, 0.9, 0.05, 0.9]) });

  for (let roundNo = 1; roundNo <= 3; roundNo += 1) {
    await lockAndSwing(engine, roundNo);
    await engine.stop('m1', roundNo, 'alice');
    const stop = await engine.stop('m1', roundNo, 'bob');
    assert.equal(stop.ok && stop.outcome?.push, 18.75);
  }

  const finished = channel.ofType('match_finished');
  assert.equal(finished.length, 2);
  const { match } = finished[0];
  assert.equal(match.status, 'finished');
  assert.equal(match.winner, 'A');
  assert.equal(match.bar, 0);
  assert.equal(match.roundsResolved, 3);
  assert.equal(match.currentRound, 3);
  assert.ok(match.fair.serverSeed);

  assert.equal(time.pending, 0);
  assert.deepEqual(await engine.lockStyle('m1', 3, 'alice', 'power'), { ok: false, error: 'match_finished' });
});

test('after the last round the side holding the bar wins', async () => {
  const { engine, channel, time, idle } = setup({ random: scriptedRandom([0.3, 0.9]), config: { maxRounds: 2 } });
  await lockAndSwing(engine, 1);
  await engine.stop('m1', 1, 'alice');
  await engine.stop('m1', 1, 'bob');
  assert.equal(engine.getMatch('m1')?.bar, 40);

  await time.run(40_000, idle);

  const match = engine.getMatch('m1');
  assert.equal(match?.status, 'finished');
  assert.equal(match?.winner, 'A');
  assert.equal(match?.roundsResolved, 2);
  assert.equal(channel.ofType('match_finished', 'bob')[0].match.winner, 'A');
});

test('a level bar after the last round has no winner', async () => {
  const { engine, time, idle } = setup({ config: { maxRounds: 1 } });
  await time.run(40_000, idle);

  const match = engine.getMatch('m1');
  assert.equal(match?.status, 'finished');
  assert.equal(match?.winner, null);
  assert.equal(match?.bar, 50);
});

test('actions are checked against the participant and round', async () => {
  const { engine } = setup();

  assert.deepEqual(await engine.lockStyle('m1', 1, 'carol', 'balanced'), { ok: false, error: 'unknown_participant' });
  assert.deepEqual(await engine.lockStyle('m1', 2, 'alice', 'balanced'), { ok: false, error: 'unknown_round' });
  assert.deepEqual(await engine.swing('m1', 0, 'alice'), { ok: false, error: 'unknown_round' });
  assert.deepEqual(engine.getRoundState('m1', 2), { ok: false, error: 'unknown_round' });

  await lockAndSwing(engine, 1);
  await engine.stop('m1', 1, 'alice');
  await engine.stop('m1', 1, 'bob');
  assert.deepEqual(await engine.swing('m1', 1, 'alice'), { ok: false, error: 'round_resolved' });
});
