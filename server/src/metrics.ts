import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export const register = new Registry();
register.setDefaultLabels({ app: 'duel-engine-server' });
collectDefaultMetrics({ register });

export const activeClientsGauge = new Gauge({
  name: 'duel_active_clients',
  help: 'Number of active WebSocket clients connected to the server',
  registers: [register]
});

export const activeMatchesGauge = new Gauge({
  name: 'duel_active_matches',
  help: 'Matches currently in play',
  registers: [register]
});

export const eventsCounter = new Counter({
  name: 'duel_events_total',
  help: 'Count of client and server events processed by the WebSocket server',
  labelNames: ['direction', 'event'],
  registers: [register]
});

export const swingsCounter = new Counter({
  name: 'duel_swings_total',
  help: 'Swings taken, by rolled tier',
  labelNames: ['tier'],
  registers: [register]
});

export const roundsResolvedCounter = new Counter({
  name: 'duel_rounds_resolved_total',
  help: 'Resolved rounds by result and whether the feint tiebreak decided them',
  labelNames: ['result', 'tie_break'],
  registers: [register]
});

export const forcedTransitionsCounter = new Counter({
  name: 'duel_forced_transitions_total',
  help: 'Participant slots filled in by a deadline instead of an action',
  labelNames: ['kind'],
  registers: [register]
});

export const roundFaultsCounter = new Counter({
  name: 'duel_round_faults_total',
  help: 'Rounds aborted by an engine fault',
  registers: [register]
});

const pushBuckets = [0, 5, 10, 12.5, 15, 18.75, 25, 30];
export const pushHistogram = new Histogram({
  name: 'duel_round_push',
  help: 'Push applied by the winner of each round',
  buckets: pushBuckets,
  registers: [register]
});

export const metricsContentType = register.contentType;

export async function collectMetrics(): Promise<string> {
  return register.metrics();
}
