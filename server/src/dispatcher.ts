import { InvariantViolation } from './errors.js';
import { componentLogger, type Logger } from './log.js';
import { eventsCounter } from './metrics.js';
import { SIDES, type EventMsg, type MatchView, type RoundOutcome, type Side } from './types.js';

/** Fan-out transport. Returns false when the participant has no live connection. */
export interface EventChannel {
  deliver(participantId: string, event: EventMsg): boolean;
}

/**
 * Delivers match events to both participants, each event at most once per
 * participant. An offline participant is skipped, not queued: they read
 * the stored outcome back through the round state instead.
 */
export class NotificationDispatcher {
  private readonly sent = new Map<string, Set<string>>();

  constructor(
    private readonly channel: EventChannel,
    private readonly log: Logger = componentLogger('dispatcher')
  ) {}

  matchStarted(match: MatchView): void {
    this.fanOut(match.id, 'started', match.participants, { t: 'match_started', match });
  }

  roundResolved(participants: Record<Side, string>, outcome: RoundOutcome): void {
    this.fanOut(outcome.matchId, `round:${outcome.roundNo}`, participants, { t: 'round_resolved', outcome });
  }

  roundAborted(participants: Record<Side, string>, matchId: string, roundNo: number): void {
    this.fanOut(matchId, `aborted:${roundNo}`, participants, { t: 'round_aborted', matchId, roundNo });
  }

  matchFinished(match: MatchView): void {
    this.fanOut(match.id, 'finished', match.participants, { t: 'match_finished', match });
  }

  forgetMatch(matchId: string): void {
    this.sent.delete(matchId);
  }

  private fanOut(matchId: string, eventKey: string, participants: Record<Side, string>, event: EventMsg): void {
    const sent = this.sent.get(matchId) ?? new Set<string>();
    this.sent.set(matchId, sent);

    for (const side of SIDES) {
      const participantId = participants[side];
      const key = `${eventKey}:${participantId}`;
      if (sent.has(key)) {
        throw new InvariantViolation(`Event ${event.t} ${eventKey} already dispatched to ${participantId} in ${matchId}`);
      }
      sent.add(key);
      if (this.channel.deliver(participantId, event)) {
        eventsCounter.inc({ direction: 'out', event: event.t });
      } else {
        this.log.debug({ matchId, participantId, event: event.t }, 'Participant offline; event not delivered');
      }
    }
  }
}
