import type { RoundOutcome } from './types.js';

/** Persistence for completed rounds. Receives each outcome exactly once. */
export interface RoundStore {
  save(outcome: RoundOutcome): void;
}

export class MemoryRoundStore implements RoundStore {
  private readonly byMatch = new Map<string, RoundOutcome[]>();

  save(outcome: RoundOutcome): void {
    const list = this.byMatch.get(outcome.matchId) ?? [];
    list.push(outcome);
    this.byMatch.set(outcome.matchId, list);
  }

  forMatch(matchId: string): readonly RoundOutcome[] {
    return this.byMatch.get(matchId) ?? [];
  }
}
