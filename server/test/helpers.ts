import type { EventChannel } from '../src/dispatcher.js';
import type { RandomSource } from '../src/fair.js';
import type { CancelTimer, Scheduler } from '../src/scheduler.js';
import { StyleCatalog } from '../src/styles.js';
import type { EventMsg } from '../src/types.js';

export const catalog = StyleCatalog.load();

interface PendingTimer {
  at: number;
  seq: number;
  fn: () => void;
}

/** Manual clock; timers fire only from `advance`. */
export class FakeTime implements Scheduler {
  private current: number;
  private seq = 0;
  private timers: PendingTimer[] = [];

  constructor(start = 1_000_000) {
    this.current = start;
  }

  readonly clock = (): number => this.current;

  get pending(): number {
    return this.timers.length;
  }

  schedule(at: number, fn: () => void): CancelTimer {
    const timer: PendingTimer = { at, seq: this.seq++, fn };
    this.timers.push(timer);
    return () => {
      this.timers = this.timers.filter((t) => t !== timer);
    };
  }

  /** Moves the clock forward, firing due timers in time order. */
  advance(ms: number): void {
    const target = this.current + ms;
    for (;;) {
      const due = this.timers
        .filter((t) => t.at <= target)
        .sort((a, b) => a.at - b.at || a.seq - b.seq)[0];
      if (!due) break;
      this.timers = this.timers.filter((t) => t !== due);
      this.current = Math.max(this.current, due.at);
      due.fn();
    }
    this.current = target;
  }

  /** Moves the clock forward without firing anything, as a late timer would. */
  jump(ms: number): void {
    this.current += ms;
  }

  /**
   * Advances and waits for the queued work, then keeps firing timers that
   * the processing armed at or before the new time.
   */
  async run(ms: number, idle: () => Promise<void>): Promise<void> {
    this.advance(ms);
    await idle();
    while (this.timers.some((t) => t.at <= this.current)) {
      this.advance(0);
      await idle();
    }
  }
}

/** Returns the queued values in order; throws once they run out. */
export function scriptedRandom(values: number[]): RandomSource & { labels: string[] } {
  const queue = [...values];
  const labels: string[] = [];
  return {
    labels,
    draw(label) {
      labels.push(label);
      const value = queue.shift();
      if (value === undefined) {
        throw new Error('scripted random exhausted');
      }
      return value;
    }
  };
}

export function constantRandom(value: number): RandomSource {
  return { draw: () => value };
}

export interface Delivery {
  to: string;
  event: EventMsg;
}

export class RecordingChannel implements EventChannel {
  readonly deliveries: Delivery[] = [];
  readonly offline = new Set<string>();

  deliver(participantId: string, event: EventMsg): boolean {
    if (this.offline.has(participantId)) return false;
    this.deliveries.push({ to: participantId, event });
    return true;
  }

  ofType<T extends EventMsg['t']>(t: T, to?: string): Extract<EventMsg, { t: T }>[] {
    return this.deliveries
      .filter((d) => d.event.t === t && (to === undefined || d.to === to))
      .map((d) => d.event)
      .filter((event): event is Extract<EventMsg, { t: T }> => event.t === t);
  }
}
