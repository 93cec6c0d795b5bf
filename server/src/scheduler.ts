export type CancelTimer = () => void;

/** Runs a callback once the clock reaches `at`. */
export interface Scheduler {
  schedule(at: number, fn: () => void): CancelTimer;
}

export class TimerScheduler implements Scheduler {
  constructor(private readonly clock: () => number = Date.now) {}

  schedule(at: number, fn: () => void): CancelTimer {
    const timer = setTimeout(fn, Math.max(0, at - this.clock()));
    return () => clearTimeout(timer);
  }
}
