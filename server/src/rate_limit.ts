import type { Clock } from './utils.js';
import { now } from './utils.js';

export interface RateLimitOptions {
  tokens: number;
  windowMs: number;
  clock?: Clock;
}

interface Bucket {
  tokens: number;
  resetAt: number;
}

/** Fixed-window token buckets keyed by user id. */
export class RateLimiter {
  private readonly buckets = new Map<string, Bucket>();
  private readonly clock: Clock;
  private nextPruneAt = 0;

  constructor(private readonly options: RateLimitOptions) {
    this.clock = options.clock ?? now;
  }

  get size(): number {
    return this.buckets.size;
  }

  consume(key: string): boolean {
    const t = this.clock();
    this.prune(t);
    let bucket = this.buckets.get(key);
    if (!bucket || t >= bucket.resetAt) {
      bucket = { tokens: this.options.tokens, resetAt: t + this.options.windowMs };
      this.buckets.set(key, bucket);
    }
    if (bucket.tokens <= 0) {
      return false;
    }
    bucket.tokens -= 1;
    return true;
  }

  /** Drops buckets whose window has closed; runs at most once per window. */
  prune(t = this.clock()): void {
    if (t < this.nextPruneAt) return;
    for (const [key, bucket] of this.buckets) {
      if (t >= bucket.resetAt) this.buckets.delete(key);
    }
    this.nextPruneAt = t + this.options.windowMs;
  }
}
