/**
 * Minimum-spacing rate limiter for outbound provider calls.
 *
 * The sync loop is sequential, so one limiter per engine is enough: before
 * each call it sleeps for whatever remains of the configured spacing since
 * the previous call started.
 */

import { buildRequestAbortError } from './errors.js';

type SleepFn = (ms: number, signal?: AbortSignal | null) => Promise<void>;

interface RateLimiterOptions {
  minSpacingMs: number;
  now?: () => number;
  sleep?: SleepFn;
}

function sleepWithAbort(ms: number, signal?: AbortSignal | null): Promise<void> {
  const waitMs = Math.max(0, Math.ceil(Number(ms) || 0));
  return new Promise((resolve, reject) => {
    let settled = false;
    const done = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (signal) {
        signal.removeEventListener('abort', onAbort);
      }
      fn();
    };
    const onAbort = () => done(() => reject(buildRequestAbortError('Aborted while waiting for the next provider slot')));
    const timer = setTimeout(() => done(resolve), waitMs);
    if (signal) {
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
}

class MinSpacingRateLimiter {
  readonly minSpacingMs: number;
  private readonly now: () => number;
  private readonly sleep: SleepFn;
  private lastCallMs: number | null = null;

  constructor(options: RateLimiterOptions) {
    this.minSpacingMs = Math.max(0, Number(options.minSpacingMs) || 0);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleepWithAbort;
  }

  /** Milliseconds still to wait before the next call may start. */
  remainingMs(): number {
    if (this.lastCallMs === null) return 0;
    const elapsed = this.now() - this.lastCallMs;
    return Math.max(0, this.minSpacingMs - elapsed);
  }

  /** Wait out the remaining spacing, then record the call start. Returns the time slept. */
  async acquire(signal?: AbortSignal | null): Promise<number> {
    const waitMs = this.remainingMs();
    if (waitMs > 0) {
      await this.sleep(waitMs, signal);
    }
    this.lastCallMs = this.now();
    return waitMs;
  }
}

export { MinSpacingRateLimiter, sleepWithAbort };
export type { RateLimiterOptions, SleepFn };
