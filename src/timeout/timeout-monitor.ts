/**
 * Timeout Monitor
 *
 * Owns the deadline timer for one child. It never sees the child process:
 * expiry is announced through an AbortSignal and the Supervisor Core decides
 * what to terminate.
 */

import { WARNING_MARGIN_RATIO } from '../config/supervisor-config';
import { formatSeconds } from '../classifier/exit-classifier';

export interface TimerFunctions {
  setTimeout: (callback: () => void, ms: number) => ReturnType<typeof setTimeout>;
  clearTimeout: (handle: ReturnType<typeof setTimeout>) => void;
}

/**
 * Largest delay setTimeout honours; longer deadlines are armed in chunks
 */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

const DEFAULT_TIMERS: TimerFunctions = {
  setTimeout: (callback, ms) => setTimeout(callback, ms),
  clearTimeout: (handle) => clearTimeout(handle),
};

export class TimeoutMonitor {
  private readonly controller = new AbortController();
  private handle: ReturnType<typeof setTimeout> | null = null;
  private armed = false;

  constructor(
    readonly timeoutSeconds: number,
    private readonly marginRatio: number = WARNING_MARGIN_RATIO,
    private readonly timers: TimerFunctions = DEFAULT_TIMERS
  ) {
    if (!(timeoutSeconds > 0)) {
      throw new RangeError(`timeoutSeconds must be positive, got ${timeoutSeconds}`);
    }
  }

  get deadlineMs(): number {
    return this.timeoutSeconds * 1000;
  }

  /**
   * Earliest elapsed time that counts as dangerously close to the deadline
   */
  get warningThresholdMs(): number {
    return this.deadlineMs * (1 - this.marginRatio);
  }

  get expired(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Start the deadline timer. The returned signal aborts exactly once, at expiry.
   */
  arm(): AbortSignal {
    if (this.armed) {
      throw new Error('TimeoutMonitor already armed');
    }
    this.armed = true;
    this.schedule(this.deadlineMs);
    return this.controller.signal;
  }

  private schedule(remainingMs: number): void {
    const delay = Math.min(remainingMs, MAX_TIMER_DELAY_MS);
    this.handle = this.timers.setTimeout(() => {
      this.handle = null;
      if (remainingMs > delay) {
        this.schedule(remainingMs - delay);
      } else {
        this.controller.abort();
      }
    }, delay);
  }

  /**
   * Cancel the timer; no-op after expiry
   */
  disarm(): void {
    if (this.handle !== null) {
      this.timers.clearTimeout(this.handle);
      this.handle = null;
    }
  }

  isDangerouslyClose(elapsedMs: number): boolean {
    return elapsedMs >= this.warningThresholdMs;
  }

  warningLines(elapsedMs: number): string[] {
    const duration = (elapsedMs / 1000).toFixed(2);
    return [
      `Warning: Test duration of ${duration} seconds is dangerously close to maximum permitted time of ${formatSeconds(this.timeoutSeconds)} seconds`,
      'Warning: Either make the test faster or increase the timeout',
    ];
  }
}
