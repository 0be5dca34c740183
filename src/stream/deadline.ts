/**
 * @fileoverview Absolute monotonic deadlines shared across a call chain
 * @module stream/deadline
 */

import { performance } from 'node:perf_hooks';

/**
 * Smallest wait handed to a timer, so an expired budget never becomes a zero
 * or negative timeout.
 */
export const MIN_WAIT_MS = 1;

/**
 * An absolute point on the monotonic clock.
 *
 * Created once at the start of an operation and passed down unchanged, so a
 * series of small reads cannot stretch the caller's budget.
 */
export class Deadline {
  private constructor(
    /** Absolute expiry in `performance.now()` milliseconds */
    readonly expiresAt: number,
    /** Budget the deadline was created with, for error messages */
    readonly timeoutMs: number,
    private readonly now: () => number
  ) {}

  /**
   * Create a deadline `timeoutMs` from now
   */
  static after(timeoutMs: number, now: () => number = () => performance.now()): Deadline {
    return new Deadline(now() + timeoutMs, timeoutMs, now);
  }

  /**
   * Milliseconds left, never below {@link MIN_WAIT_MS}
   */
  remaining(): number {
    return Math.max(this.expiresAt - this.now(), MIN_WAIT_MS);
  }

  hasExpired(): boolean {
    return this.now() >= this.expiresAt;
  }
}
