/**
 * Counts recurring failures per subject over a trailing window so callers can
 * escalate event severity (e.g. one IP repeatedly failing authentication).
 */

import type { Clock, Severity } from '../core/types.js';
import { systemClock } from '../core/types.js';
import { MemoryCounterBackend } from '../ratelimit/memory-backend.js';

export interface RepeatTrackerOptions {
  /** Occurrences within the window at which severity escalates */
  threshold?: number;
  windowSeconds?: number;
  clock?: Clock;
}

export class RepeatTracker {
  private readonly store: MemoryCounterBackend;
  private readonly threshold: number;
  private readonly windowMs: number;
  private readonly clock: Clock;

  constructor(opts: RepeatTrackerOptions = {}) {
    this.threshold = opts.threshold ?? 5;
    this.windowMs = (opts.windowSeconds ?? 300) * 1000;
    this.clock = opts.clock ?? systemClock;
    this.store = new MemoryCounterBackend({ clock: this.clock });
  }

  /** Record one occurrence; returns the count inside the window, this one included. */
  async hit(subject: string): Promise<number> {
    const { used } = await this.store.admitToWindow(subject, {
      now: this.clock(),
      windowMs: this.windowMs,
      limit: Number.MAX_SAFE_INTEGER,
      cost: 1,
      split: false,
    });
    return used;
  }

  /** Record one occurrence and pick `base`, or `high` once the threshold is reached. */
  async severity(subject: string, base: Severity): Promise<Severity> {
    const count = await this.hit(subject);
    return count >= this.threshold && base !== 'critical' ? 'high' : base;
  }

  close(): void {
    this.store.close();
  }
}
