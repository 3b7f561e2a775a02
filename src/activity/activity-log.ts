/**
 * Activity events: sinks and a fire-and-forget reporter.
 */

import { errorMessage } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { createLogger } from '../core/logger.js';
import type { MetricsCollector } from '../core/metrics.js';
import { Metric } from '../core/metrics.js';
import type { ActivityEvent, ActivitySink, ActivityType, Clock, Severity } from '../core/types.js';
import { systemClock } from '../core/types.js';

// ── Sinks ──

/** Keeps events in memory. Useful for tests and for short-lived inspection. */
export class MemoryActivityLog implements ActivitySink {
  private entries: ActivityEvent[] = [];

  record(event: ActivityEvent): void {
    this.entries.push(event);
  }

  getEntries(): ActivityEvent[] {
    return [...this.entries];
  }

  getByType(activityType: ActivityType): ActivityEvent[] {
    return this.entries.filter(e => e.activityType === activityType);
  }

  getBySeverity(severity: Severity): ActivityEvent[] {
    return this.entries.filter(e => e.severity === severity);
  }

  getByKey(keyId: string): ActivityEvent[] {
    return this.entries.filter(e => e.keyId === keyId);
  }

  clear(): void {
    this.entries = [];
  }

  toJSON(): string {
    return JSON.stringify(this.entries, null, 2);
  }
}

const SEVERITY_LEVEL: Record<Severity, 'info' | 'warn' | 'error'> = {
  low: 'info',
  medium: 'warn',
  high: 'warn',
  critical: 'error',
};

/** Writes events to the structured log. */
export class LoggerActivitySink implements ActivitySink {
  constructor(private readonly log: Logger = createLogger('activity')) {}

  record(event: ActivityEvent): void {
    const { activityType, ...rest } = event;
    this.log[SEVERITY_LEVEL[event.severity]](activityType, { ...rest });
  }
}

/** Fans one event out to several sinks. */
export class CompositeActivitySink implements ActivitySink {
  constructor(private readonly sinks: ActivitySink[]) {}

  async record(event: ActivityEvent): Promise<void> {
    const results = await Promise.allSettled(this.sinks.map(async s => s.record(event)));
    const failed = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
    if (failed) throw failed.reason;
  }
}

// ── Reporter ──

export type ActivityInput = Omit<ActivityEvent, 'timestamp' | 'details'> & { details?: Record<string, unknown> };

/**
 * Stamps and forwards events. Never throws and never makes the caller wait:
 * sink failures, sync or async, are logged and counted.
 */
export class ActivityReporter {
  private readonly log: Logger;
  private readonly clock: Clock;
  private readonly metrics?: MetricsCollector;

  constructor(
    private readonly sink: ActivitySink,
    opts: { clock?: Clock; logger?: Logger; metrics?: MetricsCollector } = {},
  ) {
    this.clock = opts.clock ?? systemClock;
    this.log = opts.logger ?? createLogger('activity');
    this.metrics = opts.metrics;
  }

  emit(input: ActivityInput): void {
    const event: ActivityEvent = {
      ...input,
      details: input.details ?? {},
      timestamp: new Date(this.clock()).toISOString(),
    };
    try {
      const pending = this.sink.record(event);
      if (pending instanceof Promise) {
        pending.catch((err: unknown) => this.onFailure(event, err));
      }
    } catch (err) {
      this.onFailure(event, err);
    }
  }

  private onFailure(event: ActivityEvent, err: unknown): void {
    this.metrics?.counter(Metric.ActivitySinkFailures, { activityType: event.activityType });
    this.log.error('Activity sink failed', { activityType: event.activityType, error: errorMessage(err) });
  }
}
