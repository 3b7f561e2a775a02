/**
 * Background scheduler that runs lifecycle cycles on an interval.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { errorMessage } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { createLogger } from '../core/logger.js';
import type { MetricsCollector } from '../core/metrics.js';
import { Metric } from '../core/metrics.js';
import type { CycleSummary } from './manager.js';

export interface CycleRunner {
  runCycle(): Promise<CycleSummary>;
}

export interface LifecycleServiceOptions {
  /** Time between successful cycles (default 1 hour) */
  intervalMs?: number;
  /** Time before retrying after a failed cycle (default 1 minute) */
  retryDelayMs?: number;
  logger?: Logger;
  metrics?: MetricsCollector;
  /** Called after each successful cycle */
  onCycle?: (summary: CycleSummary) => void;
}

export class LifecycleService {
  private readonly intervalMs: number;
  private readonly retryDelayMs: number;
  private readonly log: Logger;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private cycles = 0;

  constructor(private readonly runner: CycleRunner, private readonly opts: LifecycleServiceOptions = {}) {
    this.intervalMs = opts.intervalMs ?? 3_600_000;
    this.retryDelayMs = opts.retryDelayMs ?? 60_000;
    this.log = opts.logger ?? createLogger('lifecycle-service');
  }

  get running(): boolean {
    return this.controller !== null;
  }

  /** Completed cycles since construction */
  get completedCycles(): number {
    return this.cycles;
  }

  /** Start the loop; the first cycle runs immediately. No-op when already running. */
  start(): void {
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
    this.log.info('Lifecycle service started', { intervalMs: this.intervalMs });
  }

  /** Stop the loop and wait for an in-flight cycle to finish. */
  async stop(): Promise<void> {
    const controller = this.controller;
    const loop = this.loop;
    if (!controller || !loop) return;
    controller.abort();
    await loop;
    this.controller = null;
    this.loop = null;
    this.log.info('Lifecycle service stopped', { cycles: this.cycles });
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let delay = this.intervalMs;
      try {
        const summary = await this.runner.runCycle();
        this.cycles++;
        this.opts.onCycle?.(summary);
        this.log.debug('Lifecycle cycle completed', {
          noticesSent: summary.noticesSent,
          expired: summary.expired.length,
          revoked: summary.revoked.length,
          rotations: summary.rotations.length,
        });
      } catch (err) {
        delay = this.retryDelayMs;
        this.opts.metrics?.counter(Metric.LifecycleCycles, { result: 'failed' });
        this.log.error('Lifecycle cycle failed', { error: errorMessage(err), retryInMs: delay });
      }
      if (!(await this.wait(delay, signal))) return;
    }
  }

  /** Resolves false when aborted during the wait. */
  private async wait(ms: number, signal: AbortSignal): Promise<boolean> {
    try {
      await sleep(ms, undefined, { signal, ref: false });
      return true;
    } catch (err) {
      if (signal.aborted) return false;
      throw err;
    }
  }
}
