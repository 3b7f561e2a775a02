/**
 * Rate Limit Manager — applies per-key, global and endpoint limits in order.
 * All layers must admit; the first rejection wins and earlier charges stand.
 */

import type { ActivityReporter } from '../activity/activity-log.js';
import { RepeatTracker } from '../activity/repeat-tracker.js';
import { errorMessage, InvalidArgumentError, RateLimitUnavailableError, UnknownAlgorithmError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { createLogger } from '../core/logger.js';
import type { MetricsCollector } from '../core/metrics.js';
import { Metric } from '../core/metrics.js';
import type { AlgorithmName, ApiKeyRecord, Clock, RateLimitDecision } from '../core/types.js';
import { PERIOD_SECONDS, systemClock } from '../core/types.js';
import type { RateLimitAlgorithm } from './algorithms.js';
import { createAlgorithm } from './algorithms.js';
import type { CounterBackend } from './backend.js';
import type { RateLimitLayer } from './decision.js';
import { decisionHeaders, unlimitedDecision } from './decision.js';

// ── Types ──

export interface RateLimitRule {
  limit: number;
  windowSeconds: number;
  /** Defaults to the manager's algorithm */
  algorithm?: AlgorithmName;
}

/** Shared ceiling: across the whole system, or across all keys of one owner. */
export interface GlobalRule extends RateLimitRule {
  scope: 'system' | 'owner';
}

/** Limit shared by every key hitting paths under `pattern` (prefix; a trailing `*` is ignored). */
export interface EndpointRule extends RateLimitRule {
  pattern: string;
}

export type FailurePolicy = 'fail_closed' | 'fail_open';

export interface LayerDecision {
  layer: RateLimitLayer;
  key: string;
  decision: RateLimitDecision;
}

export type RateLimitOutcome =
  | {
      status: 'allowed';
      allowed: true;
      /** The tightest decision across evaluated layers; drives response headers */
      decision: RateLimitDecision;
      layers: LayerDecision[];
      headers: Record<string, string>;
    }
  | {
      status: 'rejected';
      allowed: false;
      layer: RateLimitLayer;
      decision: RateLimitDecision;
      layers: LayerDecision[];
      headers: Record<string, string>;
    }
  | {
      status: 'unavailable';
      /** Follows the failure policy */
      allowed: boolean;
      error: RateLimitUnavailableError;
      headers: Record<string, string>;
    };

export interface RateLimitCheck {
  record: ApiKeyRecord;
  /** Request path */
  endpoint: string;
  cost?: number;
  sourceIp?: string;
}

export interface RateLimitManagerOptions {
  backend: CounterBackend;
  algorithm?: AlgorithmName;
  global?: GlobalRule;
  endpoints?: EndpointRule[];
  failurePolicy?: FailurePolicy;
  clock?: Clock;
  logger?: Logger;
  metrics?: MetricsCollector;
  activity?: ActivityReporter;
  /** Rejections of one key within `repeatWindowSeconds` before severity escalates */
  repeatThreshold?: number;
  repeatWindowSeconds?: number;
}

// ── Request Cost ──

/** Weight of a request: reads are cheap, writes, admin and bulk work cost more. */
export function computeRequestCost(method: string, path: string): number {
  const m = method.toUpperCase();
  const isAdmin = path.includes('/admin/');
  if (m === 'GET' || m === 'HEAD') {
    return path.includes('/analytics/') || isAdmin ? 2 : 1;
  }
  if (m === 'POST' || m === 'PUT' || m === 'PATCH') {
    if (path.endsWith('/bulk-operation')) return 10;
    return isAdmin ? 5 : 3;
  }
  if (m === 'DELETE') return 5;
  return 1;
}

function normalizePattern(pattern: string): string {
  return pattern.endsWith('*') ? pattern.slice(0, -1) : pattern;
}

function tightest(layers: LayerDecision[], fallback: RateLimitDecision): RateLimitDecision {
  let best: RateLimitDecision | undefined;
  for (const { decision } of layers) {
    if (!best || decision.remaining < best.remaining) best = decision;
  }
  return best ?? fallback;
}

// ── Manager ──

export class RateLimitManager {
  private readonly algorithms = new Map<AlgorithmName, RateLimitAlgorithm>();
  private readonly defaultAlgorithm: AlgorithmName;
  private readonly global?: GlobalRule;
  private readonly endpoints: EndpointRule[];
  private readonly failurePolicy: FailurePolicy;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly metrics?: MetricsCollector;
  private readonly activity?: ActivityReporter;
  private readonly repeats: RepeatTracker;

  constructor(private readonly opts: RateLimitManagerOptions) {
    this.defaultAlgorithm = opts.algorithm ?? 'sliding_window';
    this.global = opts.global;
    this.endpoints = (opts.endpoints ?? []).map(e => ({ ...e, pattern: normalizePattern(e.pattern) }));
    this.failurePolicy = opts.failurePolicy ?? 'fail_closed';
    this.clock = opts.clock ?? systemClock;
    this.log = opts.logger ?? createLogger('ratelimit');
    this.metrics = opts.metrics;
    this.activity = opts.activity;
    this.repeats = new RepeatTracker({
      threshold: opts.repeatThreshold ?? 10,
      windowSeconds: opts.repeatWindowSeconds ?? 300,
      clock: this.clock,
    });

    for (const rule of [this.global, ...this.endpoints]) {
      if (rule?.algorithm) this.algorithm(rule.algorithm);
    }
    this.algorithm(this.defaultAlgorithm);
  }

  /** Evaluate every layer for one request, charging `cost` to each that admits. */
  async check(input: RateLimitCheck): Promise<RateLimitOutcome> {
    const cost = input.cost ?? 1;
    if (!Number.isInteger(cost) || cost < 0) {
      throw new InvalidArgumentError(`cost must be a non-negative integer, got ${cost}`);
    }

    const layers: LayerDecision[] = [];
    try {
      for (const [layer, key, rule] of this.plan(input.record, input.endpoint)) {
        const decision = rule
          ? await this.algorithm(rule.algorithm ?? this.defaultAlgorithm).check(key, rule.limit, rule.windowSeconds, cost)
          : unlimitedDecision(this.clock());
        layers.push({ layer, key, decision });
        if (!decision.allowed) {
          this.metrics?.counter(Metric.RateLimitChecks, { result: 'rejected', layer });
          await this.reportRejection(input, layer, decision);
          return { status: 'rejected', allowed: false, layer, decision, layers, headers: decisionHeaders(decision) };
        }
      }
    } catch (err) {
      if (err instanceof InvalidArgumentError || err instanceof UnknownAlgorithmError) throw err;
      return this.unavailable(err);
    }

    this.metrics?.counter(Metric.RateLimitChecks, { result: 'allowed' });
    const decision = tightest(layers, unlimitedDecision(this.clock()));
    return { status: 'allowed', allowed: true, decision, layers, headers: decisionHeaders(decision) };
  }

  /** Current standing of every layer without charging anything. */
  async status(record: ApiKeyRecord, endpoint = '/'): Promise<RateLimitOutcome> {
    return this.check({ record, endpoint, cost: 0 });
  }

  /** Clear the per-key counters of `record`. */
  async resetKey(record: ApiKeyRecord): Promise<boolean> {
    const rule = this.perKeyRule(record);
    const name = rule?.algorithm ?? this.defaultAlgorithm;
    return this.algorithm(name).reset(`key:${record.id}`);
  }

  /** Endpoint rule governing `path`: the first declared prefix that matches. */
  matchEndpoint(path: string): EndpointRule | undefined {
    return this.endpoints.find(rule => path.startsWith(rule.pattern));
  }

  close(): void {
    this.repeats.close();
  }

  private plan(record: ApiKeyRecord, endpoint: string): Array<[RateLimitLayer, string, RateLimitRule | undefined]> {
    const steps: Array<[RateLimitLayer, string, RateLimitRule | undefined]> = [
      ['per_key', `key:${record.id}`, this.perKeyRule(record)],
    ];
    if (this.global) {
      const key = this.global.scope === 'owner' ? `global:owner:${record.ownerId}` : 'global:system';
      steps.push(['global', key, this.global]);
    }
    const rule = this.matchEndpoint(endpoint);
    if (rule) steps.push(['endpoint', `endpoint:${rule.pattern}`, rule]);
    return steps;
  }

  private perKeyRule(record: ApiKeyRecord): RateLimitRule | undefined {
    if (record.rateLimit === null || record.rateLimit === undefined) return undefined;
    return {
      limit: record.rateLimit,
      windowSeconds: PERIOD_SECONDS[record.rateLimitPeriod],
      algorithm: record.rateLimitAlgorithm,
    };
  }

  private algorithm(name: AlgorithmName): RateLimitAlgorithm {
    let algo = this.algorithms.get(name);
    if (!algo) {
      algo = createAlgorithm(name, this.opts.backend, this.clock);
      this.algorithms.set(name, algo);
    }
    return algo;
  }

  private unavailable(err: unknown): RateLimitOutcome {
    const error = err instanceof RateLimitUnavailableError
      ? err
      : new RateLimitUnavailableError(`Rate limiting unavailable: ${errorMessage(err)}`, { cause: err });
    const allowed = this.failurePolicy === 'fail_open';
    this.metrics?.counter(Metric.RateLimitUnavailable, { policy: this.failurePolicy });
    this.log.error('Rate limit check failed', { policy: this.failurePolicy, allowed, error: error.message });
    return { status: 'unavailable', allowed, error, headers: {} };
  }

  private async reportRejection(input: RateLimitCheck, layer: RateLimitLayer, decision: RateLimitDecision): Promise<void> {
    if (!this.activity) return;
    const severity = await this.repeats.severity(input.record.id, 'medium');
    this.activity.emit({
      activityType: 'rate_limit_exceeded',
      severity,
      keyId: input.record.keyId,
      userId: input.record.ownerId,
      sourceIp: input.sourceIp,
      endpoint: input.endpoint,
      statusCode: 429,
      details: {
        layer,
        limit: decision.limit,
        remaining: decision.remaining,
        retryAfter: decision.retryAfter,
        algorithm: decision.algorithm,
        cost: input.cost ?? 1,
      },
    });
  }
}
