/**
 * Rate Limiting — four admission strategies over a CounterBackend.
 *
 * Each strategy namespaces its keys, so one backend can host all four.
 * A rejected request is never charged.
 */

import { InvalidArgumentError, UnknownAlgorithmError } from '../core/errors.js';
import type { AlgorithmName, Clock, RateLimitDecision } from '../core/types.js';
import { ALGORITHM_NAMES, systemClock } from '../core/types.js';
import type { CounterBackend } from './backend.js';

// ── Interface ──

export interface RateLimitAlgorithm {
  readonly name: AlgorithmName;
  /** Decide whether a request costing `cost` fits `limit` per `windowSeconds`. */
  check(key: string, limit: number, windowSeconds: number, cost?: number): Promise<RateLimitDecision>;
  /** Clear all state for `key`. False when there was none. */
  reset(key: string): Promise<boolean>;
}

/** Whole seconds until `at`, never below 1. */
export function secondsUntil(at: number, now: number): number {
  return Math.max(1, Math.ceil((at - now) / 1000));
}

function validate(limit: number, windowSeconds: number, cost: number): void {
  if (!Number.isFinite(limit) || limit < 0) {
    throw new InvalidArgumentError(`limit must be a non-negative number, got ${limit}`);
  }
  if (!Number.isFinite(windowSeconds) || windowSeconds <= 0) {
    throw new InvalidArgumentError(`windowSeconds must be positive, got ${windowSeconds}`);
  }
  if (!Number.isInteger(cost) || cost < 0) {
    throw new InvalidArgumentError(`cost must be a non-negative integer, got ${cost}`);
  }
}

abstract class BaseAlgorithm implements RateLimitAlgorithm {
  abstract readonly name: AlgorithmName;

  constructor(
    protected readonly backend: CounterBackend,
    protected readonly clock: Clock = systemClock,
  ) {}

  async check(key: string, limit: number, windowSeconds: number, cost = 1): Promise<RateLimitDecision> {
    validate(limit, windowSeconds, cost);
    return this.decide(key, limit, windowSeconds * 1000, cost, this.clock());
  }

  protected abstract decide(
    key: string,
    limit: number,
    windowMs: number,
    cost: number,
    now: number,
  ): Promise<RateLimitDecision>;

  abstract reset(key: string): Promise<boolean>;
}

// ── Fixed Window ──

/** Counts per `floor(now / window)` bucket; resets at the window boundary. */
export class FixedWindowAlgorithm extends BaseAlgorithm {
  readonly name = 'fixed_window' as const;

  protected async decide(key: string, limit: number, windowMs: number, cost: number, now: number): Promise<RateLimitDecision> {
    const index = Math.floor(now / windowMs);
    const boundary = (index + 1) * windowMs;
    const ttl = Math.ceil((boundary - now) / 1000) + 1;
    const { admitted, count } = await this.backend.incrementIfWithin(`fw:${key}#${index}`, cost, limit, ttl);
    return {
      allowed: admitted,
      limit,
      remaining: Math.max(0, limit - count),
      resetAt: boundary,
      retryAfter: admitted ? undefined : secondsUntil(boundary, now),
      windowSeconds: windowMs / 1000,
      algorithm: this.name,
    };
  }

  async reset(key: string): Promise<boolean> {
    return (await this.backend.deletePrefix(`fw:${key}#`)) > 0;
  }
}

// ── Sliding Window / Sliding Log ──

abstract class WindowedAlgorithm extends BaseAlgorithm {
  protected abstract readonly prefix: string;
  protected abstract readonly split: boolean;

  protected async decide(key: string, limit: number, windowMs: number, cost: number, now: number): Promise<RateLimitDecision> {
    const { admitted, used, oldestAt } = await this.backend.admitToWindow(`${this.prefix}${key}`, {
      now,
      windowMs,
      limit,
      cost,
      split: this.split,
    });
    const resetAt = oldestAt === null ? now + windowMs : oldestAt + windowMs;
    return {
      allowed: admitted,
      limit,
      remaining: Math.max(0, limit - used),
      resetAt,
      retryAfter: admitted ? undefined : secondsUntil(resetAt, now),
      windowSeconds: windowMs / 1000,
      algorithm: this.name,
    };
  }

  async reset(key: string): Promise<boolean> {
    return this.backend.delete(`${this.prefix}${key}`);
  }
}

/** Counts individual requests in the trailing window; a cost-n request occupies n slots. */
export class SlidingWindowAlgorithm extends WindowedAlgorithm {
  readonly name = 'sliding_window' as const;
  protected readonly prefix = 'sw:';
  protected readonly split = true;
}

/** Sums weighted `{at, cost}` entries in the trailing window. */
export class SlidingLogAlgorithm extends WindowedAlgorithm {
  readonly name = 'sliding_log' as const;
  protected readonly prefix = 'sl:';
  protected readonly split = false;
}

// ── Token Bucket ──

/** Capacity `limit`, refilling continuously at `limit / window` tokens per second. */
export class TokenBucketAlgorithm extends BaseAlgorithm {
  readonly name = 'token_bucket' as const;

  protected async decide(key: string, limit: number, windowMs: number, cost: number, now: number): Promise<RateLimitDecision> {
    const { admitted, tokens } = await this.backend.consumeTokens(`tb:${key}`, {
      now,
      capacity: limit,
      windowMs,
      cost,
    });
    const windowSeconds = windowMs / 1000;
    const perSecond = limit / windowSeconds;
    const resetAt = limit === 0 ? now + windowMs : now + ((limit - tokens) * windowMs) / limit;
    let retryAfter: number | undefined;
    if (!admitted) {
      retryAfter = perSecond > 0 ? Math.max(1, Math.ceil((cost - tokens) / perSecond)) : Math.ceil(windowSeconds);
    }
    return {
      allowed: admitted,
      limit,
      remaining: Math.max(0, Math.floor(tokens)),
      resetAt,
      retryAfter,
      windowSeconds,
      algorithm: this.name,
    };
  }

  async reset(key: string): Promise<boolean> {
    return this.backend.delete(`tb:${key}`);
  }
}

// ── Factory ──

export function isAlgorithmName(name: string): name is AlgorithmName {
  return ALGORITHM_NAMES.some(n => n === name);
}

/** Build the strategy for `name`. Unknown names are an input error. */
export function createAlgorithm(name: string, backend: CounterBackend, clock: Clock = systemClock): RateLimitAlgorithm {
  if (!isAlgorithmName(name)) throw new UnknownAlgorithmError(name);
  switch (name) {
    case 'fixed_window': return new FixedWindowAlgorithm(backend, clock);
    case 'sliding_window': return new SlidingWindowAlgorithm(backend, clock);
    case 'sliding_log': return new SlidingLogAlgorithm(backend, clock);
    case 'token_bucket': return new TokenBucketAlgorithm(backend, clock);
  }
}
