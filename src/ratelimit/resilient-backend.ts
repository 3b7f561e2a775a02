/**
 * Bounds every call to a remote counter store with a timeout and a circuit
 * breaker. Failed calls go to an in-process fallback store when one is
 * configured; otherwise they surface as RateLimitUnavailableError so the
 * caller applies its failure policy.
 */

import { CircuitBreaker } from '../core/circuit-breaker.js';
import type { CircuitBreakerConfig, CircuitState } from '../core/circuit-breaker.js';
import { errorMessage, RateLimitUnavailableError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { createLogger } from '../core/logger.js';
import type { MetricsCollector } from '../core/metrics.js';
import { Metric } from '../core/metrics.js';
import type { Clock } from '../core/types.js';
import { systemClock } from '../core/types.js';
import type {
  ConditionalIncrement,
  CounterBackend,
  TokenConsumeRequest,
  TokenConsumption,
  WindowAdmission,
  WindowAdmitRequest,
} from './backend.js';

export interface ResilientBackendOptions {
  /** Per-call deadline in ms (default 250) */
  timeoutMs?: number;
  breaker?: Partial<CircuitBreakerConfig>;
  /** Store used while the primary is failing */
  fallback?: CounterBackend;
  clock?: Clock;
  logger?: Logger;
  metrics?: MetricsCollector;
}

const CIRCUIT_STATE_VALUE: Record<CircuitState, number> = { CLOSED: 0, HALF_OPEN: 1, OPEN: 2 };

export class ResilientCounterBackend implements CounterBackend {
  readonly name: string;
  private readonly breaker: CircuitBreaker;
  private readonly timeoutMs: number;
  private readonly fallback?: CounterBackend;
  private readonly log: Logger;
  private readonly metrics?: MetricsCollector;

  constructor(private readonly primary: CounterBackend, opts: ResilientBackendOptions = {}) {
    this.name = `resilient(${primary.name})`;
    this.timeoutMs = opts.timeoutMs ?? 250;
    this.fallback = opts.fallback;
    this.metrics = opts.metrics;
    this.log = opts.logger ?? createLogger('ratelimit-backend');
    this.breaker = new CircuitBreaker({
      failureThreshold: opts.breaker?.failureThreshold ?? 5,
      resetTimeoutMs: opts.breaker?.resetTimeoutMs ?? 30_000,
      halfOpenMaxAttempts: opts.breaker?.halfOpenMaxAttempts ?? 1,
    }, opts.clock ?? systemClock);
    this.breaker.onStateChange((from, to) => {
      this.log.warn('Counter store circuit changed state', { backend: primary.name, from, to });
      this.metrics?.gauge(Metric.CircuitState, CIRCUIT_STATE_VALUE[to], { backend: primary.name });
    });
  }

  get circuitState(): CircuitState {
    return this.breaker.getState();
  }

  increment(key: string, amount: number, ttlSeconds: number): Promise<number> {
    return this.call('increment', b => b.increment(key, amount, ttlSeconds));
  }

  incrementIfWithin(key: string, amount: number, limit: number, ttlSeconds: number): Promise<ConditionalIncrement> {
    return this.call('incrementIfWithin', b => b.incrementIfWithin(key, amount, limit, ttlSeconds));
  }

  get(key: string): Promise<number> {
    return this.call('get', b => b.get(key));
  }

  expire(key: string, ttlSeconds: number): Promise<boolean> {
    return this.call('expire', b => b.expire(key, ttlSeconds));
  }

  admitToWindow(key: string, req: WindowAdmitRequest): Promise<WindowAdmission> {
    return this.call('admitToWindow', b => b.admitToWindow(key, req));
  }

  consumeTokens(key: string, req: TokenConsumeRequest): Promise<TokenConsumption> {
    return this.call('consumeTokens', b => b.consumeTokens(key, req));
  }

  delete(key: string): Promise<boolean> {
    return this.call('delete', b => b.delete(key));
  }

  deletePrefix(prefix: string): Promise<number> {
    return this.call('deletePrefix', b => b.deletePrefix(prefix));
  }

  async close(): Promise<void> {
    await this.primary.close?.();
    await this.fallback?.close?.();
  }

  private async call<T>(op: string, fn: (backend: CounterBackend) => Promise<T>): Promise<T> {
    try {
      const run = () => withTimeout(fn(this.primary), this.timeoutMs, `${this.primary.name}.${op}`);
      return this.metrics
        ? await this.metrics.time(Metric.BackendLatencyMs, () => this.breaker.execute(run), { op })
        : await this.breaker.execute(run);
    } catch (err) {
      if (this.fallback) {
        this.log.warn('Counter store call failed, using fallback', { op, error: errorMessage(err) });
        this.metrics?.counter(Metric.BackendFallbacks, { op });
        return fn(this.fallback);
      }
      this.log.error('Counter store unavailable', { op, error: errorMessage(err) });
      throw new RateLimitUnavailableError(`Rate limiting unavailable: ${errorMessage(err)}`, { cause: err });
    }
  }
}

/** Reject with a timeout error if `promise` has not settled within `ms`. */
export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
