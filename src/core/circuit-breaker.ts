/**
 * Circuit Breaker — stops calling a failing counter store until it has had time to recover.
 */

import type { Clock } from './types.js';
import { systemClock } from './types.js';

// ── Types ──

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerConfig {
  /** Consecutive failures before tripping to OPEN */
  failureThreshold: number;
  /** Time in ms before an OPEN circuit lets a probe through */
  resetTimeoutMs: number;
  /** Probes allowed while HALF_OPEN before the circuit decides */
  halfOpenMaxAttempts: number;
}

export type StateChangeCallback = (from: CircuitState, to: CircuitState) => void;

// ── Circuit Breaker ──

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failureCount = 0;
  private halfOpenAttempts = 0;
  private lastFailureTime = 0;
  private listeners: StateChangeCallback[] = [];

  constructor(
    private readonly config: CircuitBreakerConfig,
    private readonly clock: Clock = systemClock,
  ) {}

  /** Run `fn` unless the circuit is open. */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.admit();
    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (err) {
      this.onFailure();
      throw err;
    }
  }

  getState(): CircuitState {
    this.maybeHalfOpen();
    return this.state;
  }

  onStateChange(callback: StateChangeCallback): void {
    this.listeners.push(callback);
  }

  getFailureCount(): number {
    return this.failureCount;
  }

  forceReset(): void {
    this.reset();
  }

  private admit(): void {
    this.maybeHalfOpen();
    if (this.state === 'OPEN') {
      throw new CircuitOpenError('Circuit breaker is OPEN');
    }
    if (this.state === 'HALF_OPEN') {
      if (this.halfOpenAttempts >= this.config.halfOpenMaxAttempts) {
        throw new CircuitOpenError('Circuit breaker is HALF_OPEN and out of probes');
      }
      this.halfOpenAttempts++;
    }
  }

  private maybeHalfOpen(): void {
    if (this.state === 'OPEN' && this.clock() - this.lastFailureTime >= this.config.resetTimeoutMs) {
      this.halfOpenAttempts = 0;
      this.transition('HALF_OPEN');
    }
  }

  private onSuccess(): void {
    if (this.state === 'HALF_OPEN') {
      this.reset();
    } else {
      this.failureCount = 0;
    }
  }

  private onFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.clock();
    if (this.state === 'HALF_OPEN' || this.failureCount >= this.config.failureThreshold) {
      this.transition('OPEN');
      this.halfOpenAttempts = 0;
    }
  }

  private reset(): void {
    this.failureCount = 0;
    this.halfOpenAttempts = 0;
    this.transition('CLOSED');
  }

  private transition(to: CircuitState): void {
    if (this.state === to) return;
    const from = this.state;
    this.state = to;
    for (const cb of this.listeners) {
      cb(from, to);
    }
  }
}

/** Error thrown when the circuit is open. */
export class CircuitOpenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CircuitOpenError';
  }
}
