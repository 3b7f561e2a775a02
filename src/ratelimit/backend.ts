/**
 * Counter store contract shared by every rate-limit algorithm.
 *
 * Compound operations are atomic per key: an implementation either runs them
 * without yielding (in-process map) or inside a store transaction. Algorithms
 * never compose a read and a write themselves, so concurrent checks on one key
 * cannot over-admit.
 */

export interface WindowAdmitRequest {
  /** Epoch ms of this request */
  now: number;
  windowMs: number;
  limit: number;
  cost: number;
  /**
   * Store `cost` unit entries instead of one weighted entry.
   * Sliding window counts requests; sliding log sums costs.
   */
  split: boolean;
}

export interface WindowAdmission {
  admitted: boolean;
  /** Units inside the window after this call */
  used: number;
  /** Timestamp of the oldest entry still inside the window, if any */
  oldestAt: number | null;
}

export interface TokenConsumeRequest {
  now: number;
  capacity: number;
  /** Time to refill an empty bucket to capacity */
  windowMs: number;
  cost: number;
}

export interface TokenConsumption {
  admitted: boolean;
  /** Tokens left after this call, in [0, capacity] */
  tokens: number;
}

export interface ConditionalIncrement {
  admitted: boolean;
  /** Counter value after this call (unchanged when not admitted) */
  count: number;
}

export interface CounterBackend {
  readonly name: string;

  /** Add `amount` and return the new value, creating the key with `ttlSeconds` if absent. */
  increment(key: string, amount: number, ttlSeconds: number): Promise<number>;

  /** Add `amount` only if the result stays within `limit`. Amount 0 never creates the key. */
  incrementIfWithin(key: string, amount: number, limit: number, ttlSeconds: number): Promise<ConditionalIncrement>;

  /** Current value of a counter, units in a window, or whole tokens in a bucket; 0 if absent. */
  get(key: string): Promise<number>;

  /** Reset the time-to-live of an existing key. */
  expire(key: string, ttlSeconds: number): Promise<boolean>;

  /** Prune entries older than the window, then append the request if it fits. */
  admitToWindow(key: string, req: WindowAdmitRequest): Promise<WindowAdmission>;

  /** Refill by elapsed time (capped at capacity), then consume `cost` if available. */
  consumeTokens(key: string, req: TokenConsumeRequest): Promise<TokenConsumption>;

  delete(key: string): Promise<boolean>;

  /** Delete every key starting with `prefix`; returns how many went. */
  deletePrefix(prefix: string): Promise<number>;

  close?(): Promise<void> | void;
}

/** Seconds a window entry must outlive its request. */
export function windowTtlSeconds(windowMs: number): number {
  return Math.ceil(windowMs / 1000) + 1;
}
