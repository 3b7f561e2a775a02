/**
 * In-process counter store.
 *
 * Every operation completes without awaiting, so on Node's single event loop
 * each compound operation is atomic with respect to every other caller.
 */

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
import { windowTtlSeconds } from './backend.js';

// ── Types ──

interface WindowEntry {
  at: number;
  cost: number;
}

type Entry =
  | { kind: 'counter'; count: number; expiresAt: number }
  | { kind: 'window'; entries: WindowEntry[]; expiresAt: number }
  | { kind: 'bucket'; tokens: number; lastRefill: number; expiresAt: number };

type EntryOf<K extends Entry['kind']> = Extract<Entry, { kind: K }>;

export interface MemoryBackendOptions {
  clock?: Clock;
  /** Minimum time between amortized sweeps of expired keys (default 5 minutes) */
  sweepIntervalMs?: number;
}

export const DEFAULT_SWEEP_INTERVAL_MS = 300_000;

// ── Memory Counter Backend ──

export class MemoryCounterBackend implements CounterBackend {
  readonly name = 'memory';
  private entries = new Map<string, Entry>();
  private readonly clock: Clock;
  private readonly sweepIntervalMs: number;
  private lastSweep: number;
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;

  constructor(opts: MemoryBackendOptions = {}) {
    this.clock = opts.clock ?? systemClock;
    this.sweepIntervalMs = opts.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.lastSweep = this.clock();
  }

  async increment(key: string, amount: number, ttlSeconds: number): Promise<number> {
    this.maybeSweep();
    const entry = this.live(key, 'counter');
    const count = (entry?.count ?? 0) + amount;
    this.entries.set(key, { kind: 'counter', count, expiresAt: entry?.expiresAt ?? this.deadline(ttlSeconds) });
    return count;
  }

  async incrementIfWithin(key: string, amount: number, limit: number, ttlSeconds: number): Promise<ConditionalIncrement> {
    this.maybeSweep();
    const entry = this.live(key, 'counter');
    const current = entry?.count ?? 0;
    if (amount === 0) return { admitted: true, count: current };
    if (current + amount > limit) return { admitted: false, count: current };
    const count = current + amount;
    this.entries.set(key, { kind: 'counter', count, expiresAt: entry?.expiresAt ?? this.deadline(ttlSeconds) });
    return { admitted: true, count };
  }

  async get(key: string): Promise<number> {
    const entry = this.entries.get(key);
    if (!entry || entry.expiresAt <= this.clock()) return 0;
    switch (entry.kind) {
      case 'counter': return entry.count;
      case 'window': return entry.entries.reduce((sum, e) => sum + e.cost, 0);
      case 'bucket': return Math.floor(entry.tokens);
    }
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    const entry = this.entries.get(key);
    if (!entry || entry.expiresAt <= this.clock()) return false;
    entry.expiresAt = this.deadline(ttlSeconds);
    return true;
  }

  async admitToWindow(key: string, req: WindowAdmitRequest): Promise<WindowAdmission> {
    this.maybeSweep();
    const cutoff = req.now - req.windowMs;
    const existing = this.live(key, 'window');
    const entries = existing ? existing.entries.filter(e => e.at >= cutoff) : [];
    const used = entries.reduce((sum, e) => sum + e.cost, 0);
    const admitted = req.cost === 0 || used + req.cost <= req.limit;

    if (admitted && req.cost > 0) {
      if (req.split) {
        for (let i = 0; i < req.cost; i++) entries.push({ at: req.now, cost: 1 });
      } else {
        entries.push({ at: req.now, cost: req.cost });
      }
    }

    if (entries.length > 0) {
      this.entries.set(key, { kind: 'window', entries, expiresAt: this.deadline(windowTtlSeconds(req.windowMs)) });
    } else if (existing) {
      this.entries.delete(key);
    }

    return {
      admitted,
      used: admitted ? used + req.cost : used,
      oldestAt: entries.length > 0 ? entries[0].at : null,
    };
  }

  async consumeTokens(key: string, req: TokenConsumeRequest): Promise<TokenConsumption> {
    this.maybeSweep();
    const existing = this.live(key, 'bucket');
    let tokens = req.capacity;
    if (existing) {
      const elapsed = Math.max(0, req.now - existing.lastRefill);
      tokens = Math.min(req.capacity, existing.tokens + (elapsed * req.capacity) / req.windowMs);
    }

    if (req.cost === 0) return { admitted: true, tokens };

    const admitted = tokens >= req.cost;
    if (admitted) tokens = Math.max(0, tokens - req.cost);
    if (admitted || existing) {
      this.entries.set(key, {
        kind: 'bucket',
        tokens,
        lastRefill: req.now,
        expiresAt: this.deadline(windowTtlSeconds(req.windowMs)),
      });
    }
    return { admitted, tokens };
  }

  async delete(key: string): Promise<boolean> {
    const entry = this.entries.get(key);
    this.entries.delete(key);
    return entry !== undefined && entry.expiresAt > this.clock();
  }

  async deletePrefix(prefix: string): Promise<number> {
    const now = this.clock();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (!key.startsWith(prefix)) continue;
      if (entry.expiresAt > now) removed++;
      this.entries.delete(key);
    }
    return removed;
  }

  /** Remove every expired key now. Returns how many were removed. */
  sweep(): number {
    const now = this.clock();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    this.lastSweep = now;
    return removed;
  }

  /** Sweep on a timer as well as on access. */
  startCleanup(intervalMs = this.sweepIntervalMs): void {
    if (this.cleanupTimer) return;
    this.cleanupTimer = setInterval(() => this.sweep(), intervalMs);
    this.cleanupTimer.unref();
  }

  stopCleanup(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  close(): void {
    this.stopCleanup();
    this.entries.clear();
  }

  /** Number of stored keys, expired or not (for monitoring). */
  get size(): number {
    return this.entries.size;
  }

  private live<K extends Entry['kind']>(key: string, kind: K): EntryOf<K> | undefined {
    const entry = this.entries.get(key);
    if (!entry || entry.expiresAt <= this.clock()) return undefined;
    return isKind(entry, kind) ? entry : undefined;
  }

  private deadline(ttlSeconds: number): number {
    return this.clock() + ttlSeconds * 1000;
  }

  private maybeSweep(): void {
    if (this.clock() - this.lastSweep >= this.sweepIntervalMs) this.sweep();
  }
}

function isKind<K extends Entry['kind']>(entry: Entry, kind: K): entry is EntryOf<K> {
  return entry.kind === kind;
}
