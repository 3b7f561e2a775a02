/**
 * Shared counter store on SQLite (better-sqlite3).
 *
 * Compound operations run as IMMEDIATE transactions, which take the database
 * write lock up front, so processes sharing one database file serialize on it
 * exactly as callers of the in-process store serialize on the event loop.
 */

import Database from 'better-sqlite3';
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
import { DEFAULT_SWEEP_INTERVAL_MS } from './memory-backend.js';

interface CounterRow {
  value: number;
  expires_at: number;
}

interface BucketRow {
  tokens: number;
  last_refill: number;
}

interface WindowSummaryRow {
  used: number | null;
  oldest: number | null;
  entries: number;
}

export interface SqliteBackendOptions {
  clock?: Clock;
  sweepIntervalMs?: number;
  /** Milliseconds to wait on a locked database before failing */
  busyTimeoutMs?: number;
}

export class SqliteCounterBackend implements CounterBackend {
  readonly name = 'sqlite';
  private db: Database.Database;
  private readonly clock: Clock;
  private readonly sweepIntervalMs: number;
  private lastSweep: number;

  constructor(dbPath: string = ':memory:', opts: SqliteBackendOptions = {}) {
    this.clock = opts.clock ?? systemClock;
    this.sweepIntervalMs = opts.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.lastSweep = this.clock();
    this.db = new Database(dbPath, { timeout: opts.busyTimeoutMs ?? 2_000 });
    this.db.pragma('journal_mode = WAL');
    this.createTables();
  }

  private createTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS rl_counters (
        key TEXT PRIMARY KEY,
        value REAL NOT NULL,
        expires_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS rl_window_entries (
        key TEXT NOT NULL,
        at INTEGER NOT NULL,
        cost REAL NOT NULL,
        expires_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_rl_window_key_at ON rl_window_entries(key, at);

      CREATE TABLE IF NOT EXISTS rl_buckets (
        key TEXT PRIMARY KEY,
        tokens REAL NOT NULL,
        last_refill INTEGER NOT NULL,
        expires_at INTEGER NOT NULL
      );
    `);
  }

  async increment(key: string, amount: number, ttlSeconds: number): Promise<number> {
    const run = this.db.transaction((): number => {
      const now = this.clock();
      const row = this.counterRow(key, now);
      const value = (row?.value ?? 0) + amount;
      this.db.prepare(`
        INSERT OR REPLACE INTO rl_counters (key, value, expires_at) VALUES (?, ?, ?)
      `).run(key, value, row?.expires_at ?? now + ttlSeconds * 1000);
      return value;
    });
    this.maybeSweep();
    return run.immediate();
  }

  async incrementIfWithin(key: string, amount: number, limit: number, ttlSeconds: number): Promise<ConditionalIncrement> {
    const run = this.db.transaction((): ConditionalIncrement => {
      const now = this.clock();
      const row = this.counterRow(key, now);
      const current = row?.value ?? 0;
      if (amount === 0) return { admitted: true, count: current };
      if (current + amount > limit) return { admitted: false, count: current };
      const count = current + amount;
      this.db.prepare(`
        INSERT OR REPLACE INTO rl_counters (key, value, expires_at) VALUES (?, ?, ?)
      `).run(key, count, row?.expires_at ?? now + ttlSeconds * 1000);
      return { admitted: true, count };
    });
    this.maybeSweep();
    return run.immediate();
  }

  async get(key: string): Promise<number> {
    const now = this.clock();
    const counter = this.counterRow(key, now);
    if (counter) return counter.value;
    const bucket = this.db.prepare<[string, number], BucketRow>(
      'SELECT tokens, last_refill FROM rl_buckets WHERE key = ? AND expires_at > ?',
    ).get(key, now);
    if (bucket) return Math.floor(bucket.tokens);
    const window = this.db.prepare<[string, number], { used: number | null }>(
      'SELECT SUM(cost) AS used FROM rl_window_entries WHERE key = ? AND expires_at > ?',
    ).get(key, now);
    return window?.used ?? 0;
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    const now = this.clock();
    const deadline = now + ttlSeconds * 1000;
    let changed = 0;
    for (const table of ['rl_counters', 'rl_buckets', 'rl_window_entries']) {
      changed += this.db.prepare(`UPDATE ${table} SET expires_at = ? WHERE key = ? AND expires_at > ?`)
        .run(deadline, key, now).changes;
    }
    return changed > 0;
  }

  async admitToWindow(key: string, req: WindowAdmitRequest): Promise<WindowAdmission> {
    const run = this.db.transaction((): WindowAdmission => {
      const cutoff = req.now - req.windowMs;
      this.db.prepare('DELETE FROM rl_window_entries WHERE key = ? AND at < ?').run(key, cutoff);
      const summary = this.db.prepare<[string], WindowSummaryRow>(`
        SELECT SUM(cost) AS used, MIN(at) AS oldest, COUNT(*) AS entries
        FROM rl_window_entries WHERE key = ?
      `).get(key);
      const used = summary?.used ?? 0;
      const admitted = req.cost === 0 || used + req.cost <= req.limit;

      if (admitted && req.cost > 0) {
        const expiresAt = this.clock() + windowTtlSeconds(req.windowMs) * 1000;
        const insert = this.db.prepare(
          'INSERT INTO rl_window_entries (key, at, cost, expires_at) VALUES (?, ?, ?, ?)',
        );
        if (req.split) {
          for (let i = 0; i < req.cost; i++) insert.run(key, req.now, 1, expiresAt);
        } else {
          insert.run(key, req.now, req.cost, expiresAt);
        }
        this.db.prepare('UPDATE rl_window_entries SET expires_at = ? WHERE key = ?').run(expiresAt, key);
      }

      const appended = admitted && req.cost > 0;
      const oldest = summary?.oldest ?? (appended ? req.now : null);
      return { admitted, used: admitted ? used + req.cost : used, oldestAt: oldest };
    });
    this.maybeSweep();
    return run.immediate();
  }

  async consumeTokens(key: string, req: TokenConsumeRequest): Promise<TokenConsumption> {
    const run = this.db.transaction((): TokenConsumption => {
      const existing = this.db.prepare<[string, number], BucketRow>(
        'SELECT tokens, last_refill FROM rl_buckets WHERE key = ? AND expires_at > ?',
      ).get(key, this.clock());
      let tokens = req.capacity;
      if (existing) {
        const elapsed = Math.max(0, req.now - existing.last_refill);
        tokens = Math.min(req.capacity, existing.tokens + (elapsed * req.capacity) / req.windowMs);
      }
      if (req.cost === 0) return { admitted: true, tokens };

      const admitted = tokens >= req.cost;
      if (admitted) tokens = Math.max(0, tokens - req.cost);
      if (admitted || existing) {
        this.db.prepare(`
          INSERT OR REPLACE INTO rl_buckets (key, tokens, last_refill, expires_at) VALUES (?, ?, ?, ?)
        `).run(key, tokens, req.now, this.clock() + windowTtlSeconds(req.windowMs) * 1000);
      }
      return { admitted, tokens };
    });
    this.maybeSweep();
    return run.immediate();
  }

  async delete(key: string): Promise<boolean> {
    const run = this.db.transaction((): boolean => {
      const now = this.clock();
      let live = 0;
      for (const table of ['rl_counters', 'rl_buckets', 'rl_window_entries']) {
        live += this.db.prepare(`DELETE FROM ${table} WHERE key = ? AND expires_at > ?`).run(key, now).changes;
        this.db.prepare(`DELETE FROM ${table} WHERE key = ?`).run(key);
      }
      return live > 0;
    });
    return run.immediate();
  }

  async deletePrefix(prefix: string): Promise<number> {
    const run = this.db.transaction((): number => {
      const now = this.clock();
      let removed = 0;
      for (const table of ['rl_counters', 'rl_buckets', 'rl_window_entries']) {
        const row = this.db.prepare<[number, string, number], { keys: number }>(
          `SELECT COUNT(DISTINCT key) AS keys FROM ${table} WHERE substr(key, 1, ?) = ? AND expires_at > ?`,
        ).get(prefix.length, prefix, now);
        removed += row?.keys ?? 0;
        this.db.prepare(`DELETE FROM ${table} WHERE substr(key, 1, ?) = ?`).run(prefix.length, prefix);
      }
      return removed;
    });
    return run.immediate();
  }

  /** Delete expired rows. Returns how many rows went. */
  sweep(): number {
    const now = this.clock();
    let removed = 0;
    for (const table of ['rl_counters', 'rl_buckets', 'rl_window_entries']) {
      removed += this.db.prepare(`DELETE FROM ${table} WHERE expires_at <= ?`).run(now).changes;
    }
    this.lastSweep = now;
    return removed;
  }

  close(): void {
    this.db.close();
  }

  private counterRow(key: string, now: number): CounterRow | undefined {
    return this.db.prepare<[string, number], CounterRow>(
      'SELECT value, expires_at FROM rl_counters WHERE key = ? AND expires_at > ?',
    ).get(key, now);
  }

  private maybeSweep(): void {
    if (this.clock() - this.lastSweep >= this.sweepIntervalMs) this.sweep();
  }
}
