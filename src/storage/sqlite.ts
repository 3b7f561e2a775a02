/**
 * SQLite key store using better-sqlite3.
 */

import Database from 'better-sqlite3';
import type { ApiKeyFilter, ApiKeyRecord, ApiKeyStore, KeyMetadata, KeyStatus } from '../core/types.js';
import { StorageError } from '../core/errors.js';
import { ALGORITHM_NAMES, KEY_STATUSES, RATE_LIMIT_PERIODS } from '../core/types.js';

interface ApiKeyRow {
  id: string;
  key_id: string;
  digest: string;
  name: string;
  owner_id: string;
  status: string;
  scopes_json: string;
  expires_at: string | null;
  allowed_ips_json: string | null;
  allowed_domains_json: string | null;
  rate_limit: number | null;
  rate_limit_period: string;
  rate_limit_algorithm: string | null;
  created_at: string;
  updated_at: string;
  last_used_at: string | null;
  metadata_json: string;
}

function parseStringArray(json: string | null): string[] | undefined {
  if (json === null) return undefined;
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === 'string') : [];
}

export class SqliteApiKeyStore implements ApiKeyStore {
  private db: Database.Database;

  constructor(dbPath: string = ':memory:', private readonly clock: () => number = Date.now) {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.createTables();
  }

  private createTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS api_keys (
        id TEXT PRIMARY KEY,
        key_id TEXT NOT NULL UNIQUE,
        digest TEXT NOT NULL,
        name TEXT NOT NULL,
        owner_id TEXT NOT NULL,
        status TEXT NOT NULL,
        scopes_json TEXT NOT NULL,
        expires_at TEXT,
        allowed_ips_json TEXT,
        allowed_domains_json TEXT,
        rate_limit INTEGER,
        rate_limit_period TEXT NOT NULL,
        rate_limit_algorithm TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        last_used_at TEXT,
        metadata_json TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_api_keys_owner ON api_keys(owner_id);
      CREATE INDEX IF NOT EXISTS idx_api_keys_status ON api_keys(status);
      CREATE INDEX IF NOT EXISTS idx_api_keys_expires ON api_keys(expires_at);
    `);
  }

  async create(r: ApiKeyRecord): Promise<void> {
    this.db.prepare(`
      INSERT INTO api_keys (id, key_id, digest, name, owner_id, status, scopes_json, expires_at, allowed_ips_json,
        allowed_domains_json, rate_limit, rate_limit_period, rate_limit_algorithm, created_at, updated_at,
        last_used_at, metadata_json)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      r.id, r.keyId, r.digest, r.name, r.ownerId, r.status, JSON.stringify(r.scopes), r.expiresAt ?? null,
      r.allowedIps ? JSON.stringify(r.allowedIps) : null,
      r.allowedDomains ? JSON.stringify(r.allowedDomains) : null,
      r.rateLimit ?? null, r.rateLimitPeriod, r.rateLimitAlgorithm ?? null, r.createdAt, r.updatedAt,
      r.lastUsedAt ?? null, JSON.stringify(r.metadata),
    );
  }

  async getById(id: string): Promise<ApiKeyRecord | null> {
    const row = this.db.prepare<[string], ApiKeyRow>('SELECT * FROM api_keys WHERE id = ?').get(id);
    return row ? this.rowToRecord(row) : null;
  }

  async getByKeyId(keyId: string): Promise<ApiKeyRecord | null> {
    const row = this.db.prepare<[string], ApiKeyRow>('SELECT * FROM api_keys WHERE key_id = ?').get(keyId);
    return row ? this.rowToRecord(row) : null;
  }

  async list(filter?: ApiKeyFilter): Promise<ApiKeyRecord[]> {
    let sql = 'SELECT * FROM api_keys WHERE 1=1';
    const params: Array<string | number> = [];
    if (filter?.ownerId) { sql += ' AND owner_id = ?'; params.push(filter.ownerId); }
    if (filter?.status && filter.status.length > 0) {
      sql += ` AND status IN (${filter.status.map(() => '?').join(', ')})`;
      params.push(...filter.status);
    }
    const rows = this.db.prepare<Array<string | number>, ApiKeyRow>(sql + ' ORDER BY created_at').all(...params);
    let records = rows.map(r => this.rowToRecord(r));
    // compared as instants, not strings
    if (filter?.expiresBefore) {
      const cutoff = Date.parse(filter.expiresBefore);
      records = records.filter(r => r.expiresAt !== undefined && Date.parse(r.expiresAt) <= cutoff);
    }
    return records;
  }

  async updateStatus(id: string, status: KeyStatus): Promise<boolean> {
    return this.db.prepare('UPDATE api_keys SET status = ?, updated_at = ? WHERE id = ?')
      .run(status, this.now(), id).changes > 0;
  }

  async updateExpiry(id: string, expiresAt: string | null): Promise<boolean> {
    return this.db.prepare('UPDATE api_keys SET expires_at = ?, updated_at = ? WHERE id = ?')
      .run(expiresAt, this.now(), id).changes > 0;
  }

  async updateMetadata(id: string, metadata: KeyMetadata): Promise<boolean> {
    return this.db.prepare('UPDATE api_keys SET metadata_json = ?, updated_at = ? WHERE id = ?')
      .run(JSON.stringify(metadata), this.now(), id).changes > 0;
  }

  async touch(id: string, usedAt: string): Promise<boolean> {
    return this.db.prepare('UPDATE api_keys SET last_used_at = ? WHERE id = ?').run(usedAt, id).changes > 0;
  }

  close(): void {
    this.db.close();
  }

  private now(): string {
    return new Date(this.clock()).toISOString();
  }

  private rowToRecord(row: ApiKeyRow): ApiKeyRecord {
    const status = KEY_STATUSES.find(s => s === row.status);
    const period = RATE_LIMIT_PERIODS.find(p => p === row.rate_limit_period);
    if (!status || !period) {
      throw new StorageError(`Corrupt api_keys row ${row.id}: status=${row.status} period=${row.rate_limit_period}`);
    }
    const algorithm = ALGORITHM_NAMES.find(a => a === row.rate_limit_algorithm);
    const metadata: KeyMetadata = JSON.parse(row.metadata_json);
    return {
      id: row.id,
      keyId: row.key_id,
      digest: row.digest,
      name: row.name,
      ownerId: row.owner_id,
      status,
      scopes: parseStringArray(row.scopes_json) ?? [],
      expiresAt: row.expires_at ?? undefined,
      allowedIps: parseStringArray(row.allowed_ips_json),
      allowedDomains: parseStringArray(row.allowed_domains_json),
      rateLimit: row.rate_limit,
      rateLimitPeriod: period,
      rateLimitAlgorithm: algorithm,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      lastUsedAt: row.last_used_at ?? undefined,
      metadata,
    };
  }
}
