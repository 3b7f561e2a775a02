/**
 * In-memory key store for tests and simple use.
 */

import type { ApiKeyFilter, ApiKeyRecord, ApiKeyStore, KeyMetadata, KeyStatus } from '../core/types.js';

function copy(record: ApiKeyRecord): ApiKeyRecord {
  return {
    ...record,
    scopes: [...record.scopes],
    allowedIps: record.allowedIps ? [...record.allowedIps] : undefined,
    allowedDomains: record.allowedDomains ? [...record.allowedDomains] : undefined,
    metadata: structuredClone(record.metadata),
  };
}

export function matchesFilter(record: ApiKeyRecord, filter?: ApiKeyFilter): boolean {
  if (!filter) return true;
  if (filter.ownerId && record.ownerId !== filter.ownerId) return false;
  if (filter.status && !filter.status.includes(record.status)) return false;
  if (filter.expiresBefore) {
    if (!record.expiresAt || Date.parse(record.expiresAt) > Date.parse(filter.expiresBefore)) return false;
  }
  return true;
}

export class MemoryApiKeyStore implements ApiKeyStore {
  private records = new Map<string, ApiKeyRecord>();
  private byKeyId = new Map<string, string>();

  constructor(private readonly clock: () => number = Date.now) {}

  async create(record: ApiKeyRecord): Promise<void> {
    this.records.set(record.id, copy(record));
    this.byKeyId.set(record.keyId, record.id);
  }

  async getById(id: string): Promise<ApiKeyRecord | null> {
    const record = this.records.get(id);
    return record ? copy(record) : null;
  }

  async getByKeyId(keyId: string): Promise<ApiKeyRecord | null> {
    const id = this.byKeyId.get(keyId);
    return id ? this.getById(id) : null;
  }

  async list(filter?: ApiKeyFilter): Promise<ApiKeyRecord[]> {
    return Array.from(this.records.values()).filter(r => matchesFilter(r, filter)).map(copy);
  }

  async updateStatus(id: string, status: KeyStatus): Promise<boolean> {
    return this.patch(id, { status });
  }

  async updateExpiry(id: string, expiresAt: string | null): Promise<boolean> {
    return this.patch(id, { expiresAt: expiresAt ?? undefined });
  }

  async updateMetadata(id: string, metadata: KeyMetadata): Promise<boolean> {
    return this.patch(id, { metadata: structuredClone(metadata) });
  }

  async touch(id: string, usedAt: string): Promise<boolean> {
    const record = this.records.get(id);
    if (!record) return false;
    record.lastUsedAt = usedAt;
    return true;
  }

  private patch(id: string, changes: Partial<ApiKeyRecord>): boolean {
    const record = this.records.get(id);
    if (!record) return false;
    this.records.set(id, { ...record, ...changes, updatedAt: new Date(this.clock()).toISOString() });
    return true;
  }
}
