import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  AuthenticationGate,
  clientIp,
  domainAllowed,
  extractCredential,
  normalizeIp,
} from '../src/auth/gate.js';
import type { AuthenticationGateOptions, AuthRequest } from '../src/auth/gate.js';
import { ActivityReporter, MemoryActivityLog } from '../src/activity/activity-log.js';
import { KeyMaterialManager } from '../src/core/crypto.js';
import { StorageError } from '../src/core/errors.js';
import { LogLevel, setGlobalLogLevel } from '../src/core/logger.js';
import { Metric, MetricsCollector } from '../src/core/metrics.js';
import type { ApiKeyRecord } from '../src/core/types.js';
import { MemoryApiKeyStore } from '../src/storage/memory.js';
import { DAY_MS, makeRecord, TestClock } from './fixtures.js';

class BrokenStore extends MemoryApiKeyStore {
  async getByKeyId(): Promise<ApiKeyRecord | null> {
    throw new Error('disk on fire');
  }
}

describe('AuthenticationGate', () => {
  const keys = new KeyMaterialManager('test-secret');
  let clock: TestClock;
  let store: MemoryApiKeyStore;
  let log: MemoryActivityLog;
  let metrics: MetricsCollector;
  let gate: AuthenticationGate;

  const build = (opts: Partial<AuthenticationGateOptions> = {}) => {
    gate.close();
    gate = new AuthenticationGate({
      store,
      keys,
      clock: clock.read,
      activity: new ActivityReporter(log, { clock: clock.read }),
      metrics,
      ...opts,
    });
    return gate;
  };

  const issue = async (overrides: Partial<ApiKeyRecord> = {}) => {
    const pair = keys.generateKeyPair();
    const record = makeRecord({ keyId: pair.keyId, digest: pair.digest, ...overrides });
    await store.create(record);
    return { record, credential: pair.credential };
  };

  const request = (credential: string | undefined, extra: Partial<AuthRequest> = {}): AuthRequest => ({
    credential,
    sourceIp: '10.0.0.1',
    requestPath: '/api/v1/data',
    ...extra,
  });

  beforeEach(() => {
    setGlobalLogLevel(LogLevel.SILENT);
    clock = new TestClock();
    store = new MemoryApiKeyStore(clock.read);
    log = new MemoryActivityLog();
    metrics = new MetricsCollector();
    gate = new AuthenticationGate({ store, keys });
    build();
  });

  afterEach(() => {
    gate.close();
    setGlobalLogLevel(LogLevel.INFO);
  });

  describe('valid keys', () => {
    it('admits an active key and records its use', async () => {
      const { record, credential } = await issue();
      const result = await gate.authenticate(request(credential));
      expect(result.valid).toBe(true);
      if (!result.valid) return;
      expect(result.record.id).toBe(record.id);
      expect(result.deprecated).toBe(false);
      expect((await store.getById(record.id))?.lastUsedAt).toBe(clock.iso());
      expect(metrics.getCounter(Metric.AuthAttempts, { result: 'success' })).toBe(1);
      expect(log.getByType('auth_success')[0]).toMatchObject({
        severity: 'low',
        keyId: record.keyId,
        userId: 'owner-1',
        sourceIp: '10.0.0.1',
        statusCode: 200,
      });
    });

    it('admits a key that has not reached its expiry', async () => {
      const { credential } = await issue({ expiresAt: clock.iso(1) });
      expect((await gate.authenticate(request(credential))).valid).toBe(true);
    });

    it('admits the old key of a rotation during its transition period', async () => {
      const { credential } = await issue({
        status: 'suspended',
        expiresAt: clock.iso(DAY_MS),
        metadata: { deprecatedBy: 'ak_replacement' },
      });
      const result = await gate.authenticate(request(credential));
      expect(result.valid && result.deprecated).toBe(true);
      expect(log.getByType('auth_success')[0].severity).toBe('medium');
    });
  });

  describe('rejections', () => {
    it('401 missing_credentials without a credential', async () => {
      const result = await gate.authenticate(request(undefined));
      expect(result).toEqual({
        valid: false,
        reason: 'missing_credentials',
        message: 'API key required',
        statusCode: 401,
        keyId: undefined,
      });
    });

    it('401 malformed_credentials for a credential of the wrong shape', async () => {
      const result = await gate.authenticate(request('not-a-key'));
      expect(!result.valid && [result.reason, result.statusCode]).toEqual(['malformed_credentials', 401]);
    });

    it('401 key_not_found for an unknown key id', async () => {
      const result = await gate.authenticate(request(keys.generateKeyPair().credential));
      expect(!result.valid && [result.reason, result.statusCode, result.message]).toEqual([
        'key_not_found', 401, 'Invalid API key',
      ]);
    });

    it('reports a wrong secret exactly like an unknown key', async () => {
      const { record } = await issue();
      const other = keys.generateKeyPair();
      const result = await gate.authenticate(request(`${record.keyId}.${other.secret}`));
      expect(result).toEqual({
        valid: false,
        reason: 'key_not_found',
        message: 'Invalid API key',
        statusCode: 401,
        keyId: undefined,
      });
    });

    it('401 expired once expiresAt is reached', async () => {
      const { record, credential } = await issue({ expiresAt: clock.iso() });
      const result = await gate.authenticate(request(credential));
      expect(!result.valid && [result.reason, result.statusCode, result.keyId]).toEqual([
        'expired', 401, record.keyId,
      ]);
    });

    it('maps each blocked status to its code', async () => {
      const cases = [
        ['revoked', 'revoked', 401],
        ['expired', 'expired', 401],
        ['suspended', 'suspended', 403],
      ] as const;
      for (const [status, reason, code] of cases) {
        const { credential } = await issue({ status });
        const result = await gate.authenticate(request(credential));
        expect(!result.valid && [result.reason, result.statusCode]).toEqual([reason, code]);
      }
      expect(log.getByType('auth_blocked')).toHaveLength(3);
    });

    it('rejects the old key of a rotation once its transition ends', async () => {
      const { credential } = await issue({
        status: 'suspended',
        expiresAt: clock.iso(-1),
        metadata: { deprecatedBy: 'ak_replacement' },
      });
      const result = await gate.authenticate(request(credential));
      expect(!result.valid && result.reason).toBe('expired');
    });

    it('does not record use on rejection', async () => {
      const { record, credential } = await issue({ status: 'revoked' });
      await gate.authenticate(request(credential));
      expect((await store.getById(record.id))?.lastUsedAt).toBeUndefined();
    });
  });

  describe('IP allowlist', () => {
    it('matches IPv4-mapped IPv6 addresses against IPv4 entries', async () => {
      const { credential } = await issue({ allowedIps: ['10.0.0.1'] });
      expect((await gate.authenticate(request(credential, { sourceIp: '::ffff:10.0.0.1' }))).valid).toBe(true);
    });

    it('403 ip_not_allowed for other addresses', async () => {
      const { credential } = await issue({ allowedIps: ['10.0.0.1'] });
      const result = await gate.authenticate(request(credential, { sourceIp: '10.0.0.2' }));
      expect(!result.valid && [result.reason, result.statusCode]).toEqual(['ip_not_allowed', 403]);
      expect(log.getByType('ip_blocked')[0].sourceIp).toBe('10.0.0.2');
    });

    it('an empty allowlist allows everyone', async () => {
      const { credential } = await issue({ allowedIps: [] });
      expect((await gate.authenticate(request(credential, { sourceIp: '192.0.2.7' }))).valid).toBe(true);
    });
  });

  describe('domain allowlist', () => {
    it('accepts the domain and its subdomains', async () => {
      const { credential } = await issue({ allowedDomains: ['example.com'] });
      expect((await gate.authenticate(request(credential, { origin: 'https://example.com' }))).valid).toBe(true);
      expect((await gate.authenticate(request(credential, { origin: 'https://app.example.com' }))).valid).toBe(true);
    });

    it('403 domain_not_allowed for other or unparseable origins', async () => {
      const { credential } = await issue({ allowedDomains: ['example.com'] });
      for (const origin of ['https://evil.test', 'not a url']) {
        const result = await gate.authenticate(request(credential, { origin }));
        expect(!result.valid && [result.reason, result.statusCode]).toEqual(['domain_not_allowed', 403]);
      }
    });

    it('is skipped when no origin is sent', async () => {
      const { credential } = await issue({ allowedDomains: ['example.com'] });
      expect((await gate.authenticate(request(credential))).valid).toBe(true);
    });
  });

  describe('activity', () => {
    it('escalates repeated failures from one IP to high', async () => {
      build({ repeatThreshold: 3 });
      for (let i = 0; i < 3; i++) await gate.authenticate(request(keys.generateKeyPair().credential));
      expect(log.getByType('auth_failed').map(e => e.severity)).toEqual(['medium', 'medium', 'high']);
    });

    it('keeps input errors low and out of the repeat count', async () => {
      build({ repeatThreshold: 1 });
      await gate.authenticate(request(undefined));
      await gate.authenticate(request('junk'));
      expect(log.getByType('auth_failed').map(e => e.severity)).toEqual(['low', 'low']);
    });

    it('counts attempts by outcome', async () => {
      await gate.authenticate(request(undefined));
      await gate.authenticate(request(undefined));
      expect(metrics.getCounter(Metric.AuthAttempts, { result: 'missing_credentials' })).toBe(2);
    });
  });

  it('surfaces store failures as StorageError', async () => {
    build({ store: new BrokenStore() });
    await expect(gate.authenticate(request(keys.generateKeyPair().credential))).rejects.toThrow(StorageError);
  });
});

describe('request helpers', () => {
  it('extractCredential reads a bearer token or X-API-Key', () => {
    expect(extractCredential({ Authorization: 'Bearer ak_x.sk_y' })).toBe('ak_x.sk_y');
    expect(extractCredential({ authorization: 'bearer   tok  ' })).toBe('tok');
    expect(extractCredential({ 'X-API-Key': ' raw ' })).toBe('raw');
    expect(extractCredential({ 'x-api-key': ['first', 'second'] })).toBe('first');
    expect(extractCredential({ authorization: 'Basic abc' })).toBeNull();
    expect(extractCredential({})).toBeNull();
  });

  it('clientIp prefers the first forwarded hop', () => {
    expect(clientIp({ 'x-forwarded-for': '203.0.113.5, 10.0.0.1' }, '127.0.0.1')).toBe('203.0.113.5');
    expect(clientIp({}, '::ffff:127.0.0.1')).toBe('127.0.0.1');
    expect(clientIp({})).toBe('unknown');
  });

  it('normalizeIp lowercases and unwraps mapped addresses', () => {
    expect(normalizeIp(' ::FFFF:10.1.2.3 ')).toBe('10.1.2.3');
    expect(normalizeIp('2001:DB8::1')).toBe('2001:db8::1');
  });

  it('domainAllowed matches exact hosts and subdomains only', () => {
    expect(domainAllowed('a.b.example.com', ['*.example.com'])).toBe(true);
    expect(domainAllowed('example.com', ['Example.com'])).toBe(true);
    expect(domainAllowed('badexample.com', ['example.com'])).toBe(false);
  });
});
