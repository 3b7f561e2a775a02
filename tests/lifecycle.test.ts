import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ActivityReporter, MemoryActivityLog } from '../src/activity/activity-log.js';
import { KeyMaterialManager, parseCredential } from '../src/core/crypto.js';
import { InvalidArgumentError } from '../src/core/errors.js';
import { LogLevel, setGlobalLogLevel } from '../src/core/logger.js';
import { Metric, MetricsCollector } from '../src/core/metrics.js';
import type { ApiKeyRecord, KeyMetadata, KeyStatus } from '../src/core/types.js';
import { expiryLevel, LifecycleManager } from '../src/lifecycle/manager.js';
import type { LifecycleManagerOptions } from '../src/lifecycle/manager.js';
import { MemoryNotifier } from '../src/notify/notifier.js';
import type { ExpiryNotice, Notifier } from '../src/notify/notifier.js';
import { MemoryApiKeyStore } from '../src/storage/memory.js';
import { DAY_MS, makeRecord, TestClock } from './fixtures.js';

const HOUR_MS = 3_600_000;

/** Store that fails status updates for one record. */
class PartlyBrokenStore extends MemoryApiKeyStore {
  constructor(private readonly brokenId: string, clock: () => number) {
    super(clock);
  }

  async updateStatus(id: string, status: KeyStatus): Promise<boolean> {
    if (id === this.brokenId) throw new Error('write rejected');
    return super.updateStatus(id, status);
  }
}

/** Store that only accepts metadata writes for records it was seeded with. */
class NoMetadataForNewKeysStore extends MemoryApiKeyStore {
  readonly seeded = new Set<string>();

  async updateMetadata(id: string, metadata: KeyMetadata): Promise<boolean> {
    if (!this.seeded.has(id)) throw new Error('write rejected');
    return super.updateMetadata(id, metadata);
  }
}

/** Store that refuses new records once `full` is set. */
class FullStore extends MemoryApiKeyStore {
  full = false;

  async create(record: ApiKeyRecord): Promise<void> {
    if (this.full) throw new Error('disk full');
    return super.create(record);
  }
}

describe('LifecycleManager', () => {
  const keys = new KeyMaterialManager('test-secret');
  let clock: TestClock;
  let store: MemoryApiKeyStore;
  let notifier: MemoryNotifier;
  let log: MemoryActivityLog;
  let metrics: MetricsCollector;
  let manager: LifecycleManager;

  const build = (opts: Partial<LifecycleManagerOptions> = {}) => {
    manager = new LifecycleManager({
      store,
      keys,
      notifier,
      activity: new ActivityReporter(log, { clock: clock.read }),
      clock: clock.read,
      metrics,
      ...opts,
    });
    return manager;
  };

  const seed = async (overrides: Partial<ApiKeyRecord> = {}) => {
    const record = makeRecord(overrides);
    await store.create(record);
    return record;
  };

  beforeEach(() => {
    setGlobalLogLevel(LogLevel.SILENT);
    clock = new TestClock();
    store = new MemoryApiKeyStore(clock.read);
    notifier = new MemoryNotifier();
    log = new MemoryActivityLog();
    metrics = new MetricsCollector();
    build();
  });

  afterEach(() => {
    setGlobalLogLevel(LogLevel.INFO);
  });

  describe('issueKey', () => {
    it('creates an active key whose credential verifies against the stored digest', async () => {
      const { record, credential } = await manager.issueKey({ name: 'ci', ownerId: 'owner-9', scopes: ['read'] });
      const parsed = parseCredential(credential);
      expect(parsed?.keyId).toBe(record.keyId);
      expect(keys.verify(parsed?.secret ?? '', record.digest)).toBe(true);
      expect(record.status).toBe('active');
      expect(record.rateLimit).toBeNull();
      expect(record.rateLimitPeriod).toBe('hour');
      expect(record.createdAt).toBe(clock.iso());
      expect(await store.getByKeyId(record.keyId)).toEqual(record);
      expect(log.getByType('key_created')[0]).toMatchObject({ keyId: record.keyId, userId: 'owner-9' });
    });

    it('uses the configured default period', async () => {
      build({ defaultPeriod: 'day' });
      const { record } = await manager.issueKey({ name: 'n', ownerId: 'o', scopes: [] });
      expect(record.rateLimitPeriod).toBe('day');
    });

    it('rejects a blank name or a malformed limit', async () => {
      await expect(manager.issueKey({ name: '  ', ownerId: 'o', scopes: [] })).rejects.toThrow(InvalidArgumentError);
      await expect(manager.issueKey({ name: 'n', ownerId: 'o', scopes: [], rateLimit: -1 })).rejects.toThrow(InvalidArgumentError);
    });
  });

  describe('rotateKey', () => {
    it('manual rotation suspends the old key for a 14 day transition', async () => {
      const old = await seed({ expiresAt: clock.iso(10 * DAY_MS), rateLimit: 50, scopes: ['read', 'write'] });
      const result = await manager.rotateKey(old.id);

      expect(result.success).toBe(true);
      expect(result.trigger).toBe('manual');
      expect(result.transitionDays).toBe(14);
      expect(result.message).toBe('Old key will be revoked after 14 day transition period');
      expect(result.errors).toEqual([]);

      const retired = await store.getById(old.id);
      expect(retired?.status).toBe('suspended');
      expect(retired?.expiresAt).toBe(clock.iso(14 * DAY_MS));
      expect(retired?.metadata.deprecatedBy).toBe(result.newKeyId);

      const fresh = await store.getById(result.newRecordId ?? '');
      expect(fresh?.status).toBe('active');
      expect(fresh?.scopes).toEqual(['read', 'write']);
      expect(fresh?.rateLimit).toBe(50);
      // inherits at least 30 days of life
      expect(fresh?.expiresAt).toBe(clock.iso(30 * DAY_MS));
      expect(fresh?.metadata).toEqual({
        replaces: old.keyId,
        rotationTrigger: 'manual',
        rotatedAt: clock.iso(),
        transitionDays: 14,
      });

      const parsed = parseCredential(result.newCredential ?? '');
      expect(keys.verify(parsed?.secret ?? '', fresh?.digest ?? '')).toBe(true);
    });

    it('carries the remaining lifetime when it exceeds the minimum', async () => {
      const old = await seed({ expiresAt: clock.iso(40 * DAY_MS + HOUR_MS) });
      const result = await manager.rotateKey(old.id);
      expect((await store.getById(result.newRecordId ?? ''))?.expiresAt).toBe(clock.iso(40 * DAY_MS));
    });

    it('leaves the new key without expiry when the old had none', async () => {
      const old = await seed();
      const result = await manager.rotateKey(old.id, 'compliance_requirement');
      expect(result.transitionDays).toBe(30);
      expect((await store.getById(result.newRecordId ?? ''))?.expiresAt).toBeUndefined();
    });

    it('security incidents revoke the old key immediately, whatever the options say', async () => {
      const old = await seed();
      const result = await manager.rotateKey(old.id, 'security_incident', { transitionDays: 5 });
      expect(result.success).toBe(true);
      expect(result.transitionDays).toBe(0);
      expect(result.message).toBe('Old key revoked immediately');
      expect((await store.getById(old.id))?.status).toBe('revoked');
      expect(log.getByType('key_rotated')[0].severity).toBe('high');
      expect(notifier.rotated[0]).toMatchObject({ oldKeyId: old.keyId, immediate: true, trigger: 'security_incident' });
    });

    it('honours an explicit transition period', async () => {
      const old = await seed();
      const result = await manager.rotateKey(old.id, 'scheduled', { transitionDays: 3 });
      expect(result.message).toBe('Old key will be revoked after 3 day transition period');
      expect((await store.getById(old.id))?.expiresAt).toBe(clock.iso(3 * DAY_MS));
    });

    it('falls back to default settings when not preserving them', async () => {
      build({ defaultScopes: ['analytics'] });
      const old = await seed({ scopes: ['admin'], rateLimit: 10, allowedIps: ['10.0.0.1'] });
      const result = await manager.rotateKey(old.id, 'manual', { preserveSettings: false });
      const fresh = await store.getById(result.newRecordId ?? '');
      expect(fresh?.scopes).toEqual(['analytics']);
      expect(fresh?.rateLimit).toBeNull();
      expect(fresh?.allowedIps).toBeUndefined();
    });

    it('drops the schedule from the retired key', async () => {
      const old = await seed();
      await manager.scheduleAutoRotation(old.id, 7);
      await manager.rotateKey(old.id);
      expect((await store.getById(old.id))?.metadata.autoRotation).toBeUndefined();
    });

    describe('failures', () => {
      it('reports a missing key without throwing', async () => {
        const result = await manager.rotateKey('nope');
        expect(result).toMatchObject({
          success: false,
          oldKeyId: '',
          message: 'API key not found',
          errors: ['No API key with id nope'],
        });
        expect(log.getByType('rotation_failed')[0].severity).toBe('high');
        expect(metrics.getCounter(Metric.Rotations, { trigger: 'manual', result: 'failure' })).toBe(1);
      });

      it('refuses revoked and expired keys', async () => {
        for (const status of ['revoked', 'expired'] as const) {
          const old = await seed({ status });
          const result = await manager.rotateKey(old.id);
          expect(result.success).toBe(false);
          expect(result.message).toBe(`Cannot rotate a ${status} key`);
        }
      });

      it('raises failed security rotations to critical', async () => {
        await manager.rotateKey('nope', 'security_incident');
        expect(log.getByType('rotation_failed')[0].severity).toBe('critical');
      });

      it('rejects a malformed transition period', async () => {
        const old = await seed();
        const result = await manager.rotateKey(old.id, 'manual', { transitionDays: -1 });
        expect(result.success).toBe(false);
        expect(result.message).toBe('Invalid transition period');
        expect((await store.getById(old.id))?.status).toBe('active');
      });
    });
  });

  describe('expireOverdueKeys', () => {
    it('expires overdue active keys and revokes finished transitions', async () => {
      const overdue = await seed({ expiresAt: clock.iso(-1) });
      const dueNow = await seed({ expiresAt: clock.iso() });
      const future = await seed({ expiresAt: clock.iso(1) });
      const transitioned = await seed({ status: 'suspended', expiresAt: clock.iso(-1), metadata: { deprecatedBy: 'ak_x' } });
      const plainSuspended = await seed({ status: 'suspended', expiresAt: clock.iso(-1) });

      const sweep = await manager.expireOverdueKeys();
      expect(sweep.expired.sort()).toEqual([overdue.keyId, dueNow.keyId].sort());
      expect(sweep.revoked).toEqual([transitioned.keyId]);
      expect(sweep.errors).toEqual([]);

      expect((await store.getById(future.id))?.status).toBe('active');
      expect((await store.getById(plainSuspended.id))?.status).toBe('suspended');
      expect(log.getByType('key_expired')).toHaveLength(2);
      expect(log.getByType('key_revoked')[0].details).toEqual({ reason: 'transition_ended', replacedBy: 'ak_x' });
    });

    it('keeps going when one key fails', async () => {
      const broken = makeRecord({ expiresAt: clock.iso(-1) });
      const fine = makeRecord({ expiresAt: clock.iso(-1) });
      store = new PartlyBrokenStore(broken.id, clock.read);
      await store.create(broken);
      await store.create(fine);
      build();

      const sweep = await manager.expireOverdueKeys();
      expect(sweep.expired).toEqual([fine.keyId]);
      expect(sweep.errors).toEqual([`${broken.keyId}: write rejected`]);
    });
  });

  describe('expiry notices', () => {
    it('classifies keys by days left, soonest first', async () => {
      await seed({ expiresAt: clock.iso(20 * DAY_MS) });
      await seed({ expiresAt: clock.iso(5 * DAY_MS) });
      await seed({ expiresAt: clock.iso(DAY_MS) });
      await seed({ expiresAt: clock.iso(12 * HOUR_MS) });
      await seed({ expiresAt: clock.iso(-HOUR_MS) });
      await seed({ expiresAt: clock.iso(40 * DAY_MS) });
      await seed({ status: 'suspended', expiresAt: clock.iso(DAY_MS) });

      const expiring = await manager.findExpiringKeys();
      expect(expiring.map(k => [k.daysUntilExpiry, k.level])).toEqual([
        [-1, 'expired'],
        [0, 'critical'],
        [1, 'critical'],
        [5, 'urgent'],
        [20, 'warning'],
      ]);
      expect(expiring[3].suggestedActions).toEqual([
        'API key expires in 5 days',
        'Plan key rotation within the next few days',
        'Consider enabling auto-rotation',
      ]);
    });

    it('sends each key and level once a day', async () => {
      const urgent = await seed({ expiresAt: clock.iso(5 * DAY_MS) });
      await seed({ expiresAt: clock.iso(20 * DAY_MS) });

      expect(await manager.notifyExpiringKeys()).toBe(2);
      expect(await manager.notifyExpiringKeys()).toBe(0);
      clock.advance(DAY_MS - 1);
      expect(await manager.notifyExpiringKeys()).toBe(0);
      clock.advance(1);
      expect(await manager.notifyExpiringKeys()).toBe(2);

      expect(notifier.expiring.map(n => n.level)).toEqual(['urgent', 'warning', 'urgent', 'warning']);
      expect(notifier.expiring[0]).toMatchObject({ keyId: urgent.keyId, daysUntilExpiry: 5, ownerId: 'owner-1' });
      expect(log.getByType('key_expiring').map(e => e.severity)).toEqual(['medium', 'low', 'medium', 'low']);
    });

    it('forgets notices for keys that left the active set', async () => {
      const revoked = await seed({ expiresAt: clock.iso(5 * DAY_MS) });
      expect(await manager.notifyExpiringKeys()).toBe(1);
      expect(manager.noticeHistorySize).toBe(1);

      await store.updateStatus(revoked.id, 'revoked');
      clock.advance(DAY_MS - 1);
      await manager.notifyExpiringKeys();
      expect(manager.noticeHistorySize).toBe(1);

      clock.advance(1);
      expect(await manager.notifyExpiringKeys()).toBe(0);
      expect(manager.noticeHistorySize).toBe(0);
    });

    it('retries a notice that failed to send', async () => {
      let failing = true;
      const seen: ExpiryNotice[] = [];
      const flaky: Notifier = {
        notifyExpiring: async notice => {
          if (failing) throw new Error('smtp down');
          seen.push(notice);
        },
        notifyRotated: async () => undefined,
      };
      build({ notifier: flaky });
      await seed({ expiresAt: clock.iso(5 * DAY_MS) });
      expect(await manager.notifyExpiringKeys()).toBe(0);
      failing = false;
      expect(await manager.notifyExpiringKeys()).toBe(1);
      expect(seen).toHaveLength(1);
    });

    it('sends nothing without a notifier', async () => {
      build({ notifier: undefined });
      await seed({ expiresAt: clock.iso(5 * DAY_MS) });
      expect(await manager.notifyExpiringKeys()).toBe(0);
    });
  });

  describe('auto-rotation', () => {
    it('rotates when due and carries the schedule to the new key', async () => {
      const old = await seed();
      const schedule = await manager.scheduleAutoRotation(old.id, 7);
      expect(schedule).toEqual({ intervalDays: 7, nextRotationAt: clock.iso(7 * DAY_MS) });

      clock.advance(7 * DAY_MS - 1);
      expect(await manager.processScheduledRotations()).toEqual([]);

      clock.advance(1);
      const results = await manager.processScheduledRotations();
      expect(results).toHaveLength(1);
      expect(results[0].success).toBe(true);
      expect(results[0].trigger).toBe('scheduled');

      const fresh = await store.getById(results[0].newRecordId ?? '');
      expect(fresh?.metadata.autoRotation).toEqual({ intervalDays: 7, nextRotationAt: clock.iso(7 * DAY_MS) });
      expect((await store.getById(old.id))?.status).toBe('suspended');
    });

    it('rotates every due key even when the new keys reject metadata writes', async () => {
      const broken = new NoMetadataForNewKeysStore(clock.read);
      store = broken;
      build();
      const schedule = { intervalDays: 7, nextRotationAt: clock.iso() };
      const first = await seed({ metadata: { autoRotation: schedule } });
      const second = await seed({ metadata: { autoRotation: schedule } });
      broken.seeded.add(first.id);
      broken.seeded.add(second.id);

      const results = await manager.processScheduledRotations();
      expect(results.map(r => [r.oldKeyId, r.success, r.errors])).toEqual([
        [first.keyId, true, []],
        [second.keyId, true, []],
      ]);
      for (const result of results) {
        const fresh = await store.getById(result.newRecordId ?? '');
        expect(fresh?.metadata.autoRotation).toEqual({ intervalDays: 7, nextRotationAt: clock.iso(7 * DAY_MS) });
      }
      expect((await store.getById(second.id))?.status).toBe('suspended');
    });

    it('keeps the schedule on a key whose rotation failed', async () => {
      const schedule = { intervalDays: 7, nextRotationAt: clock.iso() };
      const full = new FullStore(clock.read);
      store = full;
      build();
      const old = await seed({ metadata: { autoRotation: schedule } });
      full.full = true;

      const [result] = await manager.processScheduledRotations();
      expect(result).toMatchObject({ success: false, message: 'Failed to create replacement key', errors: ['disk full'] });
      const kept = await store.getById(old.id);
      expect(kept?.status).toBe('active');
      expect(kept?.metadata.autoRotation).toEqual(schedule);
    });

    it('rejects a malformed auto-rotation interval on rotate', async () => {
      const old = await seed();
      const result = await manager.rotateKey(old.id, 'manual', { autoRotationDays: 0 });
      expect(result).toMatchObject({ success: false, message: 'Invalid auto-rotation interval' });
      expect((await store.getById(old.id))?.status).toBe('active');
    });

    it('validates the interval', async () => {
      const old = await seed();
      await expect(manager.scheduleAutoRotation(old.id, 0)).rejects.toThrow(InvalidArgumentError);
      await expect(manager.scheduleAutoRotation(old.id, 1.5)).rejects.toThrow(InvalidArgumentError);
      expect(await manager.scheduleAutoRotation('missing', 7)).toBeNull();
    });

    it('cancels a schedule', async () => {
      const old = await seed();
      await manager.scheduleAutoRotation(old.id, 7);
      expect(await manager.cancelAutoRotation(old.id)).toBe(true);
      expect(await manager.cancelAutoRotation(old.id)).toBe(false);
      expect((await store.getById(old.id))?.metadata).toEqual({});
    });

    it('skips unparseable rotation dates', async () => {
      await seed({ metadata: { autoRotation: { intervalDays: 7, nextRotationAt: 'someday' } } });
      expect(await manager.processScheduledRotations()).toEqual([]);
    });
  });

  describe('lifecycleStatus', () => {
    it('recommends an expiry, auto-rotation and an IP allowlist for a bare key', async () => {
      const record = await seed();
      expect(await manager.lifecycleStatus(record.id)).toEqual({
        recordId: record.id,
        keyId: record.keyId,
        lifecycleStatus: 'active',
        currentStatus: 'active',
        expiresAt: undefined,
        daysUntilExpiry: null,
        autoRotation: { enabled: false, intervalDays: undefined, nextRotationAt: undefined, daysUntilRotation: null },
        recommendations: [
          'Consider setting an expiration date for security',
          'Enable auto-rotation for better security',
          'Consider restricting access to specific IP addresses',
        ],
      });
    });

    it('derives the lifecycle state', async () => {
      const soon = await seed({ expiresAt: clock.iso(3 * DAY_MS), allowedIps: ['10.0.0.1'] });
      const deprecated = await seed({ status: 'suspended' });
      const lapsed = await seed({ expiresAt: clock.iso(-1) });
      const admin = await seed({ scopes: ['admin'], expiresAt: clock.iso(60 * DAY_MS), allowedIps: ['10.0.0.1'] });
      await manager.scheduleAutoRotation(admin.id, 10);

      expect((await manager.lifecycleStatus(soon.id))?.lifecycleStatus).toBe('expiring_soon');
      expect((await manager.lifecycleStatus(deprecated.id))?.lifecycleStatus).toBe('deprecated');
      expect((await manager.lifecycleStatus(lapsed.id))?.lifecycleStatus).toBe('expired');

      const adminStatus = await manager.lifecycleStatus(admin.id);
      expect(adminStatus?.autoRotation).toEqual({
        enabled: true,
        intervalDays: 10,
        nextRotationAt: clock.iso(10 * DAY_MS),
        daysUntilRotation: 10,
      });
      expect(adminStatus?.recommendations).toEqual(['Review admin permissions regularly']);
      expect(await manager.lifecycleStatus('missing')).toBeNull();
    });
  });

  it('runCycle sends notices before expiring keys', async () => {
    const lapsed = await seed({ expiresAt: clock.iso(-1) });
    const summary = await manager.runCycle();
    expect(summary).toEqual({ noticesSent: 1, expired: [lapsed.keyId], revoked: [], rotations: [] });
    expect(notifier.expiring[0].level).toBe('expired');
    expect(metrics.getCounter(Metric.LifecycleCycles, { result: 'completed' })).toBe(1);
  });
});

describe('expiryLevel', () => {
  it('maps days left onto notice levels', () => {
    expect(expiryLevel(30, false)).toBe('warning');
    expect(expiryLevel(8, false)).toBe('warning');
    expect(expiryLevel(7, false)).toBe('urgent');
    expect(expiryLevel(2, false)).toBe('urgent');
    expect(expiryLevel(1, false)).toBe('critical');
    expect(expiryLevel(0, true)).toBe('expired');
  });
});
