/**
 * Key lifecycle: issuance, expiry, rotation, expiry notices and scheduled rotation.
 *
 * Runs out of band. Operations that touch many keys handle each key on its
 * own, so one bad record never stops a sweep; rotation reports failure as a
 * RotationResult instead of throwing.
 */

import { randomUUID } from 'node:crypto';
import type { ActivityReporter } from '../activity/activity-log.js';
import type { KeyMaterialManager } from '../core/crypto.js';
import { errorMessage, InvalidArgumentError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { createLogger } from '../core/logger.js';
import type { MetricsCollector } from '../core/metrics.js';
import { Metric } from '../core/metrics.js';
import type {
  AlgorithmName,
  ApiKeyRecord,
  ApiKeyStore,
  AutoRotationSchedule,
  Clock,
  KeyStatus,
  RateLimitPeriod,
  RotationTrigger,
} from '../core/types.js';
import { systemClock } from '../core/types.js';
import type { ExpiryLevel, Notifier } from '../notify/notifier.js';

export const DAY_MS = 86_400_000;

// ── Policies ──

export interface RotationPolicy {
  /** Revoke the old key at once instead of granting a transition period */
  immediate: boolean;
  transitionDays: number;
}

export const ROTATION_POLICIES: Record<RotationTrigger, RotationPolicy> = {
  security_incident: { immediate: true, transitionDays: 0 },
  compliance_requirement: { immediate: false, transitionDays: 30 },
  scheduled: { immediate: false, transitionDays: 14 },
  expiration_approaching: { immediate: false, transitionDays: 30 },
  manual: { immediate: false, transitionDays: 14 },
  usage_anomaly: { immediate: false, transitionDays: 14 },
};

/** Days-before-expiry at which each notice level starts. */
export const NOTIFICATION_THRESHOLDS = { warning: 30, urgent: 7, critical: 1 } as const;

/** Shortest lifetime a rotated key inherits from an expiring predecessor. */
export const MIN_ROTATED_LIFETIME_DAYS = 30;

const NOTICE_DEDUPE_MS = DAY_MS;

// ── Types ──

export interface IssueKeyInput {
  name: string;
  ownerId: string;
  scopes: string[];
  expiresAt?: string;
  allowedIps?: string[];
  allowedDomains?: string[];
  rateLimit?: number | null;
  rateLimitPeriod?: RateLimitPeriod;
  rateLimitAlgorithm?: AlgorithmName;
}

export interface IssuedKey {
  record: ApiKeyRecord;
  /** Presented by clients as-is; shown once */
  credential: string;
}

export interface RotateOptions {
  /** Overrides the trigger's policy */
  transitionDays?: number;
  /** Copy scopes, limits and allowlists to the new key (default true) */
  preserveSettings?: boolean;
  /** Give the new key an auto-rotation schedule of this many days */
  autoRotationDays?: number;
}

export interface RotationResult {
  success: boolean;
  oldKeyId: string;
  newKeyId?: string;
  newRecordId?: string;
  /** Credential for the new key; shown once */
  newCredential?: string;
  trigger: RotationTrigger;
  timestamp: string;
  transitionDays: number;
  message: string;
  errors: string[];
}

export interface ExpiringKey {
  recordId: string;
  keyId: string;
  name: string;
  ownerId: string;
  expiresAt: string;
  daysUntilExpiry: number;
  level: ExpiryLevel;
  suggestedActions: string[];
}

export interface ExpirySweep {
  /** keyIds of active keys moved to expired */
  expired: string[];
  /** keyIds of rotated-out keys whose transition ended */
  revoked: string[];
  errors: string[];
}

export type LifecycleState = 'active' | 'expiring_soon' | 'expired' | 'deprecated' | 'revoked';

export interface LifecycleStatus {
  recordId: string;
  keyId: string;
  lifecycleStatus: LifecycleState;
  currentStatus: KeyStatus;
  expiresAt?: string;
  daysUntilExpiry: number | null;
  autoRotation: {
    enabled: boolean;
    intervalDays?: number;
    nextRotationAt?: string;
    daysUntilRotation: number | null;
  };
  recommendations: string[];
}

export interface CycleSummary {
  noticesSent: number;
  expired: string[];
  revoked: string[];
  rotations: RotationResult[];
}

export interface LifecycleManagerOptions {
  store: ApiKeyStore;
  keys: KeyMaterialManager;
  notifier?: Notifier;
  activity?: ActivityReporter;
  clock?: Clock;
  logger?: Logger;
  metrics?: MetricsCollector;
  /** Scopes given to a rotated key when settings are not preserved */
  defaultScopes?: string[];
  defaultPeriod?: RateLimitPeriod;
}

// ── Helpers ──

export function expiryLevel(daysUntilExpiry: number, expired: boolean): ExpiryLevel {
  if (expired) return 'expired';
  if (daysUntilExpiry <= NOTIFICATION_THRESHOLDS.critical) return 'critical';
  if (daysUntilExpiry <= NOTIFICATION_THRESHOLDS.urgent) return 'urgent';
  return 'warning';
}

export function expirationActions(level: ExpiryLevel, days: number): string[] {
  switch (level) {
    case 'expired':
      return [
        'API key has expired and is no longer valid',
        'Create a new API key immediately',
        'Update your applications with the new key',
      ];
    case 'critical':
      return [
        `API key expires in ${days} day(s)`,
        'Rotate the key immediately',
        'Test the new key before the old one expires',
      ];
    case 'urgent':
      return [
        `API key expires in ${days} days`,
        'Plan key rotation within the next few days',
        'Consider enabling auto-rotation',
      ];
    case 'warning':
      return [
        `API key expires in ${days} days`,
        'Schedule key rotation in the coming weeks',
        'Review key usage and permissions',
      ];
  }
}

// ── Lifecycle Manager ──

export class LifecycleManager {
  private readonly clock: Clock;
  private readonly log: Logger;
  /** `${recordId}:${level}` → epoch ms of the last notice sent */
  private readonly noticesSent = new Map<string, number>();

  constructor(private readonly opts: LifecycleManagerOptions) {
    this.clock = opts.clock ?? systemClock;
    this.log = opts.logger ?? createLogger('lifecycle');
  }

  /** Create and persist a new key. */
  async issueKey(input: IssueKeyInput): Promise<IssuedKey> {
    if (!input.name.trim()) throw new InvalidArgumentError('Key name must not be empty');
    if (input.rateLimit !== undefined && input.rateLimit !== null && (!Number.isInteger(input.rateLimit) || input.rateLimit < 0)) {
      throw new InvalidArgumentError(`rateLimit must be a non-negative integer, got ${input.rateLimit}`);
    }
    const generated = this.opts.keys.generateKeyPair();
    const now = this.iso();
    const record: ApiKeyRecord = {
      id: randomUUID(),
      keyId: generated.keyId,
      digest: generated.digest,
      name: input.name,
      ownerId: input.ownerId,
      status: 'active',
      scopes: [...input.scopes],
      expiresAt: input.expiresAt,
      allowedIps: input.allowedIps,
      allowedDomains: input.allowedDomains,
      rateLimit: input.rateLimit ?? null,
      rateLimitPeriod: input.rateLimitPeriod ?? this.opts.defaultPeriod ?? 'hour',
      rateLimitAlgorithm: input.rateLimitAlgorithm,
      createdAt: now,
      updatedAt: now,
      metadata: {},
    };
    await this.opts.store.create(record);
    this.opts.activity?.emit({
      activityType: 'key_created',
      severity: 'low',
      keyId: record.keyId,
      userId: record.ownerId,
      details: { name: record.name, scopes: record.scopes },
    });
    return { record, credential: generated.credential };
  }

  /** Flip overdue active keys to expired and end finished rotation transitions. */
  async expireOverdueKeys(): Promise<ExpirySweep> {
    const nowIso = this.iso();
    const sweep: ExpirySweep = { expired: [], revoked: [], errors: [] };

    const overdue = await this.opts.store.list({ status: ['active'], expiresBefore: nowIso });
    for (const record of overdue) {
      try {
        if (await this.opts.store.updateStatus(record.id, 'expired')) {
          sweep.expired.push(record.keyId);
          this.emitKeyEvent('key_expired', record, { expiresAt: record.expiresAt });
        }
      } catch (err) {
        sweep.errors.push(`${record.keyId}: ${errorMessage(err)}`);
        this.log.error('Failed to expire key', { keyId: record.keyId, error: errorMessage(err) });
      }
    }

    const transitions = await this.opts.store.list({ status: ['suspended'], expiresBefore: nowIso });
    for (const record of transitions) {
      if (!record.metadata.deprecatedBy) continue;
      try {
        if (await this.opts.store.updateStatus(record.id, 'revoked')) {
          sweep.revoked.push(record.keyId);
          this.emitKeyEvent('key_revoked', record, { reason: 'transition_ended', replacedBy: record.metadata.deprecatedBy });
        }
      } catch (err) {
        sweep.errors.push(`${record.keyId}: ${errorMessage(err)}`);
        this.log.error('Failed to revoke transitioned key', { keyId: record.keyId, error: errorMessage(err) });
      }
    }

    if (sweep.expired.length > 0 || sweep.revoked.length > 0) {
      this.log.info('Expiry sweep finished', { expired: sweep.expired.length, revoked: sweep.revoked.length });
    }
    return sweep;
  }

  /** Active keys expiring within `withinDays`, including any already past expiry. */
  async findExpiringKeys(withinDays: number = NOTIFICATION_THRESHOLDS.warning): Promise<ExpiringKey[]> {
    const now = this.clock();
    const cutoff = new Date(now + withinDays * DAY_MS).toISOString();
    const records = await this.opts.store.list({ status: ['active'], expiresBefore: cutoff });
    const result: ExpiringKey[] = [];
    for (const record of records) {
      if (record.expiresAt === undefined) continue;
      const expiresAtMs = Date.parse(record.expiresAt);
      const days = Math.floor((expiresAtMs - now) / DAY_MS);
      const level = expiryLevel(days, expiresAtMs <= now);
      result.push({
        recordId: record.id,
        keyId: record.keyId,
        name: record.name,
        ownerId: record.ownerId,
        expiresAt: record.expiresAt,
        daysUntilExpiry: days,
        level,
        suggestedActions: expirationActions(level, days),
      });
    }
    return result.sort((a, b) => a.daysUntilExpiry - b.daysUntilExpiry);
  }

  /** Notices still inside their dedupe window. */
  get noticeHistorySize(): number {
    return this.noticesSent.size;
  }

  /** Send one notice per key and level at most once a day. Returns notices sent. */
  async notifyExpiringKeys(withinDays?: number): Promise<number> {
    const notifier = this.opts.notifier;
    if (!notifier) return 0;
    const now = this.clock();
    for (const [dedupeKey, at] of this.noticesSent) {
      if (now - at >= NOTICE_DEDUPE_MS) this.noticesSent.delete(dedupeKey);
    }
    let sent = 0;
    for (const key of await this.findExpiringKeys(withinDays)) {
      const dedupeKey = `${key.recordId}:${key.level}`;
      const last = this.noticesSent.get(dedupeKey);
      if (last !== undefined && now - last < NOTICE_DEDUPE_MS) continue;
      try {
        await notifier.notifyExpiring({
          recordId: key.recordId,
          keyId: key.keyId,
          keyName: key.name,
          ownerId: key.ownerId,
          level: key.level,
          daysUntilExpiry: key.daysUntilExpiry,
          expiresAt: key.expiresAt,
          suggestedActions: key.suggestedActions,
        });
        this.noticesSent.set(dedupeKey, now);
        sent++;
        this.opts.activity?.emit({
          activityType: 'key_expiring',
          severity: key.level === 'warning' ? 'low' : 'medium',
          keyId: key.keyId,
          userId: key.ownerId,
          details: { level: key.level, daysUntilExpiry: key.daysUntilExpiry },
        });
      } catch (err) {
        this.log.warn('Failed to send expiry notice', { keyId: key.keyId, error: errorMessage(err) });
      }
    }
    return sent;
  }

  /**
   * Replace a key with a freshly generated one. The old key is revoked at once
   * for immediate policies, otherwise suspended with a grace-period expiry.
   */
  async rotateKey(recordId: string, trigger: RotationTrigger = 'manual', options: RotateOptions = {}): Promise<RotationResult> {
    const timestamp = this.iso();
    const policy = ROTATION_POLICIES[trigger];
    const fail = (oldKeyId: string, message: string, errors: string[]): RotationResult => {
      this.opts.metrics?.counter(Metric.Rotations, { trigger, result: 'failure' });
      this.opts.activity?.emit({
        activityType: 'rotation_failed',
        severity: trigger === 'security_incident' ? 'critical' : 'high',
        keyId: oldKeyId || undefined,
        details: { trigger, errors },
      });
      this.log.error('Key rotation failed', { recordId, trigger, errors });
      return { success: false, oldKeyId, trigger, timestamp, transitionDays: 0, message, errors };
    };

    if (options.transitionDays !== undefined && (!Number.isInteger(options.transitionDays) || options.transitionDays < 0)) {
      return fail('', 'Invalid transition period', [`transitionDays must be a non-negative integer, got ${options.transitionDays}`]);
    }
    if (options.autoRotationDays !== undefined && (!Number.isInteger(options.autoRotationDays) || options.autoRotationDays <= 0)) {
      return fail('', 'Invalid auto-rotation interval', [`autoRotationDays must be a positive integer, got ${options.autoRotationDays}`]);
    }

    let old: ApiKeyRecord | null;
    try {
      old = await this.opts.store.getById(recordId);
    } catch (err) {
      return fail('', 'Key lookup failed', [errorMessage(err)]);
    }
    if (!old) return fail('', 'API key not found', [`No API key with id ${recordId}`]);
    if (old.status === 'revoked' || old.status === 'expired') {
      return fail(old.keyId, `Cannot rotate a ${old.status} key`, [`Key ${old.keyId} is ${old.status}`]);
    }

    const transitionDays = policy.immediate ? 0 : options.transitionDays ?? policy.transitionDays;
    const preserve = options.preserveSettings ?? true;
    const now = this.clock();
    const generated = this.opts.keys.generateKeyPair();
    const rotationMeta = { rotationTrigger: trigger, rotatedAt: timestamp, transitionDays };

    let expiresAt: string | undefined;
    if (old.expiresAt !== undefined) {
      const daysRemaining = Math.floor((Date.parse(old.expiresAt) - now) / DAY_MS);
      if (daysRemaining > 0) {
        expiresAt = new Date(now + Math.max(daysRemaining, MIN_ROTATED_LIFETIME_DAYS) * DAY_MS).toISOString();
      }
    }

    const replacement: ApiKeyRecord = {
      id: randomUUID(),
      keyId: generated.keyId,
      digest: generated.digest,
      name: old.name,
      ownerId: old.ownerId,
      status: 'active',
      scopes: preserve ? [...old.scopes] : [...(this.opts.defaultScopes ?? ['read'])],
      expiresAt,
      allowedIps: preserve ? old.allowedIps : undefined,
      allowedDomains: preserve ? old.allowedDomains : undefined,
      rateLimit: preserve ? old.rateLimit : null,
      rateLimitPeriod: preserve ? old.rateLimitPeriod : this.opts.defaultPeriod ?? 'hour',
      rateLimitAlgorithm: preserve ? old.rateLimitAlgorithm : undefined,
      createdAt: timestamp,
      updatedAt: timestamp,
      metadata: { replaces: old.keyId, ...rotationMeta },
    };
    if (options.autoRotationDays !== undefined) {
      replacement.metadata.autoRotation = {
        intervalDays: options.autoRotationDays,
        nextRotationAt: new Date(now + options.autoRotationDays * DAY_MS).toISOString(),
      };
    }

    try {
      await this.opts.store.create(replacement);
    } catch (err) {
      return fail(old.keyId, 'Failed to create replacement key', [errorMessage(err)]);
    }

    let message: string;
    try {
      const oldMeta = { ...old.metadata, deprecatedBy: replacement.keyId, ...rotationMeta };
      delete oldMeta.autoRotation;
      await this.opts.store.updateMetadata(old.id, oldMeta);
      if (policy.immediate) {
        await this.opts.store.updateStatus(old.id, 'revoked');
        message = 'Old key revoked immediately';
      } else {
        await this.opts.store.updateExpiry(old.id, new Date(now + transitionDays * DAY_MS).toISOString());
        await this.opts.store.updateStatus(old.id, 'suspended');
        message = `Old key will be revoked after ${transitionDays} day transition period`;
      }
    } catch (err) {
      return {
        ...fail(old.keyId, 'Replacement key created but the old key could not be retired', [errorMessage(err)]),
        newKeyId: replacement.keyId,
        newRecordId: replacement.id,
      };
    }

    await this.notifyRotation(old, replacement, trigger, policy.immediate, transitionDays, message);
    this.opts.metrics?.counter(Metric.Rotations, { trigger, result: 'success' });
    this.opts.activity?.emit({
      activityType: 'key_rotated',
      severity: trigger === 'security_incident' ? 'high' : 'low',
      keyId: old.keyId,
      userId: old.ownerId,
      details: { trigger, newKeyId: replacement.keyId, transitionDays, immediate: policy.immediate },
    });
    this.log.info('Key rotated', { oldKeyId: old.keyId, newKeyId: replacement.keyId, trigger, transitionDays });

    return {
      success: true,
      oldKeyId: old.keyId,
      newKeyId: replacement.keyId,
      newRecordId: replacement.id,
      newCredential: generated.credential,
      trigger,
      timestamp,
      transitionDays,
      message,
      errors: [],
    };
  }

  /** Rotate `recordId` every `intervalDays`, starting `intervalDays` from now. */
  async scheduleAutoRotation(recordId: string, intervalDays: number): Promise<AutoRotationSchedule | null> {
    if (!Number.isInteger(intervalDays) || intervalDays <= 0) {
      throw new InvalidArgumentError(`intervalDays must be a positive integer, got ${intervalDays}`);
    }
    const record = await this.opts.store.getById(recordId);
    if (!record) return null;
    const schedule: AutoRotationSchedule = {
      intervalDays,
      nextRotationAt: new Date(this.clock() + intervalDays * DAY_MS).toISOString(),
    };
    await this.opts.store.updateMetadata(recordId, { ...record.metadata, autoRotation: schedule });
    this.log.info('Scheduled auto-rotation', { keyId: record.keyId, intervalDays });
    return schedule;
  }

  async cancelAutoRotation(recordId: string): Promise<boolean> {
    const record = await this.opts.store.getById(recordId);
    if (!record?.metadata.autoRotation) return false;
    const { autoRotation: _dropped, ...rest } = record.metadata;
    return this.opts.store.updateMetadata(recordId, rest);
  }

  /** Rotate every active key whose schedule is due; the new key is created already carrying the schedule. */
  async processScheduledRotations(): Promise<RotationResult[]> {
    const now = this.clock();
    const results: RotationResult[] = [];
    for (const record of await this.opts.store.list({ status: ['active'] })) {
      const schedule = record.metadata.autoRotation;
      if (!schedule) continue;
      const due = Date.parse(schedule.nextRotationAt);
      if (Number.isNaN(due)) {
        this.log.error('Invalid rotation date', { keyId: record.keyId, nextRotationAt: schedule.nextRotationAt });
        continue;
      }
      if (now < due) continue;
      results.push(await this.rotateKey(record.id, 'scheduled', { autoRotationDays: schedule.intervalDays }));
    }
    if (results.length > 0) this.log.info('Processed scheduled rotations', { count: results.length });
    return results;
  }

  async lifecycleStatus(recordId: string): Promise<LifecycleStatus | null> {
    const record = await this.opts.store.getById(recordId);
    if (!record) return null;
    const now = this.clock();
    const daysUntilExpiry = record.expiresAt !== undefined
      ? Math.floor((Date.parse(record.expiresAt) - now) / DAY_MS)
      : null;

    let state: LifecycleState;
    if (record.status === 'revoked') state = 'revoked';
    else if (record.status === 'expired') state = 'expired';
    else if (record.status === 'suspended') state = 'deprecated';
    else if (record.expiresAt !== undefined && Date.parse(record.expiresAt) <= now) state = 'expired';
    else if (daysUntilExpiry !== null && daysUntilExpiry <= NOTIFICATION_THRESHOLDS.urgent) state = 'expiring_soon';
    else state = 'active';

    const schedule = record.metadata.autoRotation;
    return {
      recordId: record.id,
      keyId: record.keyId,
      lifecycleStatus: state,
      currentStatus: record.status,
      expiresAt: record.expiresAt,
      daysUntilExpiry,
      autoRotation: {
        enabled: schedule !== undefined,
        intervalDays: schedule?.intervalDays,
        nextRotationAt: schedule?.nextRotationAt,
        daysUntilRotation: schedule ? Math.floor((Date.parse(schedule.nextRotationAt) - now) / DAY_MS) : null,
      },
      recommendations: this.recommendations(record, state),
    };
  }

  /** One scheduler pass: notices, expiry sweep, due rotations. */
  async runCycle(): Promise<CycleSummary> {
    const noticesSent = await this.notifyExpiringKeys();
    const sweep = await this.expireOverdueKeys();
    const rotations = await this.processScheduledRotations();
    this.opts.metrics?.counter(Metric.LifecycleCycles, { result: 'completed' });
    return { noticesSent, expired: sweep.expired, revoked: sweep.revoked, rotations };
  }

  private recommendations(record: ApiKeyRecord, state: LifecycleState): string[] {
    const out: string[] = [];
    if (state === 'expiring_soon') {
      out.push('Consider rotating the key soon to avoid service interruption');
      out.push('Enable auto-rotation for future keys');
    } else if (state === 'active') {
      if (record.expiresAt === undefined) out.push('Consider setting an expiration date for security');
      if (!record.metadata.autoRotation) out.push('Enable auto-rotation for better security');
    } else if (state === 'expired') {
      out.push('Create a new API key to restore service');
      out.push('Update your applications with the new key');
    } else if (state === 'deprecated') {
      out.push('Switch your applications to the replacement key before the transition ends');
    }
    if (record.scopes.includes('admin')) out.push('Review admin permissions regularly');
    if (!record.allowedIps || record.allowedIps.length === 0) {
      out.push('Consider restricting access to specific IP addresses');
    }
    return out;
  }

  private async notifyRotation(
    old: ApiKeyRecord,
    replacement: ApiKeyRecord,
    trigger: RotationTrigger,
    immediate: boolean,
    transitionDays: number,
    message: string,
  ): Promise<void> {
    if (!this.opts.notifier) return;
    try {
      await this.opts.notifier.notifyRotated({
        ownerId: old.ownerId,
        keyName: old.name,
        oldKeyId: old.keyId,
        newKeyId: replacement.keyId,
        trigger,
        immediate,
        transitionDays,
        message,
      });
    } catch (err) {
      this.log.warn('Failed to send rotation notice', { keyId: old.keyId, error: errorMessage(err) });
    }
  }

  private emitKeyEvent(activityType: 'key_expired' | 'key_revoked', record: ApiKeyRecord, details: Record<string, unknown>): void {
    this.opts.activity?.emit({
      activityType,
      severity: 'low',
      keyId: record.keyId,
      userId: record.ownerId,
      details,
    });
  }

  private iso(): string {
    return new Date(this.clock()).toISOString();
  }
}
