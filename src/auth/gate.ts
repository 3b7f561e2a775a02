/**
 * Authentication Gate — the first admission step for every request.
 *
 * NoKeyPresented → KeyNotFound | KeyFound
 * KeyFound → Expired | Revoked | Suspended | IPRejected | Valid
 *
 * A wrong secret is reported exactly like an unknown key id.
 */

import type { ActivityReporter } from '../activity/activity-log.js';
import { RepeatTracker } from '../activity/repeat-tracker.js';
import type { KeyMaterialManager } from '../core/crypto.js';
import { parseCredential } from '../core/crypto.js';
import { errorMessage, StorageError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { createLogger } from '../core/logger.js';
import type { MetricsCollector } from '../core/metrics.js';
import { Metric } from '../core/metrics.js';
import type { ActivityType, ApiKeyRecord, ApiKeyStore, Clock, Severity } from '../core/types.js';
import { systemClock } from '../core/types.js';

// ── Types ──

export interface AuthRequest {
  /** Raw credential as presented, `<keyId>.<secret>` */
  credential?: string | null;
  sourceIp: string;
  requestPath: string;
  /** Origin header, checked against allowedDomains when present */
  origin?: string;
  userAgent?: string;
}

export type AuthFailureReason =
  | 'missing_credentials'
  | 'malformed_credentials'
  | 'key_not_found'
  | 'expired'
  | 'revoked'
  | 'suspended'
  | 'ip_not_allowed'
  | 'domain_not_allowed';

export type AuthResult =
  | {
      valid: true;
      record: ApiKeyRecord;
      /** Old key of a rotation, accepted until its transition period ends */
      deprecated: boolean;
    }
  | {
      valid: false;
      reason: AuthFailureReason;
      message: string;
      statusCode: 401 | 403;
      /** keyId when a record was found; never set for key_not_found */
      keyId?: string;
    };

interface FailureSpec {
  message: string;
  statusCode: 401 | 403;
  activityType: ActivityType;
  severity: Severity;
}

const FAILURES: Record<AuthFailureReason, FailureSpec> = {
  missing_credentials: { message: 'API key required', statusCode: 401, activityType: 'auth_failed', severity: 'low' },
  malformed_credentials: { message: 'Malformed API key', statusCode: 401, activityType: 'auth_failed', severity: 'low' },
  key_not_found: { message: 'Invalid API key', statusCode: 401, activityType: 'auth_failed', severity: 'medium' },
  expired: { message: 'API key has expired', statusCode: 401, activityType: 'auth_blocked', severity: 'medium' },
  revoked: { message: 'API key has been revoked', statusCode: 401, activityType: 'auth_blocked', severity: 'medium' },
  suspended: { message: 'API key is suspended', statusCode: 403, activityType: 'auth_blocked', severity: 'medium' },
  ip_not_allowed: { message: 'Request IP is not allowed for this API key', statusCode: 403, activityType: 'ip_blocked', severity: 'medium' },
  domain_not_allowed: { message: 'Request origin is not allowed for this API key', statusCode: 403, activityType: 'auth_blocked', severity: 'medium' },
};

// ── Request Helpers ──

export type HeaderBag = Record<string, string | string[] | undefined>;

function header(headers: HeaderBag, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [k, v] of Object.entries(headers)) {
    if (k.toLowerCase() === wanted) return Array.isArray(v) ? v[0] : v;
  }
  return undefined;
}

/** Credential from `Authorization: Bearer …` or `X-API-Key`. */
export function extractCredential(headers: HeaderBag): string | null {
  const auth = header(headers, 'authorization');
  if (auth) {
    const match = /^Bearer\s+(\S+)\s*$/i.exec(auth);
    if (match) return match[1];
  }
  const apiKey = header(headers, 'x-api-key')?.trim();
  return apiKey ? apiKey : null;
}

/** First hop of X-Forwarded-For, else the socket address. */
export function clientIp(headers: HeaderBag, remoteAddress?: string): string {
  const forwarded = header(headers, 'x-forwarded-for') ?? header(headers, 'x-forwarded');
  const first = forwarded?.split(',')[0]?.trim();
  return normalizeIp(first || remoteAddress || 'unknown');
}

/** Lowercase, and unwrap IPv4-mapped IPv6 (`::ffff:10.0.0.1` → `10.0.0.1`). */
export function normalizeIp(ip: string): string {
  const lower = ip.trim().toLowerCase();
  const mapped = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/.exec(lower);
  return mapped ? mapped[1] : lower;
}

function originHost(origin: string): string | null {
  try {
    return new URL(origin).hostname.toLowerCase();
  } catch {
    return null;
  }
}

/** Exact host match, or any subdomain of an allowed domain. */
export function domainAllowed(host: string, allowed: readonly string[]): boolean {
  return allowed.some(d => {
    const domain = d.trim().toLowerCase().replace(/^\*\./, '');
    return host === domain || host.endsWith(`.${domain}`);
  });
}

// ── Gate ──

export interface AuthenticationGateOptions {
  store: ApiKeyStore;
  keys: KeyMaterialManager;
  activity?: ActivityReporter;
  clock?: Clock;
  logger?: Logger;
  metrics?: MetricsCollector;
  /** Failures from one IP within the window before severity escalates to high */
  repeatThreshold?: number;
  repeatWindowSeconds?: number;
}

export class AuthenticationGate {
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly repeats: RepeatTracker;

  constructor(private readonly opts: AuthenticationGateOptions) {
    this.clock = opts.clock ?? systemClock;
    this.log = opts.logger ?? createLogger('auth');
    this.repeats = new RepeatTracker({
      threshold: opts.repeatThreshold ?? 5,
      windowSeconds: opts.repeatWindowSeconds ?? 300,
      clock: this.clock,
    });
  }

  async authenticate(req: AuthRequest): Promise<AuthResult> {
    const sourceIp = normalizeIp(req.sourceIp);
    if (!req.credential) return this.reject('missing_credentials', req, sourceIp);

    const parsed = parseCredential(req.credential);
    if (!parsed) return this.reject('malformed_credentials', req, sourceIp);

    let record: ApiKeyRecord | null;
    try {
      record = await this.opts.store.getByKeyId(parsed.keyId);
    } catch (err) {
      this.log.error('Key lookup failed', { error: errorMessage(err) });
      throw new StorageError('Key lookup failed', { cause: err });
    }
    if (!record || !this.opts.keys.verify(parsed.secret, record.digest)) {
      return this.reject('key_not_found', req, sourceIp);
    }

    const now = this.clock();
    const expired = record.expiresAt !== undefined && Date.parse(record.expiresAt) <= now;
    let deprecated = false;
    switch (record.status) {
      case 'revoked': return this.reject('revoked', req, sourceIp, record);
      case 'expired': return this.reject('expired', req, sourceIp, record);
      case 'suspended':
        // the old key of a rotation stays usable until its grace period ends
        if (!record.metadata.deprecatedBy || record.expiresAt === undefined || expired) {
          return this.reject(expired ? 'expired' : 'suspended', req, sourceIp, record);
        }
        deprecated = true;
        break;
      case 'active':
        if (expired) return this.reject('expired', req, sourceIp, record);
        break;
    }

    if (record.allowedIps && record.allowedIps.length > 0) {
      const allowed = record.allowedIps.some(ip => normalizeIp(ip) === sourceIp);
      if (!allowed) return this.reject('ip_not_allowed', req, sourceIp, record);
    }

    if (req.origin && record.allowedDomains && record.allowedDomains.length > 0) {
      const host = originHost(req.origin);
      if (!host || !domainAllowed(host, record.allowedDomains)) {
        return this.reject('domain_not_allowed', req, sourceIp, record);
      }
    }

    await this.touch(record, now);
    this.opts.metrics?.counter(Metric.AuthAttempts, { result: 'success' });
    this.opts.activity?.emit({
      activityType: 'auth_success',
      severity: deprecated ? 'medium' : 'low',
      keyId: record.keyId,
      userId: record.ownerId,
      sourceIp,
      endpoint: req.requestPath,
      statusCode: 200,
      details: { deprecated, userAgent: req.userAgent },
    });
    if (deprecated) {
      this.log.warn('Deprecated key used during rotation transition', {
        keyId: record.keyId,
        replacedBy: record.metadata.deprecatedBy,
      });
    }
    return { valid: true, record, deprecated };
  }

  close(): void {
    this.repeats.close();
  }

  private async touch(record: ApiKeyRecord, now: number): Promise<void> {
    try {
      await this.opts.store.touch(record.id, new Date(now).toISOString());
    } catch (err) {
      this.log.warn('Failed to record key usage', { keyId: record.keyId, error: errorMessage(err) });
    }
  }

  private async reject(
    reason: AuthFailureReason,
    req: AuthRequest,
    sourceIp: string,
    record?: ApiKeyRecord,
  ): Promise<AuthResult> {
    const spec = FAILURES[reason];
    const inputError = reason === 'missing_credentials' || reason === 'malformed_credentials';
    const severity = inputError ? spec.severity : await this.repeats.severity(sourceIp, spec.severity);

    this.opts.metrics?.counter(Metric.AuthAttempts, { result: reason });
    this.opts.activity?.emit({
      activityType: spec.activityType,
      severity,
      keyId: record?.keyId,
      userId: record?.ownerId,
      sourceIp,
      endpoint: req.requestPath,
      statusCode: spec.statusCode,
      details: { reason, userAgent: req.userAgent },
    });
    this.log.debug('Authentication rejected', { reason, sourceIp, path: req.requestPath });

    return {
      valid: false,
      reason,
      message: spec.message,
      statusCode: spec.statusCode,
      keyId: reason === 'key_not_found' ? undefined : record?.keyId,
    };
  }
}
