/**
 * Keygate Core Types
 * Shared types and collaborator interfaces for the admission pipeline.
 */

/** Millisecond wall clock. Injected everywhere time matters so tests can drive it. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

// ── API Keys ──

export type KeyStatus = 'active' | 'suspended' | 'revoked' | 'expired';

export const KEY_STATUSES: readonly KeyStatus[] = ['active', 'suspended', 'revoked', 'expired'];

export type RateLimitPeriod = 'minute' | 'hour' | 'day' | 'month';

export const RATE_LIMIT_PERIODS: readonly RateLimitPeriod[] = ['minute', 'hour', 'day', 'month'];

export const PERIOD_SECONDS: Record<RateLimitPeriod, number> = {
  minute: 60,
  hour: 3_600,
  day: 86_400,
  month: 2_592_000,
};

export type AlgorithmName = 'fixed_window' | 'sliding_window' | 'sliding_log' | 'token_bucket';

export const ALGORITHM_NAMES: readonly AlgorithmName[] = [
  'fixed_window',
  'sliding_window',
  'sliding_log',
  'token_bucket',
];

export type RotationTrigger =
  | 'manual'
  | 'scheduled'
  | 'security_incident'
  | 'compliance_requirement'
  | 'expiration_approaching'
  | 'usage_anomaly';

export interface AutoRotationSchedule {
  intervalDays: number;
  /** ISO 8601 */
  nextRotationAt: string;
}

/** Rotation and scheduling bookkeeping carried on a key record. */
export interface KeyMetadata {
  /** keyId of the key that replaced this one */
  deprecatedBy?: string;
  /** keyId of the key this one replaced */
  replaces?: string;
  rotationTrigger?: RotationTrigger;
  rotatedAt?: string;
  transitionDays?: number;
  autoRotation?: AutoRotationSchedule;
}

export interface ApiKeyRecord {
  id: string;
  /** Public identifier, `ak_` prefixed, stored in plaintext and indexed */
  keyId: string;
  /** HMAC-SHA-256 hex digest of the secret */
  digest: string;
  name: string;
  ownerId: string;
  status: KeyStatus;
  scopes: string[];
  expiresAt?: string;
  allowedIps?: string[];
  allowedDomains?: string[];
  /** Requests per period; null/undefined means unlimited */
  rateLimit?: number | null;
  rateLimitPeriod: RateLimitPeriod;
  rateLimitAlgorithm?: AlgorithmName;
  createdAt: string;
  updatedAt: string;
  lastUsedAt?: string;
  metadata: KeyMetadata;
}

export interface ApiKeyFilter {
  ownerId?: string;
  status?: KeyStatus[];
  /** Only keys with an expiresAt at or before this ISO timestamp */
  expiresBefore?: string;
}

/** Persistence collaborator for key records. The core never owns schema. */
export interface ApiKeyStore {
  create(record: ApiKeyRecord): Promise<void>;
  getById(id: string): Promise<ApiKeyRecord | null>;
  getByKeyId(keyId: string): Promise<ApiKeyRecord | null>;
  list(filter?: ApiKeyFilter): Promise<ApiKeyRecord[]>;
  updateStatus(id: string, status: KeyStatus): Promise<boolean>;
  updateExpiry(id: string, expiresAt: string | null): Promise<boolean>;
  updateMetadata(id: string, metadata: KeyMetadata): Promise<boolean>;
  touch(id: string, usedAt: string): Promise<boolean>;
}

// ── Rate Limiting ──

export interface RateLimitDecision {
  allowed: boolean;
  /** Infinity when unlimited */
  limit: number;
  /** Never negative; Infinity when unlimited */
  remaining: number;
  /** Epoch milliseconds at which the limit fully resets */
  resetAt: number;
  /** Whole seconds, present on rejections */
  retryAfter?: number;
  windowSeconds?: number;
  algorithm: AlgorithmName | 'none';
}

// ── Activity Events ──

export type ActivityType =
  | 'auth_success'
  | 'auth_failed'
  | 'auth_blocked'
  | 'ip_blocked'
  | 'rate_limit_exceeded'
  | 'permission_denied'
  | 'key_created'
  | 'key_rotated'
  | 'key_expired'
  | 'key_revoked'
  | 'key_expiring'
  | 'rotation_failed';

export type Severity = 'low' | 'medium' | 'high' | 'critical';

export interface ActivityEvent {
  activityType: ActivityType;
  severity: Severity;
  keyId?: string;
  userId?: string;
  sourceIp?: string;
  endpoint?: string;
  statusCode?: number;
  details: Record<string, unknown>;
  /** ISO 8601 */
  timestamp: string;
}

/** Write-only logging collaborator. Failures never affect admission decisions. */
export interface ActivitySink {
  record(event: ActivityEvent): void | Promise<void>;
}
