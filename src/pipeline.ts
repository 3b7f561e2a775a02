/**
 * Admission Pipeline — authentication, then rate limiting, then permission
 * evaluation. The first stage that refuses decides the response.
 */

import type { ActivityReporter } from './activity/activity-log.js';
import type { AuthenticationGate, AuthFailureReason, HeaderBag } from './auth/gate.js';
import { clientIp, extractCredential } from './auth/gate.js';
import type { MetricsCollector } from './core/metrics.js';
import { Metric } from './core/metrics.js';
import type { PermissionDenial, PermissionEvaluator, RequiredPermission, Resource } from './core/permissions.js';
import type { ApiKeyRecord } from './core/types.js';
import type { RateLimitErrorBody } from './ratelimit/decision.js';
import { rateLimitErrorBody } from './ratelimit/decision.js';
import type { RateLimitManager, RateLimitOutcome } from './ratelimit/manager.js';
import { computeRequestCost } from './ratelimit/manager.js';

// ── Types ──

export interface AdmissionRequest {
  method: string;
  path: string;
  /** Raw credential; read from `headers` when absent */
  credential?: string | null;
  headers?: HeaderBag;
  /** Socket address; X-Forwarded-For in `headers` takes precedence */
  remoteAddress?: string;
  origin?: string;
  userAgent?: string;
  /** Permission the handler needs; skipped when absent */
  required?: { resource: Resource; permission: RequiredPermission };
  /** Overrides the method/path cost table */
  cost?: number;
}

export interface AuthErrorBody {
  error: AuthFailureReason;
  message: string;
}

export interface UnavailableBody {
  error: 'rate_limit_unavailable';
  message: string;
}

export type AdmissionStage = 'authentication' | 'rate_limit' | 'authorization';

export type AdmissionOutcome =
  | {
      admitted: true;
      record: ApiKeyRecord;
      /** Old key of a rotation in its transition period */
      deprecated: boolean;
      rateLimit: RateLimitOutcome;
      headers: Record<string, string>;
    }
  | { admitted: false; stage: 'authentication'; statusCode: 401 | 403; headers: Record<string, string>; body: AuthErrorBody }
  | { admitted: false; stage: 'rate_limit'; statusCode: 429; headers: Record<string, string>; body: RateLimitErrorBody }
  | { admitted: false; stage: 'rate_limit'; statusCode: 503; headers: Record<string, string>; body: UnavailableBody }
  | { admitted: false; stage: 'authorization'; statusCode: 403; headers: Record<string, string>; body: PermissionDenial };

export interface AdmissionPipelineOptions {
  gate: AuthenticationGate;
  rateLimits: RateLimitManager;
  permissions: PermissionEvaluator;
  activity?: ActivityReporter;
  metrics?: MetricsCollector;
}

// ── Pipeline ──

export class AdmissionPipeline {
  constructor(private readonly opts: AdmissionPipelineOptions) {}

  async admit(req: AdmissionRequest): Promise<AdmissionOutcome> {
    const headers = req.headers ?? {};
    const sourceIp = clientIp(headers, req.remoteAddress);
    const auth = await this.opts.gate.authenticate({
      credential: req.credential ?? extractCredential(headers),
      sourceIp,
      requestPath: req.path,
      origin: req.origin ?? firstValue(headers.origin),
      userAgent: req.userAgent ?? firstValue(headers['user-agent']),
    });
    if (!auth.valid) {
      return {
        admitted: false,
        stage: 'authentication',
        statusCode: auth.statusCode,
        headers: auth.statusCode === 401 ? { 'WWW-Authenticate': 'Bearer' } : {},
        body: { error: auth.reason, message: auth.message },
      };
    }

    const { record } = auth;
    const rateLimit = await this.opts.rateLimits.check({
      record,
      endpoint: req.path,
      cost: req.cost ?? computeRequestCost(req.method, req.path),
      sourceIp,
    });
    if (rateLimit.status === 'rejected') {
      return {
        admitted: false,
        stage: 'rate_limit',
        statusCode: 429,
        headers: rateLimit.headers,
        body: rateLimitErrorBody(rateLimit.layer, rateLimit.decision),
      };
    }
    if (rateLimit.status === 'unavailable' && !rateLimit.allowed) {
      return {
        admitted: false,
        stage: 'rate_limit',
        statusCode: 503,
        headers: { 'Retry-After': '1' },
        body: { error: 'rate_limit_unavailable', message: 'Rate limiting is temporarily unavailable' },
      };
    }

    const responseHeaders = { ...rateLimit.headers };
    if (auth.deprecated) responseHeaders['Deprecation'] = 'true';

    if (req.required) {
      const { resource, permission } = req.required;
      const result = this.opts.permissions.authorize(record.scopes, resource, permission);
      this.opts.metrics?.counter(Metric.PermissionChecks, { result: result.allowed ? 'allowed' : 'denied' });
      if (!result.allowed) {
        this.opts.activity?.emit({
          activityType: 'permission_denied',
          severity: 'medium',
          keyId: record.keyId,
          userId: record.ownerId,
          sourceIp,
          endpoint: req.path,
          statusCode: 403,
          details: { requiredPermission: result.body.requiredPermission, scopes: record.scopes },
        });
        return { admitted: false, stage: 'authorization', statusCode: 403, headers: responseHeaders, body: result.body };
      }
    }

    return { admitted: true, record, deprecated: auth.deprecated, rateLimit, headers: responseHeaders };
  }
}

function firstValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}
