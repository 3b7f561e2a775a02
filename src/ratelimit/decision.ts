/**
 * Pure serialization of rate-limit decisions into HTTP headers and 429 bodies.
 */

import type { RateLimitDecision } from '../core/types.js';

export type RateLimitLayer = 'per_key' | 'global' | 'endpoint';

export interface RateLimitErrorBody {
  error: 'rate_limit_exceeded' | 'global_rate_limit_exceeded' | 'endpoint_rate_limit_exceeded';
  message: string;
  details: {
    layer: RateLimitLayer;
    limit: number;
    remaining: number;
    /** Unix seconds */
    resetTime: number;
    retryAfter: number;
    algorithm: string;
    windowSize?: number;
  };
}

/** Decision for a key with no configured limit. */
export function unlimitedDecision(now: number): RateLimitDecision {
  return { allowed: true, limit: Infinity, remaining: Infinity, resetAt: now, algorithm: 'none' };
}

export function isUnlimited(decision: RateLimitDecision): boolean {
  return decision.limit === Infinity;
}

function headerNumber(value: number): string {
  return Number.isFinite(value) ? String(Math.floor(value)) : 'unlimited';
}

/** Standard rate-limit response headers. `Retry-After` only on rejections. */
export function decisionHeaders(decision: RateLimitDecision): Record<string, string> {
  const headers: Record<string, string> = {
    'X-RateLimit-Limit': headerNumber(decision.limit),
    'X-RateLimit-Remaining': headerNumber(decision.remaining),
    'X-RateLimit-Reset': String(Math.ceil(decision.resetAt / 1000)),
    'X-RateLimit-Algorithm': decision.algorithm,
  };
  if (decision.windowSeconds !== undefined) {
    headers['X-RateLimit-Window'] = String(decision.windowSeconds);
  }
  if (!decision.allowed && decision.retryAfter !== undefined) {
    headers['Retry-After'] = String(decision.retryAfter);
  }
  return headers;
}

const LAYER_ERRORS: Record<RateLimitLayer, { error: RateLimitErrorBody['error']; subject: string }> = {
  per_key: { error: 'rate_limit_exceeded', subject: 'Rate limit' },
  global: { error: 'global_rate_limit_exceeded', subject: 'Global rate limit' },
  endpoint: { error: 'endpoint_rate_limit_exceeded', subject: 'Endpoint rate limit' },
};

/** JSON body for a 429 response, mirroring the headers. */
export function rateLimitErrorBody(layer: RateLimitLayer, decision: RateLimitDecision): RateLimitErrorBody {
  const { error, subject } = LAYER_ERRORS[layer];
  const retryAfter = decision.retryAfter ?? 1;
  return {
    error,
    message: `${subject} exceeded. Try again in ${retryAfter} second${retryAfter === 1 ? '' : 's'}.`,
    details: {
      layer,
      limit: decision.limit,
      remaining: decision.remaining,
      resetTime: Math.ceil(decision.resetAt / 1000),
      retryAfter,
      algorithm: decision.algorithm,
      windowSize: decision.windowSeconds,
    },
  };
}
