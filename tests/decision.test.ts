import { describe, it, expect } from 'vitest';
import { decisionHeaders, isUnlimited, rateLimitErrorBody, unlimitedDecision } from '../src/ratelimit/decision.js';
import type { RateLimitDecision } from '../src/core/types.js';

const allowed: RateLimitDecision = {
  allowed: true,
  limit: 100,
  remaining: 42,
  resetAt: 1_700_000_000_500,
  windowSeconds: 3_600,
  algorithm: 'sliding_window',
};

const denied: RateLimitDecision = {
  allowed: false,
  limit: 100,
  remaining: 0,
  resetAt: 1_700_000_030_000,
  retryAfter: 30,
  windowSeconds: 3_600,
  algorithm: 'fixed_window',
};

describe('decisionHeaders', () => {
  it('serializes an admitted decision without Retry-After', () => {
    expect(decisionHeaders(allowed)).toEqual({
      'X-RateLimit-Limit': '100',
      'X-RateLimit-Remaining': '42',
      'X-RateLimit-Reset': '1700000001',
      'X-RateLimit-Algorithm': 'sliding_window',
      'X-RateLimit-Window': '3600',
    });
  });

  it('adds Retry-After on rejections', () => {
    expect(decisionHeaders(denied)['Retry-After']).toBe('30');
  });

  it('floors fractional token counts', () => {
    expect(decisionHeaders({ ...allowed, remaining: 2.75 })['X-RateLimit-Remaining']).toBe('2');
  });

  it('marks unlimited keys', () => {
    const headers = decisionHeaders(unlimitedDecision(1_700_000_000_000));
    expect(headers['X-RateLimit-Limit']).toBe('unlimited');
    expect(headers['X-RateLimit-Remaining']).toBe('unlimited');
    expect(headers['X-RateLimit-Algorithm']).toBe('none');
    expect(headers['X-RateLimit-Window']).toBeUndefined();
  });
});

describe('unlimitedDecision', () => {
  it('always allows', () => {
    const d = unlimitedDecision(5);
    expect(d.allowed).toBe(true);
    expect(isUnlimited(d)).toBe(true);
    expect(isUnlimited(allowed)).toBe(false);
  });
});

describe('rateLimitErrorBody', () => {
  it('describes a per-key rejection', () => {
    expect(rateLimitErrorBody('per_key', denied)).toEqual({
      error: 'rate_limit_exceeded',
      message: 'Rate limit exceeded. Try again in 30 seconds.',
      details: {
        layer: 'per_key',
        limit: 100,
        remaining: 0,
        resetTime: 1_700_000_030,
        retryAfter: 30,
        algorithm: 'fixed_window',
        windowSize: 3_600,
      },
    });
  });

  it('names the layer that refused', () => {
    expect(rateLimitErrorBody('global', { ...denied, retryAfter: 1 }).message)
      .toBe('Global rate limit exceeded. Try again in 1 second.');
    expect(rateLimitErrorBody('endpoint', denied).error).toBe('endpoint_rate_limit_exceeded');
  });
});
