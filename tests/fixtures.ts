import type { ApiKeyRecord } from '../src/core/types.js';

/** Aligned to a minute boundary. */
export const T0 = 1_699_999_980_000;

export const DAY_MS = 86_400_000;

let seq = 0;

/** A key record with a placeholder digest; override what the test cares about. */
export function makeRecord(overrides: Partial<ApiKeyRecord> = {}): ApiKeyRecord {
  seq++;
  const created = new Date(T0).toISOString();
  return {
    id: `rec-${seq}`,
    keyId: `ak_${String(seq).padStart(22, '0')}`,
    digest: '0'.repeat(64),
    name: `key ${seq}`,
    ownerId: 'owner-1',
    status: 'active',
    scopes: ['read'],
    rateLimit: null,
    rateLimitPeriod: 'hour',
    createdAt: created,
    updatedAt: created,
    metadata: {},
    ...overrides,
  };
}

/** Manually advanced millisecond clock. */
export class TestClock {
  constructor(public now: number = T0) {}

  readonly read = (): number => this.now;

  advance(ms: number): void {
    this.now += ms;
  }

  iso(offsetMs = 0): string {
    return new Date(this.now + offsetMs).toISOString();
  }
}
