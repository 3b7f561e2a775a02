/**
 * In-process metrics for admission outcomes.
 */

// ── Metric Names ──

export const Metric = {
  AuthAttempts: 'keygate_auth_attempts_total',
  RateLimitChecks: 'keygate_ratelimit_checks_total',
  RateLimitUnavailable: 'keygate_ratelimit_unavailable_total',
  BackendFallbacks: 'keygate_backend_fallbacks_total',
  BackendLatencyMs: 'keygate_backend_latency_ms',
  CircuitState: 'keygate_backend_circuit_state',
  PermissionChecks: 'keygate_permission_checks_total',
  Rotations: 'keygate_rotations_total',
  LifecycleCycles: 'keygate_lifecycle_cycles_total',
  ActivitySinkFailures: 'keygate_activity_sink_failures_total',
} as const;

export type MetricName = (typeof Metric)[keyof typeof Metric];

// ── Types ──

export type Tags = Record<string, string>;

export interface MetricsSnapshot {
  counters: Record<string, { value: number; tags?: Tags }[]>;
  gauges: Record<string, { value: number; tags?: Tags }[]>;
  histograms: Record<string, { values: number[]; tags?: Tags }[]>;
  collectedAt: string;
}

/** Forwarding hook for an external metrics system (Prometheus, StatsD, ...). */
export interface MetricsAdapter {
  onCounter(name: string, value: number, tags?: Tags): void;
  onGauge(name: string, value: number, tags?: Tags): void;
  onHistogram(name: string, value: number, tags?: Tags): void;
}

interface ValueEntry {
  value: number;
  tags?: Tags;
}

interface HistogramEntry {
  values: number[];
  tags?: Tags;
}

function tagsKey(tags?: Tags): string {
  if (!tags || Object.keys(tags).length === 0) return '';
  return Object.entries(tags).sort(([a], [b]) => a.localeCompare(b)).map(([k, v]) => `${k}=${v}`).join(',');
}

function bucket<E>(store: Map<string, Map<string, E>>, name: string): Map<string, E> {
  let byTags = store.get(name);
  if (!byTags) {
    byTags = new Map();
    store.set(name, byTags);
  }
  return byTags;
}

// ── Metrics Collector ──

export class MetricsCollector {
  private counters = new Map<string, Map<string, ValueEntry>>();
  private gauges = new Map<string, Map<string, ValueEntry>>();
  private histograms = new Map<string, Map<string, HistogramEntry>>();
  private adapters: MetricsAdapter[] = [];

  registerAdapter(adapter: MetricsAdapter): void {
    this.adapters.push(adapter);
  }

  counter(name: string, tags?: Tags, amount = 1): void {
    const byTags = bucket(this.counters, name);
    const key = tagsKey(tags);
    const existing = byTags.get(key);
    if (existing) {
      existing.value += amount;
    } else {
      byTags.set(key, { value: amount, tags });
    }
    for (const a of this.adapters) a.onCounter(name, amount, tags);
  }

  gauge(name: string, value: number, tags?: Tags): void {
    bucket(this.gauges, name).set(tagsKey(tags), { value, tags });
    for (const a of this.adapters) a.onGauge(name, value, tags);
  }

  histogram(name: string, value: number, tags?: Tags): void {
    const byTags = bucket(this.histograms, name);
    const key = tagsKey(tags);
    const existing = byTags.get(key);
    if (existing) {
      existing.values.push(value);
    } else {
      byTags.set(key, { values: [value], tags });
    }
    for (const a of this.adapters) a.onHistogram(name, value, tags);
  }

  /** Time an async call into a histogram, whether it resolves or rejects. */
  async time<T>(name: string, fn: () => Promise<T>, tags?: Tags): Promise<T> {
    const started = performance.now();
    try {
      return await fn();
    } finally {
      this.histogram(name, performance.now() - started, tags);
    }
  }

  getSnapshot(): MetricsSnapshot {
    const counters: MetricsSnapshot['counters'] = {};
    for (const [name, byTags] of this.counters) counters[name] = Array.from(byTags.values());
    const gauges: MetricsSnapshot['gauges'] = {};
    for (const [name, byTags] of this.gauges) gauges[name] = Array.from(byTags.values());
    const histograms: MetricsSnapshot['histograms'] = {};
    for (const [name, byTags] of this.histograms) histograms[name] = Array.from(byTags.values());
    return { counters, gauges, histograms, collectedAt: new Date().toISOString() };
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.histograms.clear();
  }

  /** Counter total across all tag sets, or for exactly `tags`. */
  getCounter(name: string, tags?: Tags): number {
    const byTags = this.counters.get(name);
    if (!byTags) return 0;
    if (tags) return byTags.get(tagsKey(tags))?.value ?? 0;
    let total = 0;
    for (const entry of byTags.values()) total += entry.value;
    return total;
  }

  getGauge(name: string, tags?: Tags): number | undefined {
    return this.gauges.get(name)?.get(tagsKey(tags))?.value;
  }

  getHistogramValues(name: string, tags?: Tags): number[] {
    const byTags = this.histograms.get(name);
    if (!byTags) return [];
    if (tags) return byTags.get(tagsKey(tags))?.values ?? [];
    const all: number[] = [];
    for (const entry of byTags.values()) all.push(...entry.values);
    return all;
  }
}
