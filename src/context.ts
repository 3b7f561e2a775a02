/**
 * Wires every admission component from a configuration. Nothing here is a
 * module-level singleton; each context owns its stores and timers.
 */

import { ActivityReporter, CompositeActivitySink, LoggerActivitySink } from './activity/activity-log.js';
import { AuthenticationGate } from './auth/gate.js';
import type { AdmissionConfig } from './config.js';
import { KeyMaterialManager } from './core/crypto.js';
import type { Logger } from './core/logger.js';
import { createLogger, parseLogLevel, setGlobalLogLevel } from './core/logger.js';
import { MetricsCollector } from './core/metrics.js';
import { PermissionEvaluator } from './core/permissions.js';
import type { ActivitySink, ApiKeyStore, Clock } from './core/types.js';
import { systemClock } from './core/types.js';
import { LifecycleManager } from './lifecycle/manager.js';
import { LifecycleService } from './lifecycle/service.js';
import type { Notifier } from './notify/notifier.js';
import { LoggingNotifier } from './notify/notifier.js';
import { AdmissionPipeline } from './pipeline.js';
import type { CounterBackend } from './ratelimit/backend.js';
import { RateLimitManager } from './ratelimit/manager.js';
import { MemoryCounterBackend } from './ratelimit/memory-backend.js';
import { ResilientCounterBackend } from './ratelimit/resilient-backend.js';
import { SqliteCounterBackend } from './ratelimit/sqlite-backend.js';
import { MemoryApiKeyStore } from './storage/memory.js';
import { SqliteApiKeyStore } from './storage/sqlite.js';

/** Replacements for the components the config would otherwise build. */
export interface Collaborators {
  store?: ApiKeyStore;
  backend?: CounterBackend;
  notifier?: Notifier;
  /** Several sinks each receive every event */
  activitySink?: ActivitySink | ActivitySink[];
  clock?: Clock;
  logger?: Logger;
  metrics?: MetricsCollector;
}

export interface AdmissionContext {
  config: AdmissionConfig;
  keys: KeyMaterialManager;
  store: ApiKeyStore;
  backend: CounterBackend;
  activity: ActivityReporter;
  metrics: MetricsCollector;
  gate: AuthenticationGate;
  rateLimits: RateLimitManager;
  permissions: PermissionEvaluator;
  lifecycle: LifecycleManager;
  scheduler: LifecycleService;
  pipeline: AdmissionPipeline;
  /** Start background work the config enables. */
  start(): void;
  /** Stop the scheduler and release stores and timers. */
  close(): Promise<void>;
}

interface Closable {
  close(): void | Promise<void>;
}

function isClosable(value: object): value is Closable {
  return 'close' in value && typeof value.close === 'function';
}

function buildBackend(config: AdmissionConfig, clock: Clock, logger: Logger, metrics: MetricsCollector): CounterBackend {
  const { backend } = config;
  if (backend.type === 'memory') {
    return new MemoryCounterBackend({ clock, sweepIntervalMs: backend.sweepIntervalMs });
  }
  const shared = new SqliteCounterBackend(backend.path, {
    clock,
    sweepIntervalMs: backend.sweepIntervalMs,
    busyTimeoutMs: backend.timeoutMs,
  });
  return new ResilientCounterBackend(shared, {
    timeoutMs: backend.timeoutMs,
    fallback: backend.fallback ? new MemoryCounterBackend({ clock, sweepIntervalMs: backend.sweepIntervalMs }) : undefined,
    clock,
    logger: logger.child({ component: 'backend' }),
    metrics,
  });
}

export function createAdmissionContext(config: AdmissionConfig, collaborators: Collaborators = {}): AdmissionContext {
  const level = parseLogLevel(config.logLevel);
  if (level !== undefined) setGlobalLogLevel(level);

  const clock = collaborators.clock ?? systemClock;
  const logger = collaborators.logger ?? createLogger('admission');
  const metrics = collaborators.metrics ?? new MetricsCollector();
  const keys = new KeyMaterialManager(config.serverSecret);

  const ownedStore = collaborators.store === undefined;
  const store = collaborators.store
    ?? (config.store.type === 'sqlite' ? new SqliteApiKeyStore(config.store.path, clock) : new MemoryApiKeyStore(clock));
  const ownedBackend = collaborators.backend === undefined;
  const backend = collaborators.backend ?? buildBackend(config, clock, logger, metrics);

  const sinks = collaborators.activitySink;
  const activity = new ActivityReporter(
    sinks === undefined
      ? new LoggerActivitySink(logger.child({ component: 'activity' }))
      : Array.isArray(sinks) ? new CompositeActivitySink(sinks) : sinks,
    { clock, logger: logger.child({ component: 'activity' }), metrics },
  );

  const repeat = {
    repeatThreshold: config.security.repeatThreshold,
    repeatWindowSeconds: config.security.repeatWindowSeconds,
  };
  const gate = new AuthenticationGate({
    store, keys, activity, clock, metrics, logger: logger.child({ component: 'auth' }), ...repeat,
  });
  const rateLimits = new RateLimitManager({
    backend,
    algorithm: config.rateLimit.algorithm,
    global: config.rateLimit.global,
    endpoints: config.rateLimit.endpoints,
    failurePolicy: config.rateLimit.failurePolicy,
    clock,
    metrics,
    activity,
    logger: logger.child({ component: 'ratelimit' }),
  });
  const permissions = new PermissionEvaluator();
  const lifecycle = new LifecycleManager({
    store,
    keys,
    notifier: collaborators.notifier ?? new LoggingNotifier(logger.child({ component: 'notifier' })),
    activity,
    clock,
    metrics,
    logger: logger.child({ component: 'lifecycle' }),
    defaultPeriod: config.rateLimit.defaultPeriod,
  });
  const scheduler = new LifecycleService(lifecycle, {
    intervalMs: config.lifecycle.intervalMs,
    retryDelayMs: config.lifecycle.retryDelayMs,
    metrics,
    logger: logger.child({ component: 'scheduler' }),
  });
  const pipeline = new AdmissionPipeline({ gate, rateLimits, permissions, activity, metrics });

  return {
    config, keys, store, backend, activity, metrics, gate, rateLimits, permissions, lifecycle, scheduler, pipeline,
    start() {
      if (config.lifecycle.enabled) scheduler.start();
    },
    async close() {
      await scheduler.stop();
      gate.close();
      rateLimits.close();
      if (ownedBackend) await backend.close?.();
      if (ownedStore && isClosable(store)) await store.close();
    },
  };
}
