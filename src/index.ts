/**
 * Keygate — admission control for developer-portal APIs.
 *
 * @packageDocumentation
 */

// ── Core Types ──
export type {
  Clock,
  KeyStatus,
  RateLimitPeriod,
  AlgorithmName,
  RotationTrigger,
  AutoRotationSchedule,
  KeyMetadata,
  ApiKeyRecord,
  ApiKeyFilter,
  ApiKeyStore,
  RateLimitDecision,
  ActivityType,
  Severity,
  ActivityEvent,
  ActivitySink,
} from './core/types.js';
export { systemClock, KEY_STATUSES, RATE_LIMIT_PERIODS, PERIOD_SECONDS, ALGORITHM_NAMES } from './core/types.js';

// ── Errors ──
export {
  AdmissionError,
  InvalidArgumentError,
  UnknownAlgorithmError,
  ConfigError,
  RateLimitUnavailableError,
  StorageError,
  errorMessage,
} from './core/errors.js';

// ── Key Material ──
export {
  KeyMaterialManager,
  formatCredential,
  parseCredential,
  isKeyId,
  KEY_ID_PREFIX,
  SECRET_PREFIX,
} from './core/crypto.js';
export type { GeneratedKey, ParsedCredential } from './core/crypto.js';

// ── Permissions ──
export {
  PermissionEvaluator,
  DEFAULT_SCOPES,
  RESOURCES,
  PERMISSIONS,
  ADMIN_SCOPE,
  isResource,
  isPermission,
  permissionString,
} from './core/permissions.js';
export type {
  Resource,
  Permission,
  RequiredPermission,
  ScopeDefinition,
  PermissionDenial,
  AuthorizationResult,
} from './core/permissions.js';

// ── Rate Limiting ──
export type {
  CounterBackend,
  WindowAdmitRequest,
  WindowAdmission,
  TokenConsumeRequest,
  TokenConsumption,
  ConditionalIncrement,
} from './ratelimit/backend.js';
export { MemoryCounterBackend } from './ratelimit/memory-backend.js';
export { SqliteCounterBackend } from './ratelimit/sqlite-backend.js';
export { ResilientCounterBackend } from './ratelimit/resilient-backend.js';
export type { ResilientBackendOptions } from './ratelimit/resilient-backend.js';
export {
  FixedWindowAlgorithm,
  SlidingWindowAlgorithm,
  SlidingLogAlgorithm,
  TokenBucketAlgorithm,
  createAlgorithm,
  isAlgorithmName,
} from './ratelimit/algorithms.js';
export type { RateLimitAlgorithm } from './ratelimit/algorithms.js';
export { decisionHeaders, rateLimitErrorBody, unlimitedDecision, isUnlimited } from './ratelimit/decision.js';
export type { RateLimitLayer, RateLimitErrorBody } from './ratelimit/decision.js';
export { RateLimitManager, computeRequestCost } from './ratelimit/manager.js';
export type {
  RateLimitRule,
  GlobalRule,
  EndpointRule,
  FailurePolicy,
  LayerDecision,
  RateLimitOutcome,
  RateLimitCheck,
  RateLimitManagerOptions,
} from './ratelimit/manager.js';

// ── Authentication ──
export { AuthenticationGate, extractCredential, clientIp, normalizeIp, domainAllowed } from './auth/gate.js';
export type { AuthRequest, AuthResult, AuthFailureReason, AuthenticationGateOptions, HeaderBag } from './auth/gate.js';

// ── Storage ──
export { MemoryApiKeyStore } from './storage/memory.js';
export { SqliteApiKeyStore } from './storage/sqlite.js';

// ── Activity ──
export {
  ActivityReporter,
  MemoryActivityLog,
  LoggerActivitySink,
  CompositeActivitySink,
} from './activity/activity-log.js';
export type { ActivityInput } from './activity/activity-log.js';

// ── Lifecycle ──
export { LifecycleManager, ROTATION_POLICIES, NOTIFICATION_THRESHOLDS } from './lifecycle/manager.js';
export type {
  IssueKeyInput,
  IssuedKey,
  RotateOptions,
  RotationResult,
  RotationPolicy,
  ExpiringKey,
  ExpirySweep,
  LifecycleStatus,
  CycleSummary,
} from './lifecycle/manager.js';
export { LifecycleService } from './lifecycle/service.js';
export type { LifecycleServiceOptions } from './lifecycle/service.js';
export { LoggingNotifier, MemoryNotifier } from './notify/notifier.js';
export type { Notifier, ExpiryNotice, RotationNotice, ExpiryLevel } from './notify/notifier.js';

// ── Pipeline ──
export { AdmissionPipeline } from './pipeline.js';
export type { AdmissionRequest, AdmissionOutcome, AdmissionStage } from './pipeline.js';
export { createAdmissionContext } from './context.js';
export type { AdmissionContext, Collaborators } from './context.js';
export { loadConfig, parseConfig, DEFAULT_CONFIG } from './config.js';
export type { AdmissionConfig, ConfigOverrides } from './config.js';
export { withAdmission, toHttpResponse, sendJson } from './transport/http.js';

// ── Observability ──
export { createLogger, setGlobalLogLevel, setLogOutput, resetLogOutput, LogLevel } from './core/logger.js';
export type { Logger, LogEntry } from './core/logger.js';
export { MetricsCollector, Metric } from './core/metrics.js';
export type { MetricsSnapshot, MetricsAdapter } from './core/metrics.js';
export { CircuitBreaker, CircuitOpenError } from './core/circuit-breaker.js';
export type { CircuitState, CircuitBreakerConfig } from './core/circuit-breaker.js';
