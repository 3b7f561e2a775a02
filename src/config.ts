/**
 * Configuration: defaults, then an optional JSON file, then `ADMISSION_*`
 * environment variables, then programmatic overrides. The merged result is
 * validated against a JSON schema.
 */

import { readFileSync } from 'node:fs';
import { Ajv } from 'ajv';
import { ConfigError, errorMessage } from './core/errors.js';
import type { AlgorithmName, RateLimitPeriod } from './core/types.js';
import { ALGORITHM_NAMES, RATE_LIMIT_PERIODS } from './core/types.js';
import type { EndpointRule, FailurePolicy, GlobalRule } from './ratelimit/manager.js';

// ── Types ──

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type StoreType = 'memory' | 'sqlite';

export interface AdmissionConfig {
  /** HMAC key for secret digests */
  serverSecret: string;
  logLevel: LogLevelName;
  rateLimit: {
    algorithm: AlgorithmName;
    failurePolicy: FailurePolicy;
    /** Period given to new keys without one */
    defaultPeriod: RateLimitPeriod;
    global?: GlobalRule;
    endpoints: EndpointRule[];
  };
  backend: {
    type: StoreType;
    /** SQLite database file; `:memory:` keeps it in process */
    path: string;
    /** Per-call timeout when the backend is wrapped for resilience */
    timeoutMs: number;
    /** Fall back to an in-process backend when the shared one fails */
    fallback: boolean;
    sweepIntervalMs: number;
  };
  store: {
    type: StoreType;
    path: string;
  };
  lifecycle: {
    enabled: boolean;
    intervalMs: number;
    retryDelayMs: number;
  };
  security: {
    /** Failures from one source before severity escalates */
    repeatThreshold: number;
    repeatWindowSeconds: number;
  };
}

export type ConfigOverrides = {
  [K in keyof AdmissionConfig]?: AdmissionConfig[K] extends object
    ? Partial<AdmissionConfig[K]>
    : AdmissionConfig[K];
};

export type Env = Record<string, string | undefined>;

// ── Defaults ──

export const DEFAULT_CONFIG: Omit<AdmissionConfig, 'serverSecret'> = {
  logLevel: 'info',
  rateLimit: {
    algorithm: 'sliding_window',
    failurePolicy: 'fail_closed',
    defaultPeriod: 'hour',
    endpoints: [],
  },
  backend: {
    type: 'memory',
    path: ':memory:',
    timeoutMs: 250,
    fallback: false,
    sweepIntervalMs: 300_000,
  },
  store: {
    type: 'memory',
    path: ':memory:',
  },
  lifecycle: {
    enabled: true,
    intervalMs: 3_600_000,
    retryDelayMs: 60_000,
  },
  security: {
    repeatThreshold: 5,
    repeatWindowSeconds: 300,
  },
};

// ── Schema ──

const rule = {
  limit: { type: 'integer', minimum: 0 },
  windowSeconds: { type: 'integer', minimum: 1 },
  algorithm: { type: 'string', enum: ALGORITHM_NAMES },
};

export const CONFIG_SCHEMA = {
  type: 'object',
  required: ['serverSecret', 'logLevel', 'rateLimit', 'backend', 'store', 'lifecycle', 'security'],
  additionalProperties: false,
  properties: {
    serverSecret: { type: 'string', minLength: 16 },
    logLevel: { type: 'string', enum: ['debug', 'info', 'warn', 'error', 'silent'] },
    rateLimit: {
      type: 'object',
      required: ['algorithm', 'failurePolicy', 'defaultPeriod', 'endpoints'],
      additionalProperties: false,
      properties: {
        algorithm: { type: 'string', enum: ALGORITHM_NAMES },
        failurePolicy: { type: 'string', enum: ['fail_closed', 'fail_open'] },
        defaultPeriod: { type: 'string', enum: RATE_LIMIT_PERIODS },
        global: {
          type: 'object',
          required: ['limit', 'windowSeconds', 'scope'],
          additionalProperties: false,
          properties: { ...rule, scope: { type: 'string', enum: ['system', 'owner'] } },
        },
        endpoints: {
          type: 'array',
          items: {
            type: 'object',
            required: ['pattern', 'limit', 'windowSeconds'],
            additionalProperties: false,
            properties: { ...rule, pattern: { type: 'string', minLength: 1, pattern: '^/' } },
          },
        },
      },
    },
    backend: {
      type: 'object',
      required: ['type', 'path', 'timeoutMs', 'fallback', 'sweepIntervalMs'],
      additionalProperties: false,
      properties: {
        type: { type: 'string', enum: ['memory', 'sqlite'] },
        path: { type: 'string', minLength: 1 },
        timeoutMs: { type: 'integer', minimum: 1 },
        fallback: { type: 'boolean' },
        sweepIntervalMs: { type: 'integer', minimum: 1000 },
      },
    },
    store: {
      type: 'object',
      required: ['type', 'path'],
      additionalProperties: false,
      properties: {
        type: { type: 'string', enum: ['memory', 'sqlite'] },
        path: { type: 'string', minLength: 1 },
      },
    },
    lifecycle: {
      type: 'object',
      required: ['enabled', 'intervalMs', 'retryDelayMs'],
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        intervalMs: { type: 'integer', minimum: 1000 },
        retryDelayMs: { type: 'integer', minimum: 100 },
      },
    },
    security: {
      type: 'object',
      required: ['repeatThreshold', 'repeatWindowSeconds'],
      additionalProperties: false,
      properties: {
        repeatThreshold: { type: 'integer', minimum: 1 },
        repeatWindowSeconds: { type: 'integer', minimum: 1 },
      },
    },
  },
};

// env strings become numbers and booleans during validation
const ajv = new Ajv({ strict: false, allErrors: true, coerceTypes: true });
const validateConfig = ajv.compile<AdmissionConfig>(CONFIG_SCHEMA);

// ── Environment ──

type Raw = Record<string, unknown>;

/** env var → [section, field]; a null section means top level */
const ENV_FIELDS: Record<string, [string | null, string]> = {
  ADMISSION_SERVER_SECRET: [null, 'serverSecret'],
  ADMISSION_LOG_LEVEL: [null, 'logLevel'],
  ADMISSION_ALGORITHM: ['rateLimit', 'algorithm'],
  ADMISSION_FAILURE_POLICY: ['rateLimit', 'failurePolicy'],
  ADMISSION_DEFAULT_PERIOD: ['rateLimit', 'defaultPeriod'],
  ADMISSION_BACKEND: ['backend', 'type'],
  ADMISSION_BACKEND_PATH: ['backend', 'path'],
  ADMISSION_BACKEND_TIMEOUT_MS: ['backend', 'timeoutMs'],
  ADMISSION_BACKEND_FALLBACK: ['backend', 'fallback'],
  ADMISSION_BACKEND_SWEEP_MS: ['backend', 'sweepIntervalMs'],
  ADMISSION_STORE: ['store', 'type'],
  ADMISSION_STORE_PATH: ['store', 'path'],
  ADMISSION_LIFECYCLE_ENABLED: ['lifecycle', 'enabled'],
  ADMISSION_LIFECYCLE_INTERVAL_MS: ['lifecycle', 'intervalMs'],
  ADMISSION_LIFECYCLE_RETRY_MS: ['lifecycle', 'retryDelayMs'],
  ADMISSION_REPEAT_THRESHOLD: ['security', 'repeatThreshold'],
  ADMISSION_REPEAT_WINDOW_SECONDS: ['security', 'repeatWindowSeconds'],
};

function isRecord(value: unknown): value is Raw {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(target: Raw, name: string): Raw {
  const existing = target[name];
  if (isRecord(existing)) return existing;
  const created: Raw = {};
  target[name] = created;
  return created;
}

function parseJson(source: string, text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`${source} is not valid JSON: ${errorMessage(err)}`);
  }
}

/** Config fragment from `ADMISSION_*` variables; unset variables are left out. */
export function configFromEnv(env: Env): Raw {
  const raw: Raw = {};
  for (const [name, [sectionName, field]] of Object.entries(ENV_FIELDS)) {
    const value = env[name];
    if (value === undefined || value === '') continue;
    (sectionName ? section(raw, sectionName) : raw)[field] = value;
  }

  if (env.ADMISSION_GLOBAL_LIMIT) {
    section(raw, 'rateLimit').global = {
      limit: env.ADMISSION_GLOBAL_LIMIT,
      windowSeconds: env.ADMISSION_GLOBAL_WINDOW_SECONDS || '60',
      scope: env.ADMISSION_GLOBAL_SCOPE || 'system',
      ...(env.ADMISSION_GLOBAL_ALGORITHM ? { algorithm: env.ADMISSION_GLOBAL_ALGORITHM } : {}),
    };
  }
  if (env.ADMISSION_ENDPOINTS) {
    section(raw, 'rateLimit').endpoints = parseJson('ADMISSION_ENDPOINTS', env.ADMISSION_ENDPOINTS);
  }
  return raw;
}

/** Config fragment from a JSON file. */
export function configFromFile(path: string): Raw {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}: ${errorMessage(err)}`);
  }
  const parsed = parseJson(`Config file ${path}`, text);
  if (!isRecord(parsed)) throw new ConfigError(`Config file ${path} must contain a JSON object`);
  return parsed;
}

/** Merge plain objects recursively; arrays and scalars in `patch` replace. */
function merge(base: Raw, patch: Raw): Raw {
  const out: Raw = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    const current = out[key];
    out[key] = isRecord(current) && isRecord(value) ? merge(current, value) : value;
  }
  return out;
}

function plain(value: object): Raw {
  const cloned: unknown = JSON.parse(JSON.stringify(value));
  return isRecord(cloned) ? cloned : {};
}

// ── Loading ──

/** Validate a merged config object, coercing string values where the schema allows. */
export function parseConfig(raw: unknown): AdmissionConfig {
  if (validateConfig(raw)) return raw;
  const problems = (validateConfig.errors ?? []).map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`);
  throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`, problems);
}

/**
 * Build the configuration. `ADMISSION_CONFIG_FILE` names an optional JSON
 * file applied before the other environment variables.
 */
export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): AdmissionConfig {
  let raw = plain(DEFAULT_CONFIG);
  if (env.ADMISSION_CONFIG_FILE) raw = merge(raw, configFromFile(env.ADMISSION_CONFIG_FILE));
  raw = merge(raw, configFromEnv(env));
  raw = merge(raw, plain(overrides));
  return parseConfig(raw);
}
