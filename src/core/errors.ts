/**
 * Error taxonomy. Expected outcomes (auth and rate-limit rejections,
 * lifecycle failures) are returned as values; these are for faults.
 */

export class AdmissionError extends Error {
  readonly code: string;
  readonly retryable: boolean;

  constructor(message: string, code: string, retryable = false, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AdmissionError';
    this.code = code;
    this.retryable = retryable;
  }
}

/** Malformed caller input. Never retryable, never a security event. */
export class InvalidArgumentError extends AdmissionError {
  constructor(message: string) {
    super(message, 'invalid_argument');
    this.name = 'InvalidArgumentError';
  }
}

export class UnknownAlgorithmError extends AdmissionError {
  readonly algorithm: string;

  constructor(algorithm: string) {
    super(`Unknown rate limit algorithm: ${algorithm}`, 'unknown_algorithm');
    this.name = 'UnknownAlgorithmError';
    this.algorithm = algorithm;
  }
}

export class ConfigError extends AdmissionError {
  readonly problems: string[];

  constructor(message: string, problems: string[] = []) {
    super(message, 'invalid_config');
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

/** The counter store could not be reached and no fallback was available. */
export class RateLimitUnavailableError extends AdmissionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'rate_limit_unavailable', true, options);
    this.name = 'RateLimitUnavailableError';
  }
}

export class StorageError extends AdmissionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'storage_error', true, options);
    this.name = 'StorageError';
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
