/**
 * Framework Errors
 *
 * Error types raised by the framework core. Startup errors are fatal and
 * grouped; runtime errors inside middleware are recovered by the pipeline.
 */

export enum StartupErrorCode {
  SESSION_MIDDLEWARE_NOT_FOUND = 'SESSION_MIDDLEWARE_NOT_FOUND',
  SESSION_MIDDLEWARE_BELOW_CSRF = 'SESSION_MIDDLEWARE_BELOW_CSRF',
  INVALID_TRUSTED_ORIGIN = 'INVALID_TRUSTED_ORIGIN',
  UNKNOWN_MIDDLEWARE = 'UNKNOWN_MIDDLEWARE',
}

/**
 * A structural configuration problem detected while the application starts.
 */
export class StartupConfigurationError extends Error {
  readonly code: StartupErrorCode;

  constructor(code: StartupErrorCode, message: string) {
    super(message);
    this.name = 'StartupConfigurationError';
    this.code = code;
  }
}

/**
 * Every startup problem found at construction, raised together.
 */
export class StartupErrors extends AggregateError {
  declare readonly errors: StartupConfigurationError[];

  constructor(errors: StartupConfigurationError[]) {
    super(errors, `Application failed to start: ${errors.map((e) => e.message).join('; ')}`);
    this.name = 'StartupErrors';
  }

  get codes(): StartupErrorCode[] {
    return this.errors.map((e) => e.code);
  }
}

/**
 * Token could not be decrypted (malformed, truncated, tampered or foreign key).
 */
export class DecryptionError extends Error {
  constructor(message = 'Token could not be decrypted') {
    super(message);
    this.name = 'DecryptionError';
  }
}

export type MiddlewarePhase = 'request' | 'response';

/**
 * Wraps an error thrown by a middleware hook.
 */
export class MiddlewareRuntimeError extends Error {
  readonly middleware: string;
  readonly phase: MiddlewarePhase;

  constructor(middleware: string, phase: MiddlewarePhase, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Middleware ${middleware} failed during ${phase} phase: ${reason}`, { cause });
    this.name = 'MiddlewareRuntimeError';
    this.middleware = middleware;
    this.phase = phase;
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigError extends Error {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super(`Invalid configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join(', ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Normalise an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
