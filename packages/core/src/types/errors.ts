/**
 * Error hierarchy for passforge
 * Provides structured error handling with context and exit codes
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  option?: string; // CLI flag or option key (e.g., '--length')
  classIndex?: number; // Index into Configuration.characterClasses
  value?: unknown; // Problematic value (may contain secrets)
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface PassforgeErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
  /** Actionable fixes, most relevant first */
  suggestions?: string[];
}

// Keys whose values never leave the process in production serialization
export const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  'password',
  'candidate',
  'secret',
  'token',
]);

export function redactSensitive(
  val: unknown,
  keys: ReadonlySet<string> = SENSITIVE_KEYS
): unknown {
  if (val && typeof val === 'object') {
    if (Array.isArray(val)) return val.map((v) => redactSensitive(v, keys));
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(val)) {
      out[k] = keys.has(k) ? '[REDACTED]' : redactSensitive(v, keys);
    }
    return out;
  }
  return val;
}

/**
 * Base error class for all passforge errors
 */
export abstract class PassforgeError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  public readonly suggestions?: string[];

  constructor(params: PassforgeErrorParams) {
    const {
      message,
      errorCode,
      severity = 'error',
      context,
      cause,
      suggestions,
    } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;
    this.suggestions = suggestions;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and redacts sensitive context keys
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: env === 'prod' ? this.#redactContext(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context) return context;
    const redacted: ErrorContext = {};
    for (const [k, v] of Object.entries(context)) {
      redacted[k] = SENSITIVE_KEYS.has(k) ? '[REDACTED]' : redactSensitive(v);
    }
    return redacted;
  }
}

/**
 * The configured rule rejected candidates until the rejection ceiling was hit.
 * Carries no password.
 */
export class RuleRejectionError extends PassforgeError {
  constructor(
    public readonly rejections: number,
    context?: ErrorContext
  ) {
    super({
      message: 'password rule rejected too many passwords',
      errorCode: ErrorCode.RULE_REJECTION_LIMIT,
      context: { rejections, ...(context ?? {}) },
    });
  }
}

/**
 * Malformed configuration, detected at construction time.
 */
export class ConfigurationError extends PassforgeError {
  constructor(params: {
    message: string;
    errorCode?:
      | ErrorCode.CONFIGURATION_ERROR
      | ErrorCode.INVALID_WEIGHTS
      | ErrorCode.UNSATISFIABLE_CONFIGURATION;
    context?: ErrorContext;
    suggestions?: string[];
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
      context: params.context,
      suggestions: params.suggestions,
    });
  }
}

/**
 * The secure byte source failed. Fatal: there is no degraded mode.
 */
export class EntropySourceError extends PassforgeError {
  constructor(message: string, cause?: Error) {
    super({
      message,
      errorCode: ErrorCode.ENTROPY_SOURCE_FAILURE,
      severity: 'fatal',
      cause,
    });
  }
}

/**
 * Invalid command line input.
 */
export class CliOptionError extends PassforgeError {
  constructor(
    message: string,
    option: string,
    value?: unknown,
    suggestion?: string
  ) {
    super({
      message,
      errorCode: ErrorCode.INVALID_CLI_OPTION,
      context: { option, value },
      suggestions: suggestion ? [suggestion] : undefined,
    });
  }
}

/**
 * Wraps unexpected failures so they render like every other error.
 */
export class InternalError extends PassforgeError {
  constructor(message: string, cause?: Error) {
    super({ message, errorCode: ErrorCode.INTERNAL_ERROR, cause });
  }
}

/**
 * Type guards
 */
export function isPassforgeError(error: unknown): error is PassforgeError {
  return error instanceof PassforgeError;
}

export function isRuleRejectionError(
  error: unknown
): error is RuleRejectionError {
  return error instanceof RuleRejectionError;
}

export function isEntropySourceError(
  error: unknown
): error is EntropySourceError {
  return error instanceof EntropySourceError;
}
