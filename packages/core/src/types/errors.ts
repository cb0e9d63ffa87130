/**
 * Error hierarchy for peanotrace
 * Provides structured error handling with context and suggestions
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
  getHttpStatus as _getHttpStatus,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  argument?: string; // Name of the offending argument (e.g. 'denominator')
  value?: unknown; // Offending value as received
  operation?: string; // Operation being evaluated when the error surfaced
  limit?: number; // Configured bound that was crossed
  setting?: string; // Option path for configuration errors
  suggestion?: string;
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

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  argument?: string;
}

export interface PeanoErrorParams<C extends ErrorContext = ErrorContext> {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: C;
  cause?: Error;
}

/**
 * Base error class for all peanotrace errors
 */
export abstract class PeanoError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;

  constructor(params: PeanoErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, cause ? { cause } : undefined);
    this.name = new.target.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /** Suggestions attached through the context, if any */
  get suggestions(): string[] {
    return this.context?.suggestion ? [this.context.suggestion] : [];
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack
   * - prod: excludes stack
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
      cause:
        this.cause instanceof Error
          ? { name: this.cause.name, message: this.cause.message }
          : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      argument: this.context?.argument,
    };
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  /** Resolve the HTTP status a caller should answer with */
  getHttpStatus(): number {
    return _getHttpStatus(this.errorCode);
  }
}

/**
 * Rejected caller input: negative or non-integer numbers, zero denominators,
 * malformed terms, values past a configured bound.
 */
export class InvalidInputError extends PeanoError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.INVALID_INPUT,
      context: params.context,
      cause: params.cause,
    });
  }

  get argument(): string | undefined {
    return this.context?.argument;
  }

  get value(): unknown {
    return this.context?.value;
  }
}

/**
 * Invalid option values or combinations
 */
export class ConfigurationError extends PeanoError {
  constructor(message: string, setting?: string) {
    super({
      message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: setting ? { setting } : undefined,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * Input documents (batch files) that cannot be read or decoded
 */
export class ParseError extends PeanoError {
  constructor(params: { message: string; context?: ErrorContext; cause?: Error }) {
    super({
      message: params.message,
      errorCode: ErrorCode.PARSE_ERROR,
      context: params.context,
      cause: params.cause,
    });
  }
}

/**
 * Type guard for peanotrace errors
 */
export function isPeanoError(error: unknown): error is PeanoError {
  return error instanceof PeanoError;
}

export function isInvalidInputError(
  error: unknown
): error is InvalidInputError {
  return error instanceof InvalidInputError;
}
