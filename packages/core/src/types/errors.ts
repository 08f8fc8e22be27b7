/**
 * Error hierarchy for strand
 * Structured errors carrying a stable code, context and an optional hint
 */

import { ErrorCode, getExitCode as _getExitCode } from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  option?: string; // Offending option or flag name
  value?: unknown; // Problematic value
  suggestion?: string; // Short hint shown by the CLI
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface StrandErrorParams {
  message: string;
  errorCode: ErrorCode;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all strand errors
 */
export abstract class StrandError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: StrandErrorParams) {
    const { message, errorCode, context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and the offending value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
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

  get suggestion(): string | undefined {
    const value = this.context?.suggestion;
    return typeof value === 'string' ? value : undefined;
  }

  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context || !('value' in context)) return context;
    const { value: _value, ...rest } = context;
    return rest;
  }
}

/**
 * Charset errors (empty alphabet, missing terminator)
 */
export class CharsetError extends StrandError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode;
    context?: ErrorContext & { form?: CharsetForm };
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.EMPTY_CHARSET,
      context: params.context,
      cause: params.cause,
    });
  }
}

export type CharsetForm = 'sequence' | 'array' | 'terminated' | 'text';

/**
 * Generation errors (requested sizes that cannot be materialized)
 */
export class GenerationError extends StrandError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.INVALID_LENGTH,
      context: params.context,
      cause: params.cause,
    });
  }
}

/**
 * Configuration errors (invalid generator options or CLI flags)
 */
export class ConfigurationError extends StrandError {
  constructor(params: {
    message: string;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: params.context,
      cause: params.cause,
    });
  }
}

/**
 * Wraps anything thrown outside the strand hierarchy
 */
export class InternalError extends StrandError {
  constructor(message: string, cause?: Error) {
    super({ message, errorCode: ErrorCode.INTERNAL_ERROR, cause });
  }
}

export function isStrandError(value: unknown): value is StrandError {
  return value instanceof StrandError;
}
