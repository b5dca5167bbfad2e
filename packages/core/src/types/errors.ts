/**
 * Error hierarchy for shardcheck
 * Precondition failures are thrown; graph defects are collected as issues
 * and only surface here through the aggregate ValidationFailedError.
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';
import type { ValidationIssue } from '../validation/issue.js';
import { formatIssues } from '../validation/format.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  path?: string; // JSON Pointer into the graph document (e.g. '/nodes/3/body')
  nodeId?: string;
  operation?: string; // geometry operation that rejected its operands
  value?: unknown;
  valueExcerpt?: string;
  suggestion?: string;
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

export interface ShardCheckErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all shardcheck errors
 */
export abstract class ShardCheckError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  public suggestions?: string[];

  constructor(params: ShardCheckErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: drops stack and the raw offending value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: env === 'prod' ? this.#stripValue(this.context) : this.context,
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

  #stripValue(context?: ErrorContext): ErrorContext | undefined {
    if (!context || !('value' in context)) return context;
    const { value: _value, ...rest } = context;
    return rest;
  }
}

/**
 * Precondition failures inside the integer geometry library
 * (broadcast mismatch, negative exponent, rank mismatch, bad permutation)
 */
export class GeometryError extends ShardCheckError {
  constructor(
    message: string,
    context?: ErrorContext,
    errorCode: ErrorCode = ErrorCode.GEOMETRY_PRECONDITION
  ) {
    super({ message, errorCode, context });
  }
}

/**
 * Structural problems with a graph document
 */
export class DocumentError extends ShardCheckError {
  constructor(params: {
    message: string;
    path?: string;
    errorCode?: ErrorCode;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.INVALID_GRAPH_DOCUMENT,
      context: { ...params.context, path: params.path },
      cause: params.cause,
    });
  }
}

/**
 * Invalid options or validator setup
 */
export class ConfigurationError extends ShardCheckError {
  constructor(message: string, context?: ErrorContext) {
    super({ message, errorCode: ErrorCode.CONFIGURATION_ERROR, context });
  }
}

/**
 * Input that could not be read (missing file, malformed JSON)
 */
export class InputError extends ShardCheckError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super({ message, errorCode: ErrorCode.INPUT_ERROR, context, cause });
  }
}

/**
 * Aggregate failure raised once a validation pass found issues
 */
export class ValidationFailedError extends ShardCheckError {
  public readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[]) {
    super({
      message: formatIssues(issues),
      errorCode: ErrorCode.GRAPH_VALIDATION_FAILED,
      context: { issueCount: issues.length },
    });
    this.issues = [...issues];
  }
}

/**
 * Fallback for anything that is not a ShardCheckError
 */
export class InternalError extends ShardCheckError {
  constructor(message: string, cause?: Error) {
    super({ message, errorCode: ErrorCode.INTERNAL_ERROR, cause });
  }
}

export function isShardCheckError(error: unknown): error is ShardCheckError {
  return error instanceof ShardCheckError;
}
