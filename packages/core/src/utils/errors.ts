/**
 * Custom Error Classes
 *
 * Provides structured error handling with error codes, context, and recovery hints.
 */

import type { DocumentId } from '@cadence/shared-types';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'TIMEOUT'
  | 'OPERATION_CANCELLED'
  | 'ANALYSIS_FAILED'
  | 'RESOURCE_NOT_FOUND'
  | 'INTERNAL_ERROR';

export interface ErrorContext {
  code: ErrorCode;
  component: string;
  operation: string;
  details?: Record<string, unknown>;
  recoveryHint?: string;
  retryable?: boolean;
}

/**
 * Base error class for all Cadence errors
 */
export class CadenceError extends Error {
  public readonly code: ErrorCode;
  public readonly component: string;
  public readonly operation: string;
  public readonly details: Record<string, unknown>;
  public readonly recoveryHint?: string;
  public readonly retryable: boolean;
  public readonly timestamp: Date;

  constructor(message: string, context: ErrorContext, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'CadenceError';
    this.code = context.code;
    this.component = context.component;
    this.operation = context.operation;
    this.details = context.details ?? {};
    this.recoveryHint = context.recoveryHint;
    this.retryable = context.retryable ?? false;
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      component: this.component,
      operation: this.operation,
      details: this.details,
      recoveryHint: this.recoveryHint,
      retryable: this.retryable,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.component}.${this.operation}: ${this.message}`;
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends CadenceError {
  public readonly field?: string;
  public readonly constraints?: string[];

  constructor(
    message: string,
    options: {
      component: string;
      operation: string;
      field?: string;
      constraints?: string[];
      recoveryHint?: string;
    }
  ) {
    super(message, {
      code: 'VALIDATION_ERROR',
      component: options.component,
      operation: options.operation,
      details: { field: options.field, constraints: options.constraints },
      recoveryHint: options.recoveryHint ?? `Check the ${options.field ?? 'input'} value`,
      retryable: false,
    });
    this.name = 'ValidationError';
    this.field = options.field;
    this.constraints = options.constraints;
  }
}

/**
 * Per-document analysis exceeded its time budget
 */
export class AnalysisTimeoutError extends CadenceError {
  public readonly documentId: DocumentId;
  public readonly timeoutMs: number;
  public readonly elapsed: number;

  constructor(
    message: string,
    options: {
      component: string;
      operation: string;
      documentId: DocumentId;
      timeoutMs: number;
      elapsed: number;
    }
  ) {
    super(message, {
      code: 'TIMEOUT',
      component: options.component,
      operation: options.operation,
      details: { documentId: options.documentId, timeoutMs: options.timeoutMs, elapsed: options.elapsed },
      recoveryHint: 'Raise CADENCE_DOCUMENT_ANALYSIS_TIMEOUT_MS or find the analyzer that hangs',
      retryable: true,
    });
    this.name = 'AnalysisTimeoutError';
    this.documentId = options.documentId;
    this.timeoutMs = options.timeoutMs;
    this.elapsed = options.elapsed;
  }
}

/**
 * Analysis aborted by its caller (superseded work, shutdown, caller signal)
 */
export class AnalysisCancelledError extends CadenceError {
  public readonly documentId: DocumentId;

  constructor(
    message: string,
    options: {
      component: string;
      operation: string;
      documentId: DocumentId;
      reason?: unknown;
    }
  ) {
    super(message, {
      code: 'OPERATION_CANCELLED',
      component: options.component,
      operation: options.operation,
      details: { documentId: options.documentId },
      retryable: true,
    }, options.reason);
    this.name = 'AnalysisCancelledError';
    this.documentId = options.documentId;
  }
}

/**
 * The analyzer engine threw while analyzing a document
 */
export class AnalysisFailedError extends CadenceError {
  public readonly documentId: DocumentId;

  constructor(
    message: string,
    options: {
      component: string;
      operation: string;
      documentId: DocumentId;
      analyzers?: string[];
      cause?: unknown;
    }
  ) {
    super(message, {
      code: 'ANALYSIS_FAILED',
      component: options.component,
      operation: options.operation,
      details: { documentId: options.documentId, analyzers: options.analyzers },
      recoveryHint: 'Check the analyzers listed in details for defects',
      retryable: false,
    }, options.cause);
    this.name = 'AnalysisFailedError';
    this.documentId = options.documentId;
  }
}

/**
 * Resource not found error
 */
export class ResourceNotFoundError extends CadenceError {
  public readonly resourceType: string;
  public readonly resourceId: string;

  constructor(
    message: string,
    options: {
      component: string;
      operation: string;
      resourceType: string;
      resourceId: string;
      recoveryHint?: string;
    }
  ) {
    super(message, {
      code: 'RESOURCE_NOT_FOUND',
      component: options.component,
      operation: options.operation,
      details: { resourceType: options.resourceType, resourceId: options.resourceId },
      recoveryHint: options.recoveryHint ?? `Verify the ${options.resourceType} exists`,
      retryable: false,
    });
    this.name = 'ResourceNotFoundError';
    this.resourceType = options.resourceType;
    this.resourceId = options.resourceId;
  }
}

/**
 * Check if an error is a CadenceError
 */
export function isCadenceError(error: unknown): error is CadenceError {
  return error instanceof CadenceError;
}

/**
 * Wrap unknown errors in a CadenceError
 */
export function wrapError(
  error: unknown,
  context: { component: string; operation: string }
): CadenceError {
  if (isCadenceError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);

  return new CadenceError(message, {
    code: 'INTERNAL_ERROR',
    component: context.component,
    operation: context.operation,
    retryable: false,
  }, error);
}
