/**
 * Centralized error type definitions for survey-forge
 * Provides a consistent error hierarchy and error codes
 */

import type { UsageRecord } from '../services/usage/types.js';

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, isOperational: boolean = true, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Setup-level problem (bad environment, missing input directory).
 * Raised before any job is dispatched.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', true, context);
  }
}

/**
 * Failure categories exposed by the remote model service boundary.
 *
 * - `invalid_handle`: an uploaded file or context cache referenced by the call is gone
 * - `transient`: rate limits, 5xx, dropped connections
 * - `timeout`: the call exceeded its time budget or was aborted
 * - `permanent`: anything else (bad request, unsupported format, auth)
 */
export type RemoteFailureCategory = 'invalid_handle' | 'transient' | 'timeout' | 'permanent';

export class RemoteServiceError extends AppError {
  public readonly category: RemoteFailureCategory;
  public readonly statusCode?: number;

  constructor(
    service: string,
    message: string,
    category: RemoteFailureCategory,
    statusCode?: number,
    context?: Record<string, unknown>
  ) {
    super(`External service error (${service}): ${message}`, 'EXTERNAL_SERVICE_ERROR', true, {
      service,
      category,
      statusCode,
      ...context,
    });
    this.category = category;
    this.statusCode = statusCode;
  }
}

export function isRemoteServiceError(error: unknown): error is RemoteServiceError {
  return error instanceof RemoteServiceError;
}

export function isInvalidHandleError(error: unknown): error is RemoteServiceError {
  return isRemoteServiceError(error) && error.category === 'invalid_handle';
}

/**
 * Job failure kinds. Every kind terminates only the owning job.
 */
export enum JobErrorKind {
  UPLOAD_ERROR = 'UploadError',
  REMOTE_TIMEOUT = 'RemoteTimeout',
  EXTRACTION_PARSE_ERROR = 'ExtractionParseError',
  GENERATION_ERROR = 'GenerationError',
  SURVEY_PARSE_ERROR = 'SurveyParseError',
  ARTIFACT_WRITE_ERROR = 'ArtifactWriteError',
  CANCELLED = 'Cancelled',
}

/**
 * Diagnostic payload attached to a failed job
 */
export interface JobDiagnostic {
  message: string;
  /** Raw model output when the failure was a parse failure */
  rawResponse?: string;
  cause?: string;
  details?: Record<string, unknown>;
}

/**
 * Error raised by a pipeline state. Carries the job failure kind and its diagnostic.
 */
export class PipelineError extends AppError {
  public readonly kind: JobErrorKind;
  public readonly diagnostic: JobDiagnostic;
  public readonly retryable: boolean;
  /** Model calls the job completed before failing, set by the pipeline */
  public usage: UsageRecord[] = [];

  constructor(kind: JobErrorKind, diagnostic: JobDiagnostic, retryable: boolean = false) {
    super(diagnostic.message, kind, true, { kind, ...diagnostic.details });
    this.kind = kind;
    this.diagnostic = diagnostic;
    this.retryable = retryable;
  }
}

export class UploadError extends PipelineError {
  constructor(message: string, cause?: unknown, retryable: boolean = false) {
    super(JobErrorKind.UPLOAD_ERROR, { message, cause: describeCause(cause) }, retryable);
  }
}

export class RemoteTimeoutError extends PipelineError {
  constructor(operation: string, timeoutMs?: number) {
    super(
      JobErrorKind.REMOTE_TIMEOUT,
      {
        message: timeoutMs !== undefined
          ? `${operation} timed out after ${timeoutMs}ms`
          : `${operation} was aborted before completing`,
        details: { operation, timeoutMs },
      },
      true
    );
  }
}

export class ExtractionParseError extends PipelineError {
  constructor(message: string, rawResponse: string) {
    super(JobErrorKind.EXTRACTION_PARSE_ERROR, { message, rawResponse });
  }
}

export class GenerationError extends PipelineError {
  constructor(message: string, cause?: unknown, retryable: boolean = false) {
    super(JobErrorKind.GENERATION_ERROR, { message, cause: describeCause(cause) }, retryable);
  }
}

export class SurveyParseError extends PipelineError {
  constructor(message: string, rawResponse: string) {
    super(JobErrorKind.SURVEY_PARSE_ERROR, { message, rawResponse });
  }
}

export class ArtifactWriteError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(JobErrorKind.ARTIFACT_WRITE_ERROR, { message, cause: describeCause(cause) });
  }
}

export class CancelledError extends PipelineError {
  constructor(state: string) {
    super(JobErrorKind.CANCELLED, { message: `Cancelled before ${state}`, details: { state } });
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Short human-readable description of an arbitrary thrown value
 */
export function describeCause(cause: unknown): string | undefined {
  if (cause === undefined || cause === null) {
    return undefined;
  }
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}

/**
 * Node system error code (ENOENT, EACCES, ...) of a thrown value, if any
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
