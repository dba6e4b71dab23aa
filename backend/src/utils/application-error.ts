/**
 * Application error classes for standardized error handling
 */

import { ErrorCategory, ErrorSeverity, ErrorContext, ApplicationError } from '../interfaces/error-handler.interface';

export class BaseApplicationError extends Error implements ApplicationError {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly context: ErrorContext;
  readonly httpStatusCode: number;
  readonly retryable: boolean;
  readonly userMessage?: string;
  readonly originalError?: Error;

  constructor(
    code: string,
    category: ErrorCategory,
    severity: ErrorSeverity,
    message: string,
    context: ErrorContext,
    httpStatusCode: number,
    retryable: boolean = false,
    userMessage?: string,
    originalError?: Error
  ) {
    super(message);
    this.name = 'ApplicationError';
    this.code = code;
    this.category = category;
    this.severity = severity;
    this.context = context;
    this.httpStatusCode = httpStatusCode;
    this.retryable = retryable;
    this.userMessage = userMessage;
    this.originalError = originalError;

    // Maintain proper stack trace for debugging
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      severity: this.severity,
      message: this.message,
      context: this.context,
      httpStatusCode: this.httpStatusCode,
      retryable: this.retryable,
      userMessage: this.userMessage,
      cause: this.originalError?.message,
      stack: this.stack
    };
  }
}

// Validation errors (400 Bad Request)
export class ValidationError extends BaseApplicationError {
  constructor(message: string, context: ErrorContext, details?: Record<string, unknown>) {
    super(
      'VALIDATION_FAILED',
      ErrorCategory.VALIDATION,
      ErrorSeverity.LOW,
      message,
      { ...context, metadata: { ...context.metadata, validationDetails: details } },
      400,
      false,
      'Please check your input and try again'
    );
    this.name = 'ValidationError';
  }
}

// Not found errors (404 Not Found)
export class NotFoundError extends BaseApplicationError {
  constructor(resource: string, identifier: string, context: ErrorContext, originalError?: Error) {
    super(
      'RESOURCE_NOT_FOUND',
      ErrorCategory.NOT_FOUND,
      ErrorSeverity.LOW,
      `${resource} with identifier '${identifier}' was not found`,
      { ...context, metadata: { ...context.metadata, resource, identifier } },
      404,
      false,
      `The requested ${resource.toLowerCase()} could not be found`,
      originalError
    );
    this.name = 'NotFoundError';
  }
}

// Infrastructure errors (500 Internal Server Error, usually retryable)
export class InfrastructureError extends BaseApplicationError {
  constructor(message: string, context: ErrorContext, originalError?: Error, retryable: boolean = true) {
    super(
      'INFRASTRUCTURE_ERROR',
      ErrorCategory.INFRASTRUCTURE,
      ErrorSeverity.HIGH,
      message,
      context,
      500,
      retryable,
      'A temporary system error occurred. Please try again later',
      originalError
    );
    this.name = 'InfrastructureError';
  }
}

// Object store unreachable or failing (503 Service Unavailable)
export class StoreUnavailableError extends BaseApplicationError {
  constructor(
    message: string,
    context: ErrorContext,
    originalError?: Error,
    code: string = 'STORE_UNAVAILABLE'
  ) {
    super(
      code,
      ErrorCategory.STORAGE,
      ErrorSeverity.HIGH,
      message,
      context,
      503,
      true,
      'Document storage is temporarily unavailable. Please try again later',
      originalError
    );
    this.name = 'StoreUnavailableError';
  }
}

export class StoreReadError extends StoreUnavailableError {
  constructor(message: string, context: ErrorContext, originalError?: Error) {
    super(message, context, originalError, 'STORE_READ_FAILED');
    this.name = 'StoreReadError';
  }
}

export class StoreWriteError extends StoreUnavailableError {
  constructor(message: string, context: ErrorContext, originalError?: Error) {
    super(message, context, originalError, 'STORE_WRITE_FAILED');
    this.name = 'StoreWriteError';
  }
}

// Upload could not be completed (500, retryable: the put is all-or-nothing)
export class UploadFailedError extends BaseApplicationError {
  constructor(message: string, context: ErrorContext, originalError?: Error) {
    super(
      'DOCUMENT_UPLOAD_FAILED',
      ErrorCategory.STORAGE,
      ErrorSeverity.HIGH,
      message,
      context,
      500,
      true,
      'The document could not be uploaded. Please try again',
      originalError
    );
    this.name = 'UploadFailedError';
  }
}

// Stored metadata is missing a required field or holds an unusable value (422)
export class MetadataCorruptError extends BaseApplicationError {
  constructor(objectKey: string, reason: string, context: ErrorContext) {
    super(
      'DOCUMENT_METADATA_CORRUPT',
      ErrorCategory.DATA_INTEGRITY,
      ErrorSeverity.MEDIUM,
      `Metadata for object '${objectKey}' is corrupt: ${reason}`,
      { ...context, metadata: { ...context.metadata, objectKey, reason } },
      422,
      false,
      'Stored document metadata is incomplete'
    );
    this.name = 'MetadataCorruptError';
  }
}

export class ConfigurationError extends BaseApplicationError {
  constructor(message: string, context: ErrorContext) {
    super(
      'CONFIGURATION_INVALID',
      ErrorCategory.CONFIGURATION,
      ErrorSeverity.CRITICAL,
      message,
      context,
      500,
      false,
      'The service is misconfigured'
    );
    this.name = 'ConfigurationError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
