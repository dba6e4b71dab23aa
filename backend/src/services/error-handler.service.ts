/**
 * Centralized error handler service
 */

import {
  ErrorHandler,
  ErrorContext,
  ApplicationError,
  ErrorCategory,
  ErrorSeverity
} from '../interfaces/error-handler.interface';
import {
  BaseApplicationError,
  InfrastructureError,
  StoreUnavailableError,
  ValidationError,
  toError
} from '../utils/application-error';
import { StructuredLogger } from '../utils/structured-logger';

export class ErrorHandlerService implements ErrorHandler {
  private logger: StructuredLogger;

  constructor(logger: StructuredLogger) {
    this.logger = logger;
  }

  /**
   * Convert any error to standardized ApplicationError
   */
  handleError(error: unknown, context: ErrorContext): ApplicationError {
    // If already an ApplicationError, enhance context and return
    if (error instanceof BaseApplicationError) {
      const enhancedError = this.enhanceErrorContext(error, context);
      this.logError(enhancedError);
      return enhancedError;
    }

    const applicationError = this.convertToApplicationError(toError(error), context);
    this.logError(applicationError);
    return applicationError;
  }

  isRetryableError(error: unknown): boolean {
    if (error instanceof BaseApplicationError) {
      return error.retryable;
    }

    return error instanceof Error && (this.isS3Error(error) || this.isNetworkError(error));
  }

  /**
   * Determine if error should be logged (skip low-severity validation errors)
   */
  shouldLogError(error: ApplicationError): boolean {
    if (error.severity === ErrorSeverity.HIGH || error.severity === ErrorSeverity.CRITICAL) {
      return true;
    }

    // Validation errors are expected user errors
    if (error.category === ErrorCategory.VALIDATION && error.severity === ErrorSeverity.LOW) {
      return false;
    }

    return true;
  }

  private convertToApplicationError(error: Error, context: ErrorContext): ApplicationError {
    // AWS SDK service exceptions carry $metadata and $fault
    if (this.isS3Error(error)) {
      return new StoreUnavailableError(
        `Object store error: ${error.message}`,
        { ...context, metadata: { ...context.metadata, s3ErrorName: error.name } },
        error
      );
    }

    if (this.isNetworkError(error)) {
      return new StoreUnavailableError(`Network error: ${error.message}`, context, error);
    }

    // Malformed request payloads
    if (error instanceof SyntaxError) {
      return new ValidationError(error.message, context);
    }

    return new InfrastructureError(
      error.message || 'An unexpected error occurred',
      context,
      error,
      false
    );
  }

  private enhanceErrorContext(error: BaseApplicationError, context: ErrorContext): ApplicationError {
    const enhancedContext: ErrorContext = {
      ...error.context,
      correlationId: context.correlationId || error.context.correlationId,
      transactionId: context.transactionId || error.context.transactionId,
      metadata: {
        ...error.context.metadata,
        ...context.metadata
      }
    };

    const enhanced = new BaseApplicationError(
      error.code,
      error.category,
      error.severity,
      error.message,
      enhancedContext,
      error.httpStatusCode,
      error.retryable,
      error.userMessage,
      error.originalError
    );
    enhanced.name = error.name;
    return enhanced;
  }

  private logError(error: ApplicationError): void {
    if (!this.shouldLogError(error)) {
      return;
    }

    const logContext = {
      errorCode: error.code,
      category: error.category,
      severity: error.severity,
      httpStatusCode: error.httpStatusCode,
      retryable: error.retryable,
      correlationId: error.context.correlationId,
      transactionId: error.context.transactionId,
      operation: error.context.operation,
      cause: error.originalError?.message,
      ...error.context.metadata
    };

    if (error.severity === ErrorSeverity.CRITICAL) {
      this.logger.logError(`CRITICAL_ERROR_${error.code}`, new Error(error.message), logContext);
    } else if (error.severity === ErrorSeverity.HIGH) {
      this.logger.logError(`ERROR_${error.code}`, new Error(error.message), logContext);
    } else {
      this.logger.warn(`WARNING_${error.code}`, logContext, error.message);
    }
  }

  private isS3Error(error: Error): boolean {
    return '$metadata' in error || '$fault' in error;
  }

  private isNetworkError(error: Error): boolean {
    return error.message.includes('ENOTFOUND') ||
           error.message.includes('ECONNREFUSED') ||
           error.message.includes('ECONNRESET') ||
           error.message.includes('timeout') ||
           error.message.includes('network');
  }
}
