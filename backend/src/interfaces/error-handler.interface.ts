/**
 * Standardized error handling interfaces for the document store
 */

export enum ErrorCategory {
  VALIDATION = 'VALIDATION',
  BUSINESS_LOGIC = 'BUSINESS_LOGIC',
  INFRASTRUCTURE = 'INFRASTRUCTURE',
  STORAGE = 'STORAGE',
  DATA_INTEGRITY = 'DATA_INTEGRITY',
  CONFIGURATION = 'CONFIGURATION',
  NOT_FOUND = 'NOT_FOUND'
}

export enum ErrorSeverity {
  LOW = 'LOW',
  MEDIUM = 'MEDIUM',
  HIGH = 'HIGH',
  CRITICAL = 'CRITICAL'
}

export interface ErrorContext {
  correlationId?: string;
  transactionId?: string;
  operation: string;
  timestamp: string;
  metadata?: Record<string, unknown>;
}

export interface ApplicationError {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly message: string;
  readonly context: ErrorContext;
  readonly httpStatusCode: number;
  readonly retryable: boolean;
  readonly userMessage?: string;
  readonly originalError?: Error;
  readonly stack?: string;
}

export interface ErrorHandler {
  handleError(error: unknown, context: ErrorContext): ApplicationError;
  isRetryableError(error: unknown): boolean;
  shouldLogError(error: ApplicationError): boolean;
}

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    category: ErrorCategory;
    retryable: boolean;
    context?: {
      correlationId?: string;
      timestamp: string;
      operation: string;
    };
  };
  details?: Record<string, unknown>;
  timestamp: string;
}
