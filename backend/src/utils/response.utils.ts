import { APIGatewayProxyResult } from 'aws-lambda';
import { ApplicationError, ErrorResponse } from '../interfaces/error-handler.interface';

const CORS_HEADERS: Record<string, string> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type,X-Amz-Date,Authorization,X-Api-Key,X-Amz-Security-Token,X-Correlation-ID',
  'Access-Control-Allow-Methods': 'GET,POST,DELETE,OPTIONS'
};

/**
 * Create a standardized API Gateway response with CORS headers
 */
export function createResponse(
  statusCode: number,
  body: unknown,
  additionalHeaders: Record<string, string> = {}
): APIGatewayProxyResult {
  return {
    statusCode,
    headers: {
      'Content-Type': 'application/json',
      ...CORS_HEADERS,
      ...additionalHeaders
    },
    body: JSON.stringify(body)
  };
}

/**
 * Raw bytes, base64 encoded for API Gateway binary media types
 */
export function createBinaryResponse(
  statusCode: number,
  content: Buffer,
  contentType: string = 'application/octet-stream',
  additionalHeaders: Record<string, string> = {}
): APIGatewayProxyResult {
  return {
    statusCode,
    headers: {
      'Content-Type': contentType,
      'Content-Length': String(content.length),
      ...CORS_HEADERS,
      ...additionalHeaders
    },
    body: content.toString('base64'),
    isBase64Encoded: true
  };
}

/**
 * Create standardized error response from ApplicationError
 */
export function createApplicationErrorResponse(
  applicationError: ApplicationError,
  includeDebugInfo: boolean = false
): APIGatewayProxyResult {
  const errorResponse: ErrorResponse = {
    error: {
      code: applicationError.code,
      message: applicationError.userMessage || applicationError.message,
      category: applicationError.category,
      retryable: applicationError.retryable,
      context: {
        correlationId: applicationError.context.correlationId,
        timestamp: applicationError.context.timestamp,
        operation: applicationError.context.operation
      }
    },
    timestamp: new Date().toISOString()
  };

  // Include debug information outside production
  if (includeDebugInfo) {
    errorResponse.details = {
      originalMessage: applicationError.message,
      severity: applicationError.severity,
      stack: applicationError.stack,
      metadata: applicationError.context.metadata
    };
  }

  const headers: Record<string, string> = {};
  if (applicationError.context.correlationId) {
    headers['X-Correlation-ID'] = applicationError.context.correlationId;
  }

  return createResponse(applicationError.httpStatusCode, errorResponse, headers);
}
