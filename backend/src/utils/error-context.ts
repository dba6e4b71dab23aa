/**
 * Utility functions for creating error contexts
 */

import { APIGatewayProxyEvent } from 'aws-lambda';
import { ErrorContext } from '../interfaces/error-handler.interface';

export function createErrorContext(
  operation: string,
  correlationId?: string,
  transactionId?: string,
  metadata?: Record<string, unknown>
): ErrorContext {
  return {
    correlationId,
    transactionId,
    operation,
    timestamp: new Date().toISOString(),
    metadata: metadata || {}
  };
}

export function enhanceErrorContext(
  baseContext: ErrorContext,
  additionalMetadata: Record<string, unknown>
): ErrorContext {
  return {
    ...baseContext,
    metadata: {
      ...baseContext.metadata,
      ...additionalMetadata
    }
  };
}

/**
 * Extract error context from Lambda event
 */
export function createErrorContextFromEvent(
  event: APIGatewayProxyEvent,
  operation: string,
  correlationId?: string
): ErrorContext {
  const headers = event.headers || {};
  return createErrorContext(
    operation,
    correlationId,
    event.pathParameters?.transaction_id,
    {
      httpMethod: event.httpMethod,
      path: event.path,
      userAgent: headers['User-Agent'] || headers['user-agent'],
      sourceIp: event.requestContext?.identity?.sourceIp
    }
  );
}
