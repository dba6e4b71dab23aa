/**
 * Correlation ID utilities for request traceability
 */

export interface CorrelationSource {
  headers?: Record<string, string | undefined> | null;
  correlationId?: string;
}

/**
 * Generate a new correlation ID
 */
export function generateCorrelationId(prefix: string = 'DOC'): string {
  const timestamp = new Date().toISOString().replace(/[-:T]/g, '').substring(0, 14);
  const randomId = Math.random().toString(36).substring(2, 8).toUpperCase();
  return `${prefix}-${timestamp}-${randomId}`;
}

/**
 * Create headers with correlation ID for HTTP requests
 */
export function createCorrelationHeaders(correlationId: string): Record<string, string> {
  return {
    'X-Correlation-ID': correlationId,
    'X-Request-ID': correlationId // Alternative header name
  };
}

/**
 * Extract correlation ID from an API Gateway event or a direct invocation payload
 */
export function extractCorrelationIdFromEvent(event: CorrelationSource): string | null {
  if (event.headers) {
    const correlationId =
      event.headers['X-Correlation-ID'] ||
      event.headers['x-correlation-id'] ||
      event.headers['X-Request-ID'] ||
      event.headers['x-request-id'];

    if (correlationId) {
      return correlationId;
    }
  }

  // Direct Lambda invocation
  if (event.correlationId) {
    return event.correlationId;
  }

  return null;
}
