/**
 * Structured Logging Utility
 *
 * Consistent JSON-formatted logging with correlation tracking for every
 * document store operation.
 */

import { CorrelationSource, extractCorrelationIdFromEvent, generateCorrelationId } from './correlation';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG';

export type LogData = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  correlationId: string;
  service: string;
  operation: string;
  data: LogData;
  message: string;
}

export interface LoggerOptions {
  service?: string;
  enableDebug?: boolean;
}

export class StructuredLogger {
  private service: string;
  private enableDebug: boolean;
  private correlationId: string;

  constructor(correlationId: string, options: LoggerOptions = {}) {
    this.correlationId = correlationId;
    this.service = options.service || process.env.SERVICE_NAME || 'transaction-documents';
    this.enableDebug = options.enableDebug || process.env.LOG_LEVEL === 'DEBUG';
  }

  public getCorrelationId(): string {
    return this.correlationId;
  }

  private log(level: LogLevel, operation: string, data: LogData, message: string): void {
    if (level === 'DEBUG' && !this.enableDebug) {
      return;
    }

    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      correlationId: this.correlationId,
      service: this.service,
      operation,
      data: { ...data }, // Clone to avoid mutations
      message
    };

    const logString = JSON.stringify(logEntry);

    switch (level) {
      case 'ERROR':
        console.error(logString);
        break;
      case 'WARN':
        console.warn(logString);
        break;
      case 'DEBUG':
        console.debug(logString);
        break;
      default:
        console.log(logString);
    }
  }

  public info(operation: string, data: LogData, message: string): void {
    this.log('INFO', operation, data, message);
  }

  public warn(operation: string, data: LogData, message: string): void {
    this.log('WARN', operation, data, message);
  }

  public error(operation: string, data: LogData, message: string): void {
    this.log('ERROR', operation, data, message);
  }

  public debug(operation: string, data: LogData, message: string): void {
    this.log('DEBUG', operation, data, message);
  }

  /**
   * Log performance metrics
   */
  public performance(operation: string, duration: number, data: LogData = {}): void {
    this.info('PERFORMANCE', {
      operation,
      duration,
      unit: 'ms',
      ...data
    }, `${operation} completed in ${duration}ms`);
  }

  /**
   * Log errors with structured format
   */
  public logError(operation: string, error: Error, context: LogData = {}): void {
    this.error(operation, {
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
        code: 'code' in error ? error.code : undefined
      },
      context,
      timestamp: new Date().toISOString()
    }, `${operation} failed: ${error.message}`);
  }

  /**
   * Create a child logger with additional context
   */
  public child(additionalContext: LogData): ChildLogger {
    return new ChildLogger(this, additionalContext);
  }
}

/**
 * Child logger that includes additional context in all log entries
 */
export class ChildLogger {
  constructor(private parent: StructuredLogger, private context: LogData) {}

  private mergeData(data: LogData): LogData {
    return { ...this.context, ...data };
  }

  public info(operation: string, data: LogData, message: string): void {
    this.parent.info(operation, this.mergeData(data), message);
  }

  public warn(operation: string, data: LogData, message: string): void {
    this.parent.warn(operation, this.mergeData(data), message);
  }

  public error(operation: string, data: LogData, message: string): void {
    this.parent.error(operation, this.mergeData(data), message);
  }

  public debug(operation: string, data: LogData, message: string): void {
    this.parent.debug(operation, this.mergeData(data), message);
  }

  public performance(operation: string, duration: number, data: LogData = {}): void {
    this.parent.performance(operation, duration, this.mergeData(data));
  }

  public logError(operation: string, error: Error, context: LogData = {}): void {
    this.parent.logError(operation, error, this.mergeData(context));
  }
}

/**
 * Initialize logger for a Lambda function or CLI invocation
 */
export function initializeLogger(event: CorrelationSource, serviceName?: string): StructuredLogger {
  let correlationId = extractCorrelationIdFromEvent(event);
  if (!correlationId) {
    correlationId = generateCorrelationId('AUTO');
  }
  return new StructuredLogger(correlationId, { service: serviceName });
}
