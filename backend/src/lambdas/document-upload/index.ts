/**
 * Document Upload Lambda Handler
 *
 * POST /transactions/{transaction_id}/documents
 * Body: { fileName, content (base64), docCatCode, docTypCode, langCode }
 */

import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { createResponse, createApplicationErrorResponse } from '../../utils/response.utils';
import { initializeLogger } from '../../utils/structured-logger';
import { CompositionRoot } from '../../container/composition-root';
import { ServiceTokens } from '../../container/service-container';
import { ErrorContext, ErrorHandler } from '../../interfaces/error-handler.interface';
import { createErrorContext, createErrorContextFromEvent } from '../../utils/error-context';
import { ValidationError } from '../../utils/application-error';

export const MAX_DOCUMENT_SIZE = 5 * 1024 * 1024; // 5MB

interface UploadPayload {
  fileName: string;
  content: Buffer;
  docCatCode: string;
  docTypCode: string;
  langCode: string;
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(body: Record<string, unknown>, field: string, context: ErrorContext, required: boolean): string {
  const value = body[field];
  if (value === undefined) {
    if (!required) {
      return '';
    }
    throw new ValidationError(`${field} is required`, context);
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a string`, context);
  }
  if (required && value.trim() === '') {
    throw new ValidationError(`${field} is required`, context);
  }
  return value;
}

export function parseUploadPayload(rawBody: string, isBase64Encoded: boolean, context: ErrorContext): UploadPayload {
  const text = isBase64Encoded ? Buffer.from(rawBody, 'base64').toString('utf-8') : rawBody;

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    throw new ValidationError('Request body must be valid JSON', context);
  }

  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object', context);
  }

  const encodedContent = readString(body, 'content', context, true).replace(/\s/g, '');
  if (encodedContent.length % 4 !== 0 || !BASE64_PATTERN.test(encodedContent)) {
    throw new ValidationError('content must be base64 encoded', context);
  }

  // An empty string is caught above as missing content
  const content = Buffer.from(encodedContent, 'base64');
  if (content.length > MAX_DOCUMENT_SIZE) {
    throw new ValidationError(
      `File too large. Maximum size is ${MAX_DOCUMENT_SIZE / (1024 * 1024)}MB`,
      context,
      { contentLength: content.length }
    );
  }

  return {
    fileName: readString(body, 'fileName', context, true),
    content,
    docCatCode: readString(body, 'docCatCode', context, true),
    docTypCode: readString(body, 'docTypCode', context, false),
    langCode: readString(body, 'langCode', context, false),
  };
}

export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  const startTime = Date.now();

  const logger = initializeLogger(event, 'document-upload');
  const correlationId = logger.getCorrelationId();

  logger.info('UPLOAD_REQUEST_RECEIVED', {
    httpMethod: event.httpMethod,
    path: event.path,
    transactionId: event.pathParameters?.transaction_id
  }, 'Document upload request received');

  try {
    if (event.httpMethod === 'OPTIONS') {
      return createResponse(200, { message: 'CORS preflight successful' });
    }

    if (event.httpMethod !== 'POST') {
      logger.warn('METHOD_NOT_ALLOWED', {
        method: event.httpMethod,
        allowedMethods: ['POST', 'OPTIONS']
      }, `Method ${event.httpMethod} not allowed`);
      return createResponse(405, { error: 'Method not allowed' });
    }

    const transactionId = event.pathParameters?.transaction_id;
    if (!transactionId) {
      return createResponse(400, { error: 'transaction_id path parameter is required' });
    }

    if (!event.body) {
      return createResponse(400, { error: 'Request body is required' });
    }

    const payload = parseUploadPayload(
      event.body,
      event.isBase64Encoded,
      createErrorContext('UPLOAD_VALIDATION', correlationId, transactionId)
    );

    const documentService = CompositionRoot.createDocumentService(logger);
    const document = await documentService.uploadDocument(
      transactionId,
      {
        originalFilename: payload.fileName,
        content: payload.content,
        contentLength: payload.content.length
      },
      {
        docCatCode: payload.docCatCode,
        docTypCode: payload.docTypCode,
        langCode: payload.langCode
      }
    );

    return createResponse(200, {
      success: true,
      document,
      correlation_id: correlationId,
      processing_time: Date.now() - startTime,
      message: 'Document uploaded successfully.',
    });

  } catch (error) {
    const totalTime = Date.now() - startTime;

    const context = createErrorContextFromEvent(event, 'DOCUMENT_UPLOAD', correlationId);
    context.metadata = {
      ...context.metadata,
      totalDuration: totalTime
    };

    const errorHandler = CompositionRoot.getContainer().resolve<ErrorHandler>(ServiceTokens.ERROR_HANDLER);
    const applicationError = errorHandler.handleError(error, context);

    logger.performance('UPLOAD_FAILED', totalTime, {
      error: true,
      errorCode: applicationError.code,
      errorCategory: applicationError.category
    });

    return createApplicationErrorResponse(applicationError, process.env.ENVIRONMENT !== 'production');
  }
};
