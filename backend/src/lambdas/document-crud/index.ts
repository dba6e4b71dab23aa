/**
 * Document read/delete Lambda Handler
 *
 * GET    /transactions/{transaction_id}/documents[?include_content=true]
 * GET    /transactions/{transaction_id}/documents/{document_id}
 * DELETE /transactions/{transaction_id}/documents/{document_id}
 */

import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { createResponse, createBinaryResponse, createApplicationErrorResponse } from '../../utils/response.utils';
import { StructuredLogger, initializeLogger } from '../../utils/structured-logger';
import { CompositionRoot } from '../../container/composition-root';
import { ServiceTokens } from '../../container/service-container';
import { ErrorHandler } from '../../interfaces/error-handler.interface';
import { createErrorContextFromEvent } from '../../utils/error-context';

async function listDocuments(
  transactionId: string,
  event: APIGatewayProxyEvent,
  logger: StructuredLogger
): Promise<APIGatewayProxyResult> {
  const documentService = CompositionRoot.createDocumentService(logger);

  if (event.queryStringParameters?.include_content === 'true') {
    const entries = await documentService.getDocumentsWithMetadata(transactionId);
    return createResponse(200, {
      documents: entries.map((entry) => ({
        document: entry.record,
        content: entry.content.toString('base64'),
      })),
      total_count: entries.length,
    });
  }

  const documents = await documentService.fetchAllDocumentsMetadata(transactionId);
  return createResponse(200, {
    documents,
    total_count: documents.length,
  });
}

async function getDocument(
  transactionId: string,
  documentId: string,
  logger: StructuredLogger
): Promise<APIGatewayProxyResult> {
  const documentService = CompositionRoot.createDocumentService(logger);
  const content = await documentService.fetchDocumentByDocId(transactionId, documentId);
  return createBinaryResponse(200, content);
}

async function deleteDocument(
  transactionId: string,
  documentId: string,
  logger: StructuredLogger
): Promise<APIGatewayProxyResult> {
  const documentService = CompositionRoot.createDocumentService(logger);
  const result = await documentService.deleteDocument(transactionId, documentId);
  return createResponse(200, result);
}

export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  const startTime = Date.now();
  const logger = initializeLogger(event, 'document-crud');
  const correlationId = logger.getCorrelationId();

  logger.info('CRUD_REQUEST_RECEIVED', {
    httpMethod: event.httpMethod,
    path: event.path,
    pathParameters: event.pathParameters,
    queryStringParameters: event.queryStringParameters
  }, 'Document request received');

  try {
    if (event.httpMethod === 'OPTIONS') {
      return createResponse(200, { message: 'CORS preflight successful' });
    }

    const method = event.httpMethod;
    const transactionId = event.pathParameters?.transaction_id;
    const documentId = event.pathParameters?.document_id;

    if (method !== 'GET' && method !== 'DELETE') {
      return createResponse(405, {
        error: 'Method not allowed',
        allowed_methods: ['GET', 'DELETE', 'OPTIONS']
      });
    }

    if (!transactionId) {
      return createResponse(400, { error: 'transaction_id path parameter is required' });
    }

    if (method === 'GET' && !documentId) {
      return await listDocuments(transactionId, event, logger);
    } else if (method === 'GET' && documentId) {
      return await getDocument(transactionId, documentId, logger);
    } else if (method === 'DELETE' && documentId) {
      return await deleteDocument(transactionId, documentId, logger);
    }

    return createResponse(400, { error: 'document_id path parameter is required' });

  } catch (error) {
    const context = createErrorContextFromEvent(event, 'DOCUMENT_CRUD', correlationId);
    context.metadata = {
      ...context.metadata,
      totalDuration: Date.now() - startTime
    };

    const errorHandler = CompositionRoot.getContainer().resolve<ErrorHandler>(ServiceTokens.ERROR_HANDLER);
    const applicationError = errorHandler.handleError(error, context);

    return createApplicationErrorResponse(applicationError, process.env.ENVIRONMENT !== 'production');
  }
};
