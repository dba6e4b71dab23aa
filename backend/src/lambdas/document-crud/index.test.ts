import { APIGatewayProxyEvent } from 'aws-lambda';
import { handler } from './index';
import { handler as uploadHandler } from '../document-upload/index';
import { CompositionRoot } from '../../container/composition-root';
import { ServiceTokens } from '../../container/service-container';
import { IObjectStore } from '../../interfaces/object-store.interface';

const PASSPORT_DOC_ID = '2e520fd6-ac40-548d-b56f-336eb2b6fdea';
const IDENTITY_DOC_ID = '083f5218-20fc-5d37-99c8-4d4e5ed0f159';

function createEvent(overrides: Partial<APIGatewayProxyEvent> = {}): APIGatewayProxyEvent {
  const event: Partial<APIGatewayProxyEvent> = {
    httpMethod: 'GET',
    path: '/transactions/txn-123/documents',
    headers: { 'x-correlation-id': 'corr-crud-1' },
    pathParameters: { transaction_id: 'txn-123' },
    queryStringParameters: null,
    isBase64Encoded: false,
    body: null,
    ...overrides,
  };
  return event as APIGatewayProxyEvent;
}

async function upload(fileName: string, content: Buffer, docCatCode: string): Promise<void> {
  const result = await uploadHandler(createEvent({
    httpMethod: 'POST',
    body: JSON.stringify({
      fileName,
      content: content.toString('base64'),
      docCatCode,
      docTypCode: 'RES',
      langCode: 'eng',
    }),
  }));
  expect(result.statusCode).toBe(200);
}

describe('Document CRUD Lambda', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    process.env.ENVIRONMENT = 'test';
    process.env.OBJECT_STORE_DRIVER = 'memory';
    CompositionRoot.clearContainer();
  });

  afterEach(() => {
    jest.restoreAllMocks();
    delete process.env.OBJECT_STORE_DRIVER;
  });

  describe('CORS and Method Validation', () => {
    it('should handle CORS preflight requests', async () => {
      const result = await handler(createEvent({ httpMethod: 'OPTIONS' }));

      expect(result.statusCode).toBe(200);
      expect(JSON.parse(result.body)).toEqual({ message: 'CORS preflight successful' });
    });

    it('should reject unsupported methods', async () => {
      const result = await handler(createEvent({ httpMethod: 'PATCH' }));

      expect(result.statusCode).toBe(405);
      expect(JSON.parse(result.body)).toEqual({
        error: 'Method not allowed',
        allowed_methods: ['GET', 'DELETE', 'OPTIONS'],
      });
    });

    it('should require the transaction id path parameter', async () => {
      const result = await handler(createEvent({ pathParameters: null }));

      expect(result.statusCode).toBe(400);
      expect(JSON.parse(result.body)).toEqual({ error: 'transaction_id path parameter is required' });
    });

    it('should require a document id for deletion', async () => {
      const result = await handler(createEvent({ httpMethod: 'DELETE' }));

      expect(result.statusCode).toBe(400);
      expect(JSON.parse(result.body)).toEqual({ error: 'document_id path parameter is required' });
    });
  });

  describe('GET documents', () => {
    it('should return an empty listing for an unknown transaction', async () => {
      const result = await handler(createEvent());

      expect(result.statusCode).toBe(200);
      expect(JSON.parse(result.body)).toEqual({ documents: [], total_count: 0 });
    });

    it('should list the metadata of uploaded documents', async () => {
      await upload('passport.pdf', Buffer.from('passport'), 'POA');
      await upload('id-card.png', Buffer.from('identity'), 'POI');

      const result = await handler(createEvent());

      expect(result.statusCode).toBe(200);
      const body = JSON.parse(result.body);
      expect(body.total_count).toBe(2);
      expect(body.documents).toEqual([
        {
          transactionId: 'txn-123',
          docId: IDENTITY_DOC_ID,
          docName: 'id-card.png',
          docCatCode: 'POI',
          docTypCode: 'RES',
          docFileFormat: 'png',
        },
        {
          transactionId: 'txn-123',
          docId: PASSPORT_DOC_ID,
          docName: 'passport.pdf',
          docCatCode: 'POA',
          docTypCode: 'RES',
          docFileFormat: 'pdf',
        },
      ]);
    });

    it('should include base64 content when requested', async () => {
      await upload('passport.pdf', Buffer.from('%PDF-1.4 test'), 'POA');

      const result = await handler(createEvent({ queryStringParameters: { include_content: 'true' } }));

      const body = JSON.parse(result.body);
      expect(body.total_count).toBe(1);
      expect(body.documents[0].document.docId).toBe(PASSPORT_DOC_ID);
      expect(body.documents[0].content).toBe('JVBERi0xLjQgdGVzdA==');
    });

    it('should return the raw bytes of one document', async () => {
      await upload('scan.bin', Buffer.from([0xff, 0xfe, 0x00, 0x80]), 'POA');

      const result = await handler(createEvent({
        pathParameters: { transaction_id: 'txn-123', document_id: PASSPORT_DOC_ID },
      }));

      expect(result.statusCode).toBe(200);
      expect(result.isBase64Encoded).toBe(true);
      expect(result.body).toBe('//4AgA==');
      expect(result.headers).toEqual(expect.objectContaining({
        'Content-Type': 'application/octet-stream',
        'Content-Length': '4',
      }));
    });

    it('should return 404 for an unknown document', async () => {
      const result = await handler(createEvent({
        pathParameters: { transaction_id: 'txn-123', document_id: 'missing' },
      }));

      expect(result.statusCode).toBe(404);
      const body = JSON.parse(result.body);
      expect(body.error.code).toBe('RESOURCE_NOT_FOUND');
      expect(body.error.context.correlationId).toBe('corr-crud-1');
    });

    it('should return 422 when stored metadata is corrupt', async () => {
      const store = CompositionRoot.getContainer().resolve<IObjectStore>(ServiceTokens.OBJECT_STORE);
      await store.put('txn-123/broken', Buffer.from('x'), { docid: 'broken' });

      const result = await handler(createEvent());

      expect(result.statusCode).toBe(422);
      expect(JSON.parse(result.body).error.code).toBe('DOCUMENT_METADATA_CORRUPT');
    });

    it('should skip corrupt metadata under the skip policy', async () => {
      process.env.CORRUPT_METADATA_POLICY = 'skip';
      try {
        await upload('passport.pdf', Buffer.from('passport'), 'POA');
        const store = CompositionRoot.getContainer().resolve<IObjectStore>(ServiceTokens.OBJECT_STORE);
        await store.put('txn-123/broken', Buffer.from('x'), { docid: 'broken' });

        const result = await handler(createEvent());

        expect(result.statusCode).toBe(200);
        expect(JSON.parse(result.body).total_count).toBe(1);
      } finally {
        delete process.env.CORRUPT_METADATA_POLICY;
      }
    });
  });

  describe('DELETE documents', () => {
    it('should delete an uploaded document', async () => {
      await upload('passport.pdf', Buffer.from('passport'), 'POA');

      const result = await handler(createEvent({
        httpMethod: 'DELETE',
        pathParameters: { transaction_id: 'txn-123', document_id: PASSPORT_DOC_ID },
      }));

      expect(result.statusCode).toBe(200);
      expect(JSON.parse(result.body)).toEqual({ status: 'SUCCESS', message: 'Document deleted successfully' });

      const listing = await handler(createEvent());
      expect(JSON.parse(listing.body).total_count).toBe(0);
    });

    it('should report failure for a missing document', async () => {
      const result = await handler(createEvent({
        httpMethod: 'DELETE',
        pathParameters: { transaction_id: 'txn-123', document_id: 'missing' },
      }));

      expect(result.statusCode).toBe(200);
      expect(JSON.parse(result.body)).toEqual({ status: 'FAILURE', message: 'Document deletion failed' });
    });
  });
});
