import axios from 'axios';
import { ApiClient, DocumentRecord } from './api';

const mockHttp = {
  get: jest.fn(),
  post: jest.fn(),
  delete: jest.fn(),
};

jest.mock('axios', () => ({
  __esModule: true,
  default: {
    create: jest.fn(() => mockHttp),
    isAxiosError: jest.fn(() => false),
  },
}));

const passport: DocumentRecord = {
  transactionId: 'txn-123',
  docId: '2e520fd6-ac40-548d-b56f-336eb2b6fdea',
  docName: 'passport.pdf',
  docCatCode: 'POA',
  docTypCode: 'RES',
  docFileFormat: 'pdf',
};

describe('ApiClient', () => {
  let client: ApiClient;

  beforeEach(() => {
    jest.clearAllMocks();
    client = new ApiClient({ apiBaseUrl: 'https://api.example.test/prod', timeoutMs: 5000 });
  });

  it('should create an HTTP client for the configured API', () => {
    expect(axios.create).toHaveBeenCalledWith({
      baseURL: 'https://api.example.test/prod',
      timeout: 5000,
    });
  });

  it('should upload base64 content with the document codes', async () => {
    mockHttp.post.mockResolvedValueOnce({ data: { success: true, document: passport } });

    const record = await client.uploadDocument('txn-123', 'passport.pdf', Buffer.from('%PDF-1.4 test'), {
      docCatCode: 'POA',
      docTypCode: 'RES',
      langCode: 'eng',
    });

    expect(record).toEqual(passport);
    expect(mockHttp.post).toHaveBeenCalledWith('/transactions/txn-123/documents', {
      fileName: 'passport.pdf',
      content: 'JVBERi0xLjQgdGVzdA==',
      docCatCode: 'POA',
      docTypCode: 'RES',
      langCode: 'eng',
    });
  });

  it('should escape identifiers in the path', async () => {
    mockHttp.get.mockResolvedValueOnce({ data: { documents: [], total_count: 0 } });

    await client.listDocuments('txn 1/2');

    expect(mockHttp.get).toHaveBeenCalledWith('/transactions/txn%201%2F2/documents');
  });

  it('should return the listed records', async () => {
    mockHttp.get.mockResolvedValueOnce({ data: { documents: [passport], total_count: 1 } });

    expect(await client.listDocuments('txn-123')).toEqual([passport]);
  });

  it('should decode documents listed with content', async () => {
    mockHttp.get.mockResolvedValueOnce({
      data: { documents: [{ document: passport, content: '//4AgA==' }], total_count: 1 },
    });

    const documents = await client.listDocumentsWithContent('txn-123');

    expect(mockHttp.get).toHaveBeenCalledWith('/transactions/txn-123/documents', {
      params: { include_content: 'true' },
    });
    expect(documents).toHaveLength(1);
    expect(documents[0].record).toEqual(passport);
    expect(Array.from(documents[0].content)).toEqual([0xff, 0xfe, 0x00, 0x80]);
  });

  it('should download document bytes', async () => {
    mockHttp.get.mockResolvedValueOnce({ data: new Uint8Array([1, 2, 3]).buffer });

    const content = await client.getDocumentContent('txn-123', passport.docId);

    expect(mockHttp.get).toHaveBeenCalledWith(
      `/transactions/txn-123/documents/${passport.docId}`,
      { responseType: 'arraybuffer' }
    );
    expect(Array.from(content)).toEqual([1, 2, 3]);
  });

  it('should return the deletion result', async () => {
    mockHttp.delete.mockResolvedValueOnce({ data: { status: 'FAILURE', message: 'Document deletion failed' } });

    const result = await client.deleteDocument('txn-123', 'missing');

    expect(mockHttp.delete).toHaveBeenCalledWith('/transactions/txn-123/documents/missing');
    expect(result).toEqual({ status: 'FAILURE', message: 'Document deletion failed' });
  });
});
