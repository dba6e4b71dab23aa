import axios, { AxiosInstance } from 'axios';
import { Config } from './config';

export interface DocumentRecord {
  transactionId: string;
  docId: string;
  docName: string;
  docCatCode: string;
  docTypCode: string;
  docFileFormat: string;
}

export interface DocumentCodes {
  docCatCode: string;
  docTypCode: string;
  langCode: string;
}

export interface DownloadedDocument {
  record: DocumentRecord;
  content: Buffer;
}

export interface DeletionResult {
  status: 'SUCCESS' | 'FAILURE';
  message: string;
}

interface UploadResponse {
  document: DocumentRecord;
}

interface ListResponse {
  documents: DocumentRecord[];
  total_count: number;
}

interface ListWithContentResponse {
  documents: Array<{ document: DocumentRecord; content: string }>;
  total_count: number;
}

export class ApiClient {
  private client: AxiosInstance;

  constructor(config: Config) {
    this.client = axios.create({
      baseURL: config.apiBaseUrl,
      timeout: config.timeoutMs,
    });
  }

  async uploadDocument(transactionId: string, fileName: string, content: Buffer, codes: DocumentCodes): Promise<DocumentRecord> {
    const response = await this.client.post<UploadResponse>(this.documentsPath(transactionId), {
      fileName,
      content: content.toString('base64'),
      docCatCode: codes.docCatCode,
      docTypCode: codes.docTypCode,
      langCode: codes.langCode,
    });
    return response.data.document;
  }

  async listDocuments(transactionId: string): Promise<DocumentRecord[]> {
    const response = await this.client.get<ListResponse>(this.documentsPath(transactionId));
    return response.data.documents;
  }

  async listDocumentsWithContent(transactionId: string): Promise<DownloadedDocument[]> {
    const response = await this.client.get<ListWithContentResponse>(this.documentsPath(transactionId), {
      params: { include_content: 'true' },
    });
    return response.data.documents.map((entry) => ({
      record: entry.document,
      content: Buffer.from(entry.content, 'base64'),
    }));
  }

  async getDocumentContent(transactionId: string, documentId: string): Promise<Buffer> {
    const response = await this.client.get<ArrayBuffer>(
      `${this.documentsPath(transactionId)}/${encodeURIComponent(documentId)}`,
      { responseType: 'arraybuffer' }
    );
    return Buffer.from(response.data);
  }

  async deleteDocument(transactionId: string, documentId: string): Promise<DeletionResult> {
    const response = await this.client.delete<DeletionResult>(
      `${this.documentsPath(transactionId)}/${encodeURIComponent(documentId)}`
    );
    return response.data;
  }

  private documentsPath(transactionId: string): string {
    return `/transactions/${encodeURIComponent(transactionId)}/documents`;
  }
}
