/**
 * Document service abstraction interface for dependency injection
 */

import { ObjectContent } from './object-store.interface';

export const DOCUMENT_METADATA_KEYS = ['doccatcode', 'doctypcode', 'langcode', 'docname', 'docid'] as const;

export type DocumentMetadataKey = typeof DOCUMENT_METADATA_KEYS[number];

export type DocumentMetadata = Record<DocumentMetadataKey, string>;

export interface DocumentRecord {
  transactionId: string;
  docId: string;
  docName: string;
  docCatCode: string;
  docTypCode: string;
  docFileFormat: string;
}

export interface UploadFile {
  originalFilename: string;
  content: ObjectContent;
  contentLength: number;
}

export interface DocumentUploadRequest {
  docCatCode: string;
  docTypCode: string;
  langCode: string;
}

export interface DocumentWithContent {
  record: DocumentRecord;
  content: Buffer;
}

export type DeletionStatus = 'SUCCESS' | 'FAILURE';

export interface DeletionResult {
  status: DeletionStatus;
  message: string;
}

/**
 * What listing operations do with an object whose metadata is unusable:
 * `fail-fast` aborts the whole call, `skip` logs and leaves the object out.
 */
export type CorruptMetadataPolicy = 'fail-fast' | 'skip';

export interface IDocumentService {
  uploadDocument(transactionId: string, file: UploadFile, request: DocumentUploadRequest): Promise<DocumentRecord>;

  fetchAllDocumentsMetadata(transactionId: string): Promise<DocumentRecord[]>;

  fetchDocumentByDocId(transactionId: string, documentId: string): Promise<Buffer>;

  /**
   * One entry per stored object, in listing order. Records with identical
   * field values stay separate entries.
   */
  getDocumentsWithMetadata(transactionId: string): Promise<DocumentWithContent[]>;

  deleteDocument(transactionId: string, documentId: string): Promise<DeletionResult>;
}
