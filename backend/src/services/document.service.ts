/**
 * Document Service Implementation
 *
 * Stores each document under `{transactionId}/{docId}` where the docId is
 * derived from the transaction and the document category, so every lookup
 * recomputes the key instead of reading an index.
 */

import {
  IDocumentService,
  CorruptMetadataPolicy,
  DeletionResult,
  DocumentMetadata,
  DocumentRecord,
  DocumentUploadRequest,
  DocumentWithContent,
  UploadFile,
  DOCUMENT_METADATA_KEYS
} from '../interfaces/document.interface';
import { ErrorContext } from '../interfaces/error-handler.interface';
import { IObjectStore, ObjectMetadata } from '../interfaces/object-store.interface';
import {
  BaseApplicationError,
  MetadataCorruptError,
  StoreUnavailableError,
  UploadFailedError,
  ValidationError,
  toError
} from '../utils/application-error';
import { buildObjectKey, deriveDocumentId, deriveFileFormat } from '../utils/document-addressing';
import { createErrorContext, enhanceErrorContext } from '../utils/error-context';
import { StructuredLogger } from '../utils/structured-logger';

export interface DocumentServiceOptions {
  corruptMetadataPolicy?: CorruptMetadataPolicy;
}

export const DOCUMENT_DELETION_SUCCESS_MESSAGE = 'Document deleted successfully';
export const DOCUMENT_DELETION_FAILURE_MESSAGE = 'Document deletion failed';

// Metadata entries that must also be non-empty; doctypcode and langcode only need to be present
const NON_EMPTY_METADATA_KEYS = ['docid', 'docname', 'doccatcode'] as const;

export class DocumentService implements IDocumentService {
  private objectStore: IObjectStore;
  private logger: StructuredLogger;
  private corruptMetadataPolicy: CorruptMetadataPolicy;

  constructor(objectStore: IObjectStore, logger: StructuredLogger, options: DocumentServiceOptions = {}) {
    this.objectStore = objectStore;
    this.logger = logger;
    this.corruptMetadataPolicy = options.corruptMetadataPolicy ?? 'fail-fast';
  }

  /**
   * Store the document under its derived key. Uploading the same
   * transaction and category again replaces the earlier document.
   */
  async uploadDocument(transactionId: string, file: UploadFile, request: DocumentUploadRequest): Promise<DocumentRecord> {
    const context = this.createContext('DOCUMENT_UPLOAD', transactionId);
    const docFileFormat = this.validateUpload(transactionId, file, request, context);

    const docId = deriveDocumentId(transactionId, request.docCatCode);
    const objectKey = buildObjectKey(transactionId, docId);
    const metadata: DocumentMetadata = {
      doccatcode: request.docCatCode,
      doctypcode: request.docTypCode,
      langcode: request.langCode,
      docname: file.originalFilename,
      docid: docId,
    };
    const uploadStartTime = Date.now();

    this.logger.info('DOCUMENT_UPLOAD_START', {
      transactionId,
      docId,
      objectKey,
      fileName: file.originalFilename,
      contentLength: file.contentLength,
      docCatCode: request.docCatCode
    }, `Uploading ${file.originalFilename}`);

    try {
      await this.objectStore.put(objectKey, file.content, metadata, { contentLength: file.contentLength });
    } catch (error) {
      const cause = toError(error);
      this.logger.logError('DOCUMENT_UPLOAD_FAILED', cause, {
        transactionId,
        docId,
        objectKey,
        uploadDuration: Date.now() - uploadStartTime
      });

      throw new UploadFailedError(
        `Failed to upload document '${file.originalFilename}': ${cause.message}`,
        enhanceErrorContext(context, { objectKey }),
        cause
      );
    }

    this.logger.performance('DOCUMENT_UPLOAD', Date.now() - uploadStartTime, {
      transactionId,
      docId,
      contentLength: file.contentLength
    });

    return {
      transactionId,
      docId,
      docName: file.originalFilename,
      docCatCode: request.docCatCode,
      docTypCode: request.docTypCode,
      docFileFormat,
    };
  }

  async fetchAllDocumentsMetadata(transactionId: string): Promise<DocumentRecord[]> {
    const context = this.createContext('DOCUMENT_METADATA_LIST', transactionId);
    this.requireNonEmpty(transactionId, 'transactionId', context);

    const objectNames = await this.listObjectNames(transactionId, context);
    const records = await Promise.all(
      objectNames.map((objectName) => this.fetchDocumentMetadata(transactionId, objectName, context))
    );
    const documents = records.filter((record): record is DocumentRecord => record !== null);

    this.logger.info('DOCUMENT_METADATA_LISTED', {
      transactionId,
      objectCount: objectNames.length,
      documentCount: documents.length
    }, `Listed ${documents.length} documents`);

    return documents;
  }

  async fetchDocumentByDocId(transactionId: string, documentId: string): Promise<Buffer> {
    const context = this.createContext('DOCUMENT_FETCH', transactionId);
    this.requireNonEmpty(transactionId, 'transactionId', context);
    this.requireNonEmpty(documentId, 'documentId', context);

    const objectKey = buildObjectKey(transactionId, documentId);
    const content = await this.callStore(() => this.objectStore.get(objectKey), context, objectKey);

    this.logger.debug('DOCUMENT_FETCHED', {
      transactionId,
      docId: documentId,
      contentLength: content.length
    }, `Fetched document ${documentId}`);

    return content;
  }

  async getDocumentsWithMetadata(transactionId: string): Promise<DocumentWithContent[]> {
    const context = this.createContext('DOCUMENT_CONTENT_LIST', transactionId);
    this.requireNonEmpty(transactionId, 'transactionId', context);

    const objectNames = await this.listObjectNames(transactionId, context);
    const entries = await Promise.all(
      objectNames.map(async (objectName): Promise<DocumentWithContent | null> => {
        const record = await this.fetchDocumentMetadata(transactionId, objectName, context);
        if (!record) {
          return null;
        }
        const objectKey = buildObjectKey(transactionId, objectName);
        const content = await this.callStore(() => this.objectStore.get(objectKey), context, objectKey);
        return { record, content };
      })
    );

    return entries.filter((entry): entry is DocumentWithContent => entry !== null);
  }

  /**
   * Absence and a refused deletion both come back as FAILURE, never as an error.
   */
  async deleteDocument(transactionId: string, documentId: string): Promise<DeletionResult> {
    const context = this.createContext('DOCUMENT_DELETE', transactionId);
    this.requireNonEmpty(transactionId, 'transactionId', context);
    this.requireNonEmpty(documentId, 'documentId', context);

    const objectKey = buildObjectKey(transactionId, documentId);
    const deleted = await this.callStore(() => this.objectStore.delete(objectKey), context, objectKey);

    this.logger.info(deleted ? 'DOCUMENT_DELETED' : 'DOCUMENT_DELETE_FAILED', {
      transactionId,
      docId: documentId,
      objectKey
    }, deleted ? DOCUMENT_DELETION_SUCCESS_MESSAGE : DOCUMENT_DELETION_FAILURE_MESSAGE);

    return deleted
      ? { status: 'SUCCESS', message: DOCUMENT_DELETION_SUCCESS_MESSAGE }
      : { status: 'FAILURE', message: DOCUMENT_DELETION_FAILURE_MESSAGE };
  }

  private async listObjectNames(transactionId: string, context: ErrorContext): Promise<string[]> {
    return this.callStore(() => this.objectStore.list(transactionId), context, transactionId);
  }

  private async fetchDocumentMetadata(
    transactionId: string,
    objectName: string,
    context: ErrorContext
  ): Promise<DocumentRecord | null> {
    const objectKey = buildObjectKey(transactionId, objectName);

    // The store itself may report metadata it cannot decode as corrupt
    try {
      const metadata = await this.callStore(() => this.objectStore.getMetadata(objectKey), context, objectKey);
      return this.toDocumentRecord(transactionId, objectKey, metadata, context);
    } catch (error) {
      if (error instanceof MetadataCorruptError && this.corruptMetadataPolicy === 'skip') {
        this.logger.warn('DOCUMENT_METADATA_SKIPPED', {
          transactionId,
          objectKey,
          reason: error.message
        }, `Skipping ${objectKey} with corrupt metadata`);
        return null;
      }
      throw error;
    }
  }

  private toDocumentRecord(
    transactionId: string,
    objectKey: string,
    metadata: ObjectMetadata,
    context: ErrorContext
  ): DocumentRecord {
    const missing = DOCUMENT_METADATA_KEYS.filter((key) => metadata[key] === undefined);
    if (missing.length > 0) {
      throw new MetadataCorruptError(objectKey, `missing ${missing.join(', ')}`, context);
    }

    const empty = NON_EMPTY_METADATA_KEYS.filter((key) => metadata[key].trim() === '');
    if (empty.length > 0) {
      throw new MetadataCorruptError(objectKey, `empty ${empty.join(', ')}`, context);
    }

    const docFileFormat = deriveFileFormat(metadata.docname);
    if (docFileFormat === null) {
      throw new MetadataCorruptError(objectKey, `docname '${metadata.docname}' has no file format`, context);
    }

    return {
      transactionId,
      docId: metadata.docid,
      docName: metadata.docname,
      docCatCode: metadata.doccatcode,
      docTypCode: metadata.doctypcode,
      docFileFormat,
    };
  }

  private validateUpload(
    transactionId: string,
    file: UploadFile,
    request: DocumentUploadRequest,
    context: ErrorContext
  ): string {
    this.requireNonEmpty(transactionId, 'transactionId', context);
    this.requireNonEmpty(request.docCatCode, 'docCatCode', context);

    if (transactionId.includes('/')) {
      throw new ValidationError('transactionId must not contain "/"', context, { transactionId });
    }

    if (!Number.isInteger(file.contentLength) || file.contentLength < 0) {
      throw new ValidationError('contentLength must be a non-negative integer', context, {
        contentLength: file.contentLength
      });
    }

    const docFileFormat = deriveFileFormat(file.originalFilename || '');
    if (docFileFormat === null) {
      throw new ValidationError(
        'originalFilename must have a base name and an extension separated by "."',
        context,
        { originalFilename: file.originalFilename }
      );
    }

    return docFileFormat;
  }

  private requireNonEmpty(value: string, field: string, context: ErrorContext): void {
    if (!value || value.trim() === '') {
      throw new ValidationError(`${field} is required`, context);
    }
  }

  /**
   * Application errors from the store pass through; anything else is wrapped
   * with the original error attached.
   */
  private async callStore<T>(operation: () => Promise<T>, context: ErrorContext, objectKey: string): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof BaseApplicationError) {
        throw error;
      }
      const cause = toError(error);
      this.logger.logError(`${context.operation}_STORE_FAILED`, cause, { objectKey });
      throw new StoreUnavailableError(
        `Object store call failed for '${objectKey}': ${cause.message}`,
        enhanceErrorContext(context, { objectKey }),
        cause
      );
    }
  }

  private createContext(operation: string, transactionId: string): ErrorContext {
    return createErrorContext(operation, this.logger.getCorrelationId(), transactionId);
  }
}
