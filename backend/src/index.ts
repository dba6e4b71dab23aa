export * from './interfaces/document.interface';
export * from './interfaces/object-store.interface';
export * from './interfaces/error-handler.interface';
export { DocumentService, DocumentServiceOptions } from './services/document.service';
export { S3ObjectStore, S3ObjectStoreOptions } from './services/s3-object-store.service';
export { InMemoryObjectStore } from './services/in-memory-object-store.service';
export { ErrorHandlerService } from './services/error-handler.service';
export { loadConfig, AppConfig, StorageConfig } from './config/app-config';
export { CompositionRoot } from './container/composition-root';
export { buildObjectKey, deriveDocumentId, deriveFileFormat, DOCUMENT_ID_NAMESPACE } from './utils/document-addressing';
export * from './utils/application-error';
export { StructuredLogger, initializeLogger } from './utils/structured-logger';
