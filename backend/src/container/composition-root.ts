/**
 * Composition root for dependency injection setup
 * This is where all services are wired together
 */

import { S3Client } from '@aws-sdk/client-s3';
import { ServiceContainer, ServiceTokens } from './service-container';
import { AppConfig, StorageConfig, loadConfig } from '../config/app-config';
import { DocumentService } from '../services/document.service';
import { ErrorHandlerService } from '../services/error-handler.service';
import { InMemoryObjectStore } from '../services/in-memory-object-store.service';
import { S3ObjectStore } from '../services/s3-object-store.service';
import { IDocumentService } from '../interfaces/document.interface';
import { ErrorHandler } from '../interfaces/error-handler.interface';
import { IObjectStore } from '../interfaces/object-store.interface';
import { StructuredLogger, initializeLogger } from '../utils/structured-logger';

function createObjectStore(storage: StorageConfig, logger: StructuredLogger): IObjectStore {
  if (storage.driver === 'memory') {
    return new InMemoryObjectStore();
  }

  const client = new S3Client({
    region: storage.region,
    endpoint: storage.endpoint,
    forcePathStyle: storage.forcePathStyle,
  });
  return new S3ObjectStore({ client, bucketName: storage.bucketName, keyPrefix: storage.keyPrefix }, logger);
}

export class CompositionRoot {
  private static container: ServiceContainer | null = null;

  static getContainer(): ServiceContainer {
    if (!this.container) {
      this.container = this.createContainer();
    }
    return this.container;
  }

  /**
   * Document service bound to the caller's logger, sharing the singleton store
   */
  static createDocumentService(logger: StructuredLogger): IDocumentService {
    const container = this.getContainer();
    const config = container.resolve<AppConfig>(ServiceTokens.CONFIG);
    return new DocumentService(
      container.resolve<IObjectStore>(ServiceTokens.OBJECT_STORE),
      logger,
      { corruptMetadataPolicy: config.corruptMetadataPolicy }
    );
  }

  private static createContainer(): ServiceContainer {
    const container = new ServiceContainer();

    container.register<AppConfig>(ServiceTokens.CONFIG, () => loadConfig(), 'singleton');

    // One store (and S3 client) per container, reused across invocations
    container.register<IObjectStore>(
      ServiceTokens.OBJECT_STORE,
      (container) => {
        const config = container.resolve<AppConfig>(ServiceTokens.CONFIG);
        const logger = initializeLogger({ headers: {} }, `${config.serviceName}-object-store`);
        return createObjectStore(config.storage, logger);
      },
      'singleton'
    );

    // Independent of CONFIG so configuration errors can still be reported
    container.register<ErrorHandler>(
      ServiceTokens.ERROR_HANDLER,
      () => new ErrorHandlerService(initializeLogger({ headers: {} }, 'error-handler')),
      'singleton'
    );

    return container;
  }

  /**
   * Clear the container (for testing)
   */
  static clearContainer(): void {
    this.container = null;
  }
}
