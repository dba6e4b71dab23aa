/**
 * S3 implementation of the object store
 */

import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  DeleteObjectCommand,
  ListObjectsV2Command
} from '@aws-sdk/client-s3';
import { IObjectStore, ObjectContent, ObjectMetadata, PutObjectOptions } from '../interfaces/object-store.interface';
import {
  BaseApplicationError,
  MetadataCorruptError,
  NotFoundError,
  StoreReadError,
  StoreWriteError,
  toError
} from '../utils/application-error';
import { createErrorContext } from '../utils/error-context';
import { ChildLogger, StructuredLogger } from '../utils/structured-logger';

export interface S3ObjectStoreOptions {
  client: S3Client;
  bucketName: string;
  keyPrefix?: string;
}

// S3 user metadata travels as HTTP headers and must be US-ASCII
export function encodeMetadata(metadata: ObjectMetadata): ObjectMetadata {
  const encoded: ObjectMetadata = {};
  for (const [key, value] of Object.entries(metadata)) {
    encoded[key] = encodeURIComponent(value);
  }
  return encoded;
}

/**
 * Values written by other tools may not be valid percent-encoding; those are
 * reported as corrupt metadata of `objectKey`, not as a read failure.
 */
export function decodeMetadata(metadata: ObjectMetadata, objectKey: string): ObjectMetadata {
  const decoded: ObjectMetadata = {};
  for (const [key, value] of Object.entries(metadata)) {
    try {
      decoded[key] = decodeURIComponent(value);
    } catch (error) {
      if (!(error instanceof URIError)) {
        throw error;
      }
      throw new MetadataCorruptError(
        objectKey,
        `undecodable ${key}`,
        createErrorContext('S3_DECODE_METADATA', undefined, undefined, { value })
      );
    }
  }
  return decoded;
}

export function isS3NotFound(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (error.name === 'NoSuchKey' || error.name === 'NotFound') {
    return true;
  }
  const metadata = '$metadata' in error ? error.$metadata : undefined;
  return typeof metadata === 'object' &&
    metadata !== null &&
    'httpStatusCode' in metadata &&
    metadata.httpStatusCode === 404;
}

export class S3ObjectStore implements IObjectStore {
  private client: S3Client;
  private bucketName: string;
  private keyPrefix: string;
  private logger: ChildLogger;

  constructor(options: S3ObjectStoreOptions, logger: StructuredLogger) {
    this.client = options.client;
    this.bucketName = options.bucketName;
    this.keyPrefix = options.keyPrefix ? `${options.keyPrefix.replace(/\/+$/, '')}/` : '';
    this.logger = logger.child({ s3Bucket: options.bucketName });
  }

  async put(key: string, content: ObjectContent, metadata: ObjectMetadata, options: PutObjectOptions = {}): Promise<void> {
    const s3Key = this.toS3Key(key);
    const startTime = Date.now();

    this.logger.debug('S3_PUT_OBJECT_START', {
      s3Key,
      contentLength: options.contentLength
    }, `Writing object ${s3Key}`);

    try {
      await this.client.send(new PutObjectCommand({
        Bucket: this.bucketName,
        Key: s3Key,
        Body: content,
        ContentLength: options.contentLength,
        ContentType: 'application/octet-stream',
        Metadata: encodeMetadata(metadata),
      }));

      this.logger.performance('S3_PUT_OBJECT', Date.now() - startTime, {
        s3Key,
        contentLength: options.contentLength
      });
    } catch (error) {
      const cause = toError(error);
      this.logger.logError('S3_PUT_OBJECT_FAILED', cause, {
        s3Key,
        duration: Date.now() - startTime
      });

      throw new StoreWriteError(
        `Failed to write object '${key}': ${cause.message}`,
        createErrorContext('S3_PUT_OBJECT', undefined, undefined, { bucket: this.bucketName, s3Key }),
        cause
      );
    }
  }

  async get(key: string): Promise<Buffer> {
    const s3Key = this.toS3Key(key);
    const startTime = Date.now();

    try {
      const response = await this.client.send(new GetObjectCommand({
        Bucket: this.bucketName,
        Key: s3Key,
      }));

      if (!response.Body) {
        throw new StoreReadError(
          `Object '${key}' returned no body`,
          createErrorContext('S3_GET_OBJECT', undefined, undefined, { bucket: this.bucketName, s3Key })
        );
      }

      const bytes = await response.Body.transformToByteArray();

      this.logger.performance('S3_GET_OBJECT', Date.now() - startTime, {
        s3Key,
        contentLength: bytes.byteLength
      });

      return Buffer.from(bytes);
    } catch (error) {
      throw this.toReadError(error, key, 'S3_GET_OBJECT');
    }
  }

  async getMetadata(key: string): Promise<ObjectMetadata> {
    const s3Key = this.toS3Key(key);

    let stored: ObjectMetadata;
    try {
      const response = await this.client.send(new HeadObjectCommand({
        Bucket: this.bucketName,
        Key: s3Key,
      }));
      stored = response.Metadata ?? {};
    } catch (error) {
      throw this.toReadError(error, key, 'S3_HEAD_OBJECT');
    }

    return decodeMetadata(stored, key);
  }

  async list(prefix: string): Promise<string[]> {
    const scope = this.toS3Key(`${prefix}/`);
    const names: string[] = [];
    let continuationToken: string | undefined;

    try {
      do {
        const response = await this.client.send(new ListObjectsV2Command({
          Bucket: this.bucketName,
          Prefix: scope,
          ContinuationToken: continuationToken,
        }));

        for (const item of response.Contents ?? []) {
          if (item.Key && item.Key.length > scope.length) {
            names.push(item.Key.substring(scope.length));
          }
        }

        continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
      } while (continuationToken);
    } catch (error) {
      throw this.toReadError(error, prefix, 'S3_LIST_OBJECTS');
    }

    this.logger.debug('S3_LIST_OBJECTS', { prefix: scope, objectCount: names.length }, `Listed ${names.length} objects`);
    return names;
  }

  async delete(key: string): Promise<boolean> {
    const s3Key = this.toS3Key(key);

    // DeleteObject succeeds for absent keys, so existence is checked first
    try {
      await this.client.send(new HeadObjectCommand({
        Bucket: this.bucketName,
        Key: s3Key,
      }));
    } catch (error) {
      if (isS3NotFound(error)) {
        this.logger.info('S3_DELETE_OBJECT_SKIPPED', { s3Key }, `Object ${s3Key} does not exist`);
        return false;
      }
      throw this.toDeleteError(error, key, 'S3_DELETE_OBJECT');
    }

    try {
      await this.client.send(new DeleteObjectCommand({
        Bucket: this.bucketName,
        Key: s3Key,
      }));
    } catch (error) {
      throw this.toDeleteError(error, key, 'S3_DELETE_OBJECT');
    }

    this.logger.info('S3_DELETE_OBJECT', { s3Key }, `Object ${s3Key} deleted`);
    return true;
  }

  private toS3Key(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  private toReadError(error: unknown, key: string, operation: string): Error {
    if (error instanceof BaseApplicationError) {
      return error;
    }

    const cause = toError(error);
    const context = createErrorContext(operation, undefined, undefined, {
      bucket: this.bucketName,
      s3Key: this.toS3Key(key)
    });

    if (isS3NotFound(error)) {
      return new NotFoundError('Object', key, context, cause);
    }

    this.logger.logError(`${operation}_FAILED`, cause, { s3Key: this.toS3Key(key) });
    return new StoreReadError(`Failed to read '${key}': ${cause.message}`, context, cause);
  }

  private toDeleteError(error: unknown, key: string, operation: string): Error {
    const cause = toError(error);
    this.logger.logError(`${operation}_FAILED`, cause, { s3Key: this.toS3Key(key) });
    return new StoreWriteError(
      `Failed to delete '${key}': ${cause.message}`,
      createErrorContext(operation, undefined, undefined, { bucket: this.bucketName, s3Key: this.toS3Key(key) }),
      cause
    );
  }
}
