/**
 * Map-backed object store for tests and the `memory` driver
 */

import { IObjectStore, ObjectContent, ObjectMetadata, PutObjectOptions } from '../interfaces/object-store.interface';
import { NotFoundError, StoreWriteError, toError } from '../utils/application-error';
import { createErrorContext } from '../utils/error-context';

interface StoredObject {
  content: Buffer;
  metadata: ObjectMetadata;
}

export async function readObjectContent(content: ObjectContent): Promise<Buffer> {
  if (content instanceof Uint8Array) {
    return Buffer.from(content);
  }

  const chunks: Buffer[] = [];
  for await (const chunk of content) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

export class InMemoryObjectStore implements IObjectStore {
  private objects = new Map<string, StoredObject>();

  async put(key: string, content: ObjectContent, metadata: ObjectMetadata, options: PutObjectOptions = {}): Promise<void> {
    let bytes: Buffer;
    try {
      // Buffer the whole stream first so a failed read never leaves a partial object
      bytes = await readObjectContent(content);
    } catch (error) {
      const cause = toError(error);
      throw new StoreWriteError(
        `Failed to read content for object '${key}': ${cause.message}`,
        createErrorContext('MEMORY_PUT_OBJECT', undefined, undefined, { key }),
        cause
      );
    }
    if (options.contentLength !== undefined && bytes.length !== options.contentLength) {
      throw new StoreWriteError(
        `Content length mismatch for object '${key}': expected ${options.contentLength} bytes, got ${bytes.length}`,
        createErrorContext('MEMORY_PUT_OBJECT', undefined, undefined, { key })
      );
    }
    this.objects.set(key, { content: bytes, metadata: { ...metadata } });
  }

  async get(key: string): Promise<Buffer> {
    return Buffer.from(this.require(key, 'MEMORY_GET_OBJECT').content);
  }

  async getMetadata(key: string): Promise<ObjectMetadata> {
    return { ...this.require(key, 'MEMORY_HEAD_OBJECT').metadata };
  }

  async list(prefix: string): Promise<string[]> {
    const scope = `${prefix}/`;
    return Array.from(this.objects.keys())
      .filter((key) => key.startsWith(scope))
      .sort()
      .map((key) => key.substring(scope.length));
  }

  async delete(key: string): Promise<boolean> {
    return this.objects.delete(key);
  }

  get size(): number {
    return this.objects.size;
  }

  private require(key: string, operation: string): StoredObject {
    const stored = this.objects.get(key);
    if (!stored) {
      throw new NotFoundError('Object', key, createErrorContext(operation));
    }
    return stored;
  }
}
