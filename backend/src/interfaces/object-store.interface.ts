/**
 * Object store abstraction consumed by the document service
 */

import { Readable } from 'stream';

export type ObjectContent = Buffer | Uint8Array | Readable;

export type ObjectMetadata = Record<string, string>;

export interface PutObjectOptions {
  /** Expected size in bytes; a write whose content differs fails. */
  contentLength?: number;
}

export interface IObjectStore {
  /**
   * Create or replace the object at `key`. All-or-nothing: on failure no
   * content or metadata is visible under the key.
   */
  put(key: string, content: ObjectContent, metadata: ObjectMetadata, options?: PutObjectOptions): Promise<void>;

  /**
   * Raw object bytes. Rejects with NotFoundError when the key is absent.
   */
  get(key: string): Promise<Buffer>;

  /**
   * Metadata only, without reading the content.
   */
  getMetadata(key: string): Promise<ObjectMetadata>;

  /**
   * Names of the objects under `prefix + "/"`, relative to that prefix, in
   * store order.
   */
  list(prefix: string): Promise<string[]>;

  /**
   * Resolves `false` when nothing was deleted, including when the key is absent.
   */
  delete(key: string): Promise<boolean>;
}
