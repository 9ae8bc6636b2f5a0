/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Object store abstraction for remote Targets.
 *
 * Remote locations (`s3://bucket/key` and similar) are reached only through
 * this interface, so the same task graph can run against:
 * - LocalObjectStore: a directory standing in for a bucket namespace
 * - InMemoryObjectStore: a map, for tests
 * - a cloud object store client supplied by the caller
 */

import type { Readable } from 'stream';

/**
 * Metadata returned by {@link ObjectStore.head}.
 */
export interface ObjectInfo {
  /** Size in bytes */
  size: number;
  /** Last modification time */
  modifiedAt: Date;
}

/**
 * Bucket/key object storage.
 *
 * Implementations must not throw from `head` for a missing object; they throw
 * only for transport or permission failures.
 */
export interface ObjectStore {
  /**
   * Look up an object.
   * @returns Object metadata, or null if the object does not exist
   */
  head(bucket: string, key: string): Promise<ObjectInfo | null>;

  /**
   * Open an object for reading.
   * @throws {ObjectNotFoundError} If the object doesn't exist
   */
  read(bucket: string, key: string): Promise<Readable>;

  /**
   * Write an object from a stream or buffer.
   *
   * The object becomes visible only once the whole body has been written.
   */
  write(bucket: string, key: string, body: Readable | Uint8Array): Promise<void>;

  /**
   * Copy an object into a local file.
   * @throws {ObjectNotFoundError} If the object doesn't exist
   */
  download(bucket: string, key: string, destination: string): Promise<void>;

  /**
   * Upload a local file as an object.
   */
  upload(source: string, bucket: string, key: string): Promise<void>;

  /**
   * Delete an object. Deleting a missing object is not an error.
   */
  delete(bucket: string, key: string): Promise<void>;
}
