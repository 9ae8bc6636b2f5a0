/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Local filesystem implementation of object storage.
 *
 * A root directory stands in for a bucket namespace:
 * - `<scheme>://<bucket>/<key>` is stored at `<root>/<bucket>/<key>`
 *
 * Writes are atomic (stage-and-rename), so a reader never sees a half
 * written object and `head` never reports one as existing.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { createReadStream } from 'fs';
import type { Readable } from 'stream';
import { ObjectNotFoundError, isNotFoundError } from '../../errors.js';
import type { ObjectInfo, ObjectStore } from '../interfaces.js';
import { copyFileAtomic, removeFile, statOrNull, writeFileAtomic } from './localHelpers.js';

/**
 * ObjectStore backed by a directory tree.
 */
export class LocalObjectStore implements ObjectStore {
  /**
   * @param root - Directory holding one subdirectory per bucket
   */
  constructor(public readonly root: string) {}

  /**
   * Filesystem path of an object.
   */
  objectPath(bucket: string, key: string): string {
    const resolved = path.resolve(this.root, bucket, key);
    const bucketRoot = path.resolve(this.root, bucket);
    if (resolved !== bucketRoot && !resolved.startsWith(bucketRoot + path.sep)) {
      throw new Error(`Object key '${key}' escapes bucket '${bucket}'`);
    }
    return resolved;
  }

  async head(bucket: string, key: string): Promise<ObjectInfo | null> {
    const stats = await statOrNull(this.objectPath(bucket, key));
    return stats ? { size: stats.size, modifiedAt: stats.mtime } : null;
  }

  async read(bucket: string, key: string): Promise<Readable> {
    const filePath = this.objectPath(bucket, key);
    // Open eagerly so a missing object surfaces here, not on first read
    let handle: fs.FileHandle;
    try {
      handle = await fs.open(filePath, 'r');
    } catch (err) {
      if (isNotFoundError(err)) {
        throw new ObjectNotFoundError(`${bucket}/${key}`);
      }
      throw err;
    }
    return handle.createReadStream();
  }

  async write(bucket: string, key: string, body: Readable | Uint8Array): Promise<void> {
    await writeFileAtomic(this.objectPath(bucket, key), body);
  }

  async download(bucket: string, key: string, destination: string): Promise<void> {
    const filePath = this.objectPath(bucket, key);
    if ((await statOrNull(filePath)) === null) {
      throw new ObjectNotFoundError(`${bucket}/${key}`);
    }
    await copyFileAtomic(filePath, destination);
  }

  async upload(source: string, bucket: string, key: string): Promise<void> {
    await writeFileAtomic(this.objectPath(bucket, key), createReadStream(source));
  }

  async delete(bucket: string, key: string): Promise<void> {
    await removeFile(this.objectPath(bucket, key));
  }
}
