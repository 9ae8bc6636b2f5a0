/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Targets: handles to storage locations.
 *
 * A Target stands in for a build artifact. Its existence is the only signal a
 * task has completed, so `exists()` always asks the backing store and never
 * caches the answer.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { createReadStream, createWriteStream } from 'fs';
import type { Readable, Writable } from 'stream';
import { finished } from 'stream/promises';
import { once } from 'events';
import { MaterializationError, ObjectNotFoundError, errorMessage } from '../errors.js';
import type { ObjectInfo, ObjectStore } from '../storage/interfaces.js';
import {
  commitStaged,
  copyFileAtomic,
  removeFile,
  stagingPath,
  statOrNull,
} from '../storage/local/localHelpers.js';
import { uriBasename } from '../paths.js';

/**
 * Handle to a local or remote storage location.
 */
export interface Target {
  /** Location identifier; immutable */
  readonly uri: string;
  /** Whether the location is on the local filesystem */
  readonly kind: 'local' | 'remote';

  /**
   * Query the backing store.
   *
   * Returns false for a missing location; throws only for transport or
   * permission failures.
   */
  exists(): Promise<boolean>;

  /** Size in bytes, or null if the location doesn't exist */
  size(): Promise<number | null>;

  /**
   * Run `fn` with a readable stream of the content.
   *
   * The stream is destroyed when `fn` settles, whatever the outcome.
   */
  withReader<T>(fn: (stream: Readable) => Promise<T>): Promise<T>;

  /**
   * Run `fn` with a writable stream for new content.
   *
   * The content is published only if `fn` resolves; on rejection nothing
   * appears at the location.
   */
  withWriter<T>(fn: (stream: Writable) => Promise<T>): Promise<T>;

  /**
   * Return a local path holding the content.
   *
   * Local targets return their own path; remote targets download into `dir`.
   *
   * @throws {MaterializationError} If the content cannot be fetched
   */
  materialize(dir: string): Promise<string>;

  /** Copy a finished local file to this location */
  publish(localPath: string): Promise<void>;

  /** Delete the location if present */
  remove(): Promise<void>;
}

/**
 * End a writable and wait for it to flush.
 */
async function closeWritable(stream: Writable): Promise<void> {
  if (!stream.writableEnded) {
    stream.end();
  }
  await finished(stream);
}

/**
 * Destroy a writable and wait until its file descriptor is closed.
 */
async function discardWritable(stream: Writable): Promise<void> {
  if (stream.closed) return;
  const closed = once(stream, 'close');
  stream.destroy();
  await closed;
}

// =============================================================================
// Local Targets
// =============================================================================

/**
 * Target on the local filesystem.
 */
export class LocalTarget implements Target {
  readonly kind = 'local' as const;

  constructor(
    public readonly uri: string,
    public readonly path: string
  ) {}

  async exists(): Promise<boolean> {
    return (await statOrNull(this.path)) !== null;
  }

  async size(): Promise<number | null> {
    const stats = await statOrNull(this.path);
    return stats ? stats.size : null;
  }

  async withReader<T>(fn: (stream: Readable) => Promise<T>): Promise<T> {
    const stream = createReadStream(this.path);
    try {
      return await fn(stream);
    } finally {
      stream.destroy();
    }
  }

  async withWriter<T>(fn: (stream: Writable) => Promise<T>): Promise<T> {
    await fs.mkdir(path.dirname(this.path), { recursive: true });
    const staged = stagingPath(this.path);
    const stream = createWriteStream(staged);

    let result: T;
    try {
      result = await fn(stream);
      await closeWritable(stream);
    } catch (err) {
      await discardWritable(stream);
      await removeFile(staged);
      throw err;
    }

    await commitStaged(staged, this.path);
    return result;
  }

  async materialize(_dir: string): Promise<string> {
    return this.path;
  }

  async publish(localPath: string): Promise<void> {
    if (path.resolve(localPath) === path.resolve(this.path)) return;
    await copyFileAtomic(localPath, this.path);
  }

  async remove(): Promise<void> {
    await removeFile(this.path);
  }
}

// =============================================================================
// Remote Targets
// =============================================================================

/**
 * Target in an object store.
 */
export class RemoteTarget implements Target {
  readonly kind = 'remote' as const;

  constructor(
    public readonly uri: string,
    public readonly bucket: string,
    public readonly key: string,
    private readonly store: ObjectStore
  ) {}

  async exists(): Promise<boolean> {
    return (await this.head()) !== null;
  }

  async size(): Promise<number | null> {
    const info = await this.head();
    return info ? info.size : null;
  }

  private head(): Promise<ObjectInfo | null> {
    return this.store.head(this.bucket, this.key);
  }

  async withReader<T>(fn: (stream: Readable) => Promise<T>): Promise<T> {
    const stream = await this.store.read(this.bucket, this.key);
    try {
      return await fn(stream);
    } finally {
      stream.destroy();
    }
  }

  /**
   * Buffers the content in a local temporary file and uploads it once `fn`
   * resolves.
   */
  async withWriter<T>(fn: (stream: Writable) => Promise<T>): Promise<T> {
    const dir = await fs.mkdtemp(path.join(tmpdir(), 'seqflow-upload-'));
    const localPath = path.join(dir, uriBasename(this.uri));
    const stream = createWriteStream(localPath);

    try {
      let result: T;
      try {
        result = await fn(stream);
        await closeWritable(stream);
      } catch (err) {
        await discardWritable(stream);
        throw err;
      }
      await this.store.upload(localPath, this.bucket, this.key);
      return result;
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }

  async materialize(dir: string): Promise<string> {
    const destination = path.join(dir, uriBasename(this.uri));
    try {
      await this.store.download(this.bucket, this.key, destination);
    } catch (err) {
      const cause = err instanceof Error ? err : new Error(errorMessage(err));
      throw new MaterializationError(this.uri, cause);
    }
    return destination;
  }

  async publish(localPath: string): Promise<void> {
    await this.store.upload(localPath, this.bucket, this.key);
  }

  async remove(): Promise<void> {
    await this.store.delete(this.bucket, this.key);
  }
}

/**
 * Read a whole target as UTF-8 text.
 *
 * @throws {ObjectNotFoundError} If the target doesn't exist
 */
export async function readTargetText(target: Target): Promise<string> {
  if (!(await target.exists())) {
    throw new ObjectNotFoundError(target.uri);
  }
  return target.withReader(async (stream) => {
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
      chunks.push(Buffer.from(chunk));
    }
    return Buffer.concat(chunks).toString('utf-8');
  });
}

/**
 * Write UTF-8 text to a target atomically.
 */
export async function writeTargetText(target: Target, text: string): Promise<void> {
  await target.withWriter(async (stream) => {
    await new Promise<void>((resolve, reject) => {
      stream.write(text, (err) => (err ? reject(err) : resolve()));
    });
  });
}
