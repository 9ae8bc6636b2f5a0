/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { Readable } from 'stream';
import { ObjectNotFoundError } from '../../errors.js';
import type { ObjectInfo, ObjectStore } from '../interfaces.js';

/**
 * Record of a transfer between the store and the local filesystem.
 */
export interface TransferRecord {
  bucket: string;
  key: string;
  localPath: string;
}

/**
 * In-memory implementation of ObjectStore for testing.
 *
 * Records every download and upload so tests can assert how many
 * materializations and publications happened.
 */
/* eslint-disable @typescript-eslint/require-await */
export class InMemoryObjectStore implements ObjectStore {
  private objects = new Map<string, { data: Uint8Array; modifiedAt: Date }>();
  readonly downloads: TransferRecord[] = [];
  readonly uploads: TransferRecord[] = [];

  private id(bucket: string, key: string): string {
    return `${bucket}/${key}`;
  }

  /**
   * Seed an object directly.
   */
  put(bucket: string, key: string, data: string | Uint8Array): void {
    const bytes = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
    this.objects.set(this.id(bucket, key), { data: bytes, modifiedAt: new Date() });
  }

  /**
   * Read an object as UTF-8 text, or null if it doesn't exist.
   */
  getText(bucket: string, key: string): string | null {
    const entry = this.objects.get(this.id(bucket, key));
    return entry ? Buffer.from(entry.data).toString('utf-8') : null;
  }

  /** Ids (`bucket/key`) of all stored objects, sorted */
  keys(): string[] {
    return [...this.objects.keys()].sort();
  }

  async head(bucket: string, key: string): Promise<ObjectInfo | null> {
    const entry = this.objects.get(this.id(bucket, key));
    return entry ? { size: entry.data.length, modifiedAt: entry.modifiedAt } : null;
  }

  async read(bucket: string, key: string): Promise<Readable> {
    const entry = this.objects.get(this.id(bucket, key));
    if (!entry) {
      throw new ObjectNotFoundError(this.id(bucket, key));
    }
    return Readable.from([Buffer.from(entry.data)]);
  }

  async write(bucket: string, key: string, body: Readable | Uint8Array): Promise<void> {
    if (body instanceof Uint8Array) {
      this.put(bucket, key, body);
      return;
    }
    const chunks: Buffer[] = [];
    for await (const chunk of body) {
      chunks.push(Buffer.from(chunk));
    }
    this.put(bucket, key, Buffer.concat(chunks));
  }

  async download(bucket: string, key: string, destination: string): Promise<void> {
    const entry = this.objects.get(this.id(bucket, key));
    if (!entry) {
      throw new ObjectNotFoundError(this.id(bucket, key));
    }
    await fs.mkdir(path.dirname(destination), { recursive: true });
    await fs.writeFile(destination, entry.data);
    this.downloads.push({ bucket, key, localPath: destination });
  }

  async upload(source: string, bucket: string, key: string): Promise<void> {
    const data = await fs.readFile(source);
    this.put(bucket, key, data);
    this.uploads.push({ bucket, key, localPath: source });
  }

  async delete(bucket: string, key: string): Promise<void> {
    this.objects.delete(this.id(bucket, key));
  }
}
