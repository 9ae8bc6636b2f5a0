/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Filesystem helpers shared by LocalObjectStore and LocalTarget.
 *
 * Writes are atomic using stage-and-rename:
 * 1. Write to a temporary .partial file in the destination directory
 * 2. Rename to the final destination (atomic on POSIX filesystems)
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { randomBytes } from 'crypto';
import { createReadStream, createWriteStream } from 'fs';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { isNotFoundError } from '../../errors.js';

/**
 * Path of a staging file next to `destination`.
 *
 * The random suffix keeps concurrent writers to the same destination apart.
 */
export function stagingPath(destination: string): string {
  const suffix = randomBytes(4).toString('hex');
  return `${destination}.${Date.now()}.${suffix}.partial`;
}

/**
 * Remove a file, ignoring a missing one.
 */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (err) {
    if (!isNotFoundError(err)) throw err;
  }
}

/**
 * Stat a file, returning null if it doesn't exist.
 *
 * Other errors (permissions, I/O) propagate.
 */
export async function statOrNull(filePath: string): Promise<{ size: number; mtime: Date } | null> {
  try {
    const stats = await fs.stat(filePath);
    return { size: stats.size, mtime: stats.mtime };
  } catch (err) {
    if (isNotFoundError(err)) return null;
    throw err;
  }
}

/**
 * Move a finished staging file into place, or remove it if the move fails.
 */
export async function commitStaged(staged: string, destination: string): Promise<void> {
  try {
    await fs.rename(staged, destination);
  } catch (err) {
    await removeFile(staged);
    throw err;
  }
}

/**
 * Atomically write a buffer or stream to `destination`.
 */
export async function writeFileAtomic(
  destination: string,
  body: Readable | Uint8Array
): Promise<void> {
  await fs.mkdir(path.dirname(destination), { recursive: true });
  const staged = stagingPath(destination);

  try {
    if (body instanceof Uint8Array) {
      await fs.writeFile(staged, body);
    } else {
      await pipeline(body, createWriteStream(staged));
    }
  } catch (err) {
    await removeFile(staged);
    throw err;
  }

  await commitStaged(staged, destination);
}

/**
 * Atomically copy `source` to `destination`.
 */
export async function copyFileAtomic(source: string, destination: string): Promise<void> {
  await writeFileAtomic(destination, createReadStream(source));
}
