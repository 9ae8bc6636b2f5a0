/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import * as fs from 'node:fs/promises';
import { join } from 'node:path';
import { Readable } from 'node:stream';
import { LocalObjectStore } from './LocalObjectStore.js';
import { ObjectNotFoundError } from '../../errors.js';
import { createTempDir, removeTempDir } from '../../test-helpers.js';

async function readAll(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

describe('LocalObjectStore', () => {
  let dir: string;
  let store: LocalObjectStore;

  beforeEach(() => {
    dir = createTempDir();
    store = new LocalObjectStore(join(dir, 'buckets'));
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('maps objects to <root>/<bucket>/<key>', () => {
    assert.strictEqual(store.objectPath('b', 'x/y.txt'), join(dir, 'buckets', 'b', 'x', 'y.txt'));
  });

  it('rejects keys that escape the bucket', () => {
    assert.throws(() => store.objectPath('b', '../other/x'), /escapes bucket 'b'/);
  });

  it('head returns null for a missing object', async () => {
    assert.strictEqual(await store.head('b', 'missing'), null);
  });

  it('writes a buffer and reads it back', async () => {
    await store.write('b', 'x/y.txt', Buffer.from('hello'));
    const info = await store.head('b', 'x/y.txt');
    assert.strictEqual(info?.size, 5);
    assert.strictEqual(await readAll(await store.read('b', 'x/y.txt')), 'hello');
  });

  it('writes a stream', async () => {
    await store.write('b', 'k', Readable.from([Buffer.from('ab'), Buffer.from('cd')]));
    assert.strictEqual(await fs.readFile(store.objectPath('b', 'k'), 'utf-8'), 'abcd');
  });

  it('leaves no staging files behind', async () => {
    await store.write('b', 'k', Buffer.from('x'));
    assert.deepStrictEqual(await fs.readdir(join(dir, 'buckets', 'b')), ['k']);
  });

  it('read of a missing object throws ObjectNotFoundError', async () => {
    await assert.rejects(store.read('b', 'missing'), ObjectNotFoundError);
  });

  it('uploads and downloads files', async () => {
    const source = join(dir, 'source.txt');
    await fs.writeFile(source, 'payload');
    await store.upload(source, 'b', 'up/source.txt');

    const destination = join(dir, 'down', 'copy.txt');
    await store.download('b', 'up/source.txt', destination);
    assert.strictEqual(await fs.readFile(destination, 'utf-8'), 'payload');
  });

  it('download of a missing object throws ObjectNotFoundError', async () => {
    await assert.rejects(store.download('b', 'missing', join(dir, 'x')), ObjectNotFoundError);
  });

  it('delete removes the object and ignores missing ones', async () => {
    await store.write('b', 'k', Buffer.from('x'));
    await store.delete('b', 'k');
    await store.delete('b', 'k');
    assert.strictEqual(await store.head('b', 'k'), null);
  });
});
