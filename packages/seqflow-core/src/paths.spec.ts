/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  joinUri,
  normalizeFolder,
  parseUri,
  sanitizeJobName,
  uriBasename,
} from './paths.js';

describe('paths', () => {
  describe('parseUri', () => {
    it('parses remote URIs into scheme, bucket and key', () => {
      assert.deepStrictEqual(parseUri('s3://bucket/reads/S1.fastq.gz'), {
        type: 'remote',
        scheme: 's3',
        bucket: 'bucket',
        key: 'reads/S1.fastq.gz',
      });
    });

    it('lower-cases the scheme', () => {
      assert.deepStrictEqual(parseUri('S3://b/k'), {
        type: 'remote',
        scheme: 's3',
        bucket: 'b',
        key: 'k',
      });
    });

    it('treats plain paths and file:// URIs as local', () => {
      assert.deepStrictEqual(parseUri('/data/x.txt'), { type: 'local', path: '/data/x.txt' });
      assert.deepStrictEqual(parseUri('file:///data/x.txt'), { type: 'local', path: '/data/x.txt' });
      assert.deepStrictEqual(parseUri('rel/x.txt'), { type: 'local', path: 'rel/x.txt' });
    });

    it('accepts a bucket without key', () => {
      assert.deepStrictEqual(parseUri('s3://bucket'), {
        type: 'remote',
        scheme: 's3',
        bucket: 'bucket',
        key: '',
      });
    });
  });

  describe('joinUri', () => {
    it('joins with exactly one slash', () => {
      assert.strictEqual(joinUri('s3://b/out/', 'fastqp', 'S1.tsv'), 's3://b/out/fastqp/S1.tsv');
      assert.strictEqual(joinUri('s3://b/out', 'fastqp/S1.tsv'), 's3://b/out/fastqp/S1.tsv');
      assert.strictEqual(joinUri('s3://b', 'S1.tsv'), 's3://b/S1.tsv');
    });

    it('joins local paths', () => {
      assert.strictEqual(joinUri('/data/out/', 'S1.tsv'), '/data/out/S1.tsv');
    });
  });

  describe('normalizeFolder', () => {
    it('ends with exactly one slash', () => {
      assert.strictEqual(normalizeFolder('s3://b/out'), 's3://b/out/');
      assert.strictEqual(normalizeFolder('s3://b/out//'), 's3://b/out/');
      assert.strictEqual(normalizeFolder('  /data/out '), '/data/out/');
    });

    it('leaves an empty folder empty', () => {
      assert.strictEqual(normalizeFolder('   '), '');
    });
  });

  it('uriBasename', () => {
    assert.strictEqual(uriBasename('s3://b/x/y.gz'), 'y.gz');
    assert.strictEqual(uriBasename('/data/S1.fastq'), 'S1.fastq');
    assert.strictEqual(uriBasename('s3://bucket'), 'bucket');
  });

  it('sanitizeJobName replaces disallowed characters', () => {
    assert.strictEqual(sanitizeJobName('fastqp S1.v2'), 'fastqp_S1_v2');
    assert.strictEqual(sanitizeJobName('map-viruses_S1'), 'map-viruses_S1');
  });
});
