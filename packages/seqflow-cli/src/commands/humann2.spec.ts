/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import * as fs from 'node:fs/promises';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { DuplicateDatasetValueError, MockContainerEngine } from '@seqflow/core';
import { FASTQP_IMAGE, HUMANN2_IMAGE } from '@seqflow/pipelines';
import { commonOptions, createTestDir, removeTestDir, writeTestFile } from '../cli-test-helpers.js';
import { runHumann2, type Humann2Options } from './humann2.js';
import type { CommandIO } from './run.js';

describe('humann2 command', () => {
  let testDir: string;
  let engine: MockContainerEngine;
  let lines: string[];
  let options: Humann2Options;

  function io(): CommandIO {
    return { log: (line) => lines.push(line), engine };
  }

  beforeEach(() => {
    testDir = createTestDir();
    lines = [];
    engine = new MockContainerEngine();
    for (const image of [FASTQP_IMAGE, HUMANN2_IMAGE]) {
      engine.setHandler(image, async (run) => {
        await fs.writeFile(run.args[run.args.indexOf('--output-path') + 1], run.image);
        return { exitCode: 0, output: '' };
      });
    }

    writeTestFile(testDir, 'store/b/in/S1.fq', '@r1\nACGT\n');
    writeTestFile(testDir, 'store/b/in/S2.fq', '@r2\nTTGA\n');
    const metadata = writeTestFile(
      testDir,
      'samples.csv',
      'sample,fastq\nS1,s3://b/in/S1.fq\nS2,s3://b/in/S2.fq\n'
    );

    options = {
      ...commonOptions(testDir),
      metadata,
      sampleColumn: 'sample',
      inputColumn: 'fastq',
      inputLocation: 'S3',
      separator: ',',
      refDb: join(testDir, 'refdbs'),
    };
  });

  afterEach(() => {
    removeTestDir(testDir);
  });

  it('writes a quality summary and a profile per sample', async () => {
    const code = await runHumann2(options, io());

    assert.strictEqual(code, 0);
    assert.ok(lines.includes('  [DONE] humann2_S1'));
    assert.ok(lines.includes('  [DONE] fastqp_S2'));
    assert.ok(lines.includes('  Executed:    4'));
    assert.ok(lines.includes('  Skipped:     2'));
    assert.strictEqual(readFileSync(join(testDir, 'store/b/out/humann2/S2.json.gz'), 'utf-8'), HUMANN2_IMAGE);
    assert.strictEqual(readFileSync(join(testDir, 'store/b/out/fastqp/S1.fastqp.tsv'), 'utf-8'), FASTQP_IMAGE);
  });

  it('mounts the databases read-only into each HUMAnN2 container', async () => {
    await runHumann2(options, io());

    const profiles = engine.getCalls().filter((call) => call.run.image === HUMANN2_IMAGE);
    assert.strictEqual(profiles.length, 2);
    for (const call of profiles) {
      assert.deepStrictEqual(call.run.mounts.slice(-1), [
        { hostPath: join(testDir, 'refdbs'), containerPath: '/refdbs', mode: 'ro' },
      ]);
      assert.strictEqual(call.run.args[call.run.args.indexOf('--ref-db') + 1], '/refdbs');
    }
  });

  it('rejects a sample listed twice', async () => {
    const metadata = writeTestFile(
      testDir,
      'twice.csv',
      'sample,fastq\nS1,s3://b/in/S1.fq\nS1,s3://b/in/S2.fq\n'
    );
    await assert.rejects(runHumann2({ ...options, metadata }, io()), DuplicateDatasetValueError);
    assert.strictEqual(engine.getCalls().length, 0);
  });
});
