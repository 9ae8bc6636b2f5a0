/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Tests for the map-viruses command, run end to end with a mock container engine
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import * as fs from 'node:fs/promises';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  DatasetColumnMissingError,
  InvalidOptionError,
  MockContainerEngine,
} from '@seqflow/core';
import { MAP_VIRUSES_IMAGE } from '@seqflow/pipelines';
import { commonOptions, createTestDir, removeTestDir, writeTestFile } from '../cli-test-helpers.js';
import { runMapViruses, type MapVirusesOptions } from './mapViruses.js';
import type { CommandIO } from './run.js';

describe('map-viruses command', () => {
  let testDir: string;
  let engine: MockContainerEngine;
  let lines: string[];
  let options: MapVirusesOptions;

  function io(overrides: Partial<CommandIO> = {}): CommandIO {
    return { log: (line) => lines.push(line), engine, ...overrides };
  }

  beforeEach(() => {
    testDir = createTestDir();
    lines = [];
    engine = new MockContainerEngine();
    engine.setHandler(MAP_VIRUSES_IMAGE, async (run) => {
      const json = run.args[run.args.indexOf('--output-path') + 1];
      await fs.writeFile(json, 'summary');
      await fs.writeFile(json.replace(/\.json\.gz$/, '.sam.gz'), 'alignments');
      return { exitCode: 0, output: '' };
    });

    writeTestFile(testDir, 'store/b/in/S1.fq', '@r1\nACGT\n');
    writeTestFile(testDir, 'store/b/in/S2.fq', '@r2\nTTGA\n');
    writeTestFile(testDir, 'store/ref/viral.dmnd', 'db');
    writeTestFile(testDir, 'store/ref/viral.csv', 'protein,virus\n');
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
      refDb: 's3://ref/viral.dmnd',
      refMetadata: 's3://ref/viral.csv',
    };
  });

  afterEach(() => {
    removeTestDir(testDir);
  });

  it('runs every sample and writes the manifest', async () => {
    const code = await runMapViruses(options, io());

    assert.strictEqual(code, 0);
    assert.ok(lines.includes('  [START] map_viruses_S1'));
    assert.ok(lines.includes('  [DONE] map_viruses_S1'));
    assert.ok(lines.includes('  [SKIP] load_ref_db_dmnd (already complete)'));
    assert.ok(lines.includes('  [DONE] manifest_map_viruses'));
    assert.ok(lines.includes('  Executed:    3'));
    assert.ok(lines.includes('  Skipped:     4'));
    assert.strictEqual(
      readFileSync(join(testDir, 'store/b/out/map_viruses.manifest.tsv'), 'utf-8'),
      'sample\turi\nS1\ts3://b/out/S1.json.gz\nS2\ts3://b/out/S2.json.gz\n'
    );
    assert.strictEqual(readFileSync(join(testDir, 'store/b/out/S2.sam.gz'), 'utf-8'), 'alignments');
  });

  it('skips everything on a second run', async () => {
    await runMapViruses(options, io());
    engine.clearCalls();
    lines = [];

    const code = await runMapViruses(options, io());

    assert.strictEqual(code, 0);
    assert.strictEqual(engine.getCalls().length, 0);
    assert.ok(lines.includes('  [SKIP] map_viruses_S1 (already complete)'));
    assert.ok(lines.includes('  Executed:    0'));
  });

  it('reports completion without running on a dry run', async () => {
    const code = await runMapViruses({ ...options, dryRun: true }, io());

    assert.strictEqual(code, 0);
    assert.strictEqual(engine.getCalls().length, 0);
    assert.strictEqual(lines[0], 'Dry run of map-viruses: 7 tasks');
    assert.ok(lines.includes('  load_from_s3_S1: complete'));
    assert.ok(lines.includes('  map_viruses_S1: pending'));
    assert.ok(lines.includes('  manifest_map_viruses: pending'));
    assert.strictEqual(existsSync(join(testDir, 'store/b/out')), false);
  });

  it('exits 1 and lists the failure with its output', async () => {
    engine.setHandler(MAP_VIRUSES_IMAGE, async (run) => {
      const json = run.args[run.args.indexOf('--output-path') + 1];
      if (json.endsWith('S2.json.gz')) {
        return { exitCode: 2, output: 'reading reads\nbad input\n' };
      }
      await fs.writeFile(json, 'summary');
      await fs.writeFile(json.replace(/\.json\.gz$/, '.sam.gz'), 'alignments');
      return { exitCode: 0, output: '' };
    });

    const code = await runMapViruses(options, io());

    assert.strictEqual(code, 1);
    assert.ok(lines.includes('  [DONE] map_viruses_S1'));
    assert.ok(lines.includes('  [FAIL] map_viruses_S2'));
    assert.ok(lines.includes('  [UNREACHABLE] manifest_map_viruses (after map_viruses_S2)'));
    const failed = lines.slice(lines.indexOf('Failed tasks:') + 1);
    assert.deepStrictEqual(failed, [
      "  map_viruses_S2: Command of task 'map_viruses_S2' exited with code 2 (exit code 2)",
      '    | reading reads',
      '    | bad input',
    ]);
  });

  it('exits 130 when interrupted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('Interrupted'));

    const code = await runMapViruses(options, io({ signal: controller.signal }));

    assert.strictEqual(code, 130);
    assert.strictEqual(engine.getCalls().length, 0);
    assert.strictEqual(lines[lines.length - 1], 'Interrupted with 7 tasks unfinished');
  });

  it('has nothing to run for an empty dataset', async () => {
    const metadata = writeTestFile(testDir, 'empty.csv', 'sample,fastq\n');

    const code = await runMapViruses({ ...options, metadata }, io());

    assert.strictEqual(code, 0);
    assert.deepStrictEqual(lines, ['Warning: Dataset has no rows; nothing to run', 'Nothing to run']);
  });

  it('rejects invalid options before running', async () => {
    await assert.rejects(runMapViruses({ ...options, workers: '0' }, io()), InvalidOptionError);
    await assert.rejects(runMapViruses({ ...options, inputLocation: 'GCS' }, io()), InvalidOptionError);
    assert.strictEqual(engine.getCalls().length, 0);
  });

  it('rejects a dataset without the input column', async () => {
    await assert.rejects(
      runMapViruses({ ...options, inputColumn: 'reads' }, io()),
      DatasetColumnMissingError
    );
  });
});
