/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Tests for the container sandbox protocol, using MockContainerEngine
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import * as fs from 'node:fs/promises';
import { existsSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { ContainerAttempt, ContainerExecutor, allocateOutputs } from './ContainerExecutor.js';
import { MockContainerEngine } from './MockContainerEngine.js';
import type { ContainerJob, ContainerTaskState } from './interfaces.js';
import {
  CommandFailedError,
  MaterializationError,
  OutputEmptyError,
  OutputMissingError,
  UnresolvedPlaceholderError,
} from '../errors.js';
import { inputPath, inputPaths, literal, outputPath } from '../tasks/command.js';
import type { InMemoryObjectStore } from '../storage/in-memory/InMemoryObjectStore.js';
import { createTempDir, createTestResolver, removeTempDir } from '../test-helpers.js';

function makeJob(overrides: Partial<ContainerJob> = {}): ContainerJob {
  return {
    name: 'tool_S1',
    task: 'tool_S1',
    image: 'example.org/tool:1.0',
    command: [literal('tool'), inputPath('reads'), outputPath('result')],
    inputs: { reads: 's3://b/in/S1.fq' },
    outputs: { result: 's3://b/out/S1.result.txt' },
    vcpus: 2,
    memoryMb: 2048,
    mounts: [],
    ...overrides,
  };
}

describe('ContainerExecutor', () => {
  let dir: string;
  let scratch: string;
  let store: InMemoryObjectStore;
  let engine: MockContainerEngine;
  let executor: ContainerExecutor;

  beforeEach(() => {
    dir = createTempDir();
    scratch = join(dir, 'scratch');
    const test = createTestResolver(dir);
    store = test.store;
    engine = new MockContainerEngine();
    executor = new ContainerExecutor({ resolver: test.resolver, engine, scratchRoot: scratch });
    store.put('b', 'in/S1.fq', '@read1\nACGT\n');
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('materializes inputs, runs the command and publishes outputs', async () => {
    let seenInput = '';
    engine.setDefaultHandler(async (run) => {
      seenInput = await fs.readFile(run.args[1], 'utf-8');
      await fs.writeFile(run.args[2], 'result for S1');
      return { exitCode: 0, output: 'done\n' };
    });
    const states: ContainerTaskState[] = [];

    const result = await executor.execute(makeJob(), {
      onStateChange: (state) => states.push(state),
    });

    assert.strictEqual(result.state, 'COMPLETE');
    assert.strictEqual(result.exitCode, 0);
    assert.strictEqual(result.output, 'done\n');
    assert.strictEqual(result.materialized, 1);
    assert.strictEqual(seenInput, '@read1\nACGT\n');
    assert.strictEqual(store.getText('b', 'out/S1.result.txt'), 'result for S1');
    assert.deepStrictEqual(states, ['RESOLVING_INPUTS', 'RUNNING', 'PUBLISHING', 'COMPLETE']);
  });

  it('renders paths inside a sandbox named after the job', async () => {
    engine.setDefaultHandler(async (run) => {
      await fs.writeFile(run.args[2], 'x');
      return { exitCode: 0, output: '' };
    });

    const result = await executor.execute(makeJob());
    const [call] = engine.getCalls();
    const sandbox = result.sandbox;

    assert.match(sandbox, /tool_S1-[0-9a-f]{8}$/);
    assert.strictEqual(join(sandbox, '..'), scratch);
    assert.deepStrictEqual(call.run.args, [
      'tool',
      join(sandbox, 'input', 'reads', '0', 'S1.fq'),
      join(sandbox, 'output', 'S1.result.txt'),
    ]);
    assert.strictEqual(call.run.workdir, sandbox);
    assert.deepStrictEqual(call.run.mounts, [
      { hostPath: sandbox, containerPath: sandbox, mode: 'rw' },
    ]);
    assert.strictEqual(call.run.vcpus, 2);
    assert.strictEqual(call.run.memoryMb, 2048);
  });

  it('removes the sandbox after success and after failure', async () => {
    engine.setDefaultHandler(async (run) => {
      await fs.writeFile(run.args[2], 'x');
      return { exitCode: 0, output: '' };
    });
    const ok = await executor.execute(makeJob());
    assert.strictEqual(existsSync(ok.sandbox), false);

    engine.setDefaultHandler(() => ({ exitCode: 1, output: '' }));
    const failed = await executor.execute(makeJob());
    assert.strictEqual(existsSync(failed.sandbox), false);
  });

  it('gives inputs with the same basename distinct paths and downloads each once', async () => {
    store.put('b', 'run1/reads.fq', 'one');
    store.put('b', 'run2/reads.fq', 'two');
    const contents: string[] = [];
    engine.setDefaultHandler(async (run) => {
      contents.push(await fs.readFile(run.args[1], 'utf-8'));
      contents.push(await fs.readFile(run.args[2], 'utf-8'));
      await fs.writeFile(run.args[3], 'merged');
      return { exitCode: 0, output: '' };
    });

    const result = await executor.execute(
      makeJob({
        command: [literal('merge'), inputPaths('reads'), outputPath('result')],
        inputs: { reads: ['s3://b/run1/reads.fq', 's3://b/run2/reads.fq'] },
      })
    );

    assert.strictEqual(result.state, 'COMPLETE');
    assert.deepStrictEqual(contents, ['one', 'two']);
    assert.strictEqual(result.materialized, 2);
    assert.deepStrictEqual(
      store.downloads.map((d) => d.key),
      ['run1/reads.fq', 'run2/reads.fq']
    );
    const [call] = engine.getCalls();
    assert.strictEqual(call.run.args[1], join(result.sandbox, 'input', 'reads', '0', 'reads.fq'));
    assert.strictEqual(call.run.args[2], join(result.sandbox, 'input', 'reads', '1', 'reads.fq'));
  });

  it('uses local inputs in place, mounted read-only', async () => {
    const local = join(dir, 'data', 'S1.fq');
    await fs.mkdir(join(dir, 'data'));
    writeFileSync(local, 'local reads');
    engine.setDefaultHandler(async (run) => {
      await fs.writeFile(run.args[2], 'x');
      return { exitCode: 0, output: '' };
    });

    const result = await executor.execute(makeJob({ inputs: { reads: local } }));
    const [call] = engine.getCalls();

    assert.strictEqual(result.materialized, 0);
    assert.strictEqual(call.run.args[1], local);
    assert.deepStrictEqual(call.run.mounts[1], { hostPath: local, containerPath: local, mode: 'ro' });
  });

  it('fails with MaterializationError for a missing input', async () => {
    const result = await executor.execute(makeJob({ inputs: { reads: 's3://b/in/missing.fq' } }));
    assert.strictEqual(result.state, 'FAILED');
    assert.ok(result.error instanceof MaterializationError);
    assert.strictEqual(engine.getCalls().length, 0);
  });

  it('fails a non-zero exit with the exit code and output, publishing nothing', async () => {
    engine.setDefaultHandler(async (run) => {
      await fs.writeFile(run.args[2], 'half written');
      return { exitCode: 3, output: 'segfault\n' };
    });
    const states: ContainerTaskState[] = [];

    const result = await executor.execute(makeJob(), {
      onStateChange: (state) => states.push(state),
    });

    assert.strictEqual(result.state, 'FAILED');
    assert.strictEqual(result.exitCode, 3);
    assert.strictEqual(result.output, 'segfault\n');
    assert.ok(result.error instanceof CommandFailedError);
    assert.strictEqual(result.error.output, 'segfault\n');
    assert.strictEqual(store.getText('b', 'out/S1.result.txt'), null);
    assert.deepStrictEqual(states, ['RESOLVING_INPUTS', 'RUNNING', 'FAILED']);
  });

  it('includes the engine error in the captured output of a killed container', async () => {
    engine.setDefaultHandler(() => ({ exitCode: null, output: 'partial\n', error: 'Aborted' }));
    const result = await executor.execute(makeJob());
    assert.ok(result.error instanceof CommandFailedError);
    assert.strictEqual(result.error.output, 'partial\nAborted\n');
    assert.strictEqual(result.exitCode, null);
  });

  it('fails when a declared output was not produced', async () => {
    const result = await executor.execute(makeJob());
    assert.strictEqual(result.state, 'FAILED');
    assert.ok(result.error instanceof OutputMissingError);
    assert.strictEqual(result.error.slot, 'result');
  });

  it('fails when a declared output is empty', async () => {
    engine.setDefaultHandler(async (run) => {
      await fs.writeFile(run.args[2], '');
      return { exitCode: 0, output: '' };
    });
    const result = await executor.execute(makeJob());
    assert.ok(result.error instanceof OutputEmptyError);
    assert.deepStrictEqual(store.keys(), ['b/in/S1.fq']);
  });

  it('withdraws published outputs when a later publication fails', async () => {
    // a regular file where the second output's directory should be
    writeFileSync(join(dir, 'blocker'), 'not a directory');
    engine.setDefaultHandler(async (run) => {
      await fs.writeFile(run.args[2], 'first');
      await fs.writeFile(run.args[3], 'second');
      return { exitCode: 0, output: '' };
    });

    const result = await executor.execute(
      makeJob({
        command: [literal('tool'), inputPath('reads'), outputPath('first'), outputPath('second')],
        outputs: { first: 's3://b/out/first.txt', second: join(dir, 'blocker', 'second.txt') },
      })
    );

    assert.strictEqual(result.state, 'FAILED');
    assert.match(result.error?.message ?? '', /Failed to publish output 'second'/);
    assert.strictEqual(store.getText('b', 'out/first.txt'), null);
  });

  it('runs concurrent attempts of the same job in separate sandboxes', async () => {
    engine.setDefaultHandler(async (run) => {
      await new Promise((resolve) => setTimeout(resolve, 10));
      await fs.writeFile(run.args[2], run.workdir);
      return { exitCode: 0, output: '' };
    });

    const [a, b] = await Promise.all([executor.execute(makeJob()), executor.execute(makeJob())]);

    assert.strictEqual(a.state, 'COMPLETE');
    assert.strictEqual(b.state, 'COMPLETE');
    assert.notStrictEqual(a.sandbox, b.sandbox);
  });

  it('rethrows configuration errors from rendering', async () => {
    await assert.rejects(
      executor.execute(makeJob({ command: [literal('tool'), outputPath('undeclared')] })),
      UnresolvedPlaceholderError
    );
  });
});

describe('ContainerAttempt', () => {
  it('rejects transitions outside the state machine', () => {
    const attempt = new ContainerAttempt();
    attempt.transition('RESOLVING_INPUTS');
    assert.throws(() => attempt.transition('COMPLETE'), /RESOLVING_INPUTS -> COMPLETE/);
  });

  it('cannot leave FAILED', () => {
    const attempt = new ContainerAttempt();
    attempt.transition('FAILED');
    assert.throws(() => attempt.transition('RESOLVING_INPUTS'), /FAILED -> RESOLVING_INPUTS/);
  });
});

describe('allocateOutputs', () => {
  it('places outputs under output/<basename>', () => {
    assert.deepStrictEqual(
      allocateOutputs({ gff: 's3://b/S1.gff.gz', faa: 's3://b/S1.faa.gz' }, '/sb'),
      { gff: '/sb/output/S1.gff.gz', faa: '/sb/output/S1.faa.gz' }
    );
  });

  it('separates outputs that share a basename by slot', () => {
    assert.deepStrictEqual(
      allocateOutputs({ a: 's3://b/x/out.txt', b: 's3://b/y/out.txt', c: 's3://b/c.txt' }, '/sb'),
      { a: '/sb/output/a/out.txt', b: '/sb/output/b/out.txt', c: '/sb/output/c.txt' }
    );
  });
});
