/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import {
  GraphBuilder,
  InMemoryObjectStore,
  Scheduler,
  TargetResolver,
  renderCommand,
} from '@seqflow/core';
import { famli, fastqp, loadFile, writeManifest } from './general.js';

const placement = { engine: 'docker' } as const;

describe('loadFile', () => {
  it('has its URI as its only output', () => {
    assert.deepStrictEqual(loadFile.outputs({ uri: 's3://ref/viral.dmnd' }), {
      file: 's3://ref/viral.dmnd',
    });
  });
});

describe('fastqp', () => {
  const params = {
    sample: 'S1',
    outputFolder: 's3://b/out/fastqp',
    resources: { threads: 1, memoryMb: 32000 },
    placement,
  };

  it('writes the summary under the output folder', () => {
    assert.deepStrictEqual(fastqp.outputs(params), { summary: 's3://b/out/fastqp/S1.fastqp.tsv' });
  });

  it('renders its command against sandbox paths', () => {
    const args = renderCommand('fastqp_S1', fastqp.command(params), {
      inputs: { reads: '/sb/input/reads/0/S1.fq' },
      outputs: { summary: '/sb/output/S1.fastqp.tsv' },
      scratch: '/sb/scratch',
    });
    assert.deepStrictEqual(args, [
      'run_fastqp.py',
      '--input',
      '/sb/input/reads/0/S1.fq',
      '--output-path',
      '/sb/output/S1.fastqp.tsv',
      '--temp-folder',
      '/sb/scratch',
    ]);
  });

  it('names its job after the sample', () => {
    const settings = fastqp.container(params);
    assert.strictEqual(settings.jobNamePrefix, 'fastqp_S1');
    assert.strictEqual(settings.vcpus, 1);
    assert.strictEqual(settings.memoryMb, 32000);
  });
});

describe('famli', () => {
  it('passes the thread count to the aligner', () => {
    const params = {
      sample: 'S2',
      outputFolder: 's3://b/out/famli/',
      resources: { threads: 8, memoryMb: 32000 },
      placement,
    };
    const args = renderCommand('famli_S2', famli.command(params), {
      inputs: { reads: '/sb/r.fq', refDb: '/sb/db.dmnd' },
      outputs: { json: '/sb/output/S2.json.gz' },
      scratch: '/sb/scratch',
    });
    assert.deepStrictEqual(args.slice(0, 2), ['famli', 'align']);
    assert.strictEqual(args[args.indexOf('--threads') + 1], '8');
    assert.strictEqual(args[args.indexOf('--ref-db') + 1], '/sb/db.dmnd');
    assert.deepStrictEqual(famli.outputs(params), { json: 's3://b/out/famli/S2.json.gz' });
  });
});

describe('writeManifest', () => {
  let store: InMemoryObjectStore;
  let builder: GraphBuilder;

  beforeEach(() => {
    store = new InMemoryObjectStore();
    builder = new GraphBuilder(new TargetResolver({ stores: { s3: store } }));
    store.put('b', 'out/S1.json.gz', 'one');
    store.put('b', 'out/S2.json.gz', 'two');
  });

  function addManifest(samples: string[]) {
    const s1 = builder.add(loadFile, 'load_S1', { uri: 's3://b/out/S1.json.gz' });
    const s2 = builder.add(loadFile, 'load_S2', { uri: 's3://b/out/S2.json.gz' });
    const manifest = builder.add(writeManifest, 'manifest', {
      samples,
      outputFolder: 's3://b/out/',
      name: 'run',
    });
    builder.bind(manifest, 'outputs', [s1.out('file'), s2.out('file')]);
  }

  it('lists each sample with its output URI', async () => {
    addManifest(['S1', 'S2']);
    const result = await new Scheduler().run(builder.build());

    assert.strictEqual(result.success, true);
    assert.strictEqual(
      store.getText('b', 'out/run.manifest.tsv'),
      'sample\turi\nS1\ts3://b/out/S1.json.gz\nS2\ts3://b/out/S2.json.gz\n'
    );
  });

  it('fails when samples and outputs disagree', async () => {
    addManifest(['S1']);
    const result = await new Scheduler().run(builder.build());

    assert.strictEqual(result.success, false);
    assert.deepStrictEqual(result.failed, ['manifest']);
    const report = result.tasks.find((t) => t.name === 'manifest');
    assert.strictEqual(report?.error, "Manifest 'manifest' has 1 samples but 2 outputs");
    assert.strictEqual(store.getText('b', 'out/run.manifest.tsv'), null);
  });
});
