/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { buildContainerJob } from '@seqflow/core';
import { createTestBuilder, datasetRows } from '../test-helpers.js';
import {
  FIND_VIRAL_CONTIGS_DEFAULTS,
  findViralContigsWorkflow,
  type FindViralContigsSettings,
} from './findViralContigs.js';

const settings: FindViralContigsSettings = {
  ...FIND_VIRAL_CONTIGS_DEFAULTS,
  outputFolder: 's3://b/out/',
  placement: { engine: 'docker' },
};

describe('findViralContigsWorkflow', () => {
  it('scores the contigs of each sample', () => {
    const { builder } = createTestBuilder();
    const rows = datasetRows(['S1', 's3://b/asm/S1.fasta.gz'], ['S 2', 's3://b/asm/S2.fasta.gz']);

    const targets = findViralContigsWorkflow(builder, rows, settings);
    const graph = builder.build();

    assert.deepStrictEqual(targets, ['virfinder_S1', 'virfinder_S 2']);
    assert.strictEqual(graph.size, 4);

    const job = buildContainerJob(graph, 'virfinder_S 2');
    assert.strictEqual(job.name, 'virfinder_S_2');
    assert.deepStrictEqual(job.inputs, { contigs: 's3://b/asm/S2.fasta.gz' });
    assert.deepStrictEqual(job.outputs, { scores: 's3://b/out/virfinder/S 2.tsv' });
    assert.strictEqual(job.memoryMb, 8000);
  });
});
