/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { renderCommand } from '@seqflow/core';
import type { Placement } from '../settings.js';
import { HUMANN2_REF_DB_MOUNT, humann2 } from './biobakery.js';

describe('humann2', () => {
  const placement: Placement = {
    engine: 'docker',
    mounts: [{ hostPath: '/data/shared', containerPath: '/shared', mode: 'ro' }],
  };
  const params = {
    sample: 'S1',
    outputFolder: 's3://b/out/humann2',
    refDb: '/data/refdbs/humann2',
    resources: { threads: 8, memoryMb: 32000 },
    placement,
  };

  it('writes one profile per sample', () => {
    assert.deepStrictEqual(humann2.outputs(params), { json: 's3://b/out/humann2/S1.json.gz' });
  });

  it('points the tool at the mounted reference databases', () => {
    const args = renderCommand('humann2_S1', humann2.command(params), {
      inputs: { reads: '/sb/input/reads/0/S1.fq' },
      outputs: { json: '/sb/output/S1.json.gz' },
      scratch: '/sb/scratch',
    });
    assert.deepStrictEqual(args, [
      'run.py',
      '--input',
      '/sb/input/reads/0/S1.fq',
      '--sample-name',
      'S1',
      '--output-path',
      '/sb/output/S1.json.gz',
      '--ref-db',
      '/refdbs',
      '--threads',
      '8',
      '--temp-folder',
      '/sb/scratch',
    ]);
  });

  it('mounts the databases read-only after the shared mounts', () => {
    const settings = humann2.container(params);
    assert.deepStrictEqual(settings.mounts, [
      { hostPath: '/data/shared', containerPath: '/shared', mode: 'ro' },
      { hostPath: '/data/refdbs/humann2', containerPath: HUMANN2_REF_DB_MOUNT, mode: 'ro' },
    ]);
    assert.strictEqual(settings.jobNamePrefix, 'humann2_S1');
    assert.strictEqual(settings.vcpus, 8);
  });
});
