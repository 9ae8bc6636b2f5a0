/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { renderCommand } from '@seqflow/core';
import { annotateProkka, assembleMetaSpades, checkm, integrateAssemblies } from './assembly.js';
import { importSraFastq } from './sra.js';
import { mapViruses } from './viral.js';

const placement = { engine: 'batch', queue: 'optimal' } as const;
const bindings = { inputs: {}, outputs: {}, scratch: '/sb/scratch' };

describe('assembleMetaSpades', () => {
  it('gives the assembler its memory in whole gigabytes', () => {
    const params = {
      sample: 'S1',
      outputFolder: 's3://b/out/metaspades',
      resources: { threads: 8, memoryMb: 32500 },
      placement,
    };
    const args = renderCommand('metaspades_S1', assembleMetaSpades.command(params), {
      ...bindings,
      inputs: { reads: '/sb/r.fq' },
      outputs: { fasta: '/sb/output/S1.fasta.gz' },
    });
    assert.strictEqual(args[args.indexOf('--max-mem') + 1], '32');
    assert.strictEqual(args[args.indexOf('--threads') + 1], '8');
    assert.deepStrictEqual(assembleMetaSpades.outputs(params), {
      fasta: 's3://b/out/metaspades/S1.fasta.gz',
    });
  });
});

describe('annotateProkka', () => {
  it('declares features and peptides', () => {
    const params = {
      sample: 'S1',
      outputFolder: 's3://b/out/prokka',
      resources: { threads: 8, memoryMb: 32000 },
      placement,
    };
    assert.deepStrictEqual(annotateProkka.outputs(params), {
      gff: 's3://b/out/prokka/S1.gff.gz',
      faa: 's3://b/out/prokka/S1.faa.gz',
    });
    assert.strictEqual(annotateProkka.container(params).jobNamePrefix, undefined);
  });
});

describe('checkm', () => {
  it('reads the called peptides', () => {
    const params = {
      sample: 'G1',
      outputFolder: '/data/checkm',
      resources: { threads: 8, memoryMb: 64000 },
      placement,
    };
    const args = renderCommand('checkm_G1', checkm.command(params), {
      ...bindings,
      inputs: { faa: '/sb/G1.faa.gz' },
      outputs: { report: '/sb/output/G1.checkm.tsv' },
    });
    assert.deepStrictEqual(args.slice(0, 3), ['run_checkm.py', '--input', '/sb/G1.faa.gz']);
    assert.deepStrictEqual(checkm.outputs(params), { report: '/data/checkm/G1.checkm.tsv' });
  });
});

describe('integrateAssemblies', () => {
  const params = {
    project: 'gut',
    outputFolder: 's3://b/out/integrated_assembly',
    resources: { threads: 8, memoryMb: 120000 },
    placement,
  };

  it('lists every annotation after its flag', () => {
    const args = renderCommand('integrate_assemblies-gut', integrateAssemblies.command(params), {
      ...bindings,
      inputs: { gff: ['/sb/a.gff.gz', '/sb/b.gff.gz'], faa: ['/sb/a.faa.gz', '/sb/b.faa.gz'] },
      outputs: { dmnd: '/sb/output/gut.dmnd', catalog: '/sb/output/gut.csv.gz' },
    });
    assert.deepStrictEqual(args.slice(0, 7), [
      'integrate_assemblies.py',
      '--gff',
      '/sb/a.gff.gz',
      '/sb/b.gff.gz',
      '--faa',
      '/sb/a.faa.gz',
      '/sb/b.faa.gz',
    ]);
  });

  it('names the job after the project', () => {
    const settings = integrateAssemblies.container(params);
    assert.strictEqual(settings.jobNamePrefix, 'integrate_assemblies_gut');
    assert.strictEqual(settings.queue, 'optimal');
    assert.strictEqual(settings.engine, 'batch');
  });
});

describe('importSraFastq', () => {
  it('downloads into the reads folder under the accession', () => {
    const params = {
      sample: 'S1',
      accession: 'SRR0000001',
      baseFolder: 's3://b/out/',
      resources: { threads: 1, memoryMb: 4096 },
      placement,
    };
    assert.deepStrictEqual(importSraFastq.outputs(params), {
      file: 's3://b/out/reads/SRR0000001.fastq.gz',
    });
    const args = renderCommand('download_from_sra_S1', importSraFastq.command(params), {
      ...bindings,
      outputs: { file: '/sb/output/SRR0000001.fastq.gz' },
    });
    assert.deepStrictEqual(args, [
      'get_sra.py',
      '--accession',
      'SRR0000001',
      '--output-path',
      '/sb/output/SRR0000001.fastq.gz',
      '--temp-folder',
      '/sb/scratch',
    ]);
  });
});

describe('mapViruses', () => {
  it('keeps alignments beside the summary', () => {
    const params = {
      sample: 'S1',
      outputFolder: 's3://b/out/',
      resources: { threads: 4, memoryMb: 10000 },
      placement,
    };
    assert.deepStrictEqual(mapViruses.outputs(params), {
      json: 's3://b/out/S1.json.gz',
      sam: 's3://b/out/S1.sam.gz',
    });
    const args = renderCommand('map_viruses_S1', mapViruses.command(params), {
      ...bindings,
      inputs: { reads: '/sb/r.fq', refDb: '/sb/db.dmnd', refMetadata: '/sb/meta.csv' },
      outputs: { json: '/sb/output/S1.json.gz', sam: '/sb/output/S1.sam.gz' },
    });
    assert.strictEqual(args[args.length - 1], '--keep-alignments');
    assert.strictEqual(args[args.indexOf('--metadata') + 1], '/sb/meta.csv');
  });
});
