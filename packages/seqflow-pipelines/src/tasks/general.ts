/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * General purpose tasks: existing files, read quality, FAMLI alignment and
 * output manifests.
 */

import {
  aggregateTask,
  containerTask,
  externalTask,
  inputPath,
  joinUri,
  literal,
  outputPath,
  scratchPath,
  writeTargetText,
} from '@seqflow/core';
import { containerSettings, type Placement, type Resources } from '../settings.js';

export const FASTQP_IMAGE = 'quay.io/fhcrc-microbiome/fastqp:v0.3';
export const FAMLI_IMAGE = 'quay.io/fhcrc-microbiome/famli:v1.1';

/**
 * A file that must already exist, e.g. reads in a bucket or a reference
 * database.
 */
export const loadFile = externalTask({
  family: 'loadFile',
  outputs: (p: { uri: string }) => ({ file: p.uri }),
});

export interface FastqpParams {
  sample: string;
  outputFolder: string;
  resources: Resources;
  placement: Placement;
}

/** Read quality summary, `<outputFolder>/<sample>.fastqp.tsv` */
export const fastqp = containerTask({
  family: 'fastqp',
  inputs: { reads: 'one' },
  outputs: (p: FastqpParams) => ({
    summary: joinUri(p.outputFolder, `${p.sample}.fastqp.tsv`),
  }),
  image: () => FASTQP_IMAGE,
  command: () => [
    literal('run_fastqp.py'),
    literal('--input'),
    inputPath('reads'),
    literal('--output-path'),
    outputPath('summary'),
    literal('--temp-folder'),
    scratchPath(),
  ],
  container: (p) => containerSettings(p.resources, p.placement, `fastqp_${p.sample}`),
});

export interface FamliParams {
  sample: string;
  outputFolder: string;
  resources: Resources;
  placement: Placement;
}

/** FAMLI alignment of reads against a protein database */
export const famli = containerTask({
  family: 'famli',
  inputs: { reads: 'one', refDb: 'one' },
  outputs: (p: FamliParams) => ({
    json: joinUri(p.outputFolder, `${p.sample}.json.gz`),
  }),
  image: () => FAMLI_IMAGE,
  command: (p) => [
    literal('famli'),
    literal('align'),
    literal('--input'),
    inputPath('reads'),
    literal('--sample-name'),
    literal(p.sample),
    literal('--ref-db'),
    inputPath('refDb'),
    literal('--output-path'),
    outputPath('json'),
    literal('--threads'),
    literal(p.resources.threads),
    literal('--temp-folder'),
    scratchPath(),
  ],
  container: (p) => containerSettings(p.resources, p.placement, `famli_${p.sample}`),
});

export interface ManifestParams {
  /** Sample of each input, in binding order */
  samples: string[];
  outputFolder: string;
  /** File name stem */
  name: string;
}

/**
 * Tab-separated table of sample and output URI, one row per collected output.
 */
export const writeManifest = aggregateTask({
  family: 'writeManifest',
  inputs: { outputs: 'many' },
  outputs: (p: ManifestParams) => ({
    manifest: joinUri(p.outputFolder, `${p.name}.manifest.tsv`),
  }),
  async run(ctx) {
    const { samples } = ctx.params;
    const outputs = ctx.inputs.outputs;
    if (outputs.length !== samples.length) {
      throw new Error(
        `Manifest '${ctx.name}' has ${samples.length} samples but ${outputs.length} outputs`
      );
    }
    const lines = ['sample\turi', ...outputs.map((target, i) => `${samples[i]}\t${target.uri}`)];
    await writeTargetText(ctx.outputs.manifest, lines.join('\n') + '\n');
  },
});
