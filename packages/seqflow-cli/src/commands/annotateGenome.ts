/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * seqflow annotate-genome - Annotate an assembled genome
 *
 * Usage:
 *   seqflow annotate-genome --genome-fasta s3://bucket/G1.fasta --sample-name G1 --output-folder s3://bucket/out
 */

import { ANNOTATE_GENOME_DEFAULTS, annotateGenomeWorkflow } from '@seqflow/pipelines';
import { parseResources, parseRuntimeConfig, type CommonOptions } from '../config.js';
import { runCommandAction, runPipeline, type CommandIO } from './run.js';

export interface AnnotateGenomeOptions extends CommonOptions {
  genomeFasta: string;
  sampleName: string;
  annotateThreads?: string;
  annotateMem?: string;
  checkmThreads?: string;
  checkmMem?: string;
}

export async function runAnnotateGenome(options: AnnotateGenomeOptions, io: CommandIO): Promise<number> {
  const config = parseRuntimeConfig(options);
  const defaults = ANNOTATE_GENOME_DEFAULTS;
  const annotate = parseResources('annotate', options.annotateThreads, options.annotateMem, defaults.annotate);
  const checkm = parseResources('checkm', options.checkmThreads, options.checkmMem, defaults.checkm);

  return runPipeline(
    'annotate-genome',
    config,
    (builder) =>
      annotateGenomeWorkflow(builder, {
        genomeFasta: options.genomeFasta,
        sampleName: options.sampleName,
        outputFolder: config.outputFolder,
        placement: config.placement,
        annotate,
        checkm,
      }),
    io
  );
}

export async function annotateGenomeCommand(options: AnnotateGenomeOptions): Promise<void> {
  await runCommandAction((io) => runAnnotateGenome(options, io));
}
