/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * seqflow assemble-famli - Assemble a dataset and profile it with FAMLI
 *
 * Usage:
 *   seqflow assemble-famli --metadata samples.csv --project gut --output-folder s3://bucket/out
 *   seqflow assemble-famli --metadata samples.csv --project gut --output-folder out --dry-run
 */

import { ASSEMBLE_FAMLI_DEFAULTS, assembleFamliWorkflow } from '@seqflow/pipelines';
import { parseResources, parseRuntimeConfig, type CommonOptions } from '../config.js';
import { loadDataset, type DatasetOptions } from './dataset.js';
import { runCommandAction, runPipeline, type CommandIO } from './run.js';

export interface AssembleFamliOptions extends CommonOptions, DatasetOptions {
  project: string;
  downloadThreads?: string;
  downloadMem?: string;
  fastqpThreads?: string;
  fastqpMem?: string;
  assembleThreads?: string;
  assembleMem?: string;
  annotateThreads?: string;
  annotateMem?: string;
  integrateThreads?: string;
  integrateMem?: string;
  famliThreads?: string;
  famliMem?: string;
}

export async function runAssembleFamli(options: AssembleFamliOptions, io: CommandIO): Promise<number> {
  const config = parseRuntimeConfig(options);
  const d = ASSEMBLE_FAMLI_DEFAULTS;
  const resources = {
    download: parseResources('download', options.downloadThreads, options.downloadMem, d.download),
    fastqp: parseResources('fastqp', options.fastqpThreads, options.fastqpMem, d.fastqp),
    assemble: parseResources('assemble', options.assembleThreads, options.assembleMem, d.assemble),
    annotate: parseResources('annotate', options.annotateThreads, options.annotateMem, d.annotate),
    integrate: parseResources('integrate', options.integrateThreads, options.integrateMem, d.integrate),
    famli: parseResources('famli', options.famliThreads, options.famliMem, d.famli),
  };
  const { rows, inputLocation } = await loadDataset(options);

  return runPipeline(
    'assemble-famli',
    config,
    (builder) =>
      assembleFamliWorkflow(builder, rows, {
        project: options.project,
        inputLocation,
        outputFolder: config.outputFolder,
        placement: config.placement,
        ...resources,
      }),
    io
  );
}

export async function assembleFamliCommand(options: AssembleFamliOptions): Promise<void> {
  await runCommandAction((io) => runAssembleFamli(options, io));
}
