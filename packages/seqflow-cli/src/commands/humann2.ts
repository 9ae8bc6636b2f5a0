/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * seqflow humann2 - Functional profiles of a dataset with HUMAnN2
 *
 * Usage:
 *   seqflow humann2 --metadata samples.csv --ref-db /data/refdbs --output-folder s3://bucket/out
 */

import { resolve } from 'path';
import { HUMANN2_DEFAULTS, humann2Workflow } from '@seqflow/pipelines';
import { parseResources, parseRuntimeConfig, type CommonOptions } from '../config.js';
import { loadDataset, type DatasetOptions } from './dataset.js';
import { runCommandAction, runPipeline, type CommandIO } from './run.js';

export interface Humann2Options extends CommonOptions, DatasetOptions {
  refDb: string;
  humann2Threads?: string;
  humann2Mem?: string;
  fastqpThreads?: string;
  fastqpMem?: string;
  downloadThreads?: string;
  downloadMem?: string;
}

export async function runHumann2(options: Humann2Options, io: CommandIO): Promise<number> {
  const config = parseRuntimeConfig(options);
  const d = HUMANN2_DEFAULTS;
  const resources = {
    humann2: parseResources('humann2', options.humann2Threads, options.humann2Mem, d.humann2),
    fastqp: parseResources('fastqp', options.fastqpThreads, options.fastqpMem, d.fastqp),
    download: parseResources('download', options.downloadThreads, options.downloadMem, d.download),
  };
  const { rows, inputLocation } = await loadDataset(options);

  return runPipeline(
    'humann2',
    config,
    (builder) =>
      humann2Workflow(builder, rows, {
        inputLocation,
        outputFolder: config.outputFolder,
        placement: config.placement,
        // mounted into the container, so it must be absolute
        refDb: resolve(options.refDb),
        ...resources,
      }),
    io
  );
}

export async function humann2Command(options: Humann2Options): Promise<void> {
  await runCommandAction((io) => runHumann2(options, io));
}
