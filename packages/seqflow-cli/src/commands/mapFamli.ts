/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * seqflow map-famli - Profile a dataset with FAMLI against an existing database
 *
 * Usage:
 *   seqflow map-famli --metadata samples.csv --project gut --ref-db s3://ref/genes.dmnd \
 *     --output-folder s3://bucket/out
 */

import { MAP_FAMLI_DEFAULTS, mapFamliWorkflow } from '@seqflow/pipelines';
import { parseResources, parseRuntimeConfig, type CommonOptions } from '../config.js';
import { loadDataset, type DatasetOptions } from './dataset.js';
import { runCommandAction, runPipeline, type CommandIO } from './run.js';

export interface MapFamliOptions extends CommonOptions, DatasetOptions {
  project: string;
  refDb: string;
  famliFolder: string;
  famliThreads?: string;
  famliMem?: string;
  downloadThreads?: string;
  downloadMem?: string;
}

export async function runMapFamli(options: MapFamliOptions, io: CommandIO): Promise<number> {
  const config = parseRuntimeConfig(options);
  const d = MAP_FAMLI_DEFAULTS;
  const famli = parseResources('famli', options.famliThreads, options.famliMem, d.famli);
  const download = parseResources('download', options.downloadThreads, options.downloadMem, d.download);
  const { rows, inputLocation } = await loadDataset(options);

  return runPipeline(
    'map-famli',
    config,
    (builder) =>
      mapFamliWorkflow(builder, rows, {
        project: options.project,
        inputLocation,
        outputFolder: config.outputFolder,
        placement: config.placement,
        refDb: options.refDb,
        famliFolder: options.famliFolder,
        famli,
        download,
      }),
    io
  );
}

export async function mapFamliCommand(options: MapFamliOptions): Promise<void> {
  await runCommandAction((io) => runMapFamli(options, io));
}
