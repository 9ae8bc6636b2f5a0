/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * seqflow map-viruses - Align the reads of a dataset against viral proteins
 *
 * Usage:
 *   seqflow map-viruses --metadata samples.csv --ref-db s3://ref/viral.dmnd \
 *     --ref-metadata s3://ref/viral.csv --output-folder s3://bucket/out
 */

import { MAP_VIRUSES_DEFAULTS, mapVirusesWorkflow } from '@seqflow/pipelines';
import { parseResources, parseRuntimeConfig, type CommonOptions } from '../config.js';
import { loadDataset, type DatasetOptions } from './dataset.js';
import { runCommandAction, runPipeline, type CommandIO } from './run.js';

export interface MapVirusesOptions extends CommonOptions, DatasetOptions {
  refDb: string;
  refMetadata: string;
  alignThreads?: string;
  alignMem?: string;
  downloadThreads?: string;
  downloadMem?: string;
}

export async function runMapViruses(options: MapVirusesOptions, io: CommandIO): Promise<number> {
  const config = parseRuntimeConfig(options);
  const defaults = MAP_VIRUSES_DEFAULTS;
  const align = parseResources('align', options.alignThreads, options.alignMem, defaults.align);
  const download = parseResources(
    'download',
    options.downloadThreads,
    options.downloadMem,
    defaults.download
  );
  const { rows, inputLocation } = await loadDataset(options);

  return runPipeline(
    'map-viruses',
    config,
    (builder) =>
      mapVirusesWorkflow(builder, rows, {
        inputLocation,
        outputFolder: config.outputFolder,
        placement: config.placement,
        refDb: options.refDb,
        refMetadata: options.refMetadata,
        align,
        download,
      }),
    io
  );
}

export async function mapVirusesCommand(options: MapVirusesOptions): Promise<void> {
  await runCommandAction((io) => runMapViruses(options, io));
}
