/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * seqflow find-viral-contigs - Score assembled contigs with VirFinder
 *
 * Usage:
 *   seqflow find-viral-contigs --metadata contigs.csv --output-folder s3://bucket/out
 */

import { FIND_VIRAL_CONTIGS_DEFAULTS, findViralContigsWorkflow } from '@seqflow/pipelines';
import { parseResources, parseRuntimeConfig, type CommonOptions } from '../config.js';
import { loadDatasetRows, type DatasetTableOptions } from './dataset.js';
import { runCommandAction, runPipeline, type CommandIO } from './run.js';

export interface FindViralContigsOptions extends CommonOptions, DatasetTableOptions {
  virfinderThreads?: string;
  virfinderMem?: string;
}

export async function runFindViralContigs(options: FindViralContigsOptions, io: CommandIO): Promise<number> {
  const config = parseRuntimeConfig(options);
  const virfinder = parseResources(
    'virfinder',
    options.virfinderThreads,
    options.virfinderMem,
    FIND_VIRAL_CONTIGS_DEFAULTS.virfinder
  );
  const rows = await loadDatasetRows(options);

  return runPipeline(
    'find-viral-contigs',
    config,
    (builder) =>
      findViralContigsWorkflow(builder, rows, {
        outputFolder: config.outputFolder,
        placement: config.placement,
        virfinder,
      }),
    io
  );
}

export async function findViralContigsCommand(options: FindViralContigsOptions): Promise<void> {
  await runCommandAction((io) => runFindViralContigs(options, io));
}
