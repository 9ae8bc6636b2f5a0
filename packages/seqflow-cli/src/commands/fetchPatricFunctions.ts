/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * seqflow fetch-patric-functions - Build a 16S-to-function reference from PATRIC genomes
 *
 * Usage:
 *   seqflow fetch-patric-functions --genomes genome_metadata.tsv --output-folder s3://bucket/patric
 */

import { readDatasetTable } from '@seqflow/core';
import { FETCH_PATRIC_FUNCTIONS_DEFAULTS, fetchPatricFunctionsWorkflow } from '@seqflow/pipelines';
import { parseResources, parseRuntimeConfig, type CommonOptions } from '../config.js';
import { runCommandAction, runPipeline, type CommandIO } from './run.js';

export interface FetchPatricFunctionsOptions extends CommonOptions {
  /** Table listing the genomes */
  genomes: string;
  genomeColumn: string;
  separator: string;
  ftpRoot: string;
  transferThreads?: string;
  transferMem?: string;
}

/**
 * Genome identifiers of the `--genomes` table, in file order.
 *
 * @throws {ConfigurationError} On a missing column, or an empty or repeated identifier
 */
export async function readGenomeIds(options: FetchPatricFunctionsOptions): Promise<string[]> {
  const table = await readDatasetTable(options.genomes, {
    sampleColumn: options.genomeColumn,
    sourceColumn: options.genomeColumn,
    separator: options.separator,
  });
  return table.rows.map((row) => row.sample);
}

export async function runFetchPatricFunctions(
  options: FetchPatricFunctionsOptions,
  io: CommandIO
): Promise<number> {
  const config = parseRuntimeConfig(options);
  const transfer = parseResources(
    'transfer',
    options.transferThreads,
    options.transferMem,
    FETCH_PATRIC_FUNCTIONS_DEFAULTS.transfer
  );
  const genomes = await readGenomeIds(options);

  return runPipeline(
    'fetch-patric-functions',
    config,
    (builder) =>
      fetchPatricFunctionsWorkflow(builder, genomes, {
        outputFolder: config.outputFolder,
        ftpRoot: options.ftpRoot,
        placement: config.placement,
        transfer,
      }),
    io
  );
}

export async function fetchPatricFunctionsCommand(options: FetchPatricFunctionsOptions): Promise<void> {
  await runCommandAction((io) => runFetchPatricFunctions(options, io));
}
