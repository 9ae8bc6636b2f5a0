/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { readDatasetTable, type DatasetRow } from '@seqflow/core';
import { parseInputLocation, type InputLocation } from '@seqflow/pipelines';

/** Options naming a dataset table and its two columns */
export interface DatasetTableOptions {
  metadata: string;
  sampleColumn: string;
  inputColumn: string;
  separator: string;
}

/** Options of commands that fan out over the reads of a dataset */
export interface DatasetOptions extends DatasetTableOptions {
  inputLocation: string;
}

export interface Dataset {
  rows: DatasetRow[];
  inputLocation: InputLocation;
}

/**
 * Read the dataset table named by `--metadata`.
 *
 * @throws {ConfigurationError} On an invalid input location or table
 */
export async function loadDataset(options: DatasetOptions): Promise<Dataset> {
  const inputLocation = parseInputLocation(options.inputLocation);
  return { rows: await loadDatasetRows(options), inputLocation };
}

/**
 * Rows of the dataset table named by `--metadata`.
 *
 * @throws {ConfigurationError} On a missing column, or an empty or repeated value
 */
export async function loadDatasetRows(options: DatasetTableOptions): Promise<DatasetRow[]> {
  const table = await readDatasetTable(options.metadata, {
    sampleColumn: options.sampleColumn,
    sourceColumn: options.inputColumn,
    separator: options.separator,
  });
  return table.rows;
}
