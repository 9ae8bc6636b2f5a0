/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import type { DatasetRow, GraphBuilder, OutputRef } from '@seqflow/core';
import { validateAccession, type InputLocation, type Placement, type Resources } from '../settings.js';
import { loadFile } from '../tasks/general.js';
import { importSraFastq } from '../tasks/sra.js';

export interface SampleReadsSettings {
  inputLocation: InputLocation;
  /** Project folder; SRA downloads land in its `reads/` folder */
  outputFolder: string;
  placement: Placement;
  /** Resources of an SRA download */
  download: Resources;
}

/**
 * Check every row before any task is created.
 *
 * @throws {InvalidAccessionError} If reads come from SRA and a source is not a run accession
 */
export function validateSampleSources(rows: readonly DatasetRow[], inputLocation: InputLocation): void {
  if (inputLocation !== 'SRA') return;
  for (const row of rows) {
    validateAccession(row.sample, row.source);
  }
}

/**
 * Reads of one sample: the existing file for S3 datasets, a download for SRA
 * datasets.
 */
export function sampleReads(
  builder: GraphBuilder,
  row: DatasetRow,
  settings: SampleReadsSettings
): OutputRef {
  if (settings.inputLocation === 'S3') {
    return builder.add(loadFile, `load_from_s3_${row.sample}`, { uri: row.source }).out('file');
  }
  return builder
    .add(importSraFastq, `download_from_sra_${row.sample}`, {
      sample: row.sample,
      accession: row.source,
      baseFolder: settings.outputFolder,
      resources: settings.download,
      placement: settings.placement,
    })
    .out('file');
}
