/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Functional profiling with HUMAnN2, with a read quality summary per sample.
 */

import { joinUri, type DatasetRow, type GraphBuilder } from '@seqflow/core';
import type { Resources } from '../settings.js';
import { humann2 } from '../tasks/biobakery.js';
import { fastqp } from '../tasks/general.js';
import { sampleReads, validateSampleSources, type SampleReadsSettings } from './inputs.js';

export interface Humann2Settings extends SampleReadsSettings {
  /** Host directory of the HUMAnN2 databases */
  refDb: string;
  fastqp: Resources;
  humann2: Resources;
}

export const HUMANN2_DEFAULTS: Pick<Humann2Settings, 'download' | 'fastqp' | 'humann2'> = {
  download: { threads: 1, memoryMb: 32000 },
  fastqp: { threads: 1, memoryMb: 10000 },
  humann2: { threads: 4, memoryMb: 10000 },
};

/**
 * @returns Names of the target tasks: fastqp and HUMAnN2 of each sample, in row order
 * @throws {InvalidAccessionError} For a non-SRR source of an SRA dataset
 */
export function humann2Workflow(
  builder: GraphBuilder,
  rows: readonly DatasetRow[],
  settings: Humann2Settings
): string[] {
  validateSampleSources(rows, settings.inputLocation);
  const { outputFolder, placement } = settings;

  const branches = builder.fanOut(rows, (row) => {
    const reads = sampleReads(builder, row, settings);

    const quality = builder.add(fastqp, `fastqp_${row.sample}`, {
      sample: row.sample,
      outputFolder: joinUri(outputFolder, 'fastqp'),
      resources: settings.fastqp,
      placement,
    });
    builder.bind(quality, 'reads', reads);

    const profile = builder.add(humann2, `humann2_${row.sample}`, {
      sample: row.sample,
      outputFolder: joinUri(outputFolder, 'humann2'),
      refDb: settings.refDb,
      resources: settings.humann2,
      placement,
    });
    builder.bind(profile, 'reads', reads);
    return [quality.name, profile.name];
  });
  return [...branches.values()].flat();
}
