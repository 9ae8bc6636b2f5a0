/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * FAMLI profiling against an existing protein database: the reads of every
 * sample are aligned with FAMLI.
 */

import { joinUri, type DatasetRow, type GraphBuilder } from '@seqflow/core';
import { validateProjectName, type Resources } from '../settings.js';
import { famli, loadFile } from '../tasks/general.js';
import { sampleReads, validateSampleSources, type SampleReadsSettings } from './inputs.js';

export interface MapFamliSettings extends SampleReadsSettings {
  /** Letters, digits and underscores */
  project: string;
  /** DIAMOND database to align against */
  refDb: string;
  /** Subfolder of the output folder for FAMLI results */
  famliFolder: string;
  famli: Resources;
}

export const MAP_FAMLI_DEFAULTS: Pick<MapFamliSettings, 'famliFolder' | 'download' | 'famli'> = {
  famliFolder: 'famli',
  download: { threads: 1, memoryMb: 32000 },
  famli: { threads: 4, memoryMb: 10000 },
};

/**
 * @returns Names of the FAMLI tasks, in row order
 * @throws {InvalidProjectNameError} If the project name has other characters
 * @throws {InvalidAccessionError} For a non-SRR source of an SRA dataset
 */
export function mapFamliWorkflow(
  builder: GraphBuilder,
  rows: readonly DatasetRow[],
  settings: MapFamliSettings
): string[] {
  validateProjectName(settings.project);
  validateSampleSources(rows, settings.inputLocation);

  const profiles = builder.fanOut(rows, (row) => {
    const refDb = builder.add(loadFile, 'load_db_from_s3', { uri: settings.refDb });
    const profile = builder.add(famli, `famli_${row.sample}`, {
      sample: row.sample,
      outputFolder: joinUri(settings.outputFolder, settings.famliFolder),
      resources: settings.famli,
      placement: settings.placement,
    });
    builder.bind(profile, 'reads', sampleReads(builder, row, settings));
    builder.bind(profile, 'refDb', refDb.out('file'));
    return profile.name;
  });
  return [...profiles.values()];
}
