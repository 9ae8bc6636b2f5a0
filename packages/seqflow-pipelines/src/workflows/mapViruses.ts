/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Viral mapping: the reads of every sample are aligned against a viral
 * protein database, and the per-sample results are listed in a manifest.
 */

import type { DatasetRow, GraphBuilder } from '@seqflow/core';
import type { Resources } from '../settings.js';
import { loadFile, writeManifest } from '../tasks/general.js';
import { mapViruses } from '../tasks/viral.js';
import { sampleReads, validateSampleSources, type SampleReadsSettings } from './inputs.js';

export interface MapVirusesSettings extends SampleReadsSettings {
  /** DIAMOND database of viral proteins */
  refDb: string;
  /** Metadata of the database's proteins */
  refMetadata: string;
  align: Resources;
}

export const MAP_VIRUSES_DEFAULTS: Pick<MapVirusesSettings, 'align' | 'download'> = {
  align: { threads: 4, memoryMb: 10000 },
  download: { threads: 1, memoryMb: 4096 },
};

/**
 * Add one mapping branch per dataset row, then the manifest.
 *
 * @returns Names of the target tasks (none for an empty dataset)
 * @throws {InvalidAccessionError} For a non-SRR source of an SRA dataset
 */
export function mapVirusesWorkflow(
  builder: GraphBuilder,
  rows: readonly DatasetRow[],
  settings: MapVirusesSettings
): string[] {
  validateSampleSources(rows, settings.inputLocation);

  const mapped = builder.fanOut(rows, (row) => {
    // shared by every branch; re-adding returns the same task
    const refDb = builder.add(loadFile, 'load_ref_db_dmnd', { uri: settings.refDb });
    const refMetadata = builder.add(loadFile, 'load_ref_db_metadata', { uri: settings.refMetadata });

    const node = builder.add(mapViruses, `map_viruses_${row.sample}`, {
      sample: row.sample,
      outputFolder: settings.outputFolder,
      resources: settings.align,
      placement: settings.placement,
    });
    builder.bind(node, 'reads', sampleReads(builder, row, settings));
    builder.bind(node, 'refDb', refDb.out('file'));
    builder.bind(node, 'refMetadata', refMetadata.out('file'));
    return node;
  });

  if (mapped.size === 0) return [];

  const manifest = builder.add(writeManifest, 'manifest_map_viruses', {
    samples: [...mapped.keys()],
    outputFolder: settings.outputFolder,
    name: 'map_viruses',
  });
  builder.bind(
    manifest,
    'outputs',
    [...mapped.values()].map((node) => node.out('json'))
  );
  return [manifest.name];
}
