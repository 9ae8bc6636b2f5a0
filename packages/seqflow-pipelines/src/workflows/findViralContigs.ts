/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { joinUri, type DatasetRow, type GraphBuilder } from '@seqflow/core';
import type { Placement, Resources } from '../settings.js';
import { loadFile } from '../tasks/general.js';
import { virFinder } from '../tasks/viral.js';

export interface FindViralContigsSettings {
  outputFolder: string;
  placement: Placement;
  virfinder: Resources;
}

export const FIND_VIRAL_CONTIGS_DEFAULTS: Pick<FindViralContigsSettings, 'virfinder'> = {
  virfinder: { threads: 1, memoryMb: 8000 },
};

/**
 * Score the assembled contigs of each sample with VirFinder. Each row's
 * source is the sample's contig FASTA.
 *
 * @returns Names of the VirFinder tasks, in row order
 */
export function findViralContigsWorkflow(
  builder: GraphBuilder,
  rows: readonly DatasetRow[],
  settings: FindViralContigsSettings
): string[] {
  const scored = builder.fanOut(rows, (row) => {
    const contigs = builder.add(loadFile, `load_contigs_${row.sample}`, { uri: row.source });
    const node = builder.add(virFinder, `virfinder_${row.sample}`, {
      sample: row.sample,
      outputFolder: joinUri(settings.outputFolder, 'virfinder'),
      resources: settings.virfinder,
      placement: settings.placement,
    });
    builder.bind(node, 'contigs', contigs.out('file'));
    return node.name;
  });
  return [...scored.values()];
}
