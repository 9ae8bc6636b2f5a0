/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Genome annotation: an assembled genome is annotated with Prokka and its
 * called peptides are assessed with CheckM.
 */

import { InvalidOptionError, joinUri, type GraphBuilder } from '@seqflow/core';
import type { Placement, Resources } from '../settings.js';
import { annotateProkka, checkm } from '../tasks/assembly.js';
import { loadFile } from '../tasks/general.js';

export interface AnnotateGenomeSettings {
  /** Genome FASTA (URI or local path) */
  genomeFasta: string;
  /** Names the output files and tasks */
  sampleName: string;
  outputFolder: string;
  placement: Placement;
  annotate: Resources;
  checkm: Resources;
}

export const ANNOTATE_GENOME_DEFAULTS: Pick<AnnotateGenomeSettings, 'annotate' | 'checkm'> = {
  annotate: { threads: 8, memoryMb: 32000 },
  checkm: { threads: 8, memoryMb: 64000 },
};

/**
 * Add the annotation tasks to a graph.
 *
 * @returns Names of the target tasks
 */
export function annotateGenomeWorkflow(
  builder: GraphBuilder,
  settings: AnnotateGenomeSettings
): string[] {
  const { sampleName, outputFolder, placement } = settings;
  if (sampleName.trim() === '') {
    throw new InvalidOptionError('sample-name', 'must not be empty');
  }

  const genome = builder.add(loadFile, 'load_genome_fasta', { uri: settings.genomeFasta });

  const prokka = builder.add(annotateProkka, `annotate_prokka_${sampleName}`, {
    sample: sampleName,
    outputFolder: joinUri(outputFolder, 'prokka'),
    resources: settings.annotate,
    placement,
  });
  builder.bind(prokka, 'fasta', genome.out('file'));

  const quality = builder.add(checkm, `checkm_${sampleName}`, {
    sample: sampleName,
    outputFolder: joinUri(outputFolder, 'checkm'),
    resources: settings.checkm,
    placement,
  });
  builder.bind(quality, 'faa', prokka.out('faa'));

  return [quality.name];
}
