/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Assembly and FAMLI profiling.
 *
 * Per sample: read quality (fastqp), assembly (metaSPAdes) and annotation
 * (Prokka). The annotations of all samples are integrated into one gene
 * catalog, and every sample's reads are then aligned against it with FAMLI.
 */

import { joinUri, type DatasetRow, type GraphBuilder } from '@seqflow/core';
import { validateProjectName, type Resources } from '../settings.js';
import { annotateProkka, assembleMetaSpades, integrateAssemblies } from '../tasks/assembly.js';
import { famli, fastqp } from '../tasks/general.js';
import { sampleReads, validateSampleSources, type SampleReadsSettings } from './inputs.js';

export interface AssembleFamliSettings extends SampleReadsSettings {
  /** Letters, digits and underscores; names the integrated assembly */
  project: string;
  fastqp: Resources;
  assemble: Resources;
  annotate: Resources;
  integrate: Resources;
  famli: Resources;
}

export const ASSEMBLE_FAMLI_DEFAULTS: Pick<
  AssembleFamliSettings,
  'download' | 'fastqp' | 'assemble' | 'annotate' | 'integrate' | 'famli'
> = {
  download: { threads: 1, memoryMb: 32000 },
  fastqp: { threads: 1, memoryMb: 32000 },
  assemble: { threads: 8, memoryMb: 32000 },
  annotate: { threads: 8, memoryMb: 32000 },
  integrate: { threads: 8, memoryMb: 120000 },
  famli: { threads: 8, memoryMb: 32000 },
};

/**
 * Add the assembly and profiling tasks to a graph.
 *
 * @returns Names of the target tasks: fastqp and FAMLI of each sample, in row order
 * @throws {InvalidProjectNameError} If the project name has other characters
 * @throws {InvalidAccessionError} For a non-SRR source of an SRA dataset
 */
export function assembleFamliWorkflow(
  builder: GraphBuilder,
  rows: readonly DatasetRow[],
  settings: AssembleFamliSettings
): string[] {
  const project = validateProjectName(settings.project);
  validateSampleSources(rows, settings.inputLocation);
  const { outputFolder, placement } = settings;

  const branches = builder.fanOut(rows, (row) => {
    const sample = row.sample;
    const reads = sampleReads(builder, row, settings);

    const quality = builder.add(fastqp, `fastqp_${sample}`, {
      sample,
      outputFolder: joinUri(outputFolder, 'fastqp'),
      resources: settings.fastqp,
      placement,
    });
    builder.bind(quality, 'reads', reads);

    const assembly = builder.add(assembleMetaSpades, `metaspades_${sample}`, {
      sample,
      outputFolder: joinUri(outputFolder, 'metaspades'),
      resources: settings.assemble,
      placement,
    });
    builder.bind(assembly, 'reads', reads);

    const annotation = builder.add(annotateProkka, `prokka_${sample}`, {
      sample,
      outputFolder: joinUri(outputFolder, 'prokka'),
      resources: settings.annotate,
      placement,
    });
    builder.bind(annotation, 'fasta', assembly.out('fasta'));

    return { reads, quality, annotation };
  });

  if (branches.size === 0) return [];

  const integrated = builder.add(integrateAssemblies, `integrate_assemblies-${project}`, {
    project,
    outputFolder: joinUri(outputFolder, 'integrated_assembly'),
    resources: settings.integrate,
    placement,
  });
  const annotations = [...branches.values()].map((b) => b.annotation);
  builder.bind(integrated, 'gff', annotations.map((a) => a.out('gff')));
  builder.bind(integrated, 'faa', annotations.map((a) => a.out('faa')));

  const targets: string[] = [];
  for (const [sample, branch] of branches) {
    const profile = builder.add(famli, `famli_${sample}`, {
      sample,
      outputFolder: joinUri(outputFolder, 'famli'),
      resources: settings.famli,
      placement,
    });
    builder.bind(profile, 'reads', branch.reads);
    builder.bind(profile, 'refDb', integrated.out('dmnd'));
    targets.push(branch.quality.name, profile.name);
  }
  return targets;
}
