/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * PATRIC reference functions.
 *
 * For every genome the PATRIC transcripts and pathway annotations are fetched
 * into `<outputFolder>/<genome>/`. The 16S records of all genomes are then
 * collected into one FASTA, and each genome's function copy numbers are
 * linked to its 16S transcripts and merged into one table.
 */

import { joinUri, type DatasetRow, type GraphBuilder } from '@seqflow/core';
import type { Placement, Resources } from '../settings.js';
import { extract16S, link16SFunctions, mergeFunctionTables, transferUrl } from '../tasks/patric.js';

export const PATRIC_FTP_ROOT = 'ftp://ftp.patricbrc.org';

export interface FetchPatricFunctionsSettings {
  outputFolder: string;
  /** Server root holding `genomes/<genome>/` */
  ftpRoot: string;
  placement: Placement;
  transfer: Resources;
}

export const FETCH_PATRIC_FUNCTIONS_DEFAULTS: Pick<FetchPatricFunctionsSettings, 'ftpRoot' | 'transfer'> = {
  ftpRoot: PATRIC_FTP_ROOT,
  transfer: { threads: 1, memoryMb: 1000 },
};

/** URL of one file of a genome, e.g. suffix `PATRIC.frn` */
export function patricGenomeUrl(ftpRoot: string, genome: string, suffix: string): string {
  return joinUri(ftpRoot, 'genomes', genome, `${genome}.${suffix}`);
}

/**
 * Dataset rows for a genome list: the genome is the sample, its transcript
 * URL the source.
 */
export function genomeRows(genomes: readonly string[], ftpRoot: string): DatasetRow[] {
  return genomes.map((genome) => ({
    sample: genome,
    source: patricGenomeUrl(ftpRoot, genome, 'PATRIC.frn'),
    values: { genome_id: genome },
  }));
}

/**
 * @returns Names of the target tasks: `extract_all_16S` and
 *   `extract_all_annotations` (none for an empty genome list)
 * @throws {EmptyDatasetValueError} If a genome identifier is empty
 * @throws {DuplicateDatasetValueError} If a genome is listed twice
 */
export function fetchPatricFunctionsWorkflow(
  builder: GraphBuilder,
  genomes: readonly string[],
  settings: FetchPatricFunctionsSettings
): string[] {
  const { outputFolder, placement } = settings;

  const branches = builder.fanOut(genomeRows(genomes, settings.ftpRoot), (row) => {
    const genome = row.sample;
    const folder = joinUri(outputFolder, genome);

    const transcripts = builder.add(transferUrl, `fetch_patric_transcripts_${genome}`, {
      url: row.source,
      destination: joinUri(folder, 'transcripts.frn'),
      resources: settings.transfer,
      placement,
      jobNamePrefix: `fetch_patric_transcripts_${genome}`,
    });
    const annotations = builder.add(transferUrl, `fetch_patric_annotations_${genome}`, {
      url: patricGenomeUrl(settings.ftpRoot, genome, 'PATRIC.pathway.tab'),
      destination: joinUri(folder, 'annotation.tsv'),
      resources: settings.transfer,
      placement,
      jobNamePrefix: `fetch_patric_annotations_${genome}`,
    });

    const linked = builder.add(link16SFunctions, `link_16S_functions_${genome}`, {
      genome,
      outputFolder: folder,
    });
    builder.bind(linked, 'transcripts', transcripts.out('file'));
    builder.bind(linked, 'annotations', annotations.out('file'));
    return { transcripts, linked };
  });

  if (branches.size === 0) return [];

  const fasta = builder.add(extract16S, 'extract_all_16S', { outputFolder });
  builder.bind(
    fasta,
    'transcripts',
    [...branches.values()].map((b) => b.transcripts.out('file'))
  );

  const table = builder.add(mergeFunctionTables, 'extract_all_annotations', { outputFolder });
  builder.bind(
    table,
    'tables',
    [...branches.values()].map((b) => b.linked.out('table'))
  );
  return [fasta.name, table.name];
}
