/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import {
  containerTask,
  joinUri,
  literal,
  outputPath,
  scratchPath,
} from '@seqflow/core';
import { containerSettings, type Placement, type Resources } from '../settings.js';

export const GET_SRA_IMAGE = 'quay.io/fhcrc-microbiome/get_sra:v0.2';

export interface ImportSraFastqParams {
  /** Sample the reads belong to; names the job */
  sample: string;
  /** SRA run accession (SRR...) */
  accession: string;
  /** Project folder; reads land in `<baseFolder>/reads/<accession>.fastq.gz` */
  baseFolder: string;
  resources: Resources;
  placement: Placement;
}

/**
 * Download the reads of an SRA run as gzipped FASTQ.
 */
export const importSraFastq = containerTask({
  family: 'importSraFastq',
  inputs: {},
  outputs: (p: ImportSraFastqParams) => ({
    file: joinUri(p.baseFolder, 'reads', `${p.accession}.fastq.gz`),
  }),
  image: () => GET_SRA_IMAGE,
  command: (p) => [
    literal('get_sra.py'),
    literal('--accession'),
    literal(p.accession),
    literal('--output-path'),
    outputPath('file'),
    literal('--temp-folder'),
    scratchPath(),
  ],
  container: (p) => containerSettings(p.resources, p.placement, `get_sra_${p.sample}`),
});
