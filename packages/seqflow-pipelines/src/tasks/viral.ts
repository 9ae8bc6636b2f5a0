/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import {
  containerTask,
  inputPath,
  joinUri,
  literal,
  outputPath,
  scratchPath,
} from '@seqflow/core';
import { containerSettings, type Placement, type Resources } from '../settings.js';

export const MAP_VIRUSES_IMAGE = 'quay.io/fhcrc-microbiome/map_viruses:v0.7';
export const VIRFINDER_IMAGE = 'quay.io/fhcrc-microbiome/virfinder:v1.1--0';

export interface MapVirusesParams {
  sample: string;
  outputFolder: string;
  resources: Resources;
  placement: Placement;
}

/**
 * Align reads against a viral protein database.
 *
 * The tool writes the alignments (`.sam.gz`) beside the summary
 * (`.json.gz`), so both outputs share a stem.
 */
export const mapViruses = containerTask({
  family: 'mapViruses',
  inputs: { reads: 'one', refDb: 'one', refMetadata: 'one' },
  outputs: (p: MapVirusesParams) => ({
    json: joinUri(p.outputFolder, `${p.sample}.json.gz`),
    sam: joinUri(p.outputFolder, `${p.sample}.sam.gz`),
  }),
  image: () => MAP_VIRUSES_IMAGE,
  command: (p) => [
    literal('map_viruses.py'),
    literal('--input'),
    inputPath('reads'),
    literal('--metadata'),
    inputPath('refMetadata'),
    literal('--ref-db'),
    inputPath('refDb'),
    literal('--output-path'),
    outputPath('json'),
    literal('--threads'),
    literal(p.resources.threads),
    literal('--temp-folder'),
    scratchPath(),
    literal('--keep-alignments'),
  ],
  container: (p) => containerSettings(p.resources, p.placement, `map_viruses_${p.sample}`),
});

export interface VirFinderParams {
  sample: string;
  outputFolder: string;
  resources: Resources;
  placement: Placement;
}

/** VirFinder scores for the contigs of one sample, `<outputFolder>/<sample>.tsv` */
export const virFinder = containerTask({
  family: 'virFinder',
  inputs: { contigs: 'one' },
  outputs: (p: VirFinderParams) => ({
    scores: joinUri(p.outputFolder, `${p.sample}.tsv`),
  }),
  image: () => VIRFINDER_IMAGE,
  command: () => [literal('run_virfinder.Rscript'), inputPath('contigs'), outputPath('scores')],
  container: (p) => containerSettings(p.resources, p.placement, `virfinder_${p.sample}`),
});
