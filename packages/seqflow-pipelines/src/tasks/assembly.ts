/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Assembly, annotation and assembly-integration tasks.
 */

import {
  containerTask,
  inputPath,
  inputPaths,
  joinUri,
  literal,
  outputPath,
  scratchPath,
} from '@seqflow/core';
import { containerSettings, type Placement, type Resources } from '../settings.js';

export const METASPADES_IMAGE = 'quay.io/fhcrc-microbiome/metaspades:v3.11.1--7';
/** Prokka ships in the same image as metaSPAdes */
export const PROKKA_IMAGE = METASPADES_IMAGE;
export const CHECKM_IMAGE = 'quay.io/fhcrc-microbiome/checkm:v1.0.11';
export const INTEGRATE_ASSEMBLIES_IMAGE = 'quay.io/fhcrc-microbiome/integrate-metagenomic-assemblies:v0.5';

/** Parameters of a per-sample container step */
export interface SampleStepParams {
  sample: string;
  outputFolder: string;
  resources: Resources;
  placement: Placement;
  /** Job name prefix (default: the task name) */
  jobNamePrefix?: string;
}

/**
 * metaSPAdes assembly of one sample, `<outputFolder>/<sample>.fasta.gz`.
 *
 * The assembler's memory limit is given in whole gigabytes, derived from the
 * container memory.
 */
export const assembleMetaSpades = containerTask({
  family: 'assembleMetaSpades',
  inputs: { reads: 'one' },
  outputs: (p: SampleStepParams) => ({
    fasta: joinUri(p.outputFolder, `${p.sample}.fasta.gz`),
  }),
  image: () => METASPADES_IMAGE,
  command: (p) => [
    literal('run_metaspades.py'),
    literal('--input'),
    inputPath('reads'),
    literal('--sample-name'),
    literal(p.sample),
    literal('--output-path'),
    outputPath('fasta'),
    literal('--threads'),
    literal(p.resources.threads),
    literal('--max-mem'),
    literal(Math.floor(p.resources.memoryMb / 1000)),
    literal('--temp-folder'),
    scratchPath(),
  ],
  container: (p) => containerSettings(p.resources, p.placement, p.jobNamePrefix),
});

/**
 * Prokka annotation of an assembly: features (`.gff.gz`) and called
 * peptides (`.faa.gz`).
 */
export const annotateProkka = containerTask({
  family: 'annotateProkka',
  inputs: { fasta: 'one' },
  outputs: (p: SampleStepParams) => ({
    gff: joinUri(p.outputFolder, `${p.sample}.gff.gz`),
    faa: joinUri(p.outputFolder, `${p.sample}.faa.gz`),
  }),
  image: () => PROKKA_IMAGE,
  command: (p) => [
    literal('run_prokka.py'),
    literal('--input'),
    inputPath('fasta'),
    literal('--sample-name'),
    literal(p.sample),
    literal('--output-gff'),
    outputPath('gff'),
    literal('--output-faa'),
    outputPath('faa'),
    literal('--threads'),
    literal(p.resources.threads),
    literal('--temp-folder'),
    scratchPath(),
  ],
  container: (p) => containerSettings(p.resources, p.placement, p.jobNamePrefix),
});

/**
 * CheckM completeness and taxonomy of a genome from its called peptides.
 */
export const checkm = containerTask({
  family: 'checkm',
  inputs: { faa: 'one' },
  outputs: (p: SampleStepParams) => ({
    report: joinUri(p.outputFolder, `${p.sample}.checkm.tsv`),
  }),
  image: () => CHECKM_IMAGE,
  command: (p) => [
    literal('run_checkm.py'),
    literal('--input'),
    inputPath('faa'),
    literal('--sample-name'),
    literal(p.sample),
    literal('--output-path'),
    outputPath('report'),
    literal('--threads'),
    literal(p.resources.threads),
    literal('--temp-folder'),
    scratchPath(),
  ],
  container: (p) => containerSettings(p.resources, p.placement, p.jobNamePrefix),
});

export interface IntegrateAssembliesParams {
  /** Prefix of the output files */
  project: string;
  outputFolder: string;
  resources: Resources;
  placement: Placement;
}

/**
 * Combine the annotations of every sample into one gene catalog and its
 * DIAMOND database.
 */
export const integrateAssemblies = containerTask({
  family: 'integrateAssemblies',
  inputs: { gff: 'many', faa: 'many' },
  outputs: (p: IntegrateAssembliesParams) => ({
    dmnd: joinUri(p.outputFolder, `${p.project}.dmnd`),
    catalog: joinUri(p.outputFolder, `${p.project}.csv.gz`),
  }),
  image: () => INTEGRATE_ASSEMBLIES_IMAGE,
  command: (p) => [
    literal('integrate_assemblies.py'),
    literal('--gff'),
    inputPaths('gff'),
    literal('--faa'),
    inputPaths('faa'),
    literal('--output-prefix'),
    literal(p.project),
    literal('--output-dmnd'),
    outputPath('dmnd'),
    literal('--output-csv'),
    outputPath('catalog'),
    literal('--temp-folder'),
    scratchPath(),
  ],
  container: (p) =>
    containerSettings(p.resources, p.placement, `integrate_assemblies_${p.project}`),
});
