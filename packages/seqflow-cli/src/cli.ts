#!/usr/bin/env -S node --import tsx

/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * seqflow CLI - run microbiome pipelines in containers
 *
 * Every pipeline command takes the shared execution options; tasks whose
 * outputs already exist are skipped.
 */

import { createRequire } from 'node:module';
import { Command } from 'commander';
import {
  ANNOTATE_GENOME_DEFAULTS,
  ASSEMBLE_FAMLI_DEFAULTS,
  DEFAULT_BATCH_QUEUE,
  FETCH_PATRIC_FUNCTIONS_DEFAULTS,
  FIND_VIRAL_CONTIGS_DEFAULTS,
  HUMANN2_DEFAULTS,
  MAP_FAMLI_DEFAULTS,
  MAP_VIRUSES_DEFAULTS,
  type Resources,
} from '@seqflow/pipelines';
import { COMMON_DEFAULTS } from './config.js';
import { annotateGenomeCommand } from './commands/annotateGenome.js';
import { assembleFamliCommand } from './commands/assembleFamli.js';
import { fetchPatricFunctionsCommand } from './commands/fetchPatricFunctions.js';
import { findViralContigsCommand } from './commands/findViralContigs.js';
import { humann2Command } from './commands/humann2.js';
import { mapFamliCommand } from './commands/mapFamli.js';
import { mapVirusesCommand } from './commands/mapViruses.js';

const require = createRequire(import.meta.url);
const packageJson = require('../package.json') as { version: string };

function withCommonOptions(command: Command): Command {
  return command
    .requiredOption('--output-folder <folder>', 'Folder (local path or s3:// URI) for all outputs')
    .option('--engine <engine>', 'Where containers run: docker or batch', COMMON_DEFAULTS.engine)
    .option('--batch-queue <queue>', 'Batch queue', DEFAULT_BATCH_QUEUE)
    .option('--job-role-arn <arn>', 'Execution role of batch jobs')
    .option('--workers <n>', 'Tasks running or submitting at once', COMMON_DEFAULTS.workers)
    .option('--max-remote-jobs <n>', 'Batch jobs in flight at once', COMMON_DEFAULTS.maxRemoteJobs)
    .option('--scratch-dir <dir>', 'Host directory for task sandboxes (default: OS temp dir)')
    .option('--store-root <dir>', 'Directory that holds s3:// buckets', COMMON_DEFAULTS.storeRoot)
    .option('--poll-interval <seconds>', 'Seconds between batch status polls', COMMON_DEFAULTS.pollInterval)
    .option('--retries <n>', 'Extra attempts for a failed task', COMMON_DEFAULTS.retries)
    .option('--dry-run', 'Show which tasks are complete without running anything');
}

function withDatasetTableOptions(command: Command, inputColumn: string, inputLabel: string): Command {
  return command
    .requiredOption('--metadata <file>', 'Dataset table with one row per sample')
    .option('--sample-column <name>', 'Column naming each sample', 'sample')
    .option('--input-column <name>', `Column with the ${inputLabel} location`, inputColumn)
    .option('--separator <char>', 'Field separator of the dataset table', ',');
}

function withDatasetOptions(command: Command): Command {
  return withDatasetTableOptions(command, 'fastq', 'reads').option(
    '--input-location <location>',
    'Where the reads are: S3 or SRA',
    'S3'
  );
}

function withResourceOptions(command: Command, step: string, label: string, defaults: Resources): Command {
  return command
    .option(`--${step}-threads <n>`, `Threads for ${label} (default: ${defaults.threads})`)
    .option(`--${step}-mem <mb>`, `Memory in MB for ${label} (default: ${defaults.memoryMb})`);
}

const program = new Command();

program
  .name('seqflow')
  .description('Run microbiome pipelines as container task graphs')
  .version(packageJson.version);

const annotateGenome = new Command('annotate-genome')
  .description('Annotate an assembled genome with Prokka and assess it with CheckM')
  .requiredOption('--genome-fasta <uri>', 'Genome FASTA')
  .requiredOption('--sample-name <name>', 'Name of the genome');
withCommonOptions(annotateGenome);
withResourceOptions(annotateGenome, 'annotate', 'Prokka', ANNOTATE_GENOME_DEFAULTS.annotate);
withResourceOptions(annotateGenome, 'checkm', 'CheckM', ANNOTATE_GENOME_DEFAULTS.checkm);
program.addCommand(annotateGenome.action(annotateGenomeCommand));

const mapViruses = new Command('map-viruses')
  .description('Align the reads of each sample against a viral protein database')
  .requiredOption('--ref-db <uri>', 'DIAMOND database of viral proteins')
  .requiredOption('--ref-metadata <uri>', 'Metadata of the database proteins');
withDatasetOptions(mapViruses);
withCommonOptions(mapViruses);
withResourceOptions(mapViruses, 'align', 'alignment', MAP_VIRUSES_DEFAULTS.align);
withResourceOptions(mapViruses, 'download', 'SRA downloads', MAP_VIRUSES_DEFAULTS.download);
program.addCommand(mapViruses.action(mapVirusesCommand));

const assembleFamli = new Command('assemble-famli')
  .description('Assemble and annotate each sample, integrate the assemblies and profile with FAMLI')
  .requiredOption('--project <name>', 'Project name (letters, digits and underscores)');
withDatasetOptions(assembleFamli);
withCommonOptions(assembleFamli);
withResourceOptions(assembleFamli, 'download', 'SRA downloads', ASSEMBLE_FAMLI_DEFAULTS.download);
withResourceOptions(assembleFamli, 'fastqp', 'fastqp', ASSEMBLE_FAMLI_DEFAULTS.fastqp);
withResourceOptions(assembleFamli, 'assemble', 'metaSPAdes', ASSEMBLE_FAMLI_DEFAULTS.assemble);
withResourceOptions(assembleFamli, 'annotate', 'Prokka', ASSEMBLE_FAMLI_DEFAULTS.annotate);
withResourceOptions(assembleFamli, 'integrate', 'assembly integration', ASSEMBLE_FAMLI_DEFAULTS.integrate);
withResourceOptions(assembleFamli, 'famli', 'FAMLI', ASSEMBLE_FAMLI_DEFAULTS.famli);
program.addCommand(assembleFamli.action(assembleFamliCommand));

const mapFamli = new Command('map-famli')
  .description('Profile each sample with FAMLI against an existing protein database')
  .requiredOption('--project <name>', 'Project name (letters, digits and underscores)')
  .requiredOption('--ref-db <uri>', 'DIAMOND database to align against')
  .option('--famli-folder <folder>', 'Subfolder of the output folder for FAMLI results', MAP_FAMLI_DEFAULTS.famliFolder);
withDatasetOptions(mapFamli);
withCommonOptions(mapFamli);
withResourceOptions(mapFamli, 'famli', 'FAMLI', MAP_FAMLI_DEFAULTS.famli);
withResourceOptions(mapFamli, 'download', 'SRA downloads', MAP_FAMLI_DEFAULTS.download);
program.addCommand(mapFamli.action(mapFamliCommand));

const humann2 = new Command('humann2')
  .description('Functional profiles of each sample with HUMAnN2, plus read quality summaries')
  .requiredOption('--ref-db <dir>', 'Host directory of the HUMAnN2 databases');
withDatasetOptions(humann2);
withCommonOptions(humann2);
withResourceOptions(humann2, 'humann2', 'HUMAnN2', HUMANN2_DEFAULTS.humann2);
withResourceOptions(humann2, 'fastqp', 'fastqp', HUMANN2_DEFAULTS.fastqp);
withResourceOptions(humann2, 'download', 'SRA downloads', HUMANN2_DEFAULTS.download);
program.addCommand(humann2.action(humann2Command));

const findViralContigs = new Command('find-viral-contigs').description(
  'Score the assembled contigs of each sample with VirFinder'
);
withDatasetTableOptions(findViralContigs, 'fasta', 'contigs');
withCommonOptions(findViralContigs);
withResourceOptions(findViralContigs, 'virfinder', 'VirFinder', FIND_VIRAL_CONTIGS_DEFAULTS.virfinder);
program.addCommand(findViralContigs.action(findViralContigsCommand));

const fetchPatricFunctions = new Command('fetch-patric-functions')
  .description('Fetch PATRIC genomes and tabulate functions against their 16S transcripts')
  .requiredOption('--genomes <file>', 'Table listing the genomes')
  .option('--genome-column <name>', 'Column with the PATRIC genome identifier', 'genome_id')
  .option('--separator <char>', 'Field separator of the genome table', '\t')
  .option('--ftp-root <url>', 'Server holding the genomes', FETCH_PATRIC_FUNCTIONS_DEFAULTS.ftpRoot);
withCommonOptions(fetchPatricFunctions);
withResourceOptions(fetchPatricFunctions, 'transfer', 'downloads', FETCH_PATRIC_FUNCTIONS_DEFAULTS.transfer);
program.addCommand(fetchPatricFunctions.action(fetchPatricFunctionsCommand));

program.parse();
