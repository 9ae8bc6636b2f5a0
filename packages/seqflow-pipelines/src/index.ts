/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * seqflow pipelines - microbiome task definitions and workflows
 */

export { InvalidProjectNameError, InvalidAccessionError } from './errors.js';

export {
  INPUT_LOCATIONS,
  DEFAULT_BATCH_QUEUE,
  containerSettings,
  outputFolder,
  parseInputLocation,
  validateProjectName,
  validateAccession,
  type InputLocation,
  type Placement,
  type Resources,
} from './settings.js';

// Tasks
export {
  loadFile,
  fastqp,
  famli,
  writeManifest,
  FASTQP_IMAGE,
  FAMLI_IMAGE,
  type FastqpParams,
  type FamliParams,
  type ManifestParams,
} from './tasks/general.js';
export { importSraFastq, GET_SRA_IMAGE, type ImportSraFastqParams } from './tasks/sra.js';
export {
  assembleMetaSpades,
  annotateProkka,
  checkm,
  integrateAssemblies,
  METASPADES_IMAGE,
  PROKKA_IMAGE,
  CHECKM_IMAGE,
  INTEGRATE_ASSEMBLIES_IMAGE,
  type SampleStepParams,
  type IntegrateAssembliesParams,
} from './tasks/assembly.js';
export {
  mapViruses,
  virFinder,
  MAP_VIRUSES_IMAGE,
  VIRFINDER_IMAGE,
  type MapVirusesParams,
  type VirFinderParams,
} from './tasks/viral.js';
export {
  humann2,
  HUMANN2_IMAGE,
  HUMANN2_REF_DB_MOUNT,
  type Humann2Params,
} from './tasks/biobakery.js';
export {
  transferUrl,
  extract16S,
  link16SFunctions,
  mergeFunctionTables,
  parseFasta,
  is16S,
  countProducts,
  TRANSFER_IMAGE,
  FUNCTION_TABLE_HEADER,
  type FastaRecord,
  type TransferUrlParams,
  type ReferenceFolderParams,
  type GenomeFunctionsParams,
} from './tasks/patric.js';

// Workflows
export {
  sampleReads,
  validateSampleSources,
  type SampleReadsSettings,
} from './workflows/inputs.js';
export {
  annotateGenomeWorkflow,
  ANNOTATE_GENOME_DEFAULTS,
  type AnnotateGenomeSettings,
} from './workflows/annotateGenome.js';
export {
  mapVirusesWorkflow,
  MAP_VIRUSES_DEFAULTS,
  type MapVirusesSettings,
} from './workflows/mapViruses.js';
export {
  assembleFamliWorkflow,
  ASSEMBLE_FAMLI_DEFAULTS,
  type AssembleFamliSettings,
} from './workflows/assembleFamli.js';
export {
  mapFamliWorkflow,
  MAP_FAMLI_DEFAULTS,
  type MapFamliSettings,
} from './workflows/mapFamli.js';
export {
  humann2Workflow,
  HUMANN2_DEFAULTS,
  type Humann2Settings,
} from './workflows/humann2.js';
export {
  fetchPatricFunctionsWorkflow,
  genomeRows,
  patricGenomeUrl,
  FETCH_PATRIC_FUNCTIONS_DEFAULTS,
  PATRIC_FTP_ROOT,
  type FetchPatricFunctionsSettings,
} from './workflows/fetchPatricFunctions.js';
export {
  findViralContigsWorkflow,
  FIND_VIRAL_CONTIGS_DEFAULTS,
  type FindViralContigsSettings,
} from './workflows/findViralContigs.js';
