/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Settings shared by the pipelines, and the container settings derived from
 * them.
 */

import {
  InvalidOptionError,
  normalizeFolder,
  type ContainerEngineKind,
  type ContainerSettings,
  type Mount,
} from '@seqflow/core';
import { InvalidAccessionError, InvalidProjectNameError } from './errors.js';

/** Where the reads of a dataset come from */
export type InputLocation = 'S3' | 'SRA';

export const INPUT_LOCATIONS: readonly InputLocation[] = ['S3', 'SRA'];

/** Default batch queue */
export const DEFAULT_BATCH_QUEUE = 'optimal';

/**
 * Where container tasks run. Shared by every container task of a pipeline.
 */
export interface Placement {
  engine: ContainerEngineKind;
  /** Batch queue (batch engine only) */
  queue?: string;
  /** Execution role for batch jobs */
  jobRole?: string;
  /** Host directory for sandboxes */
  scratchRoot?: string;
  /** Extra mounts, e.g. a shared reference directory */
  mounts?: Mount[];
}

/** CPU and memory of one container task */
export interface Resources {
  threads: number;
  memoryMb: number;
}

/**
 * Container settings for a task.
 *
 * @param jobNamePrefix - Prefix for the job name (default: the task name)
 */
export function containerSettings(
  resources: Resources,
  placement: Placement,
  jobNamePrefix?: string
): ContainerSettings {
  return {
    vcpus: resources.threads,
    memoryMb: resources.memoryMb,
    engine: placement.engine,
    queue: placement.queue,
    jobRole: placement.jobRole,
    scratchRoot: placement.scratchRoot,
    mounts: placement.mounts,
    jobNamePrefix,
  };
}

/**
 * Output folder in its canonical form (one trailing `/`).
 *
 * @throws {InvalidOptionError} If the folder is empty
 */
export function outputFolder(folder: string): string {
  const normalized = normalizeFolder(folder);
  if (normalized === '') {
    throw new InvalidOptionError('output-folder', 'must not be empty');
  }
  return normalized;
}

/**
 * @throws {InvalidOptionError} Unless the value is S3 or SRA
 */
export function parseInputLocation(value: string): InputLocation {
  const location = INPUT_LOCATIONS.find((l) => l === value);
  if (location === undefined) {
    throw new InvalidOptionError('input-location', `expected S3 or SRA, got '${value}'`);
  }
  return location;
}

/**
 * @throws {InvalidProjectNameError} Unless the name is non-empty letters, digits and underscores
 */
export function validateProjectName(name: string): string {
  if (!/^[A-Za-z0-9_]+$/.test(name)) {
    throw new InvalidProjectNameError(name);
  }
  return name;
}

/**
 * @throws {InvalidAccessionError} Unless the accession starts with SRR
 */
export function validateAccession(sample: string, accession: string): string {
  if (!accession.startsWith('SRR')) {
    throw new InvalidAccessionError(sample, accession);
  }
  return accession;
}
