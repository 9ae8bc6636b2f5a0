/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Conversion of command-line options into runtime configuration.
 *
 * Every option arrives as a string from commander. It is validated and
 * converted once here; the result is frozen and passed down unchanged.
 */

import { tmpdir } from 'os';
import { resolve } from 'path';
import {
  DEFAULT_MAX_REMOTE_JOBS,
  InvalidOptionError,
  type ContainerEngineKind,
} from '@seqflow/core';
import { outputFolder, type Placement, type Resources } from '@seqflow/pipelines';

/** Options shared by every pipeline command, as commander gives them */
export interface CommonOptions {
  outputFolder: string;
  engine: string;
  batchQueue: string;
  jobRoleArn?: string;
  workers: string;
  maxRemoteJobs: string;
  scratchDir?: string;
  storeRoot: string;
  pollInterval: string;
  retries: string;
  dryRun?: boolean;
}

export interface RuntimeConfig {
  /** Ends with exactly one `/` */
  readonly outputFolder: string;
  readonly placement: Readonly<Placement>;
  readonly workers: number;
  readonly maxRemoteJobs: number;
  readonly pollIntervalMs: number;
  readonly retries: number;
  /** Absolute */
  readonly scratchDir: string;
  /** Absolute; backs `s3://` URIs */
  readonly storeRoot: string;
  readonly dryRun: boolean;
}

const ENGINES: readonly ContainerEngineKind[] = ['docker', 'batch'];

/**
 * Parse a whole number of at least `min`.
 *
 * @throws {InvalidOptionError}
 */
export function parseInteger(option: string, value: string, min: number): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (trimmed === '' || !Number.isInteger(parsed) || parsed < min) {
    throw new InvalidOptionError(option, `expected an integer of at least ${min}, got '${value}'`);
  }
  return parsed;
}

/**
 * @throws {InvalidOptionError} Unless the value is docker or batch
 */
export function parseEngine(value: string): ContainerEngineKind {
  const engine = ENGINES.find((e) => e === value);
  if (engine === undefined) {
    throw new InvalidOptionError('engine', `expected docker or batch, got '${value}'`);
  }
  return engine;
}

/**
 * Resources of one pipeline step from its `--<step>-threads` and
 * `--<step>-mem` flags, falling back to the step's defaults.
 */
export function parseResources(
  step: string,
  threads: string | undefined,
  memoryMb: string | undefined,
  defaults: Resources
): Resources {
  return {
    threads: threads === undefined ? defaults.threads : parseInteger(`${step}-threads`, threads, 1),
    memoryMb: memoryMb === undefined ? defaults.memoryMb : parseInteger(`${step}-mem`, memoryMb, 1),
  };
}

/**
 * Validate the shared options.
 *
 * @throws {InvalidOptionError} On the first invalid option
 */
export function parseRuntimeConfig(options: CommonOptions): RuntimeConfig {
  const engine = parseEngine(options.engine);
  const placement: Placement =
    engine === 'batch'
      ? { engine, queue: options.batchQueue, jobRole: options.jobRoleArn }
      : { engine };

  return Object.freeze({
    outputFolder: outputFolder(options.outputFolder),
    placement: Object.freeze(placement),
    workers: parseInteger('workers', options.workers, 1),
    maxRemoteJobs: parseInteger('max-remote-jobs', options.maxRemoteJobs, 1),
    pollIntervalMs: parseInteger('poll-interval', options.pollInterval, 0) * 1000,
    retries: parseInteger('retries', options.retries, 0),
    scratchDir: resolve(options.scratchDir ?? tmpdir()),
    storeRoot: resolve(options.storeRoot),
    dryRun: options.dryRun === true,
  });
}

/** Defaults of the shared options, as commander strings */
export const COMMON_DEFAULTS = {
  engine: 'docker',
  workers: '4',
  maxRemoteJobs: String(DEFAULT_MAX_REMOTE_JOBS),
  storeRoot: '.',
  pollInterval: '5',
  retries: '0',
} as const;
