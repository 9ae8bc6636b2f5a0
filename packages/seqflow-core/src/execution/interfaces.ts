/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Execution abstraction interfaces for container tasks.
 *
 * These interfaces separate the sandbox protocol from the thing that runs
 * containers, enabling:
 * - ContainerExecutor + DockerEngine: containers on this host
 * - ContainerExecutor + MockContainerEngine: tests, no Docker needed
 * - BatchBackend: jobs submitted to a batch service and polled
 */

import type { CommandPart } from '../tasks/command.js';
import type { Mount } from '../tasks/types.js';
import type { ExecutionError } from '../errors.js';

// =============================================================================
// Jobs
// =============================================================================

/**
 * Self-contained description of one container task invocation.
 *
 * Everything needed to run the task elsewhere: a batch backend receives
 * exactly this.
 */
export interface ContainerJob {
  /** Job name; characters outside `[a-zA-Z0-9-_]` already replaced */
  name: string;
  /** Name of the task this job runs */
  task: string;
  image: string;
  command: CommandPart[];
  /** Input slot -> URI (single slots) or URIs (collection slots) */
  inputs: Record<string, string | string[]>;
  /** Output slot -> URI */
  outputs: Record<string, string>;
  vcpus: number;
  memoryMb: number;
  /** Extra mounts besides the sandbox */
  mounts: Mount[];
  /** Host directory for the sandbox (default: the executor's) */
  scratchRoot?: string;
  /** Batch queue identifier */
  queue?: string;
  /** Execution role for batch jobs */
  jobRole?: string;
}

/**
 * States of one container task attempt.
 *
 * PENDING -> RESOLVING_INPUTS -> RUNNING -> PUBLISHING -> COMPLETE, with a
 * move to FAILED allowed from any non-terminal state.
 */
export type ContainerTaskState =
  | 'PENDING'
  | 'RESOLVING_INPUTS'
  | 'RUNNING'
  | 'PUBLISHING'
  | 'COMPLETE'
  | 'FAILED';

// =============================================================================
// Container Engines
// =============================================================================

/**
 * A fully resolved container invocation.
 */
export interface ContainerRun {
  /** Container name, unique per invocation */
  name: string;
  image: string;
  /** Argument vector; the first element is the program */
  args: string[];
  /** Working directory inside the container (the sandbox) */
  workdir: string;
  mounts: Mount[];
  vcpus: number;
  memoryMb: number;
}

export interface ContainerRunOptions {
  /** AbortSignal; kills the container */
  signal?: AbortSignal;
  /** Kill the container after this many milliseconds */
  timeout?: number;
  /** Called with each chunk of stdout or stderr */
  onOutput?: (data: string) => void;
}

export interface ContainerRunResult {
  /** Process exit code, null if killed or never started */
  exitCode: number | null;
  /** Combined stdout and stderr */
  output: string;
  /** Why the container did not run or exit normally */
  error?: string;
}

/**
 * Runs containers.
 *
 * Implementations:
 * - DockerEngine: `docker run` as a child process
 * - MockContainerEngine: calls a handler, records runs
 */
export interface ContainerEngine {
  run(run: ContainerRun, options?: ContainerRunOptions): Promise<ContainerRunResult>;
}

// =============================================================================
// Container Executor
// =============================================================================

export interface ContainerExecuteOptions {
  signal?: AbortSignal;
  /** Kill the container after this many milliseconds */
  timeout?: number;
  /** Called on every state transition */
  onStateChange?: (state: ContainerTaskState, previous: ContainerTaskState) => void;
  onOutput?: (data: string) => void;
}

/**
 * Outcome of one container task attempt.
 */
export interface ContainerExecutionResult {
  state: 'COMPLETE' | 'FAILED';
  /** Container exit code (null if the container never ran or was killed) */
  exitCode: number | null;
  /** Combined container output */
  output: string;
  /** Set when state is FAILED */
  error?: ExecutionError;
  /** Sandbox path used by the attempt (already removed) */
  sandbox: string;
  /** Number of inputs downloaded into the sandbox */
  materialized: number;
  /** Milliseconds */
  duration: number;
}

// =============================================================================
// Batch Backends
// =============================================================================

/** Handle to a submitted batch job */
export interface BatchJobHandle {
  readonly id: string;
  readonly name: string;
}

/** Status of a batch job as reported by the backend */
export type BatchJobStatus =
  | { state: 'queued' }
  | { state: 'running' }
  | { state: 'succeeded' }
  | { state: 'failed'; reason: string; exitCode?: number | null; output?: string };

/**
 * A remote batch compute service.
 *
 * Transport failures worth retrying are reported as TransientBackendError;
 * anything else fails the task.
 *
 * Implementations:
 * - LocalBatchBackend: runs jobs through a ContainerExecutor in the background
 * - MockBatchBackend: scripted statuses, for tests
 */
export interface BatchBackend {
  /** Submit a job; resolves once the backend has accepted it */
  submit(job: ContainerJob): Promise<BatchJobHandle>;
  /** Current status of a job */
  poll(handle: BatchJobHandle): Promise<BatchJobStatus>;
  /** Ask the backend to stop a job */
  cancel(handle: BatchJobHandle, reason: string): Promise<void>;
}
