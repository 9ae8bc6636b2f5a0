/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Container task execution.
 *
 * This module runs one container task attempt:
 * - Creating a sandbox directory unique to the attempt
 * - Materializing remote inputs into the sandbox (local inputs are mounted in place)
 * - Allocating output paths and rendering the command
 * - Running the container through a ContainerEngine
 * - Checking outputs and publishing them to their Targets
 * - Removing the sandbox, whatever happened
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { randomBytes } from 'crypto';
import { tmpdir } from 'os';
import {
  CommandFailedError,
  ConfigurationError,
  ExecutionError,
  MaterializationError,
  ObjectNotFoundError,
  OutputEmptyError,
  OutputMissingError,
  errorMessage,
} from '../errors.js';
import { sanitizeJobName, uriBasename } from '../paths.js';
import type { Target } from '../targets/Target.js';
import type { TargetResolver } from '../targets/TargetResolver.js';
import { renderCommand } from '../tasks/command.js';
import type { Mount } from '../tasks/types.js';
import { statOrNull } from '../storage/local/localHelpers.js';
import type {
  ContainerEngine,
  ContainerExecuteOptions,
  ContainerExecutionResult,
  ContainerJob,
  ContainerTaskState,
} from './interfaces.js';

const TRANSITIONS: Record<ContainerTaskState, readonly ContainerTaskState[]> = {
  PENDING: ['RESOLVING_INPUTS', 'FAILED'],
  RESOLVING_INPUTS: ['RUNNING', 'FAILED'],
  RUNNING: ['PUBLISHING', 'FAILED'],
  PUBLISHING: ['COMPLETE', 'FAILED'],
  COMPLETE: [],
  FAILED: [],
};

/**
 * State of one attempt. Rejects transitions outside the state machine, so a
 * FAILED attempt can never run again.
 */
export class ContainerAttempt {
  private current: ContainerTaskState = 'PENDING';

  constructor(
    private readonly onStateChange?: (state: ContainerTaskState, previous: ContainerTaskState) => void
  ) {}

  get state(): ContainerTaskState {
    return this.current;
  }

  transition(next: ContainerTaskState): void {
    const previous = this.current;
    if (!TRANSITIONS[previous].includes(next)) {
      throw new Error(`Invalid container task transition ${previous} -> ${next}`);
    }
    this.current = next;
    this.onStateChange?.(next, previous);
  }
}

export interface ContainerExecutorOptions {
  /** Maps job URIs to Targets */
  resolver: TargetResolver;
  /** Runs the containers */
  engine: ContainerEngine;
  /** Host directory for sandboxes when the job names none (default: OS temp dir) */
  scratchRoot?: string;
}

/** Resolved input paths, and mounts for inputs used in place */
interface ResolvedInputs {
  paths: Record<string, string | string[]>;
  mounts: Mount[];
  materialized: number;
}

/**
 * Runs container jobs through the sandbox protocol.
 */
export class ContainerExecutor {
  private readonly resolver: TargetResolver;
  private readonly engine: ContainerEngine;
  private readonly scratchRoot: string;

  constructor(options: ContainerExecutorOptions) {
    this.resolver = options.resolver;
    this.engine = options.engine;
    this.scratchRoot = options.scratchRoot ?? tmpdir();
  }

  /**
   * Run one attempt of a container job.
   *
   * Execution problems (non-zero exit, missing or empty output, failed
   * download or upload) produce a FAILED result.
   *
   * @throws {ConfigurationError} If the job itself is malformed
   */
  async execute(
    job: ContainerJob,
    options: ContainerExecuteOptions = {}
  ): Promise<ContainerExecutionResult> {
    const startTime = Date.now();
    const attempt = new ContainerAttempt(options.onStateChange);
    const suffix = randomBytes(4).toString('hex');
    const sandboxName = `${sanitizeJobName(job.name)}-${suffix}`;
    const sandbox = path.join(job.scratchRoot ?? this.scratchRoot, sandboxName);

    let exitCode: number | null = null;
    let output = '';
    let materialized = 0;
    const published: Target[] = [];

    await fs.mkdir(sandbox, { recursive: true });
    try {
      // Step 1: Resolve inputs
      attempt.transition('RESOLVING_INPUTS');
      const inputs = await this.resolveInputs(job, sandbox);
      materialized = inputs.materialized;

      // Step 2: Allocate outputs
      const outputs = allocateOutputs(job.outputs, sandbox);
      for (const outputPath of Object.values(outputs)) {
        await fs.mkdir(path.dirname(outputPath), { recursive: true });
      }

      // Step 3: Render command
      const args = renderCommand(job.task, job.command, {
        inputs: inputs.paths,
        outputs,
        scratch: sandbox,
      });

      // Step 4: Run
      attempt.transition('RUNNING');
      const result = await this.engine.run(
        {
          name: sandboxName,
          image: job.image,
          args,
          workdir: sandbox,
          mounts: [
            { hostPath: sandbox, containerPath: sandbox, mode: 'rw' },
            ...inputs.mounts,
            ...job.mounts,
          ],
          vcpus: job.vcpus,
          memoryMb: job.memoryMb,
        },
        { signal: options.signal, timeout: options.timeout, onOutput: options.onOutput }
      );
      exitCode = result.exitCode;
      output = result.output;

      // Step 5: Non-zero exit publishes nothing
      if (result.exitCode !== 0) {
        const captured = result.error ? `${output}${result.error}\n` : output;
        throw new CommandFailedError(job.task, result.exitCode, captured);
      }

      // Step 6: Every output must exist and be non-empty before any is published
      for (const [slot, localPath] of Object.entries(outputs)) {
        const stats = await statOrNull(localPath);
        if (stats === null) throw new OutputMissingError(job.task, slot, localPath);
        if (stats.size === 0) throw new OutputEmptyError(job.task, slot, localPath);
      }

      attempt.transition('PUBLISHING');
      for (const [slot, localPath] of Object.entries(outputs)) {
        const target = this.resolver.resolve(job.outputs[slot]);
        try {
          await target.publish(localPath);
        } catch (err) {
          throw new ExecutionError(
            `Failed to publish output '${slot}' of task '${job.task}' to '${target.uri}': ${errorMessage(err)}`
          );
        }
        published.push(target);
      }

      attempt.transition('COMPLETE');
      return {
        state: 'COMPLETE',
        exitCode,
        output,
        sandbox,
        materialized,
        duration: Date.now() - startTime,
      };
    } catch (err) {
      // Outputs already published by this attempt are withdrawn
      await this.rollback(published);
      if (attempt.state !== 'FAILED') attempt.transition('FAILED');

      if (err instanceof ConfigurationError) throw err;
      const error =
        err instanceof ExecutionError
          ? err
          : new ExecutionError(`Task '${job.task}' failed: ${errorMessage(err)}`);
      return {
        state: 'FAILED',
        exitCode,
        output,
        error,
        sandbox,
        materialized,
        duration: Date.now() - startTime,
      };
    } finally {
      await fs.rm(sandbox, { recursive: true, force: true }).catch((err: unknown) => {
        console.warn(`Failed to remove sandbox ${sandbox}: ${errorMessage(err)}`);
      });
    }
  }

  /**
   * Give every input a local path.
   *
   * Remote inputs are downloaded to `input/<slot>/<index>/<basename>`, so
   * two inputs with the same basename never collide.
   */
  private async resolveInputs(job: ContainerJob, sandbox: string): Promise<ResolvedInputs> {
    const resolved: ResolvedInputs = { paths: {}, mounts: [], materialized: 0 };

    for (const [slot, bound] of Object.entries(job.inputs)) {
      const uris = Array.isArray(bound) ? bound : [bound];
      const paths: string[] = [];

      for (const [index, uri] of uris.entries()) {
        const target = this.resolver.resolve(uri);
        if (target.kind === 'local') {
          if (!(await target.exists())) {
            throw new MaterializationError(uri, new ObjectNotFoundError(uri));
          }
          const localPath = await target.materialize(sandbox);
          resolved.mounts.push({ hostPath: localPath, containerPath: localPath, mode: 'ro' });
          paths.push(localPath);
        } else {
          const dir = path.join(sandbox, 'input', slot, String(index));
          await fs.mkdir(dir, { recursive: true });
          paths.push(await target.materialize(dir));
          resolved.materialized++;
        }
      }

      resolved.paths[slot] = Array.isArray(bound) ? paths : paths[0];
    }
    return resolved;
  }

  private async rollback(published: Target[]): Promise<void> {
    for (const target of published) {
      try {
        await target.remove();
      } catch (err) {
        console.warn(`Failed to remove partially published output ${target.uri}: ${errorMessage(err)}`);
      }
    }
  }
}

/**
 * Sandbox paths for a job's outputs.
 *
 * Outputs go to `output/<basename>`; when two outputs share a basename each
 * of them goes to `output/<slot>/<basename>` instead.
 */
export function allocateOutputs(
  outputs: Record<string, string>,
  sandbox: string
): Record<string, string> {
  const counts = new Map<string, number>();
  for (const uri of Object.values(outputs)) {
    const base = uriBasename(uri);
    counts.set(base, (counts.get(base) ?? 0) + 1);
  }

  const allocated: Record<string, string> = {};
  for (const [slot, uri] of Object.entries(outputs)) {
    const base = uriBasename(uri);
    allocated[slot] =
      (counts.get(base) ?? 0) > 1
        ? path.join(sandbox, 'output', slot, base)
        : path.join(sandbox, 'output', base);
  }
  return allocated;
}
