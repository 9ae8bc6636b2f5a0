/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Container execution with the local Docker CLI.
 */

import { spawn } from 'child_process';
import type {
  ContainerEngine,
  ContainerRun,
  ContainerRunOptions,
  ContainerRunResult,
} from './interfaces.js';

/** Captured output beyond this many characters keeps only its tail */
export const MAX_CAPTURED_OUTPUT = 1024 * 1024;

/**
 * Arguments for `docker` that run a container invocation.
 *
 * @example
 * ```ts
 * buildDockerArgs({ name: 'fastqp_S1-0a1b2c3d', image: 'quay.io/org/fastqp:v1',
 *   args: ['fastqp', '/scratch/x/in.fq'], workdir: '/scratch/x',
 *   mounts: [{ hostPath: '/scratch/x', containerPath: '/scratch/x', mode: 'rw' }],
 *   vcpus: 1, memoryMb: 4096 });
 * // ['run', '--rm', '--name', 'fastqp_S1-0a1b2c3d', '--cpus', '1', '--memory', '4096m',
 * //  '-v', '/scratch/x:/scratch/x:rw', '-w', '/scratch/x', 'quay.io/org/fastqp:v1',
 * //  'fastqp', '/scratch/x/in.fq']
 * ```
 */
export function buildDockerArgs(run: ContainerRun): string[] {
  const args = [
    'run',
    '--rm',
    '--name',
    run.name,
    '--cpus',
    String(run.vcpus),
    '--memory',
    `${run.memoryMb}m`,
  ];
  for (const mount of run.mounts) {
    args.push('-v', `${mount.hostPath}:${mount.containerPath}:${mount.mode}`);
  }
  args.push('-w', run.workdir, run.image, ...run.args);
  return args;
}

/**
 * ContainerEngine that shells out to `docker run`.
 */
export class DockerEngine implements ContainerEngine {
  constructor(private readonly dockerCommand = 'docker') {}

  async run(run: ContainerRun, options: ContainerRunOptions = {}): Promise<ContainerRunResult> {
    // detached: true puts the CLI in its own process group so the whole group
    // can be signalled through -pid
    const child = spawn(this.dockerCommand, buildDockerArgs(run), {
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true,
    });

    let output = '';
    const capture = (data: Buffer) => {
      const str = data.toString('utf-8');
      output += str;
      if (output.length > MAX_CAPTURED_OUTPUT) {
        output = output.slice(output.length - MAX_CAPTURED_OUTPUT);
      }
      options.onOutput?.(str);
    };

    // Listeners go on before anything else so a fast exit is not missed
    const resultPromise = new Promise<{ exitCode: number | null; error?: string }>((resolve) => {
      child.on('error', (err) => {
        resolve({ exitCode: null, error: `Failed to spawn: ${err.message}` });
      });
      child.on('close', (code) => {
        resolve({ exitCode: code });
      });
    });
    child.stdout.on('data', capture);
    child.stderr.on('data', capture);

    let killReason: string | undefined;
    const kill = (reason: string) => {
      killReason ??= reason;
      if (child.pid !== undefined) {
        try {
          process.kill(-child.pid, 'SIGKILL');
        } catch {
          // already exited
        }
      }
      // killing the CLI does not stop the container itself
      const remover = spawn(this.dockerCommand, ['rm', '-f', run.name], { stdio: 'ignore' });
      remover.on('error', (err) => {
        console.warn(`Failed to remove container ${run.name}: ${err.message}`);
      });
    };
    const onAbort = () => kill('Aborted');

    let timeoutId: NodeJS.Timeout | undefined;
    if (options.timeout !== undefined) {
      timeoutId = setTimeout(() => kill(`Timed out after ${options.timeout}ms`), options.timeout);
    }
    if (options.signal) {
      if (options.signal.aborted) {
        onAbort();
      } else {
        options.signal.addEventListener('abort', onAbort, { once: true });
      }
    }

    try {
      const result = await resultPromise;
      return {
        exitCode: killReason === undefined ? result.exitCode : null,
        output,
        error: killReason ?? result.error,
      };
    } finally {
      if (timeoutId) clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }
}
